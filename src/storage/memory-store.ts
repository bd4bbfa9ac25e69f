/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Records are
 * deep-copied on the way in and out, so a caller mutating a returned
 * object never touches stored state.
 */

import { AuditRecord } from '../domain/audit';
import { Job } from '../domain/job';
import { Organization, Program, ScopeRef, Subject, scopeKey } from '../domain/organization';
import { AccessGrant } from '../domain/rbac';
import {
  Store,
  OrganizationStore,
  ProgramStore,
  SubjectStore,
  AccessGrantStore,
  JobStore,
  AuditStore,
  AuditQuery,
  Inserted,
  ListOptions,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryOrganizationStore implements OrganizationStore {
  private data = new Map<string, Organization>();

  async create(organization: Organization): Promise<Organization> {
    this.data.set(organization.id, deepCopy(organization));
    return deepCopy(organization);
  }

  async getById(id: string): Promise<Organization | null> {
    const org = this.data.get(id);
    return org ? deepCopy(org) : null;
  }

  async getByKey(key: string): Promise<Organization | null> {
    const org = [...this.data.values()].find((o) => o.key === key);
    return org ? deepCopy(org) : null;
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

class MemoryProgramStore implements ProgramStore {
  private data = new Map<string, Program>();

  async create(program: Program): Promise<Program> {
    this.data.set(program.id, deepCopy(program));
    return deepCopy(program);
  }

  async getById(id: string): Promise<Program | null> {
    const program = this.data.get(id);
    return program ? deepCopy(program) : null;
  }

  async getByKey(key: string): Promise<Program | null> {
    const program = [...this.data.values()].find((p) => p.key === key);
    return program ? deepCopy(program) : null;
  }

  async update(id: string, updates: Partial<Omit<Program, 'id'>>): Promise<Program | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: Program = { ...deepCopy(existing), ...deepCopy(updates) };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async listByAuthoringOrganization(organizationId: string): Promise<Program[]> {
    return [...this.data.values()]
      .filter((p) => p.authoringOrganizationIds.includes(organizationId))
      .map(deepCopy);
  }
}

class MemorySubjectStore implements SubjectStore {
  private data = new Map<string, Subject>();

  async create(subject: Subject): Promise<Subject> {
    this.data.set(subject.id, deepCopy(subject));
    return deepCopy(subject);
  }

  async getById(id: string): Promise<Subject | null> {
    const subject = this.data.get(id);
    return subject ? deepCopy(subject) : null;
  }

  async getByUsername(username: string): Promise<Subject | null> {
    const subject = [...this.data.values()].find((s) => s.username === username);
    return subject ? deepCopy(subject) : null;
  }

  async createIfAbsent(subject: Subject): Promise<Inserted<Subject>> {
    const existing = [...this.data.values()].find((s) => s.username === subject.username);
    if (existing) return { record: deepCopy(existing), created: false };
    this.data.set(subject.id, deepCopy(subject));
    return { record: deepCopy(subject), created: true };
  }

  async update(id: string, updates: Partial<Omit<Subject, 'id'>>): Promise<Subject | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: Subject = { ...existing, ...updates };
    this.data.set(id, deepCopy(updated));
    return deepCopy(updated);
  }
}

class MemoryAccessGrantStore implements AccessGrantStore {
  private data = new Map<string, AccessGrant>();

  async create(grant: AccessGrant): Promise<AccessGrant> {
    this.data.set(grant.id, deepCopy(grant));
    return deepCopy(grant);
  }

  async getById(id: string): Promise<AccessGrant | null> {
    const grant = this.data.get(id);
    return grant ? deepCopy(grant) : null;
  }

  async find(subjectId: string, role: string, scope: ScopeRef): Promise<AccessGrant | null> {
    const key = scopeKey(scope);
    const grant = [...this.data.values()].find(
      (g) => g.subjectId === subjectId && g.role === role && scopeKey(g.scope) === key,
    );
    return grant ? deepCopy(grant) : null;
  }

  async createIfAbsent(grant: AccessGrant): Promise<Inserted<AccessGrant>> {
    // Lookup and insert share one synchronous turn.
    const key = scopeKey(grant.scope);
    const existing = [...this.data.values()].find(
      (g) => g.subjectId === grant.subjectId && g.role === grant.role && scopeKey(g.scope) === key,
    );
    if (existing) return { record: deepCopy(existing), created: false };
    this.data.set(grant.id, deepCopy(grant));
    return { record: deepCopy(grant), created: true };
  }

  async listBySubject(subjectId: string): Promise<AccessGrant[]> {
    return [...this.data.values()].filter((g) => g.subjectId === subjectId).map(deepCopy);
  }

  async listBySubjectAndScope(subjectId: string, scope: ScopeRef): Promise<AccessGrant[]> {
    const key = scopeKey(scope);
    return [...this.data.values()]
      .filter((g) => g.subjectId === subjectId && scopeKey(g.scope) === key)
      .map(deepCopy);
  }

  async countByScope(scope: ScopeRef): Promise<number> {
    const key = scopeKey(scope);
    return [...this.data.values()].filter((g) => scopeKey(g.scope) === key).length;
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

class MemoryJobStore implements JobStore {
  private data = new Map<string, Job>();

  async create(job: Job): Promise<Job> {
    this.data.set(job.id, deepCopy(job));
    return deepCopy(job);
  }

  async getById(id: string): Promise<Job | null> {
    const job = this.data.get(id);
    return job ? deepCopy(job) : null;
  }

  async compareAndSet(id: string, expectedVersion: number, next: Job): Promise<Job | null> {
    // Read and write happen in one synchronous turn; no other writer interleaves.
    const current = this.data.get(id);
    if (!current || current.version !== expectedVersion) return null;
    this.data.set(id, deepCopy(next));
    return deepCopy(next);
  }

  async listByOwner(ownerId: string, options?: ListOptions): Promise<Job[]> {
    const items = [...this.data.values()]
      .filter((j) => j.ownerId === ownerId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return applyListOptions(items.map(deepCopy), options);
  }
}

class MemoryAuditStore implements AuditStore {
  private data: AuditRecord[] = [];

  async create(record: AuditRecord): Promise<AuditRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async list(query?: AuditQuery): Promise<AuditRecord[]> {
    const items = this.data.filter(
      (r) =>
        (query?.actorId === undefined || r.actorId === query.actorId) &&
        (query?.resourceId === undefined || r.resourceId === query.resourceId) &&
        (query?.action === undefined || r.action === query.action),
    );
    return applyListOptions(items.map(deepCopy), query);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    organizations: new MemoryOrganizationStore(),
    programs: new MemoryProgramStore(),
    subjects: new MemorySubjectStore(),
    accessGrants: new MemoryAccessGrantStore(),
    jobs: new MemoryJobStore(),
    audit: new MemoryAuditStore(),
  };
}
