/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends.
 * Every read returns a copy; callers never hold references into the
 * backend's state.
 */

import { AuditAction, AuditRecord } from '../domain/audit';
import { Job } from '../domain/job';
import { Organization, Program, ScopeRef, Subject } from '../domain/organization';
import { AccessGrant } from '../domain/rbac';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Result of a conditional insert: the stored record and whether this call wrote it. */
export interface Inserted<T> {
  record: T;
  created: boolean;
}

export interface OrganizationStore {
  create(organization: Organization): Promise<Organization>;
  getById(id: string): Promise<Organization | null>;
  getByKey(key: string): Promise<Organization | null>;
  delete(id: string): Promise<boolean>;
}

export interface ProgramStore {
  create(program: Program): Promise<Program>;
  getById(id: string): Promise<Program | null>;
  getByKey(key: string): Promise<Program | null>;
  update(id: string, updates: Partial<Omit<Program, 'id'>>): Promise<Program | null>;
  /** Programs whose authoring organizations include the given one. */
  listByAuthoringOrganization(organizationId: string): Promise<Program[]>;
}

export interface SubjectStore {
  create(subject: Subject): Promise<Subject>;
  getById(id: string): Promise<Subject | null>;
  getByUsername(username: string): Promise<Subject | null>;
  /** Insert unless a subject with the same username exists; either way return the stored one. */
  createIfAbsent(subject: Subject): Promise<Inserted<Subject>>;
  update(id: string, updates: Partial<Omit<Subject, 'id'>>): Promise<Subject | null>;
}

export interface AccessGrantStore {
  create(grant: AccessGrant): Promise<AccessGrant>;
  getById(id: string): Promise<AccessGrant | null>;
  /** The grant for an exact (subject, role, scope) triple, if any. */
  find(subjectId: string, role: string, scope: ScopeRef): Promise<AccessGrant | null>;
  /** Insert unless the (subject, role, scope) triple is already granted. */
  createIfAbsent(grant: AccessGrant): Promise<Inserted<AccessGrant>>;
  listBySubject(subjectId: string): Promise<AccessGrant[]>;
  listBySubjectAndScope(subjectId: string, scope: ScopeRef): Promise<AccessGrant[]>;
  countByScope(scope: ScopeRef): Promise<number>;
  delete(id: string): Promise<boolean>;
}

export interface JobStore {
  create(job: Job): Promise<Job>;
  getById(id: string): Promise<Job | null>;
  /**
   * Replace the job only if its stored version still equals
   * `expectedVersion`. Returns the stored job on success, null if the job
   * is missing or was written in the meantime.
   */
  compareAndSet(id: string, expectedVersion: number, next: Job): Promise<Job | null>;
  listByOwner(ownerId: string, options?: ListOptions): Promise<Job[]>;
}

export interface AuditQuery extends ListOptions {
  actorId?: string;
  resourceId?: string;
  action?: AuditAction;
}

export interface AuditStore {
  create(record: AuditRecord): Promise<AuditRecord>;
  list(query?: AuditQuery): Promise<AuditRecord[]>;
}

/** Composite store interface. */
export interface Store {
  organizations: OrganizationStore;
  programs: ProgramStore;
  subjects: SubjectStore;
  accessGrants: AccessGrantStore;
  jobs: JobStore;
  audit: AuditStore;
}
