import { ResultArtifact, ResultRef } from '../src/domain/job';
import { Organization, Program, ProgramType, ScopeRef, Subject } from '../src/domain/organization';
import { AccessGrant } from '../src/domain/rbac';
import { EntityGraph } from '../src/authz/entity-graph';
import { ResultStore, resultKey, toBuffer } from '../src/storage/result-store';
import { Store } from '../src/storage/store';

let grantSeq = 0;

export function makeSubject(overrides: Partial<Subject> = {}): Subject {
  return {
    id: 'sub_alice',
    username: 'alice',
    email: 'alice@example.com',
    isStaff: false,
    createdAt: '2026-01-01T00:00:00Z',
    lastSeenAt: '2026-01-01T00:00:00Z',
    ...overrides,
  };
}

/** Persist a subject so services that look it up can find it. */
export async function addSubject(store: Store, overrides: Partial<Subject> = {}): Promise<Subject> {
  return store.subjects.create(makeSubject(overrides));
}

/** Write a grant straight to the store, bypassing the authority check. */
export async function seedGrant(store: Store, subjectId: string, role: string, scope: ScopeRef): Promise<AccessGrant> {
  grantSeq++;
  return store.accessGrants.create({
    id: `grt_seed_${grantSeq}`,
    subjectId,
    role,
    scope,
    createdAt: '2026-01-01T00:00:00Z',
  });
}

export interface World {
  acme: Organization;
  globex: Organization;
  initech: Organization;
  /** Managed by Acme. */
  acmeMba: Program;
  /** Managed by Globex, co-authored by Acme. */
  jointMasters: Program;
  /** Managed by Initech alone. */
  initechBachelors: Program;
}

export async function buildWorld(graph: EntityGraph): Promise<World> {
  const acme = await graph.createOrganization({ key: 'acme', uuid: 'uuid-acme', name: 'Acme University' });
  const globex = await graph.createOrganization({ key: 'globex', uuid: 'uuid-globex', name: 'Globex Institute' });
  const initech = await graph.createOrganization({ key: 'initech', uuid: 'uuid-initech', name: 'Initech College' });
  const acmeMba = await graph.createProgram({
    key: 'acme-mba',
    uuid: 'uuid-acme-mba',
    title: 'Acme MBA',
    programType: ProgramType.Masters,
    managingOrganizationId: acme.id,
  });
  const jointMasters = await graph.createProgram({
    key: 'joint-masters',
    uuid: 'uuid-joint-masters',
    title: 'Joint Masters',
    programType: ProgramType.Masters,
    managingOrganizationId: globex.id,
    authoringOrganizationIds: [acme.id],
  });
  const initechBachelors = await graph.createProgram({
    key: 'initech-bachelors',
    uuid: 'uuid-initech-bachelors',
    title: 'Initech Bachelors',
    programType: ProgramType.Bachelors,
    managingOrganizationId: initech.id,
  });
  return { acme, globex, initech, acmeMba, jointMasters, initechBachelors };
}

export function orgScope(org: Organization): ScopeRef {
  return { kind: 'organization', id: org.id };
}

export function programScope(program: Program): ScopeRef {
  return { kind: 'program', id: program.id };
}

/** Result store kept in a map. */
export class InMemoryResultStore implements ResultStore {
  readonly backend = 'filesystem' as const;
  readonly objects = new Map<string, ResultArtifact>();
  failPuts = false;

  async put(jobId: string, payload: Buffer | string, contentType: string): Promise<ResultRef> {
    if (this.failPuts) throw new Error('disk full');
    const key = resultKey(jobId, contentType);
    this.objects.set(key, { payload: toBuffer(payload), contentType });
    return { backend: this.backend, key };
  }

  async get(ref: ResultRef): Promise<ResultArtifact | null> {
    return this.objects.get(ref.key) ?? null;
  }

  async getUrl(ref: ResultRef): Promise<string | null> {
    return this.objects.has(ref.key) ? `memory://${ref.key}` : null;
  }
}

/** Parse a stored artifact as JSON. */
export function artifactJson<T = unknown>(artifact: ResultArtifact | null | undefined): T {
  if (!artifact) throw new Error('artifact missing');
  return JSON.parse(artifact.payload.toString('utf8'));
}
