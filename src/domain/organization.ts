/**
 * Entity model: organizations, the programs they author, and the
 * subjects that act on them.
 *
 * Organizations are the root authorization scope. A program is managed
 * by one organization and may be co-authored by others; authorization
 * never flows from a program back up to an organization.
 */

export interface Organization {
  id: string;
  /** Stable external key (e.g., "acme"). */
  key: string;
  /** Cross-system identifier shared with the catalog service. */
  uuid: string;
  name: string;
  createdAt: string;
}

/** Program type tag from the catalog. */
export enum ProgramType {
  Masters = 'masters',
  Bachelors = 'bachelors',
  MicroMasters = 'micromasters',
  MicroBachelors = 'microbachelors',
  Other = 'other',
}

export interface Program {
  id: string;
  key: string;
  uuid: string;
  title: string;
  programType: ProgramType;
  managingOrganizationId: string;
  /** Always contains managingOrganizationId. */
  authoringOrganizationIds: string[];
  createdAt: string;
}

export type ScopeKind = 'organization' | 'program';

/** Reference to an authorization scope by internal id. */
export type ScopeRef =
  | { kind: 'organization'; id: string }
  | { kind: 'program'; id: string };

/**
 * How callers address a target: by internal id or by external key.
 * Resolved to a ScopeRef through the entity graph.
 */
export type ScopeLocator =
  | ScopeRef
  | { kind: 'organization'; key: string }
  | { kind: 'program'; key: string };

/** An authenticated caller identity. */
export interface Subject {
  id: string;
  username: string;
  email: string;
  /** Administrative override claimed by the identity provider. */
  isStaff: boolean;
  createdAt: string;
  lastSeenAt: string;
}

/** Verified claims handed over by the identity provider. */
export interface VerifiedIdentity {
  username: string;
  email: string;
  isStaff?: boolean;
}

/** Input for registering a program in the entity graph. */
export interface CreateProgramInput {
  key: string;
  uuid: string;
  title: string;
  programType: ProgramType;
  managingOrganizationId: string;
  /** Additional authoring organizations; the managing one is always included. */
  authoringOrganizationIds?: string[];
}

export interface CreateOrganizationInput {
  key: string;
  uuid: string;
  name: string;
}

export function scopeKey(scope: ScopeRef): string {
  return `${scope.kind}:${scope.id}`;
}

export function isProgramType(value: string): value is ProgramType {
  return Object.values(ProgramType).some((t) => t === value);
}
