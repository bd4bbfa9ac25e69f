/**
 * Role-Based Access Control (RBAC) domain model.
 *
 * Roles are bound to an organization or a program scope. A role expands
 * into internal permissions that record the scope kind they were granted
 * on; those collapse many-to-one onto the public API permission
 * vocabulary.
 */

import { ScopeKind, ScopeRef } from './organization';

/** Public actions a caller can request. */
export enum ApiPermission {
  ReadMetadata = 'read_metadata',
  ReadEnrollments = 'read_enrollments',
  WriteEnrollments = 'write_enrollments',
  ReadReports = 'read_reports',
}

/** Fine-grained permissions stored with their granting scope kind. */
export enum InternalPermission {
  OrganizationReadMetadata = 'organization_read_metadata',
  OrganizationReadEnrollments = 'organization_read_enrollments',
  OrganizationWriteEnrollments = 'organization_write_enrollments',
  OrganizationReadReports = 'organization_read_reports',
  OrganizationManageAccess = 'organization_manage_access',

  ProgramReadMetadata = 'program_read_metadata',
  ProgramReadEnrollments = 'program_read_enrollments',
  ProgramWriteEnrollments = 'program_write_enrollments',
  ProgramReadReports = 'program_read_reports',
  ProgramManageAccess = 'program_manage_access',
}

/** Built-in roles. */
export enum Role {
  OrganizationReadMetadata = 'organization_read_metadata',
  OrganizationReadEnrollments = 'organization_read_enrollments',
  OrganizationReadWriteEnrollments = 'organization_read_write_enrollments',
  OrganizationReadReports = 'organization_read_reports',

  ProgramReadMetadata = 'program_read_metadata',
  ProgramReadEnrollments = 'program_read_enrollments',
  ProgramReadWriteEnrollments = 'program_read_write_enrollments',
  ProgramReadReports = 'program_read_reports',

  /** Read and write enrollments; grantable on either scope kind. */
  ProgramManager = 'program_manager',
  /** Assign and revoke roles at the scope. */
  AccessManager = 'access_manager',
}

/** Marker for internal permissions that are never exposed at the API boundary. */
export const INTERNAL_ONLY = 'internal-only';

type PermissionsByScopeKind = Partial<Record<ScopeKind, InternalPermission[]>>;

const P = InternalPermission;

/**
 * Role table. A role lists permissions per scope kind; a kind it does
 * not list cannot carry it.
 */
export const ROLE_PERMISSIONS: Record<Role, PermissionsByScopeKind> = {
  [Role.OrganizationReadMetadata]: {
    organization: [P.OrganizationReadMetadata],
  },
  [Role.OrganizationReadEnrollments]: {
    organization: [P.OrganizationReadMetadata, P.OrganizationReadEnrollments],
  },
  [Role.OrganizationReadWriteEnrollments]: {
    organization: [
      P.OrganizationReadMetadata,
      P.OrganizationReadEnrollments,
      P.OrganizationWriteEnrollments,
    ],
  },
  [Role.OrganizationReadReports]: {
    organization: [P.OrganizationReadMetadata, P.OrganizationReadReports],
  },
  [Role.ProgramReadMetadata]: {
    program: [P.ProgramReadMetadata],
  },
  [Role.ProgramReadEnrollments]: {
    program: [P.ProgramReadMetadata, P.ProgramReadEnrollments],
  },
  [Role.ProgramReadWriteEnrollments]: {
    program: [P.ProgramReadMetadata, P.ProgramReadEnrollments, P.ProgramWriteEnrollments],
  },
  [Role.ProgramReadReports]: {
    program: [P.ProgramReadMetadata, P.ProgramReadReports],
  },
  [Role.ProgramManager]: {
    organization: [
      P.OrganizationReadMetadata,
      P.OrganizationReadEnrollments,
      P.OrganizationWriteEnrollments,
    ],
    program: [P.ProgramReadMetadata, P.ProgramReadEnrollments, P.ProgramWriteEnrollments],
  },
  [Role.AccessManager]: {
    organization: [P.OrganizationReadMetadata, P.OrganizationManageAccess],
    program: [P.ProgramReadMetadata, P.ProgramManageAccess],
  },
};

/** Internal → API collapse. Total over InternalPermission. */
export const INTERNAL_TO_API_PERMISSION: Record<InternalPermission, ApiPermission | typeof INTERNAL_ONLY> = {
  [P.OrganizationReadMetadata]: ApiPermission.ReadMetadata,
  [P.OrganizationReadEnrollments]: ApiPermission.ReadEnrollments,
  [P.OrganizationWriteEnrollments]: ApiPermission.WriteEnrollments,
  [P.OrganizationReadReports]: ApiPermission.ReadReports,
  [P.OrganizationManageAccess]: INTERNAL_ONLY,
  [P.ProgramReadMetadata]: ApiPermission.ReadMetadata,
  [P.ProgramReadEnrollments]: ApiPermission.ReadEnrollments,
  [P.ProgramWriteEnrollments]: ApiPermission.WriteEnrollments,
  [P.ProgramReadReports]: ApiPermission.ReadReports,
  [P.ProgramManageAccess]: INTERNAL_ONLY,
};

/** Permissions that allow managing grants at a scope. */
export const MANAGE_ACCESS_PERMISSIONS: ReadonlySet<InternalPermission> = new Set([
  P.OrganizationManageAccess,
  P.ProgramManageAccess,
]);

/** A role bound to a subject on a scope. */
export interface AccessGrant {
  id: string;
  subjectId: string;
  /** Role name; validated against the role table when the grant is created. */
  role: string;
  scope: ScopeRef;
  createdAt: string;
}

export interface CreateGrantInput {
  subjectId: string;
  role: string;
  scope: ScopeRef;
}

export function isRole(value: string): value is Role {
  return Object.values(Role).some((r) => r === value);
}

export function isApiPermission(value: string): value is ApiPermission {
  return Object.values(ApiPermission).some((p) => p === value);
}

/** True when the role may be granted on scopes of the given kind. */
export function isGrantableOn(role: Role, kind: ScopeKind): boolean {
  return (ROLE_PERMISSIONS[role][kind]?.length ?? 0) > 0;
}

/**
 * Expand a role for a scope kind. Returns undefined when the role is not
 * in the table; an empty list when it is defined but not for that kind.
 */
export function expandRole(role: string, kind: ScopeKind): InternalPermission[] | undefined {
  if (!isRole(role)) return undefined;
  return ROLE_PERMISSIONS[role][kind] ?? [];
}

/** Map internal permissions to the API permissions they expose. */
export function toApiPermissions(internal: Iterable<InternalPermission>): Set<ApiPermission> {
  const result = new Set<ApiPermission>();
  for (const permission of internal) {
    const api = INTERNAL_TO_API_PERMISSION[permission];
    if (api !== INTERNAL_ONLY) result.add(api);
  }
  return result;
}

/**
 * Check the role and mapping tables against the enums. Returns the
 * problems found; an empty list means the tables are complete.
 */
export function checkPermissionMapping(
  roleTable: Record<string, Partial<Record<string, readonly string[]>>> = ROLE_PERMISSIONS,
  mapping: Partial<Record<string, string>> = INTERNAL_TO_API_PERMISSION,
): string[] {
  const problems: string[] = [];
  const known = new Set<string>(Object.values(InternalPermission));
  const apiValues = new Set<string>([...Object.values(ApiPermission), INTERNAL_ONLY]);

  for (const permission of known) {
    const target = mapping[permission];
    if (target === undefined) {
      problems.push(`internal permission "${permission}" has no API mapping`);
    } else if (!apiValues.has(target)) {
      problems.push(`internal permission "${permission}" maps to unknown "${target}"`);
    }
  }
  for (const [role, byKind] of Object.entries(roleTable)) {
    for (const [kind, permissions] of Object.entries(byKind)) {
      for (const permission of permissions ?? []) {
        if (!known.has(permission)) {
          problems.push(`role "${role}" on ${kind} expands to unknown permission "${permission}"`);
        }
      }
    }
  }
  return problems;
}
