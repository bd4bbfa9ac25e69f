/**
 * Permission Resolver.
 *
 * Unions the internal permissions a subject holds on every scope that
 * applies to a target (the target itself plus, for a program, each
 * authoring organization), then collapses them onto API permissions.
 * Reads only; holds no cache, so grant and authoring changes are seen
 * by the next call.
 */

import {
  AccessGrant,
  ApiPermission,
  InternalPermission,
  expandRole,
  isApiPermission,
  toApiPermissions,
} from '../domain/rbac';
import { Program, ProgramType, ScopeKind, ScopeRef, Subject } from '../domain/organization';
import { RegistrarError, unresolvableRoleError, validationError } from '../domain/errors';
import { logger } from '../logger';
import { Store } from '../storage/store';
import { EntityGraph } from './entity-graph';

export interface Decision {
  granted: boolean;
  action: ApiPermission;
  target: ScopeRef;
  apiPermissions: Set<ApiPermission>;
}

export interface PermissionResolverOptions {
  /** Program types on which enrollment permissions are withheld. */
  enrollmentDisabledProgramTypes?: ProgramType[];
}

const ENROLLMENT_PERMISSIONS: readonly ApiPermission[] = [
  ApiPermission.ReadEnrollments,
  ApiPermission.WriteEnrollments,
];

const log = logger.child({ module: 'permission-resolver' });

export class PermissionResolver {
  private readonly disabledProgramTypes: ReadonlySet<ProgramType>;

  constructor(
    private store: Store,
    private graph: EntityGraph,
    options: PermissionResolverOptions = {},
  ) {
    this.disabledProgramTypes = new Set(options.enrollmentDisabledProgramTypes ?? []);
  }

  /** Decide whether the subject may perform `action` on `target`. */
  async resolve(subject: Subject, target: ScopeRef, action: ApiPermission): Promise<Decision> {
    if (!isApiPermission(action)) {
      throw new RegistrarError(validationError(`Unknown action: ${String(action)}`, { action }));
    }
    const apiPermissions = await this.getApiPermissions(subject, target);
    return { granted: apiPermissions.has(action), action, target, apiPermissions };
  }

  /** The API permissions the subject holds on the target. */
  async getApiPermissions(subject: Subject, target: ScopeRef): Promise<Set<ApiPermission>> {
    const { internal, program } = await this.collect(subject.id, target);
    const apiPermissions = toApiPermissions(internal);
    if (program && this.enrollmentsDisabled(program)) {
      for (const permission of ENROLLMENT_PERMISSIONS) apiPermissions.delete(permission);
    }
    return apiPermissions;
  }

  /** Internal permissions, including internal-only ones, over the target's applicable scopes. */
  async getInternalPermissions(subjectId: string, target: ScopeRef): Promise<Set<InternalPermission>> {
    return (await this.collect(subjectId, target)).internal;
  }

  /**
   * Every scope of `kind` on which `resolve` would grant `action`.
   * Walks the subject's grants downward: an organization grant covers the
   * programs it authors.
   */
  async listAuthorizedScopes(subject: Subject, action: ApiPermission, kind: ScopeKind): Promise<Set<string>> {
    if (!isApiPermission(action)) {
      throw new RegistrarError(validationError(`Unknown action: ${String(action)}`, { action }));
    }
    const authorized = new Set<string>();
    const grants = await this.store.accessGrants.listBySubject(subject.id);

    for (const grant of grants) {
      if (!toApiPermissions(this.expand(grant)).has(action)) continue;

      if (kind === 'organization') {
        if (grant.scope.kind === 'organization') authorized.add(grant.scope.id);
        continue;
      }

      const programs =
        grant.scope.kind === 'program'
          ? [await this.graph.getProgram(grant.scope.id)]
          : await this.graph.programsAuthoredBy(grant.scope.id);
      for (const program of programs) {
        if (!program) continue;
        if (ENROLLMENT_PERMISSIONS.includes(action) && this.enrollmentsDisabled(program)) continue;
        authorized.add(program.id);
      }
    }
    return authorized;
  }

  private async collect(
    subjectId: string,
    target: ScopeRef,
  ): Promise<{ internal: Set<InternalPermission>; program?: Program }> {
    const { applicableScopes, program } = await this.graph.resolveTarget(target);
    const internal = new Set<InternalPermission>();
    for (const scope of applicableScopes) {
      const grants = await this.store.accessGrants.listBySubjectAndScope(subjectId, scope);
      for (const grant of grants) {
        for (const permission of this.expand(grant)) internal.add(permission);
      }
    }
    return { internal, program };
  }

  private expand(grant: AccessGrant): InternalPermission[] {
    const permissions = expandRole(grant.role, grant.scope.kind);
    if (permissions === undefined) {
      const error = unresolvableRoleError(grant.role, grant.id);
      log.fatal(error.message, { grantId: grant.id, role: grant.role, subjectId: grant.subjectId });
      throw new RegistrarError(error);
    }
    return permissions;
  }

  private enrollmentsDisabled(program: Program): boolean {
    return this.disabledProgramTypes.has(program.programType);
  }
}
