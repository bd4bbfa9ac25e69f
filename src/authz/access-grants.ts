/**
 * Access Grant Service and Subject Directory.
 *
 * Grants bind a role to a subject on an organization or program. Roles
 * are checked against the role table here, when the grant is created,
 * so resolution never meets an unknown role in normal operation.
 */

import { v4 as uuid } from 'uuid';
import { AuditService } from '../audit/audit-service';
import {
  AccessGrant,
  CreateGrantInput,
  MANAGE_ACCESS_PERMISSIONS,
  isGrantableOn,
  isRole,
} from '../domain/rbac';
import { ScopeRef, Subject, VerifiedIdentity } from '../domain/organization';
import {
  RegistrarError,
  invalidRoleError,
  notFoundError,
  unauthorizedError,
  validationError,
} from '../domain/errors';
import { logger } from '../logger';
import { Store } from '../storage/store';
import { EntityGraph } from './entity-graph';
import { PermissionResolver } from './permission-resolver';

const log = logger.child({ module: 'access-grants' });

export class AccessGrantService {
  constructor(
    private store: Store,
    private graph: EntityGraph,
    private resolver: PermissionResolver,
    private audit: AuditService,
  ) {}

  /**
   * Assign a role. Re-assigning an existing (subject, role, scope) triple
   * returns the existing grant.
   */
  async grant(actor: Subject, input: CreateGrantInput): Promise<AccessGrant> {
    if (!isRole(input.role)) {
      throw new RegistrarError(invalidRoleError(input.role));
    }
    if (!isGrantableOn(input.role, input.scope.kind)) {
      throw new RegistrarError(invalidRoleError(input.role, input.scope.kind));
    }
    await this.graph.resolveTarget(input.scope);
    await this.requireManageAccess(actor, input.scope, 'role.assigned');

    const subject = await this.store.subjects.getById(input.subjectId);
    if (!subject) {
      throw new RegistrarError(notFoundError('Subject', input.subjectId));
    }

    const { record: grant, created } = await this.store.accessGrants.createIfAbsent({
      id: `grt_${uuid()}`,
      subjectId: input.subjectId,
      role: input.role,
      scope: input.scope,
      createdAt: new Date().toISOString(),
    });
    if (!created) return grant;

    log.info('Role assigned', { grantId: grant.id, subjectId: grant.subjectId, role: grant.role });
    await this.audit.record({
      actorId: actor.id,
      action: 'role.assigned',
      resourceType: 'access-grant',
      resourceId: grant.id,
      scope: grant.scope,
      outcome: 'success',
      details: { subjectId: grant.subjectId, role: grant.role },
    });
    return grant;
  }

  async revoke(actor: Subject, grantId: string): Promise<void> {
    const grant = await this.store.accessGrants.getById(grantId);
    if (!grant) {
      throw new RegistrarError(notFoundError('AccessGrant', grantId));
    }
    await this.requireManageAccess(actor, grant.scope, 'role.revoked');
    await this.store.accessGrants.delete(grantId);
    log.info('Role revoked', { grantId, subjectId: grant.subjectId, role: grant.role });
    await this.audit.record({
      actorId: actor.id,
      action: 'role.revoked',
      resourceType: 'access-grant',
      resourceId: grantId,
      scope: grant.scope,
      outcome: 'success',
      details: { subjectId: grant.subjectId, role: grant.role },
    });
  }

  async listForSubject(subjectId: string): Promise<AccessGrant[]> {
    return this.store.accessGrants.listBySubject(subjectId);
  }

  /** Staff, or a manage-access permission on the scope or an authoring organization of it. */
  private async requireManageAccess(actor: Subject, scope: ScopeRef, attempted: string): Promise<void> {
    if (actor.isStaff) return;
    const held = await this.resolver.getInternalPermissions(actor.id, scope);
    if ([...held].some((p) => MANAGE_ACCESS_PERMISSIONS.has(p))) return;

    await this.audit.record({
      actorId: actor.id,
      action: 'access.denied',
      resourceType: scope.kind,
      resourceId: scope.id,
      scope,
      outcome: 'denied',
      details: { attempted },
    });
    throw new RegistrarError(unauthorizedError(actor.id, 'manage_access', scope));
  }
}

/** Lazily registers subjects from verified identity claims. */
export class SubjectDirectory {
  constructor(private store: Store) {}

  /** Get or create the subject for the identity, refreshing its claims and lastSeenAt. */
  async authenticate(identity: VerifiedIdentity): Promise<Subject> {
    if (!identity.username) {
      throw new RegistrarError(validationError('Identity has no username'));
    }
    const now = new Date().toISOString();
    const { record, created } = await this.store.subjects.createIfAbsent({
      id: `sub_${uuid()}`,
      username: identity.username,
      email: identity.email,
      isStaff: identity.isStaff ?? false,
      createdAt: now,
      lastSeenAt: now,
    });
    if (created) {
      log.info('Subject registered', { subjectId: record.id, username: record.username });
      return record;
    }
    const updated = await this.store.subjects.update(record.id, {
      email: identity.email,
      isStaff: identity.isStaff ?? record.isStaff,
      lastSeenAt: now,
    });
    if (!updated) throw new RegistrarError(notFoundError('Subject', record.id));
    return updated;
  }

  async get(id: string): Promise<Subject | null> {
    return this.store.subjects.getById(id);
  }
}
