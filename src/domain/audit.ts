/**
 * Audit trail domain model.
 *
 * Immutable records of grant changes, authorization denials and job
 * lifecycle events.
 */

import { ScopeRef } from './organization';

/** Audit event categories. */
export type AuditAction =
  // Access control
  | 'role.assigned'
  | 'role.revoked'
  | 'access.denied'
  // Jobs
  | 'job.created'
  | 'job.started'
  | 'job.succeeded'
  | 'job.failed'
  | 'job.cancel_requested';

/** Resource types for audit records. */
export type AuditResourceType = 'access-grant' | 'job' | 'organization' | 'program';

/** Audit outcome. */
export type AuditOutcome = 'success' | 'failure' | 'denied';

/** An immutable audit record. */
export interface AuditRecord {
  id: string;
  timestamp: string;
  /** Subject that acted; "system" for executor-driven events. */
  actorId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  /** Scope the action applied to, when there is one. */
  scope?: ScopeRef;
  outcome: AuditOutcome;
  /** Additional context about the action. */
  details?: Record<string, unknown>;
}
