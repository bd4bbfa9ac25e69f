/**
 * Audit Trail Service.
 *
 * Records immutable audit records for grant changes, denials and job
 * lifecycle events. A failed write is logged; it never fails the
 * operation being audited.
 */

import { v4 as uuid } from 'uuid';
import { AuditRecord, AuditAction, AuditResourceType, AuditOutcome } from '../domain/audit';
import { ScopeRef } from '../domain/organization';
import { logger } from '../logger';
import { AuditQuery, Store } from '../storage/store';

/** Input for creating an audit record. */
export interface AuditInput {
  actorId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  scope?: ScopeRef;
  outcome: AuditOutcome;
  details?: Record<string, unknown>;
}

/** Actor id for events the executor produces. */
export const SYSTEM_ACTOR = 'system';

const log = logger.child({ module: 'audit' });

/** The audit service. */
export class AuditService {
  constructor(private store: Store) {}

  /** Record an audit event. Returns null when the record could not be written. */
  async record(input: AuditInput): Promise<AuditRecord | null> {
    const record: AuditRecord = {
      id: `aud_${uuid()}`,
      timestamp: new Date().toISOString(),
      actorId: input.actorId,
      action: input.action,
      resourceType: input.resourceType,
      resourceId: input.resourceId,
      scope: input.scope,
      outcome: input.outcome,
      details: input.details,
    };

    try {
      return await this.store.audit.create(record);
    } catch (err) {
      log.error('Failed to write audit record', {
        action: input.action,
        resourceId: input.resourceId,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  /** Query audit records. */
  async query(query?: AuditQuery): Promise<AuditRecord[]> {
    return this.store.audit.list(query);
  }
}
