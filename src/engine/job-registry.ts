/**
 * Job Registry: durable job records and guarded state transitions.
 *
 * Creation is gated by the Permission Resolver. Transitions are applied
 * by compare-and-set on the job's version, so of two concurrent
 * finalizations (a timeout and a late handler, say) exactly one wins.
 */

import { v4 as uuid } from 'uuid';
import { AuditService, SYSTEM_ACTOR } from '../audit/audit-service';
import { PermissionResolver } from '../authz/permission-resolver';
import {
  Job,
  JobChange,
  JobOperation,
  JobState,
  JobView,
  OPERATION_CATALOGUE,
  isJobOperation,
  isTerminalJob,
  resultRefOf,
} from '../domain/job';
import { ScopeRef, Subject } from '../domain/organization';
import {
  RegistrarError,
  invalidTransitionError,
  notFoundError,
  unauthorizedError,
  validationError,
} from '../domain/errors';
import { AuditAction } from '../domain/audit';
import { logger } from '../logger';
import { ListOptions, Store } from '../storage/store';
import { applyJobChange } from './state-machine';

const log = logger.child({ module: 'job-registry' });

const AUDIT_ACTION_BY_STATE: Record<Exclude<JobState, JobState.Pending>, AuditAction> = {
  [JobState.InProgress]: 'job.started',
  [JobState.Succeeded]: 'job.succeeded',
  [JobState.Failed]: 'job.failed',
};

/** Compare-and-set attempts before a write gives up racing other writers. */
const CAS_ATTEMPTS = 3;

export class JobRegistry {
  constructor(
    private store: Store,
    private resolver: PermissionResolver,
    private audit: AuditService,
  ) {}

  /**
   * Authorize and persist a PENDING job. Returns as soon as the record is
   * written; execution is the executor's business.
   */
  async create(subject: Subject, operation: JobOperation, target: ScopeRef): Promise<Job> {
    if (!isJobOperation(operation)) {
      throw new RegistrarError(validationError(`Unknown operation: ${String(operation)}`, { operation }));
    }
    const catalogued = OPERATION_CATALOGUE[operation];
    if (!catalogued.targetKinds.includes(target.kind)) {
      throw new RegistrarError(
        validationError(`Operation ${operation} cannot target a ${target.kind}`, {
          operation,
          allowed: catalogued.targetKinds,
        }),
      );
    }

    const decision = await this.resolver.resolve(subject, target, catalogued.action);
    if (!decision.granted) {
      await this.audit.record({
        actorId: subject.id,
        action: 'access.denied',
        resourceType: target.kind,
        resourceId: target.id,
        scope: target,
        outcome: 'denied',
        details: { operation, action: catalogued.action },
      });
      throw new RegistrarError(unauthorizedError(subject.id, catalogued.action, target));
    }

    const now = new Date().toISOString();
    const job = await this.store.jobs.create({
      id: uuid(),
      ownerId: subject.id,
      operation,
      target,
      createdAt: now,
      updatedAt: now,
      version: 1,
      state: JobState.Pending,
    });
    log.info('Job created', { jobId: job.id, operation, ownerId: subject.id });
    await this.audit.record({
      actorId: subject.id,
      action: 'job.created',
      resourceType: 'job',
      resourceId: job.id,
      scope: target,
      outcome: 'success',
      details: { operation },
    });
    return job;
  }

  /**
   * Apply a state change. A write that lost a race is re-read and
   * re-checked, so a concurrent cancel flag is kept; an illegal change
   * leaves the job unchanged and throws JOB.INVALID_TRANSITION.
   */
  async transition(jobId: string, change: JobChange): Promise<Job> {
    for (let attempt = 1; attempt <= CAS_ATTEMPTS; attempt++) {
      const current = await this.store.jobs.getById(jobId);
      if (!current) {
        throw new RegistrarError(notFoundError('Job', jobId));
      }

      const result = applyJobChange(current, change, new Date().toISOString());
      if (!result.success) {
        log.fatal(result.error.message, { jobId, from: current.state, to: change.state });
        throw new RegistrarError(result.error);
      }

      const stored = await this.store.jobs.compareAndSet(jobId, current.version, result.value);
      if (!stored) continue;

      log.info('Job transitioned', { jobId, from: current.state, to: stored.state });
      await this.audit.record({
        actorId: SYSTEM_ACTOR,
        action: AUDIT_ACTION_BY_STATE[change.state],
        resourceType: 'job',
        resourceId: jobId,
        scope: stored.target,
        outcome: stored.state === JobState.Failed ? 'failure' : 'success',
        details: stored.state === JobState.Failed ? { code: stored.error.code } : undefined,
      });
      return stored;
    }

    const latest = await this.store.jobs.getById(jobId);
    log.fatal('Lost compare-and-set on job transition', { jobId, actual: latest?.state, to: change.state });
    throw new RegistrarError(invalidTransitionError(jobId, latest?.state ?? 'missing', change.state));
  }

  /** Poll a job. Jobs the subject may not see are reported as missing. */
  async get(subject: Subject, jobId: string): Promise<JobView> {
    return this.toView(await this.requireVisible(subject, jobId));
  }

  /** The subject's own jobs, newest first. */
  async list(subject: Subject, options?: ListOptions): Promise<JobView[]> {
    const jobs = await this.store.jobs.listByOwner(subject.id, options);
    return jobs.map((job) => this.toView(job));
  }

  /** Unfiltered read for the executor. */
  async getRecord(jobId: string): Promise<Job | null> {
    return this.store.jobs.getById(jobId);
  }

  /**
   * Flag a job for cancellation. The executor observes the flag between
   * pages and batches; a terminal job is returned unchanged.
   */
  async requestCancel(subject: Subject, jobId: string, reason?: string): Promise<JobView> {
    for (let attempt = 1; attempt <= CAS_ATTEMPTS; attempt++) {
      const job = await this.requireVisible(subject, jobId);
      if (isTerminalJob(job) || job.cancelRequestedAt) return this.toView(job);

      const now = new Date().toISOString();
      const flagged: Job = {
        ...job,
        cancelRequestedAt: now,
        cancelReason: reason,
        updatedAt: now,
        version: job.version + 1,
      };
      const stored = await this.store.jobs.compareAndSet(jobId, job.version, flagged);
      if (stored) {
        log.info('Job cancellation requested', { jobId, requestedBy: subject.id });
        await this.audit.record({
          actorId: subject.id,
          action: 'job.cancel_requested',
          resourceType: 'job',
          resourceId: jobId,
          scope: stored.target,
          outcome: 'success',
          details: reason ? { reason } : undefined,
        });
        return this.toView(stored);
      }
    }
    return this.get(subject, jobId);
  }

  private async requireVisible(subject: Subject, jobId: string): Promise<Job> {
    const job = await this.store.jobs.getById(jobId);
    if (!job || (job.ownerId !== subject.id && !subject.isStaff)) {
      throw new RegistrarError(notFoundError('Job', jobId));
    }
    return job;
  }

  /** Built from the stored record alone, so repeated polls of an unchanged job are equal. */
  private toView(job: Job): JobView {
    const resultRef = resultRefOf(job);
    const view: JobView = {
      id: job.id,
      operation: job.operation,
      target: job.target,
      state: job.state,
      createdAt: job.createdAt,
      updatedAt: job.updatedAt,
      cancelRequested: job.cancelRequestedAt !== undefined,
    };
    if (job.state !== JobState.Pending) view.startedAt = job.startedAt;
    if (job.state === JobState.Succeeded) {
      view.completedAt = job.completedAt;
      view.partialFailure = job.partialFailure;
    }
    if (job.state === JobState.Failed) {
      view.completedAt = job.completedAt;
      view.error = job.error;
    }
    if (resultRef) view.resultRef = resultRef;
    return view;
  }
}
