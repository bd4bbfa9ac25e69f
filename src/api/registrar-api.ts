/**
 * Registrar API: the surface the request-handling layer calls.
 *
 * authorizeRequest(subject, target, action)  permission decision (denials audited)
 * submitJob(subject, operation, target, body)  create a PENDING job and queue it
 * pollJob(subject, jobId)  job status
 * fetchResult(subject, jobId)  result artifact of a finished job
 * fetchResultUrl(subject, jobId)  download URL of that artifact, minted per call
 * listAuthorizedScopes(subject, action, kind)  scopes where the action is granted
 * getApiPermissions(subject, target)  permissions held on a target
 * cancelJob(subject, jobId, reason?)  request cancellation
 *
 * Targets may be addressed by id or by external key.
 */

import { AuditService } from '../audit/audit-service';
import { EntityGraph } from '../authz/entity-graph';
import { Decision, PermissionResolver } from '../authz/permission-resolver';
import {
  RegistrarError,
  jobNotReadyError,
  notFoundError,
  unauthorizedError,
  validationError,
} from '../domain/errors';
import { JobOperation, JobState, JobView, ResultArtifact, ResultRef, isJobOperation } from '../domain/job';
import { ScopeKind, ScopeLocator, Subject } from '../domain/organization';
import { ApiPermission } from '../domain/rbac';
import { JobExecutor } from '../engine/executor';
import { JobHandlerRegistry } from '../engine/job-handlers';
import { JobRegistry } from '../engine/job-registry';
import { logger } from '../logger';
import { ResultStore } from '../storage/result-store';

export interface RegistrarApiDeps {
  graph: EntityGraph;
  resolver: PermissionResolver;
  registry: JobRegistry;
  executor: JobExecutor;
  handlers: JobHandlerRegistry;
  resultStore: ResultStore;
  audit: AuditService;
}

const log = logger.child({ module: 'registrar-api' });

export class RegistrarApi {
  constructor(private deps: RegistrarApiDeps) {}

  async authorizeRequest(subject: Subject, target: ScopeLocator, action: ApiPermission): Promise<Decision> {
    const ref = await this.deps.graph.locate(target);
    const decision = await this.deps.resolver.resolve(subject, ref, action);
    if (!decision.granted) {
      await this.deps.audit.record({
        actorId: subject.id,
        action: 'access.denied',
        resourceType: ref.kind,
        resourceId: ref.id,
        scope: ref,
        outcome: 'denied',
        details: { action },
      });
    }
    return decision;
  }

  /** Like authorizeRequest, but throws AUTH.UNAUTHORIZED on denial. */
  async requirePermission(subject: Subject, target: ScopeLocator, action: ApiPermission): Promise<Decision> {
    const decision = await this.authorizeRequest(subject, target, action);
    if (!decision.granted) {
      throw new RegistrarError(unauthorizedError(subject.id, action, decision.target));
    }
    return decision;
  }

  /**
   * Validate the payload, create the job and hand it to the executor.
   * Returns the job id without waiting for execution.
   */
  async submitJob(subject: Subject, operation: string, target: ScopeLocator, payload?: unknown): Promise<string> {
    if (!isJobOperation(operation)) {
      throw new RegistrarError(validationError(`Unknown operation: ${operation}`, { operation }));
    }
    const ref = await this.deps.graph.locate(target);
    const validation = this.deps.handlers.validate(operation, payload);
    if (!validation.valid) {
      throw new RegistrarError(
        validationError(`Invalid payload for ${operation}: ${validation.errors.join('; ')}`, {
          operation,
          errors: validation.errors,
        }),
      );
    }

    const job = await this.deps.registry.create(subject, operation, ref);
    this.deps.executor.submit(job.id, payload);
    log.info('Job submitted', { jobId: job.id, operation, target: ref });
    return job.id;
  }

  async pollJob(subject: Subject, jobId: string): Promise<JobView> {
    return this.deps.registry.get(subject, jobId);
  }

  /**
   * The artifact of a finished job: the result of a SUCCEEDED job, or the
   * error summary of a FAILED one.
   */
  async fetchResult(subject: Subject, jobId: string): Promise<ResultArtifact> {
    const resultRef = await this.finishedResultRef(subject, jobId);
    const artifact = await this.deps.resultStore.get(resultRef);
    if (!artifact) {
      log.error('Result artifact missing', { jobId, resultRef });
      throw new RegistrarError(notFoundError('Result', jobId));
    }
    return artifact;
  }

  /**
   * A URL the artifact can be downloaded from, or null when the result
   * store offers none. Presigned URLs differ on every call.
   */
  async fetchResultUrl(subject: Subject, jobId: string): Promise<string | null> {
    return this.deps.resultStore.getUrl(await this.finishedResultRef(subject, jobId));
  }

  private async finishedResultRef(subject: Subject, jobId: string): Promise<ResultRef> {
    const view = await this.deps.registry.get(subject, jobId);
    const finished = view.state === JobState.Succeeded || view.state === JobState.Failed;
    if (!finished || !view.resultRef) {
      throw new RegistrarError(jobNotReadyError(jobId, view.state));
    }
    return view.resultRef;
  }

  async listAuthorizedScopes(subject: Subject, action: ApiPermission, kind: ScopeKind): Promise<Set<string>> {
    return this.deps.resolver.listAuthorizedScopes(subject, action, kind);
  }

  async getApiPermissions(subject: Subject, target: ScopeLocator): Promise<Set<ApiPermission>> {
    const ref = await this.deps.graph.locate(target);
    return this.deps.resolver.getApiPermissions(subject, ref);
  }

  async cancelJob(subject: Subject, jobId: string, reason?: string): Promise<JobView> {
    return this.deps.registry.requestCancel(subject, jobId, reason);
  }

  /** The subject's own jobs, newest first. */
  async listJobs(subject: Subject, options?: { limit?: number; offset?: number }): Promise<JobView[]> {
    return this.deps.registry.list(subject, options);
  }

  /** Operations a job can be submitted for. */
  operations(): JobOperation[] {
    return Object.values(JobOperation);
  }
}
