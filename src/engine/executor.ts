/**
 * Job Executor: runs jobs off the request path.
 *
 * A bounded worker pool pulls submitted jobs from an in-process queue,
 * moves each to IN_PROGRESS, dispatches it to the handler registered for
 * its operation, stores the artifact and finalizes the job. Every job
 * gets a single attempt under a wall-clock timeout; cancellation is
 * observed at the handler's checkpoints.
 */

import { EntityGraph } from '../authz/entity-graph';
import {
  RegistrarError,
  TypedError,
  downstreamFailureError,
  internalError,
  isRegistrarError,
  jobCanceledError,
  jobTimeoutError,
  validationError,
} from '../domain/errors';
import { InProgressJob, JobState, ResultRef } from '../domain/job';
import { DownstreamError, EnrollmentProvider } from '../downstream/provider';
import { Logger, logger } from '../logger';
import { ResultStore } from '../storage/result-store';
import { InvalidPayloadError, JobContext, JobHandlerRegistry, JobOutput, JobProgress } from './job-handlers';
import { JobRegistry } from './job-registry';

/** Executor configuration. */
export interface JobExecutorConfig {
  /** Jobs running at once. */
  concurrency: number;
  /** Wall-clock limit per job. */
  timeoutMs: number;
  writeBatchSize: number;
}

export interface JobExecutorDeps {
  registry: JobRegistry;
  graph: EntityGraph;
  resultStore: ResultStore;
  provider: EnrollmentProvider;
  handlers: JobHandlerRegistry;
}

interface QueuedJob {
  jobId: string;
  payload: unknown;
}

const log = logger.child({ module: 'job-executor' });

export class JobExecutor {
  private queue: QueuedJob[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private deps: JobExecutorDeps,
    private config: JobExecutorConfig,
  ) {}

  /** Queue a PENDING job. Returns immediately; the outcome lands on the job record. */
  submit(jobId: string, payload: unknown): void {
    this.queue.push({ jobId, payload });
    log.debug('Job queued', { jobId, ...this.stats() });
    this.drain();
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Jobs queued and jobs running. */
  stats(): { queued: number; running: number } {
    return { queued: this.queue.length, running: this.running };
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  private drain(): void {
    while (this.running < this.config.concurrency) {
      const next = this.queue.shift();
      if (!next) break;
      this.running++;
      void this.run(next)
        .catch((err: unknown) => {
          log.error('Job run ended without finalizing', {
            jobId: next.jobId,
            error: err instanceof Error ? err.message : String(err),
          });
        })
        .finally(() => {
          this.running--;
          this.drain();
          if (this.isIdle()) {
            const waiters = this.idleWaiters;
            this.idleWaiters = [];
            for (const resolve of waiters) resolve();
          }
        });
    }
  }

  private async run(task: QueuedJob): Promise<void> {
    const started = await this.deps.registry.transition(task.jobId, { state: JobState.InProgress });
    if (started.state !== JobState.InProgress) return;
    const job = started;
    const jobLog = log.child({ jobId: job.id, operation: job.operation });
    const controller = new AbortController();
    const progress: JobProgress = { pagesRead: 0, batchesCompleted: 0 };

    let output: JobOutput;
    let resultRef: ResultRef;
    try {
      output = await executeWithTimeout(
        async () => {
          const context = await this.buildContext(job, controller.signal, progress, jobLog);
          const handler = this.deps.handlers.get(job.operation);
          if (!handler) {
            throw new RegistrarError(internalError(`No handler registered for operation "${job.operation}"`, job.id));
          }
          return handler.execute(task.payload, context);
        },
        this.config.timeoutMs,
        () => controller.abort(),
      );
      resultRef = await this.deps.resultStore.put(job.id, output.payload, output.contentType);
    } catch (err) {
      await this.fail(job, this.describeFailure(err, job.id, progress), progress, jobLog);
      return;
    }

    await this.deps.registry.transition(job.id, {
      state: JobState.Succeeded,
      resultRef,
      partialFailure: output.partialFailure,
    });
    jobLog.info('Job succeeded', { ...progress, partialFailure: output.partialFailure });
  }

  private async buildContext(
    job: InProgressJob,
    signal: AbortSignal,
    progress: JobProgress,
    jobLog: Logger,
  ): Promise<JobContext> {
    const { graph, provider, registry } = this.deps;
    const context: JobContext = {
      job,
      graph,
      provider,
      signal,
      writeBatchSize: this.config.writeBatchSize,
      progress,
      log: jobLog,
      checkpoint: async () => {
        if (signal.aborted) throw new TimeoutError(this.config.timeoutMs);
        const latest = await registry.getRecord(job.id);
        if (latest?.cancelRequestedAt) throw new JobCanceledError(latest.cancelReason);
      },
    };
    if (job.target.kind === 'program') {
      context.program = await graph.requireProgram(job.target.id);
    } else {
      context.organization = await graph.requireOrganization(job.target.id);
    }
    return context;
  }

  private describeFailure(err: unknown, jobId: string, progress: JobProgress): TypedError {
    if (err instanceof TimeoutError) return jobTimeoutError(jobId, err.timeoutMs);
    if (err instanceof JobCanceledError) return jobCanceledError(jobId, err.reason);
    if (err instanceof DownstreamError) {
      return downstreamFailureError(err.message, {
        statusCode: err.statusCode,
        batchesCompleted: progress.batchesCompleted,
        jobId,
      });
    }
    if (isRegistrarError(err)) return err.typedError;
    if (err instanceof InvalidPayloadError) return validationError(err.message, { errors: err.errors });
    return internalError(err instanceof Error ? err.message : String(err), jobId);
  }

  /** Write the error summary, then move the job to FAILED. */
  private async fail(job: InProgressJob, error: TypedError, progress: JobProgress, jobLog: Logger): Promise<void> {
    jobLog.warn('Job failed', { code: error.code, message: error.message, ...progress });
    let resultRef: ResultRef | undefined;
    try {
      resultRef = await this.deps.resultStore.put(
        job.id,
        JSON.stringify({ jobId: job.id, error, progress }),
        'application/json',
      );
    } catch (err) {
      jobLog.error('Could not store error summary', { error: err instanceof Error ? err.message : String(err) });
    }
    await this.deps.registry.transition(job.id, { state: JobState.Failed, error, resultRef });
  }
}

/** Run `fn`, rejecting with TimeoutError (and calling `onTimeout`) if it outlives `timeoutMs`. */
export async function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  onTimeout?: () => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export class TimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Job execution timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Raised at a checkpoint once cancellation was requested. */
export class JobCanceledError extends Error {
  constructor(public reason?: string) {
    super(reason ? `Job canceled: ${reason}` : 'Job canceled');
    this.name = 'JobCanceledError';
  }
}
