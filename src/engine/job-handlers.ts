/**
 * Job handlers: pluggable implementations of the bulk operations.
 *
 * A handler validates its payload at submission time and, once the job
 * is running, produces the artifact. Handlers check `context.checkpoint()`
 * between pages and batches; that is where timeouts and cancellation
 * take effect.
 */

import { EntityGraph } from '../authz/entity-graph';
import { InProgressJob, JobOperation, PartialFailure } from '../domain/job';
import { Organization, Program } from '../domain/organization';
import { EnrollmentProvider } from '../downstream/provider';
import { Logger } from '../logger';

/** Result of a handler's payload validation. */
export interface PayloadValidationResult {
  valid: boolean;
  errors: string[];
}

export type ParseResult<P> = { ok: true; value: P } | { ok: false; errors: string[] };

/** Counters a handler advances as it works; reported when the job fails. */
export interface JobProgress {
  pagesRead: number;
  batchesCompleted: number;
}

/** Execution context provided by the executor. */
export interface JobContext {
  job: InProgressJob;
  /** Present when the job targets a program. */
  program?: Program;
  /** Present when the job targets an organization. */
  organization?: Organization;
  graph: EntityGraph;
  provider: EnrollmentProvider;
  /** Fires on timeout; pass it to every downstream call. */
  signal: AbortSignal;
  writeBatchSize: number;
  progress: JobProgress;
  log: Logger;
  /** Throws once the job has timed out or cancellation was requested. */
  checkpoint(): Promise<void>;
}

/** What a handler produces. */
export interface JobOutput {
  payload: Buffer | string;
  contentType: string;
  partialFailure?: PartialFailure;
}

export interface JobHandler {
  operation: JobOperation;
  validate(payload: unknown): PayloadValidationResult;
  execute(payload: unknown, context: JobContext): Promise<JobOutput>;
}

/** Build a handler from a payload parser and a typed body. */
export function defineJobHandler<P>(
  operation: JobOperation,
  parse: (payload: unknown) => ParseResult<P>,
  run: (payload: P, context: JobContext) => Promise<JobOutput>,
): JobHandler {
  return {
    operation,
    validate(payload) {
      const result = parse(payload);
      return result.ok ? { valid: true, errors: [] } : { valid: false, errors: result.errors };
    },
    async execute(payload, context) {
      const result = parse(payload);
      if (!result.ok) {
        throw new InvalidPayloadError(operation, result.errors);
      }
      return run(result.value, context);
    },
  };
}

/** The payload no longer validates at execution time. */
export class InvalidPayloadError extends Error {
  constructor(
    public readonly operation: JobOperation,
    public readonly errors: string[],
  ) {
    super(`Invalid payload for ${operation}: ${errors.join('; ')}`);
    this.name = 'InvalidPayloadError';
  }
}

/** Registry of job handlers by operation. */
export class JobHandlerRegistry {
  private handlers = new Map<JobOperation, JobHandler>();

  constructor(handlers: JobHandler[] = []) {
    for (const handler of handlers) this.register(handler);
  }

  register(handler: JobHandler): void {
    this.handlers.set(handler.operation, handler);
  }

  get(operation: JobOperation): JobHandler | undefined {
    return this.handlers.get(operation);
  }

  /** Validate a payload against the handler for the operation. */
  validate(operation: JobOperation, payload: unknown): PayloadValidationResult {
    const handler = this.handlers.get(operation);
    if (!handler) {
      return { valid: false, errors: [`No handler registered for operation "${operation}"`] };
    }
    return handler.validate(payload);
  }
}

/** The program a program-targeted job runs against. */
export function requireProgram(context: JobContext): Program {
  if (!context.program) {
    throw new Error(`Job ${context.job.id} does not target a program`);
  }
  return context.program;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
