/**
 * Typed error model.
 *
 * Failures are described by a TypedError value with a namespaced code.
 * Job failures persist the value on the job record; synchronous service
 * calls throw it wrapped in a RegistrarError.
 */

/** Typed suggested fix a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "JOB.INVALID_TRANSITION"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated job if applicable. */
  jobId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  jobId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    jobId: params.jobId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Exception wrapper used at synchronous service boundaries. */
export class RegistrarError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'RegistrarError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** True when the value is a RegistrarError carrying the given code. */
export function isRegistrarError(err: unknown, code?: string): err is RegistrarError {
  return err instanceof RegistrarError && (code === undefined || err.typedError.code === code);
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
    details: { resourceType, resourceId },
  });
}

export function unauthorizedError(
  subjectId: string,
  action: string,
  target: { kind: string; id: string },
): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHORIZED',
    message: `Subject "${subjectId}" may not ${action} on ${target.kind} ${target.id}`,
    retryable: false,
    details: { subjectId, action, target },
    suggestedFixes: [
      {
        type: 'REQUEST_ACCESS',
        params: { action, scope: target },
        description: 'Ask an administrator of the organization for a role granting this action',
      },
    ],
  });
}

/** Grant creation referenced a role missing from the role table, or one not grantable on the scope kind. */
export function invalidRoleError(role: string, scopeKind?: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.INVALID_ROLE',
    message: scopeKind
      ? `Role "${role}" cannot be granted on a ${scopeKind}`
      : `Unknown role: ${role}`,
    retryable: false,
    details: { role, scopeKind },
  });
}

/** A stored grant references a role the running process does not define. */
export function unresolvableRoleError(role: string, grantId: string): TypedError {
  return createTypedError({
    code: 'AUTH.INVALID_ROLE',
    message: `Grant ${grantId} references undefined role "${role}"`,
    retryable: false,
    details: { role, grantId },
  });
}

export function invalidTransitionError(jobId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'JOB.INVALID_TRANSITION',
    message: `Cannot transition job from "${from}" to "${to}"`,
    jobId,
    retryable: false,
    details: { from, to },
  });
}

export function jobNotReadyError(jobId: string, state: string): TypedError {
  return createTypedError({
    code: 'JOB.NOT_READY',
    message: `Job ${jobId} has no result yet (state: ${state})`,
    jobId,
    retryable: true,
    details: { state },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: 5000 }, description: 'Poll the job until it reaches a terminal state' },
    ],
  });
}

export function jobTimeoutError(jobId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'JOB.TIMEOUT',
    message: `Job exceeded timeout of ${timeoutMs}ms`,
    jobId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'REDUCE_SCOPE', params: {}, description: 'Submit fewer records per job' },
    ],
  });
}

export function jobCanceledError(jobId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'JOB.CANCELED',
    message: reason ? `Job canceled: ${reason}` : 'Job canceled',
    jobId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

/**
 * The downstream enrollment system was unreachable or answered with a
 * fatal status. Terminal for the job; nothing retries it automatically.
 */
export function downstreamFailureError(
  message: string,
  details?: { statusCode?: number; batchesCompleted?: number; jobId?: string },
): TypedError {
  const fixes: SuggestedFix[] = [];
  if (details?.statusCode === 401 || details?.statusCode === 403) {
    fixes.push({
      type: 'CHECK_CREDENTIALS',
      params: { statusCode: details.statusCode },
      description: 'Verify the service credentials configured for the enrollment system',
    });
  } else {
    fixes.push({
      type: 'RESUBMIT_LATER',
      params: {},
      description: 'Submit a new job once the enrollment system is reachable',
    });
  }
  return createTypedError({
    code: 'DOWNSTREAM.FAILURE',
    message,
    jobId: details?.jobId,
    retryable: true,
    details: {
      statusCode: details?.statusCode,
      batchesCompleted: details?.batchesCompleted,
    },
    suggestedFixes: fixes,
  });
}

export function configError(errors: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message: `Invalid configuration: ${errors.join('; ')}`,
    retryable: false,
    details: { errors },
  });
}

export function internalError(message: string, jobId?: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    jobId,
    retryable: false,
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with their
 * masked form.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}
