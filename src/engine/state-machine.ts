/**
 * Job state machine.
 *
 * Guards transitions over the tagged job variants and builds the next
 * variant, producing typed errors on invalid transitions.
 */

import {
  Job,
  JobChange,
  JobState,
  VALID_JOB_TRANSITIONS,
} from '../domain/job';
import { TypedError, invalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<T> =
  | { success: true; value: T }
  | { success: false; error: TypedError };

/** Attempt a job state transition. */
export function transitionJobState(
  jobId: string,
  current: JobState,
  target: JobState,
): TransitionResult<JobState> {
  const validTargets = VALID_JOB_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    const error = invalidTransitionError(jobId, current, target);
    return {
      success: false,
      error: { ...error, details: { ...error.details, validTargets } },
    };
  }
  return { success: true, value: target };
}

/** Check if a job state is terminal. */
export function isTerminalJobState(state: JobState): boolean {
  return state === JobState.Succeeded || state === JobState.Failed;
}

/** Build the job that results from applying `change`, or explain why it is illegal. */
export function applyJobChange(job: Job, change: JobChange, now: string): TransitionResult<Job> {
  const check = transitionJobState(job.id, job.state, change.state);
  if (!check.success) return check;

  const base = {
    id: job.id,
    ownerId: job.ownerId,
    operation: job.operation,
    target: job.target,
    createdAt: job.createdAt,
    updatedAt: now,
    version: job.version + 1,
    cancelRequestedAt: job.cancelRequestedAt,
    cancelReason: job.cancelReason,
  };

  if (job.state === JobState.Pending && change.state === JobState.InProgress) {
    return { success: true, value: { ...base, state: JobState.InProgress, startedAt: now } };
  }
  if (job.state === JobState.InProgress && change.state === JobState.Succeeded) {
    return {
      success: true,
      value: {
        ...base,
        state: JobState.Succeeded,
        startedAt: job.startedAt,
        completedAt: now,
        resultRef: change.resultRef,
        partialFailure: change.partialFailure,
      },
    };
  }
  if (job.state === JobState.InProgress && change.state === JobState.Failed) {
    return {
      success: true,
      value: {
        ...base,
        state: JobState.Failed,
        startedAt: job.startedAt,
        completedAt: now,
        error: change.error,
        resultRef: change.resultRef,
      },
    };
  }
  return { success: false, error: invalidTransitionError(job.id, job.state, change.state) };
}
