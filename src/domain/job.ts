/**
 * Job domain model.
 *
 * A job is a tracked asynchronous bulk operation. Its state is a tagged
 * union: each variant carries exactly the fields valid in that state, so
 * a SUCCEEDED job without a result reference cannot be constructed.
 */

import { ApiPermission } from './rbac';
import { ScopeKind, ScopeRef } from './organization';
import { TypedError } from './errors';

/** Job lifecycle states. */
export enum JobState {
  Pending = 'PENDING',
  InProgress = 'IN_PROGRESS',
  Succeeded = 'SUCCEEDED',
  Failed = 'FAILED',
}

/** Valid state transitions for jobs. */
export const VALID_JOB_TRANSITIONS: Record<JobState, JobState[]> = {
  [JobState.Pending]: [JobState.InProgress],
  [JobState.InProgress]: [JobState.Succeeded, JobState.Failed],
  [JobState.Succeeded]: [],
  [JobState.Failed]: [],
};

/** Bulk operations that run as jobs. */
export enum JobOperation {
  ReadProgramEnrollments = 'read_program_enrollments',
  ReadCourseEnrollments = 'read_course_enrollments',
  WriteProgramEnrollments = 'write_program_enrollments',
  WriteCourseEnrollments = 'write_course_enrollments',
  GenerateEnrollmentReport = 'generate_enrollment_report',
  ReadCourseGrades = 'read_course_grades',
}

export interface OperationSpec {
  /** API permission required on the target. */
  action: ApiPermission;
  /** Scope kinds the operation may target. */
  targetKinds: ScopeKind[];
  description: string;
}

export const OPERATION_CATALOGUE: Record<JobOperation, OperationSpec> = {
  [JobOperation.ReadProgramEnrollments]: {
    action: ApiPermission.ReadEnrollments,
    targetKinds: ['program'],
    description: 'Export all enrollments in a program',
  },
  [JobOperation.ReadCourseEnrollments]: {
    action: ApiPermission.ReadEnrollments,
    targetKinds: ['program'],
    description: 'Export enrollments in one course of a program',
  },
  [JobOperation.WriteProgramEnrollments]: {
    action: ApiPermission.WriteEnrollments,
    targetKinds: ['program'],
    description: 'Create, update or upsert program enrollments',
  },
  [JobOperation.WriteCourseEnrollments]: {
    action: ApiPermission.WriteEnrollments,
    targetKinds: ['program'],
    description: 'Create, update or upsert course enrollments within a program',
  },
  [JobOperation.GenerateEnrollmentReport]: {
    action: ApiPermission.ReadReports,
    targetKinds: ['program', 'organization'],
    description: 'Summarize enrollment counts by status',
  },
  [JobOperation.ReadCourseGrades]: {
    action: ApiPermission.ReadEnrollments,
    targetKinds: ['program'],
    description: 'Export grades in one course of a program',
  },
};

export function isJobOperation(value: string): value is JobOperation {
  return Object.values(JobOperation).some((op) => op === value);
}

/** Opaque pointer into the result store. */
export interface ResultRef {
  backend: 'filesystem' | 's3';
  key: string;
}

/** Durable output of a job. */
export interface ResultArtifact {
  payload: Buffer;
  contentType: string;
}

/** Per-item failure totals carried by a job that succeeded overall. */
export interface PartialFailure {
  totalItems: number;
  failedItems: number;
}

interface JobBase {
  id: string;
  ownerId: string;
  operation: JobOperation;
  target: ScopeRef;
  createdAt: string;
  updatedAt: string;
  /** Incremented on every write; compare-and-set checks it. */
  version: number;
  /** Set when cancellation was requested; the executor checks it between batches. */
  cancelRequestedAt?: string;
  cancelReason?: string;
}

export interface PendingJob extends JobBase {
  state: JobState.Pending;
}

export interface InProgressJob extends JobBase {
  state: JobState.InProgress;
  startedAt: string;
}

export interface SucceededJob extends JobBase {
  state: JobState.Succeeded;
  startedAt: string;
  completedAt: string;
  resultRef: ResultRef;
  partialFailure?: PartialFailure;
}

export interface FailedJob extends JobBase {
  state: JobState.Failed;
  startedAt: string;
  completedAt: string;
  error: TypedError;
  /** Error-summary artifact, when one was written. */
  resultRef?: ResultRef;
}

export type Job = PendingJob | InProgressJob | SucceededJob | FailedJob;

export type TerminalJob = SucceededJob | FailedJob;

/** A requested state change. */
export type JobChange =
  | { state: JobState.InProgress }
  | { state: JobState.Succeeded; resultRef: ResultRef; partialFailure?: PartialFailure }
  | { state: JobState.Failed; error: TypedError; resultRef?: ResultRef };

/** What a caller sees when polling a job. */
export interface JobView {
  id: string;
  operation: JobOperation;
  target: ScopeRef;
  state: JobState;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  resultRef?: ResultRef;
  partialFailure?: PartialFailure;
  error?: TypedError;
  cancelRequested: boolean;
}

export function isTerminalJob(job: Job): job is TerminalJob {
  return job.state === JobState.Succeeded || job.state === JobState.Failed;
}

/** The result reference of a job, if its state carries one. */
export function resultRefOf(job: Job): ResultRef | undefined {
  switch (job.state) {
    case JobState.Succeeded:
      return job.resultRef;
    case JobState.Failed:
      return job.resultRef;
    default:
      return undefined;
  }
}
