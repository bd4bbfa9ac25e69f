/**
 * Enrollment Data Provider: the downstream system that holds enrollment
 * and grade records. Reads are cursor-paginated; writes accept bounded batches and
 * answer with a status string per student key.
 */

import {
  CourseEnrollment,
  CourseGrade,
  EnrollmentWriteItem,
  ProgramEnrollment,
  WriteMode,
} from '../domain/enrollment';

export interface Page<T> {
  items: T[];
  /** Opaque cursor of the next page; absent on the last page. */
  nextCursor?: string;
}

export interface BatchWriteResponse {
  statusCode: number;
  /** Status string per student key, as reported downstream. */
  results: Record<string, string>;
}

export interface EnrollmentProvider {
  listProgramEnrollments(
    programUuid: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<ProgramEnrollment>>;
  listCourseEnrollments(
    programUuid: string,
    courseKey: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<CourseEnrollment>>;
  listCourseGrades(
    programUuid: string,
    courseKey: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<CourseGrade>>;
  writeProgramEnrollments(
    programUuid: string,
    mode: WriteMode,
    items: EnrollmentWriteItem[],
    signal?: AbortSignal,
  ): Promise<BatchWriteResponse>;
  writeCourseEnrollments(
    programUuid: string,
    courseKey: string,
    mode: WriteMode,
    items: EnrollmentWriteItem[],
    signal?: AbortSignal,
  ): Promise<BatchWriteResponse>;
}

/**
 * The downstream system is unreachable or answered with a status that
 * makes continuing pointless. Terminal for the job.
 */
export class DownstreamError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'DownstreamError';
  }
}

/** Statuses whose body carries per-item results. */
export const RESULT_BEARING_STATUSES: ReadonlySet<number> = new Set([200, 201, 207, 422]);

/** Statuses after which no further batch should be attempted. */
export function isFatalStatus(statusCode: number): boolean {
  return statusCode === 401 || statusCode === 403 || statusCode === 429 || statusCode >= 500;
}
