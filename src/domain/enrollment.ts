/**
 * Enrollment and grade records exchanged with the downstream enrollment
 * system, job payloads, and per-item write outcomes.
 */

export enum ProgramEnrollmentStatus {
  Enrolled = 'enrolled',
  Pending = 'pending',
  Suspended = 'suspended',
  Canceled = 'canceled',
}

export enum CourseEnrollmentStatus {
  Active = 'active',
  Inactive = 'inactive',
}

export interface ProgramEnrollment {
  studentKey: string;
  status: ProgramEnrollmentStatus;
  accountExists: boolean;
}

export interface CourseEnrollment {
  courseKey: string;
  studentKey: string;
  status: CourseEnrollmentStatus;
  accountExists: boolean;
}

/** An item submitted for writing. Validated locally before it is sent. */
export interface EnrollmentWriteItem {
  studentKey: string;
  status: string;
}

/** Create new enrollments, modify existing ones, or create-or-update. */
export type WriteMode = 'create' | 'update' | 'upsert';

export const WRITE_MODES: readonly WriteMode[] = ['create', 'update', 'upsert'];

export type ResultFormat = 'json' | 'csv';

export const CONTENT_TYPES: Record<ResultFormat, string> = {
  json: 'application/json',
  csv: 'text/csv',
};

export interface ReadProgramEnrollmentsPayload {
  format?: ResultFormat;
}

export interface ReadCourseEnrollmentsPayload {
  courseKey: string;
  format?: ResultFormat;
}

/**
 * A student's grade in one course run. Either `error` is set, or all of
 * `letterGrade`, `percent` and `passed` are.
 */
export interface CourseGrade {
  studentKey: string;
  letterGrade?: string | null;
  percent?: number;
  passed?: boolean;
  error?: string;
}

/** Overall outcome of a grade read, by whether any grades and any errors came back. */
export enum GradeReadStatus {
  Ok = 200,
  NoContent = 204,
  MultiStatus = 207,
  UnprocessableEntity = 422,
}

export interface ReadCourseGradesPayload {
  courseKey: string;
  format?: ResultFormat;
}

/** Result artifact body of a JSON grade read. */
export interface GradeReport {
  status: GradeReadStatus;
  grades: CourseGrade[];
}

export function gradeReadStatus(grades: CourseGrade[]): GradeReadStatus {
  const good = grades.some((g) => g.error === undefined);
  const bad = grades.some((g) => g.error !== undefined);
  if (good && bad) return GradeReadStatus.MultiStatus;
  if (good) return GradeReadStatus.Ok;
  if (bad) return GradeReadStatus.UnprocessableEntity;
  return GradeReadStatus.NoContent;
}

export interface WriteProgramEnrollmentsPayload {
  mode: WriteMode;
  enrollments: EnrollmentWriteItem[];
}

export interface WriteCourseEnrollmentsPayload {
  courseKey: string;
  mode: WriteMode;
  enrollments: EnrollmentWriteItem[];
}

/** Outcome of writing one item. */
export type ItemOutcome = 'success' | 'duplicate' | 'validation-error' | 'internal-error';

export interface ItemResult {
  studentKey: string;
  outcome: ItemOutcome;
  /** Status string reported downstream, or the local reason. */
  detail: string;
  /** Set for validation errors. */
  errorCode?: 'VALIDATION.ITEM';
}

/** Result artifact body of a write job. */
export interface WriteSummary {
  totals: Record<ItemOutcome, number>;
  batches: number;
  items: ItemResult[];
}

/** Status strings the downstream system uses for item-level failures. */
export const DOWNSTREAM_DUPLICATED = 'duplicated';
export const DOWNSTREAM_VALIDATION_ERRORS: ReadonlySet<string> = new Set([
  'invalid-status',
  'not-in-program',
  'conflict',
]);

const VALID_STATUSES: ReadonlySet<string> = new Set<string>([
  ...Object.values(ProgramEnrollmentStatus),
  ...Object.values(CourseEnrollmentStatus),
]);

export function isProgramEnrollmentStatus(value: string): value is ProgramEnrollmentStatus {
  return Object.values(ProgramEnrollmentStatus).some((s) => s === value);
}

export function isCourseEnrollmentStatus(value: string): value is CourseEnrollmentStatus {
  return Object.values(CourseEnrollmentStatus).some((s) => s === value);
}

/** Classify a per-item status string returned downstream. */
export function classifyDownstreamStatus(status: string): ItemOutcome {
  if (VALID_STATUSES.has(status)) return 'success';
  if (status === DOWNSTREAM_DUPLICATED) return 'duplicate';
  if (DOWNSTREAM_VALIDATION_ERRORS.has(status)) return 'validation-error';
  return 'internal-error';
}

export function emptyTotals(): Record<ItemOutcome, number> {
  return { success: 0, duplicate: 0, 'validation-error': 0, 'internal-error': 0 };
}
