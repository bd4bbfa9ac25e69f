/**
 * In-process enrollment provider.
 *
 * Keeps enrollments and grades in maps, pages through them by offset cursor and
 * answers writes the way the real system does: a status string per
 * student, 200/207/422 by how many items were accepted. Failures can be
 * injected per call for tests and local runs.
 */

import {
  CourseEnrollment,
  CourseGrade,
  EnrollmentWriteItem,
  ProgramEnrollment,
  WriteMode,
  isCourseEnrollmentStatus,
  isProgramEnrollmentStatus,
} from '../domain/enrollment';
import { BatchWriteResponse, DownstreamError, EnrollmentProvider, Page } from './provider';

export interface MemoryEnrollmentProviderOptions {
  pageSize?: number;
}

/** A write the provider received. */
export interface RecordedWrite {
  programUuid: string;
  courseKey?: string;
  mode: WriteMode;
  items: EnrollmentWriteItem[];
}

type WriteFailure = { kind: 'throw'; error: Error } | { kind: 'status'; statusCode: number };

export class MemoryEnrollmentProvider implements EnrollmentProvider {
  readonly writes: RecordedWrite[] = [];
  readonly pageRequests: Array<{ programUuid: string; courseKey?: string; cursor?: string }> = [];

  private readonly pageSize: number;
  private programs = new Map<string, Map<string, ProgramEnrollment>>();
  private courses = new Map<string, Map<string, CourseEnrollment>>();
  private grades = new Map<string, CourseGrade[]>();
  private itemStatusOverrides = new Map<string, string>();
  private writeFailures = new Map<number, WriteFailure>();
  private readFailures = new Map<number, Error>();
  private writeDelayMs = 0;

  constructor(options: MemoryEnrollmentProviderOptions = {}) {
    this.pageSize = options.pageSize ?? 100;
  }

  seedProgramEnrollments(programUuid: string, records: ProgramEnrollment[]): void {
    const existing = this.programTable(programUuid);
    for (const record of records) existing.set(record.studentKey, { ...record });
  }

  seedCourseEnrollments(programUuid: string, courseKey: string, records: Omit<CourseEnrollment, 'courseKey'>[]): void {
    const existing = this.courseTable(programUuid, courseKey);
    for (const record of records) existing.set(record.studentKey, { ...record, courseKey });
  }

  seedCourseGrades(programUuid: string, courseKey: string, grades: CourseGrade[]): void {
    const key = courseTableKey(programUuid, courseKey);
    this.grades.set(key, [...(this.grades.get(key) ?? []), ...grades.map((g) => ({ ...g }))]);
  }

  /** Report `status` for this student key on every write, whatever was sent. */
  setItemStatus(studentKey: string, status: string): void {
    this.itemStatusOverrides.set(studentKey, status);
  }

  /** Make the nth write call (1-based) throw. */
  failWriteCall(callNumber: number, error: Error = new DownstreamError('Enrollment system unavailable', 503)): void {
    this.writeFailures.set(callNumber, { kind: 'throw', error });
  }

  /** Make the nth write call (1-based) answer with a bare status code. */
  answerWriteCallWith(callNumber: number, statusCode: number): void {
    this.writeFailures.set(callNumber, { kind: 'status', statusCode });
  }

  /** Make the nth page request (1-based) throw. */
  failReadCall(callNumber: number, error: Error = new DownstreamError('Enrollment system unavailable', 503)): void {
    this.readFailures.set(callNumber, error);
  }

  /** Delay every write, to give timeouts and cancellation something to interrupt. */
  setWriteDelay(ms: number): void {
    this.writeDelayMs = ms;
  }

  programEnrollments(programUuid: string): ProgramEnrollment[] {
    return [...this.programTable(programUuid).values()];
  }

  async listProgramEnrollments(
    programUuid: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<ProgramEnrollment>> {
    this.pageRequests.push({ programUuid, cursor });
    this.checkRead(signal);
    return this.paginate([...this.programTable(programUuid).values()], cursor);
  }

  async listCourseEnrollments(
    programUuid: string,
    courseKey: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<CourseEnrollment>> {
    this.pageRequests.push({ programUuid, courseKey, cursor });
    this.checkRead(signal);
    return this.paginate([...this.courseTable(programUuid, courseKey).values()], cursor);
  }

  async listCourseGrades(
    programUuid: string,
    courseKey: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<CourseGrade>> {
    this.pageRequests.push({ programUuid, courseKey, cursor });
    this.checkRead(signal);
    const grades = this.grades.get(courseTableKey(programUuid, courseKey)) ?? [];
    return this.paginate(grades.map((g) => ({ ...g })), cursor);
  }

  async writeProgramEnrollments(
    programUuid: string,
    mode: WriteMode,
    items: EnrollmentWriteItem[],
    signal?: AbortSignal,
  ): Promise<BatchWriteResponse> {
    const failure = await this.beginWrite({ programUuid, mode, items }, signal);
    if (failure) return failure;
    const table = this.programTable(programUuid);
    return this.applyWrite(items, mode, (studentKey) => table.has(studentKey), (item) => {
      if (!isProgramEnrollmentStatus(item.status)) return false;
      const previous = table.get(item.studentKey);
      table.set(item.studentKey, {
        studentKey: item.studentKey,
        status: item.status,
        accountExists: previous?.accountExists ?? false,
      });
      return true;
    });
  }

  async writeCourseEnrollments(
    programUuid: string,
    courseKey: string,
    mode: WriteMode,
    items: EnrollmentWriteItem[],
    signal?: AbortSignal,
  ): Promise<BatchWriteResponse> {
    const failure = await this.beginWrite({ programUuid, courseKey, mode, items }, signal);
    if (failure) return failure;
    const table = this.courseTable(programUuid, courseKey);
    return this.applyWrite(items, mode, (studentKey) => table.has(studentKey), (item) => {
      if (!isCourseEnrollmentStatus(item.status)) return false;
      const previous = table.get(item.studentKey);
      table.set(item.studentKey, {
        courseKey,
        studentKey: item.studentKey,
        status: item.status,
        accountExists: previous?.accountExists ?? false,
      });
      return true;
    });
  }

  private async beginWrite(write: RecordedWrite, signal?: AbortSignal): Promise<BatchWriteResponse | null> {
    this.writes.push({ ...write, items: write.items.map((item) => ({ ...item })) });
    if (this.writeDelayMs > 0) {
      await abortableDelay(this.writeDelayMs, signal);
    }
    const failure = this.writeFailures.get(this.writes.length);
    if (failure?.kind === 'throw') throw failure.error;
    if (failure?.kind === 'status') return { statusCode: failure.statusCode, results: {} };
    return null;
  }

  private applyWrite(
    items: EnrollmentWriteItem[],
    mode: WriteMode,
    exists: (studentKey: string) => boolean,
    store: (item: EnrollmentWriteItem) => boolean,
  ): BatchWriteResponse {
    const results: Record<string, string> = {};
    let accepted = 0;
    for (const item of items) {
      const override = this.itemStatusOverrides.get(item.studentKey);
      if (override !== undefined) {
        results[item.studentKey] = override;
      } else if (mode === 'create' && exists(item.studentKey)) {
        results[item.studentKey] = 'conflict';
      } else if (mode === 'update' && !exists(item.studentKey)) {
        results[item.studentKey] = 'not-in-program';
      } else if (!store(item)) {
        results[item.studentKey] = 'invalid-status';
      } else {
        results[item.studentKey] = item.status;
        accepted++;
      }
    }
    const statusCode = accepted === items.length ? (mode === 'create' ? 201 : 200) : accepted > 0 ? 207 : 422;
    return { statusCode, results };
  }

  private checkRead(signal?: AbortSignal): void {
    if (signal?.aborted) throw new DownstreamError('Request aborted');
    const failure = this.readFailures.get(this.pageRequests.length);
    if (failure) throw failure;
  }

  private paginate<T>(all: T[], cursor?: string): Page<T> {
    const offset = cursor ? Number(cursor) : 0;
    const items = all.slice(offset, offset + this.pageSize);
    const next = offset + items.length;
    return { items, nextCursor: next < all.length ? String(next) : undefined };
  }

  private programTable(programUuid: string): Map<string, ProgramEnrollment> {
    let table = this.programs.get(programUuid);
    if (!table) {
      table = new Map();
      this.programs.set(programUuid, table);
    }
    return table;
  }

  private courseTable(programUuid: string, courseKey: string): Map<string, CourseEnrollment> {
    const key = courseTableKey(programUuid, courseKey);
    let table = this.courses.get(key);
    if (!table) {
      table = new Map();
      this.courses.set(key, table);
    }
    return table;
  }
}

function courseTableKey(programUuid: string, courseKey: string): string {
  return `${programUuid}/${courseKey}`;
}

function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DownstreamError('Request aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new DownstreamError('Request aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
