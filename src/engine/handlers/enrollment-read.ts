/**
 * Enrollment export handlers. Page through the provider one cursor at a
 * time and render the accumulated records as JSON or CSV.
 */

import {
  CONTENT_TYPES,
  CourseEnrollment,
  ProgramEnrollment,
  ReadCourseEnrollmentsPayload,
  ReadProgramEnrollmentsPayload,
  ResultFormat,
} from '../../domain/enrollment';
import { JobOperation } from '../../domain/job';
import { DownstreamError, Page } from '../../downstream/provider';
import { JobContext, JobHandler, JobOutput, ParseResult, defineJobHandler, isPlainObject, requireProgram } from '../job-handlers';
import { toCsv } from './csv';

function parseFormat(value: unknown, errors: string[]): ResultFormat | undefined {
  if (value === undefined) return undefined;
  if (value === 'json' || value === 'csv') return value;
  errors.push('format must be "json" or "csv"');
  return undefined;
}

export function parseReadProgramPayload(payload: unknown): ParseResult<ReadProgramEnrollmentsPayload> {
  const body = payload ?? {};
  if (!isPlainObject(body)) return { ok: false, errors: ['payload must be an object'] };
  const errors: string[] = [];
  const format = parseFormat(body.format, errors);
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: { format } };
}

export function parseReadCoursePayload(payload: unknown): ParseResult<ReadCourseEnrollmentsPayload> {
  if (!isPlainObject(payload)) return { ok: false, errors: ['payload must be an object'] };
  const errors: string[] = [];
  const format = parseFormat(payload.format, errors);
  const courseKey = payload.courseKey;
  if (typeof courseKey !== 'string' || courseKey.length === 0) {
    errors.push('courseKey is required');
    return { ok: false, errors };
  }
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: { courseKey, format } };
}

/** Follow cursors until the last page, checking for timeout and cancellation between pages. */
export async function readAllPages<T>(
  context: JobContext,
  fetchPage: (cursor: string | undefined) => Promise<Page<T>>,
): Promise<T[]> {
  const items: T[] = [];
  const seen = new Set<string>();
  let cursor: string | undefined;
  do {
    await context.checkpoint();
    const page = await fetchPage(cursor);
    context.progress.pagesRead++;
    items.push(...page.items);
    cursor = page.nextCursor;
    if (cursor !== undefined) {
      if (seen.has(cursor)) {
        throw new DownstreamError(`Enrollment system repeated pagination cursor ${cursor}`);
      }
      seen.add(cursor);
    }
  } while (cursor !== undefined);
  return items;
}

function render<T>(records: T[], format: ResultFormat, header: string[], row: (r: T) => (string | boolean)[]): JobOutput {
  if (format === 'csv') {
    return { payload: toCsv(header, records.map(row)), contentType: CONTENT_TYPES.csv };
  }
  return { payload: JSON.stringify(records), contentType: CONTENT_TYPES.json };
}

export const readProgramEnrollmentsHandler: JobHandler = defineJobHandler(
  JobOperation.ReadProgramEnrollments,
  parseReadProgramPayload,
  async (payload, context) => {
    const program = requireProgram(context);
    const records = await readAllPages<ProgramEnrollment>(context, (cursor) =>
      context.provider.listProgramEnrollments(program.uuid, cursor, context.signal),
    );
    context.log.info('Program enrollments read', { count: records.length, pages: context.progress.pagesRead });
    return render(records, payload.format ?? 'json', ['student_key', 'status', 'account_exists'], (r) => [
      r.studentKey,
      r.status,
      r.accountExists,
    ]);
  },
);

export const readCourseEnrollmentsHandler: JobHandler = defineJobHandler(
  JobOperation.ReadCourseEnrollments,
  parseReadCoursePayload,
  async (payload, context) => {
    const program = requireProgram(context);
    const records = await readAllPages<CourseEnrollment>(context, (cursor) =>
      context.provider.listCourseEnrollments(program.uuid, payload.courseKey, cursor, context.signal),
    );
    context.log.info('Course enrollments read', { count: records.length, pages: context.progress.pagesRead });
    return render(
      records,
      payload.format ?? 'json',
      ['course_key', 'student_key', 'status', 'account_exists'],
      (r) => [r.courseKey, r.studentKey, r.status, r.accountExists],
    );
  },
);
