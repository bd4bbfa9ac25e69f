/**
 * Enrollment write handlers.
 *
 * Items are checked locally first: an unknown status is a validation
 * error and a student key that appears more than once is a duplicate
 * (none of its occurrences are sent). The remaining items go downstream
 * in batches of at most `writeBatchSize`. Every unique key ends up with
 * exactly one outcome in the summary.
 */

import {
  CONTENT_TYPES,
  EnrollmentWriteItem,
  ItemResult,
  WriteCourseEnrollmentsPayload,
  WRITE_MODES,
  WriteMode,
  WriteProgramEnrollmentsPayload,
  WriteSummary,
  classifyDownstreamStatus,
  emptyTotals,
  isCourseEnrollmentStatus,
  isProgramEnrollmentStatus,
} from '../../domain/enrollment';
import { JobOperation } from '../../domain/job';
import { BatchWriteResponse, DownstreamError, isFatalStatus } from '../../downstream/provider';
import { JobContext, JobHandler, JobOutput, ParseResult, defineJobHandler, isPlainObject, requireProgram } from '../job-handlers';

/** Reported for items the downstream system never answered for. */
export const UNREPORTED_ITEM_STATUS = 'internal-error';

function parseItems(value: unknown, errors: string[]): EnrollmentWriteItem[] {
  if (!Array.isArray(value)) {
    errors.push('enrollments must be an array');
    return [];
  }
  if (value.length === 0) {
    errors.push('enrollments must not be empty');
    return [];
  }
  const items: EnrollmentWriteItem[] = [];
  value.forEach((entry: unknown, index) => {
    if (!isPlainObject(entry)) {
      errors.push(`enrollments[${index}] must be an object`);
      return;
    }
    const { studentKey, status } = entry;
    if (typeof studentKey !== 'string' || studentKey.length === 0) {
      errors.push(`enrollments[${index}].studentKey must be a non-empty string`);
      return;
    }
    if (typeof status !== 'string') {
      errors.push(`enrollments[${index}].status must be a string`);
      return;
    }
    items.push({ studentKey, status });
  });
  return items;
}

function parseMode(value: unknown, errors: string[]): WriteMode {
  const mode = WRITE_MODES.find((m) => m === value);
  if (mode) return mode;
  errors.push('mode must be "create", "update" or "upsert"');
  return 'create';
}

export function parseWriteProgramPayload(payload: unknown): ParseResult<WriteProgramEnrollmentsPayload> {
  if (!isPlainObject(payload)) return { ok: false, errors: ['payload must be an object'] };
  const errors: string[] = [];
  const mode = parseMode(payload.mode, errors);
  const enrollments = parseItems(payload.enrollments, errors);
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: { mode, enrollments } };
}

export function parseWriteCoursePayload(payload: unknown): ParseResult<WriteCourseEnrollmentsPayload> {
  if (!isPlainObject(payload)) return { ok: false, errors: ['payload must be an object'] };
  const errors: string[] = [];
  const courseKey = typeof payload.courseKey === 'string' ? payload.courseKey : '';
  if (courseKey.length === 0) errors.push('courseKey is required');
  const mode = parseMode(payload.mode, errors);
  const enrollments = parseItems(payload.enrollments, errors);
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: { courseKey, mode, enrollments } };
}

/** Split items into consecutive batches of at most `size`. */
export function partition<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

interface WritePlan {
  /** One entry per unique student key, in first-seen order. */
  results: Map<string, ItemResult>;
  toSend: EnrollmentWriteItem[];
}

/** Settle locally decidable outcomes and collect the items to send. */
export function planWrite(items: EnrollmentWriteItem[], isValidStatus: (status: string) => boolean): WritePlan {
  const occurrences = new Map<string, number>();
  for (const item of items) {
    occurrences.set(item.studentKey, (occurrences.get(item.studentKey) ?? 0) + 1);
  }

  const results = new Map<string, ItemResult>();
  const toSend: EnrollmentWriteItem[] = [];
  for (const item of items) {
    if (results.has(item.studentKey)) continue;
    if ((occurrences.get(item.studentKey) ?? 0) > 1) {
      results.set(item.studentKey, { studentKey: item.studentKey, outcome: 'duplicate', detail: 'duplicated' });
    } else if (!isValidStatus(item.status)) {
      results.set(item.studentKey, {
        studentKey: item.studentKey,
        outcome: 'validation-error',
        detail: 'invalid-status',
        errorCode: 'VALIDATION.ITEM',
      });
    } else {
      results.set(item.studentKey, {
        studentKey: item.studentKey,
        outcome: 'internal-error',
        detail: UNREPORTED_ITEM_STATUS,
      });
      toSend.push(item);
    }
  }
  return { results, toSend };
}

function mergeBatch(results: Map<string, ItemResult>, batch: EnrollmentWriteItem[], response: BatchWriteResponse): void {
  for (const item of batch) {
    const reported = response.results[item.studentKey];
    if (reported === undefined) continue;
    const outcome = classifyDownstreamStatus(reported);
    results.set(item.studentKey, {
      studentKey: item.studentKey,
      outcome,
      detail: reported,
      ...(outcome === 'validation-error' ? { errorCode: 'VALIDATION.ITEM' as const } : {}),
    });
  }
}

async function runWrite(
  context: JobContext,
  items: EnrollmentWriteItem[],
  isValidStatus: (status: string) => boolean,
  send: (batch: EnrollmentWriteItem[]) => Promise<BatchWriteResponse>,
): Promise<JobOutput> {
  const { results, toSend } = planWrite(items, isValidStatus);
  const batches = partition(toSend, context.writeBatchSize);

  for (const [index, batch] of batches.entries()) {
    await context.checkpoint();
    const response = await send(batch);
    if (isFatalStatus(response.statusCode)) {
      throw new DownstreamError(`Enrollment system answered batch ${index + 1} with HTTP ${response.statusCode}`, response.statusCode);
    }
    mergeBatch(results, batch, response);
    context.progress.batchesCompleted++;
    context.log.debug('Enrollment batch written', {
      batch: index + 1,
      of: batches.length,
      items: batch.length,
      status: response.statusCode,
    });
  }

  const summary: WriteSummary = { totals: emptyTotals(), batches: batches.length, items: [...results.values()] };
  for (const result of summary.items) summary.totals[result.outcome]++;
  const failedItems = summary.items.length - summary.totals.success;

  context.log.info('Enrollment write finished', { totals: summary.totals, batches: summary.batches });
  return {
    payload: JSON.stringify(summary),
    contentType: CONTENT_TYPES.json,
    ...(failedItems > 0 ? { partialFailure: { totalItems: summary.items.length, failedItems } } : {}),
  };
}

export const writeProgramEnrollmentsHandler: JobHandler = defineJobHandler(
  JobOperation.WriteProgramEnrollments,
  parseWriteProgramPayload,
  async (payload, context) => {
    const program = requireProgram(context);
    return runWrite(context, payload.enrollments, isProgramEnrollmentStatus, (batch) =>
      context.provider.writeProgramEnrollments(program.uuid, payload.mode, batch, context.signal),
    );
  },
);

export const writeCourseEnrollmentsHandler: JobHandler = defineJobHandler(
  JobOperation.WriteCourseEnrollments,
  parseWriteCoursePayload,
  async (payload, context) => {
    const program = requireProgram(context);
    return runWrite(context, payload.enrollments, isCourseEnrollmentStatus, (batch) =>
      context.provider.writeCourseEnrollments(program.uuid, payload.courseKey, payload.mode, batch, context.signal),
    );
  },
);
