/**
 * Enrollment report: counts of program enrollments by status, for one
 * program or for every program an organization authors.
 */

import { CONTENT_TYPES, ProgramEnrollment, ProgramEnrollmentStatus } from '../../domain/enrollment';
import { JobOperation } from '../../domain/job';
import { Program, ScopeRef } from '../../domain/organization';
import { JobContext, JobHandler, ParseResult, defineJobHandler, isPlainObject } from '../job-handlers';
import { readAllPages } from './enrollment-read';

export interface ProgramReportRow {
  programKey: string;
  programUuid: string;
  title: string;
  total: number;
  byStatus: Record<ProgramEnrollmentStatus, number>;
}

export interface EnrollmentReport {
  target: ScopeRef;
  programs: ProgramReportRow[];
  total: number;
  byStatus: Record<ProgramEnrollmentStatus, number>;
}

function emptyStatusCounts(): Record<ProgramEnrollmentStatus, number> {
  return {
    [ProgramEnrollmentStatus.Enrolled]: 0,
    [ProgramEnrollmentStatus.Pending]: 0,
    [ProgramEnrollmentStatus.Suspended]: 0,
    [ProgramEnrollmentStatus.Canceled]: 0,
  };
}

export function parseReportPayload(payload: unknown): ParseResult<Record<string, never>> {
  if (payload === undefined || payload === null) return { ok: true, value: {} };
  if (!isPlainObject(payload)) return { ok: false, errors: ['payload must be an object'] };
  const unknownKeys = Object.keys(payload);
  if (unknownKeys.length > 0) {
    return { ok: false, errors: [`unexpected payload fields: ${unknownKeys.join(', ')}`] };
  }
  return { ok: true, value: {} };
}

async function reportRow(context: JobContext, program: Program): Promise<ProgramReportRow> {
  const records = await readAllPages<ProgramEnrollment>(context, (cursor) =>
    context.provider.listProgramEnrollments(program.uuid, cursor, context.signal),
  );
  const byStatus = emptyStatusCounts();
  for (const record of records) byStatus[record.status]++;
  return { programKey: program.key, programUuid: program.uuid, title: program.title, total: records.length, byStatus };
}

export const enrollmentReportHandler: JobHandler = defineJobHandler(
  JobOperation.GenerateEnrollmentReport,
  parseReportPayload,
  async (_payload, context) => {
    let programs: Program[];
    if (context.program) {
      programs = [context.program];
    } else if (context.organization) {
      programs = await context.graph.programsAuthoredBy(context.organization.id);
    } else {
      throw new Error(`Job ${context.job.id} has no resolvable target`);
    }

    const report: EnrollmentReport = {
      target: context.job.target,
      programs: [],
      total: 0,
      byStatus: emptyStatusCounts(),
    };
    for (const program of programs) {
      const row = await reportRow(context, program);
      report.programs.push(row);
      report.total += row.total;
      for (const status of Object.values(ProgramEnrollmentStatus)) {
        report.byStatus[status] += row.byStatus[status];
      }
    }

    context.log.info('Enrollment report generated', { programs: programs.length, total: report.total });
    return { payload: JSON.stringify(report), contentType: CONTENT_TYPES.json };
  },
);
