/**
 * Course grade export. Reads every page of grades for one course run and
 * reports, beside the grades, whether any came back and whether any
 * came back as errors.
 */

import {
  CONTENT_TYPES,
  CourseGrade,
  GradeReport,
  ReadCourseGradesPayload,
  gradeReadStatus,
} from '../../domain/enrollment';
import { JobOperation, PartialFailure } from '../../domain/job';
import { JobHandler, ParseResult, defineJobHandler, requireProgram } from '../job-handlers';
import { CsvValue, toCsv } from './csv';
import { parseReadCoursePayload, readAllPages } from './enrollment-read';

export const GRADE_COLUMNS = ['student_key', 'letter_grade', 'percent', 'passed', 'error'];

/** Same shape as a course enrollment read: a course key and an optional format. */
export const parseReadGradesPayload: (payload: unknown) => ParseResult<ReadCourseGradesPayload> = parseReadCoursePayload;

function gradeRow(grade: CourseGrade): CsvValue[] {
  return [grade.studentKey, grade.letterGrade ?? '', grade.percent ?? '', grade.passed ?? '', grade.error ?? ''];
}

export const readCourseGradesHandler: JobHandler = defineJobHandler(
  JobOperation.ReadCourseGrades,
  parseReadGradesPayload,
  async (payload, context) => {
    const program = requireProgram(context);
    const grades = await readAllPages<CourseGrade>(context, (cursor) =>
      context.provider.listCourseGrades(program.uuid, payload.courseKey, cursor, context.signal),
    );
    const status = gradeReadStatus(grades);
    const failedItems = grades.filter((g) => g.error !== undefined).length;
    context.log.info('Course grades read', { count: grades.length, failedItems, status, pages: context.progress.pagesRead });

    const partialFailure: PartialFailure | undefined =
      failedItems > 0 ? { totalItems: grades.length, failedItems } : undefined;
    if (payload.format === 'csv') {
      return { payload: toCsv(GRADE_COLUMNS, grades.map(gradeRow)), contentType: CONTENT_TYPES.csv, partialFailure };
    }
    const report: GradeReport = { status, grades };
    return { payload: JSON.stringify(report), contentType: CONTENT_TYPES.json, partialFailure };
  },
);
