import { JobHandler } from '../job-handlers';
import { readCourseEnrollmentsHandler, readProgramEnrollmentsHandler } from './enrollment-read';
import { writeCourseEnrollmentsHandler, writeProgramEnrollmentsHandler } from './enrollment-write';
import { readCourseGradesHandler } from './grades';
import { enrollmentReportHandler } from './report';

export * from './csv';
export * from './enrollment-read';
export * from './enrollment-write';
export * from './grades';
export * from './report';

/** One handler per catalogued operation. */
export function defaultJobHandlers(): JobHandler[] {
  return [
    readProgramEnrollmentsHandler,
    readCourseEnrollmentsHandler,
    writeProgramEnrollmentsHandler,
    writeCourseEnrollmentsHandler,
    enrollmentReportHandler,
    readCourseGradesHandler,
  ];
}
