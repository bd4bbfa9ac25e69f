import { AppContext, createAppContext } from '../../src/app';
import { RegistrarConfig, createConfig } from '../../src/config';
import {
  CourseEnrollmentStatus,
  GradeReadStatus,
  GradeReport,
  ProgramEnrollmentStatus,
  WriteSummary,
} from '../../src/domain/enrollment';
import { JobOperation, JobState } from '../../src/domain/job';
import { Subject } from '../../src/domain/organization';
import { Role } from '../../src/domain/rbac';
import { MemoryEnrollmentProvider } from '../../src/downstream/memory-provider';
import { EnrollmentReport } from '../../src/engine/handlers/report';
import { LogEntry, resetLogHandler, setLogHandler } from '../../src/logger';
import {
  InMemoryResultStore,
  World,
  addSubject,
  artifactJson,
  buildWorld,
  orgScope,
  programScope,
  seedGrant,
} from '../fixtures';

function students(count: number, status = 'enrolled'): Array<{ studentKey: string; status: string }> {
  return Array.from({ length: count }, (_, i) => ({
    studentKey: `student-${String(i + 1).padStart(3, '0')}`,
    status,
  }));
}

async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('JobExecutor', () => {
  let provider: MemoryEnrollmentProvider;
  let resultStore: InMemoryResultStore;
  let app: AppContext | undefined;
  let world: World;
  let alice: Subject;
  let logs: LogEntry[];

  async function setup(overrides: Partial<RegistrarConfig> = {}): Promise<AppContext> {
    const context = createAppContext(createConfig({ enrollmentProvider: 'memory', writeBatchSize: 50, jobConcurrency: 2, ...overrides }), {
      provider,
      resultStore,
    });
    app = context;
    world = await buildWorld(context.graph);
    alice = await addSubject(context.store);
    await seedGrant(context.store, alice.id, Role.ProgramManager, orgScope(world.acme));
    await seedGrant(context.store, alice.id, Role.OrganizationReadReports, orgScope(world.acme));
    return context;
  }

  function writePayload(count: number) {
    return { mode: 'create', enrollments: students(count) };
  }

  beforeEach(() => {
    logs = [];
    setLogHandler((entry) => logs.push(entry));
    provider = new MemoryEnrollmentProvider({ pageSize: 2 });
    resultStore = new InMemoryResultStore();
    app = undefined;
  });

  afterEach(async () => {
    await app?.executor.onIdle();
    resetLogHandler();
  });

  describe('writes', () => {
    test('150 records in batches of 50 with one rejected item succeed with a partial failure', async () => {
      const { api, executor } = await setup();
      provider.setItemStatus('student-075', 'invalid-status');

      const jobId = await api.submitJob(
        alice,
        JobOperation.WriteProgramEnrollments,
        { kind: 'program', key: 'acme-mba' },
        writePayload(150),
      );
      await executor.onIdle();

      expect(provider.writes.map((w) => w.items.length)).toEqual([50, 50, 50]);
      const view = await api.pollJob(alice, jobId);
      expect(view.state).toBe(JobState.Succeeded);
      expect(view.partialFailure).toEqual({ totalItems: 150, failedItems: 1 });

      const summary = artifactJson<WriteSummary>(await api.fetchResult(alice, jobId));
      expect(summary.totals).toEqual({ success: 149, duplicate: 0, 'validation-error': 1, 'internal-error': 0 });
      expect(summary.batches).toBe(3);
      expect(summary.items.find((i) => i.studentKey === 'student-075')).toEqual({
        studentKey: 'student-075',
        outcome: 'validation-error',
        detail: 'invalid-status',
        errorCode: 'VALIDATION.ITEM',
      });
    });

    test('an outage after the first of three batches fails the job without partial results', async () => {
      const { api, executor } = await setup();
      provider.failWriteCall(2);

      const jobId = await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), writePayload(150));
      await executor.onIdle();

      expect(provider.writes).toHaveLength(2);
      const view = await api.pollJob(alice, jobId);
      expect(view.state).toBe(JobState.Failed);
      expect(view.error).toMatchObject({
        code: 'DOWNSTREAM.FAILURE',
        message: 'Enrollment system unavailable',
        details: { statusCode: 503, batchesCompleted: 1 },
      });

      const summary = artifactJson<Record<string, unknown>>(await api.fetchResult(alice, jobId));
      expect(Object.keys(summary).sort()).toEqual(['error', 'jobId', 'progress']);
      expect(summary).toMatchObject({ jobId, progress: { pagesRead: 0, batchesCompleted: 1 } });
    });

    test('a fatal status answer fails the job the same way', async () => {
      const { api, executor } = await setup();
      provider.answerWriteCallWith(1, 401);

      const jobId = await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), writePayload(10));
      await executor.onIdle();

      const view = await api.pollJob(alice, jobId);
      expect(view.error).toMatchObject({ code: 'DOWNSTREAM.FAILURE', details: { statusCode: 401, batchesCompleted: 0 } });
      expect(view.error?.suggestedFixes.map((f) => f.type)).toEqual(['CHECK_CREDENTIALS']);
    });

    test('a status without per-item results leaves the batch as internal errors', async () => {
      const { api, executor } = await setup();
      provider.answerWriteCallWith(1, 404);

      const jobId = await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), writePayload(3));
      await executor.onIdle();

      const summary = artifactJson<WriteSummary>(await api.fetchResult(alice, jobId));
      expect(summary.totals).toEqual({ success: 0, duplicate: 0, 'validation-error': 0, 'internal-error': 3 });
      expect((await api.pollJob(alice, jobId)).partialFailure).toEqual({ totalItems: 3, failedItems: 3 });
    });

    test('duplicates and invalid statuses are settled locally and never sent', async () => {
      const { api, executor } = await setup();

      const jobId = await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), {
        mode: 'create',
        enrollments: [
          { studentKey: 'a', status: 'enrolled' },
          { studentKey: 'b', status: 'graduated' },
          { studentKey: 'c', status: 'pending' },
          { studentKey: 'a', status: 'suspended' },
        ],
      });
      await executor.onIdle();

      expect(provider.writes).toHaveLength(1);
      expect(provider.writes[0].items).toEqual([{ studentKey: 'c', status: 'pending' }]);
      const summary = artifactJson<WriteSummary>(await api.fetchResult(alice, jobId));
      expect(summary.items).toEqual([
        { studentKey: 'a', outcome: 'duplicate', detail: 'duplicated' },
        { studentKey: 'b', outcome: 'validation-error', detail: 'invalid-status', errorCode: 'VALIDATION.ITEM' },
        { studentKey: 'c', outcome: 'success', detail: 'pending' },
      ]);
    });

    test('updates report students missing from the program', async () => {
      const { api, executor } = await setup();
      provider.seedProgramEnrollments(world.acmeMba.uuid, [
        { studentKey: 'known', status: ProgramEnrollmentStatus.Pending, accountExists: true },
      ]);

      const jobId = await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), {
        mode: 'update',
        enrollments: [
          { studentKey: 'known', status: 'enrolled' },
          { studentKey: 'stranger', status: 'enrolled' },
        ],
      });
      await executor.onIdle();

      const summary = artifactJson<WriteSummary>(await api.fetchResult(alice, jobId));
      expect(summary.items).toEqual([
        { studentKey: 'known', outcome: 'success', detail: 'enrolled' },
        { studentKey: 'stranger', outcome: 'validation-error', detail: 'not-in-program', errorCode: 'VALIDATION.ITEM' },
      ]);
      expect(provider.programEnrollments(world.acmeMba.uuid)).toEqual([
        { studentKey: 'known', status: ProgramEnrollmentStatus.Enrolled, accountExists: true },
      ]);
    });

    test('upserts create missing students and update known ones', async () => {
      const { api, executor } = await setup();
      provider.seedProgramEnrollments(world.acmeMba.uuid, [
        { studentKey: 'known', status: ProgramEnrollmentStatus.Pending, accountExists: true },
      ]);

      const jobId = await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), {
        mode: 'upsert',
        enrollments: [
          { studentKey: 'known', status: 'enrolled' },
          { studentKey: 'fresh', status: 'pending' },
        ],
      });
      await executor.onIdle();

      expect(provider.writes.map((w) => w.mode)).toEqual(['upsert']);
      const summary = artifactJson<WriteSummary>(await api.fetchResult(alice, jobId));
      expect(summary.items).toEqual([
        { studentKey: 'known', outcome: 'success', detail: 'enrolled' },
        { studentKey: 'fresh', outcome: 'success', detail: 'pending' },
      ]);
      expect(provider.programEnrollments(world.acmeMba.uuid)).toEqual([
        { studentKey: 'known', status: ProgramEnrollmentStatus.Enrolled, accountExists: true },
        { studentKey: 'fresh', status: ProgramEnrollmentStatus.Pending, accountExists: false },
      ]);
    });

    test('course writes go to the course endpoint', async () => {
      const { api, executor } = await setup();

      const jobId = await api.submitJob(alice, JobOperation.WriteCourseEnrollments, programScope(world.acmeMba), {
        courseKey: 'course-v1:acme+fin101',
        mode: 'create',
        enrollments: [
          { studentKey: 's1', status: 'active' },
          { studentKey: 's2', status: 'enrolled' },
        ],
      });
      await executor.onIdle();

      expect(provider.writes).toEqual([
        {
          programUuid: world.acmeMba.uuid,
          courseKey: 'course-v1:acme+fin101',
          mode: 'create',
          items: [{ studentKey: 's1', status: 'active' }],
        },
      ]);
      const summary = artifactJson<WriteSummary>(await api.fetchResult(alice, jobId));
      expect(summary.totals).toEqual({ success: 1, duplicate: 0, 'validation-error': 1, 'internal-error': 0 });
    });
  });

  describe('timeout and cancellation', () => {
    test('a job that outlives its timeout fails with JOB.TIMEOUT', async () => {
      const { api, executor } = await setup({ jobTimeoutMs: 50 });
      provider.setWriteDelay(500);

      const jobId = await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), writePayload(100));
      await executor.onIdle();

      expect(provider.writes).toHaveLength(1);
      const view = await api.pollJob(alice, jobId);
      expect(view.state).toBe(JobState.Failed);
      expect(view.error).toMatchObject({ code: 'JOB.TIMEOUT', details: { timeoutMs: 50 } });
    });

    test('cancellation stops the job before the next batch', async () => {
      const { api, executor } = await setup();
      provider.setWriteDelay(50);

      const jobId = await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), writePayload(150));
      await waitFor(() => provider.writes.length === 1);
      await api.cancelJob(alice, jobId, 'uploaded the wrong file');
      await executor.onIdle();

      expect(provider.writes).toHaveLength(1);
      const view = await api.pollJob(alice, jobId);
      expect(view.state).toBe(JobState.Failed);
      expect(view.cancelRequested).toBe(true);
      expect(view.error).toMatchObject({ code: 'JOB.CANCELED', message: 'Job canceled: uploaded the wrong file' });
    });
  });

  describe('reads', () => {
    test('pages through every cursor and returns JSON', async () => {
      const { api, executor } = await setup();
      provider.seedProgramEnrollments(
        world.acmeMba.uuid,
        ['s1', 's2', 's3', 's4', 's5'].map((studentKey) => ({
          studentKey,
          status: ProgramEnrollmentStatus.Enrolled,
          accountExists: false,
        })),
      );

      const jobId = await api.submitJob(alice, JobOperation.ReadProgramEnrollments, programScope(world.acmeMba));
      await executor.onIdle();

      expect(provider.pageRequests.map((r) => r.cursor)).toEqual([undefined, '2', '4']);
      const artifact = await api.fetchResult(alice, jobId);
      expect(artifact.contentType).toBe('application/json');
      expect(artifactJson(artifact)).toHaveLength(5);
    });

    test('renders CSV with quoted fields', async () => {
      const { api, executor } = await setup();
      provider.seedProgramEnrollments(world.acmeMba.uuid, [
        { studentKey: 's1', status: ProgramEnrollmentStatus.Enrolled, accountExists: true },
        { studentKey: 's,2', status: ProgramEnrollmentStatus.Pending, accountExists: false },
      ]);

      const jobId = await api.submitJob(alice, JobOperation.ReadProgramEnrollments, programScope(world.acmeMba), {
        format: 'csv',
      });
      await executor.onIdle();

      const artifact = await api.fetchResult(alice, jobId);
      expect(artifact.contentType).toBe('text/csv');
      expect(artifact.payload.toString('utf8')).toBe(
        'student_key,status,account_exists\r\ns1,enrolled,true\r\n"s,2",pending,false\r\n',
      );
    });

    test('reads course enrollments', async () => {
      const { api, executor } = await setup();
      provider.seedCourseEnrollments(world.acmeMba.uuid, 'course-v1:acme+fin101', [
        { studentKey: 's1', status: CourseEnrollmentStatus.Active, accountExists: true },
      ]);

      const jobId = await api.submitJob(alice, JobOperation.ReadCourseEnrollments, programScope(world.acmeMba), {
        courseKey: 'course-v1:acme+fin101',
        format: 'csv',
      });
      await executor.onIdle();

      const artifact = await api.fetchResult(alice, jobId);
      expect(artifact.payload.toString('utf8')).toBe(
        'course_key,student_key,status,account_exists\r\ncourse-v1:acme+fin101,s1,active,true\r\n',
      );
    });

    test('a failed page fails the job', async () => {
      const { api, executor } = await setup();
      provider.seedProgramEnrollments(
        world.acmeMba.uuid,
        ['s1', 's2', 's3'].map((studentKey) => ({ studentKey, status: ProgramEnrollmentStatus.Enrolled, accountExists: false })),
      );
      provider.failReadCall(2);

      const jobId = await api.submitJob(alice, JobOperation.ReadProgramEnrollments, programScope(world.acmeMba));
      await executor.onIdle();

      const view = await api.pollJob(alice, jobId);
      expect(view.error).toMatchObject({ code: 'DOWNSTREAM.FAILURE', details: { statusCode: 503 } });
    });
  });

  describe('grades', () => {
    const courseKey = 'course-v1:acme+fin101';

    test('exports grades as JSON with a multi-status when some came back as errors', async () => {
      const { api, executor } = await setup();
      provider.seedCourseGrades(world.acmeMba.uuid, courseKey, [
        { studentKey: 's1', letterGrade: 'A', percent: 0.95, passed: true },
        { studentKey: 's2', letterGrade: null, percent: 0.4, passed: false },
        { studentKey: 's3', error: 'no grade recorded' },
      ]);

      const jobId = await api.submitJob(alice, JobOperation.ReadCourseGrades, programScope(world.acmeMba), { courseKey });
      await executor.onIdle();

      expect(provider.pageRequests.map((r) => r.cursor)).toEqual([undefined, '2']);
      const view = await api.pollJob(alice, jobId);
      expect(view.state).toBe(JobState.Succeeded);
      expect(view.partialFailure).toEqual({ totalItems: 3, failedItems: 1 });
      expect(artifactJson<GradeReport>(await api.fetchResult(alice, jobId))).toEqual({
        status: GradeReadStatus.MultiStatus,
        grades: [
          { studentKey: 's1', letterGrade: 'A', percent: 0.95, passed: true },
          { studentKey: 's2', letterGrade: null, percent: 0.4, passed: false },
          { studentKey: 's3', error: 'no grade recorded' },
        ],
      });
    });

    test('exports grades as CSV', async () => {
      const { api, executor } = await setup();
      provider.seedCourseGrades(world.acmeMba.uuid, courseKey, [
        { studentKey: 's1', letterGrade: 'A', percent: 0.95, passed: true },
        { studentKey: 's2', letterGrade: null, percent: 0.4, passed: false },
      ]);

      const jobId = await api.submitJob(alice, JobOperation.ReadCourseGrades, programScope(world.acmeMba), {
        courseKey,
        format: 'csv',
      });
      await executor.onIdle();

      expect((await api.pollJob(alice, jobId)).partialFailure).toBeUndefined();
      const artifact = await api.fetchResult(alice, jobId);
      expect(artifact.contentType).toBe('text/csv');
      expect(artifact.payload.toString('utf8')).toBe(
        'student_key,letter_grade,percent,passed,error\r\ns1,A,0.95,true,\r\ns2,,0.4,false,\r\n',
      );
    });

    test('a course without grades reports no content', async () => {
      const { api, executor } = await setup();

      const jobId = await api.submitJob(alice, JobOperation.ReadCourseGrades, programScope(world.acmeMba), { courseKey });
      await executor.onIdle();

      expect(artifactJson<GradeReport>(await api.fetchResult(alice, jobId))).toEqual({
        status: GradeReadStatus.NoContent,
        grades: [],
      });
    });

    test('grade exports need a course key', async () => {
      const { api } = await setup();

      await expect(
        api.submitJob(alice, JobOperation.ReadCourseGrades, programScope(world.acmeMba), { format: 'json' }),
      ).rejects.toMatchObject({ code: 'VALIDATION.SCHEMA' });
    });
  });

  describe('reports', () => {
    test('an organization report counts enrollments across the programs it authors', async () => {
      const { api, executor } = await setup();
      provider.seedProgramEnrollments(world.acmeMba.uuid, [
        { studentKey: 's1', status: ProgramEnrollmentStatus.Enrolled, accountExists: true },
        { studentKey: 's2', status: ProgramEnrollmentStatus.Enrolled, accountExists: true },
        { studentKey: 's3', status: ProgramEnrollmentStatus.Pending, accountExists: false },
      ]);
      provider.seedProgramEnrollments(world.jointMasters.uuid, [
        { studentKey: 's9', status: ProgramEnrollmentStatus.Suspended, accountExists: true },
      ]);

      const jobId = await api.submitJob(alice, JobOperation.GenerateEnrollmentReport, { kind: 'organization', key: 'acme' });
      await executor.onIdle();

      const report = artifactJson<EnrollmentReport>(await api.fetchResult(alice, jobId));
      expect(report.target).toEqual(orgScope(world.acme));
      expect(report.total).toBe(4);
      expect(report.byStatus).toEqual({ enrolled: 2, pending: 1, suspended: 1, canceled: 0 });
      expect(report.programs.map((p) => [p.programKey, p.total])).toEqual([
        ['acme-mba', 3],
        ['joint-masters', 1],
      ]);
    });
  });

  describe('pool', () => {
    test('runs at most `jobConcurrency` jobs at once', async () => {
      const { api, executor } = await setup();
      provider.setWriteDelay(50);

      for (let i = 0; i < 3; i++) {
        await api.submitJob(alice, JobOperation.WriteProgramEnrollments, programScope(world.acmeMba), writePayload(1));
      }

      expect(executor.stats()).toEqual({ queued: 1, running: 2 });
      await executor.onIdle();
      expect(executor.stats()).toEqual({ queued: 0, running: 0 });
    });

    test('onIdle resolves immediately with nothing to do', async () => {
      const { executor } = await setup();

      await expect(executor.onIdle()).resolves.toBeUndefined();
    });
  });
});
