/**
 * HTTP Enrollment Provider: talks to the enrollment system's REST API.
 *
 * Authenticates with the OAuth2 client-credentials grant and caches the
 * token until shortly before it expires. Reads follow `next` URLs page by
 * page; writes send one batch per request (POST to create, PATCH to
 * update, PUT to create or update).
 *
 * Usage:
 *   const provider = new HttpEnrollmentProvider({
 *     baseUrl: 'https://lms.example.com',
 *     clientId: 'registrar-worker',
 *     clientSecret: process.env.REGISTRAR_LMS_CLIENT_SECRET ?? '',
 *   });
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
import { maskSecretsInMessage } from '../domain/errors';
import { logger } from '../logger';
import {
  BatchWriteResponse,
  DownstreamError,
  EnrollmentProvider,
  Page,
  RESULT_BEARING_STATUSES,
  isFatalStatus,
} from './provider';

export interface HttpEnrollmentProviderOptions {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  /** Per-request timeout when the caller passes no signal. */
  requestTimeoutMs?: number;
}

interface WirePage {
  results: unknown[];
  next?: string;
}

const WRITE_METHODS: Record<WriteMode, string> = {
  create: 'POST',
  update: 'PATCH',
  upsert: 'PUT',
};

/** Grade pages come back with 422 when every grade on them is an error. */
const GRADE_PAGE_STATUSES: ReadonlySet<number> = new Set([422]);

/** Refresh the token this long before the server says it expires. */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const log = logger.child({ module: 'http-enrollment-provider' });

export class HttpEnrollmentProvider implements EnrollmentProvider {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private token?: { value: string; expiresAt: number };

  constructor(private readonly options: HttpEnrollmentProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  }

  async listProgramEnrollments(
    programUuid: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<ProgramEnrollment>> {
    const page = await this.getPage(cursor ?? this.programEnrollmentsUrl(programUuid), signal);
    return {
      items: page.results.map((record) => {
        const { studentKey, status, accountExists } = this.parseRecord(record);
        if (!isProgramEnrollmentStatus(status)) {
          throw new DownstreamError(`Enrollment system returned unknown program enrollment status "${status}"`);
        }
        return { studentKey, status, accountExists };
      }),
      nextCursor: page.next,
    };
  }

  async listCourseEnrollments(
    programUuid: string,
    courseKey: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<CourseEnrollment>> {
    const page = await this.getPage(cursor ?? this.courseUrl(programUuid, courseKey, 'enrollments'), signal);
    return {
      items: page.results.map((record) => {
        const { studentKey, status, accountExists } = this.parseRecord(record);
        if (!isCourseEnrollmentStatus(status)) {
          throw new DownstreamError(`Enrollment system returned unknown course enrollment status "${status}"`);
        }
        return { courseKey, studentKey, status, accountExists };
      }),
      nextCursor: page.next,
    };
  }

  async listCourseGrades(
    programUuid: string,
    courseKey: string,
    cursor?: string,
    signal?: AbortSignal,
  ): Promise<Page<CourseGrade>> {
    const url = cursor ?? this.courseUrl(programUuid, courseKey, 'grades');
    const page = await this.getPage(url, signal, GRADE_PAGE_STATUSES);
    return { items: page.results.map(parseGrade), nextCursor: page.next };
  }

  async writeProgramEnrollments(
    programUuid: string,
    mode: WriteMode,
    items: EnrollmentWriteItem[],
    signal?: AbortSignal,
  ): Promise<BatchWriteResponse> {
    return this.writeBatch(this.programEnrollmentsUrl(programUuid), mode, items, signal);
  }

  async writeCourseEnrollments(
    programUuid: string,
    courseKey: string,
    mode: WriteMode,
    items: EnrollmentWriteItem[],
    signal?: AbortSignal,
  ): Promise<BatchWriteResponse> {
    return this.writeBatch(this.courseUrl(programUuid, courseKey, 'enrollments'), mode, items, signal);
  }

  private programEnrollmentsUrl(programUuid: string): string {
    return `${this.baseUrl}/api/program_enrollments/v1/programs/${encodeURIComponent(programUuid)}/enrollments/`;
  }

  private courseUrl(programUuid: string, courseKey: string, resource: 'enrollments' | 'grades'): string {
    return (
      `${this.baseUrl}/api/program_enrollments/v1/programs/${encodeURIComponent(programUuid)}` +
      `/courses/${encodeURIComponent(courseKey)}/${resource}/`
    );
  }

  /** One page of results; a 204 is an empty last page. */
  private async getPage(
    url: string,
    signal?: AbortSignal,
    tolerated: ReadonlySet<number> = new Set(),
  ): Promise<WirePage> {
    if (new URL(url).origin !== new URL(this.baseUrl).origin) {
      throw new DownstreamError(`Refusing to follow pagination link to another host: ${url}`);
    }
    const res = await this.request(url, { method: 'GET' }, signal);
    if (res.status === 204) {
      return { results: [] };
    }
    if (!res.ok && !tolerated.has(res.status)) {
      const text = await res.text().catch(() => '');
      throw new DownstreamError(
        this.mask(`Enrollment system returned HTTP ${res.status} for ${url}: ${text.slice(0, 200)}`),
        res.status,
      );
    }
    let data: unknown;
    try {
      data = await res.json();
    } catch {
      throw new DownstreamError(`Enrollment system returned non-JSON page for ${url}`, res.status);
    }
    if (!isRecord(data) || !Array.isArray(data.results)) {
      throw new DownstreamError(`Enrollment system returned a page without results for ${url}`, res.status);
    }
    return {
      results: data.results,
      next: typeof data.next === 'string' && data.next ? data.next : undefined,
    };
  }

  private async writeBatch(
    url: string,
    mode: WriteMode,
    items: EnrollmentWriteItem[],
    signal?: AbortSignal,
  ): Promise<BatchWriteResponse> {
    const res = await this.request(
      url,
      {
        method: WRITE_METHODS[mode],
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(items.map((item) => ({ student_key: item.studentKey, status: item.status }))),
      },
      signal,
    );

    const text = await res.text().catch(() => '');
    log.info('Enrollment write answered', { url, method: mode, status: res.status, items: items.length });

    if (isFatalStatus(res.status)) {
      throw new DownstreamError(
        this.mask(`Enrollment system returned HTTP ${res.status} for ${url}: ${text.slice(0, 200)}`),
        res.status,
      );
    }
    if (!RESULT_BEARING_STATUSES.has(res.status)) {
      return { statusCode: res.status, results: {} };
    }
    return { statusCode: res.status, results: parseResults(text) };
  }

  private async request(url: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const token = await this.accessToken(signal);
    const headers = new Headers(init.headers);
    headers.set('Authorization', `JWT ${token}`);
    try {
      return await fetch(url, {
        ...init,
        headers,
        signal: signal ?? AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new DownstreamError(
        this.mask(`Enrollment system connection failed (${url}): ${err instanceof Error ? err.message : 'unknown error'}`),
      );
    }
  }

  private async accessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      token_type: 'jwt',
    });

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/oauth2/access_token`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
        signal: signal ?? AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new DownstreamError(
        this.mask(`Token request failed (${this.baseUrl}): ${err instanceof Error ? err.message : 'unknown error'}`),
      );
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new DownstreamError(
        this.mask(`Token request returned HTTP ${res.status}: ${text.slice(0, 200)}`),
        res.status,
      );
    }

    const data: unknown = await res.json();
    if (!isRecord(data) || typeof data.access_token !== 'string' || !data.access_token) {
      throw new DownstreamError('Token response carried no access_token', res.status);
    }
    const expiresIn = typeof data.expires_in === 'number' ? data.expires_in : 3600;
    const lifetimeMs = expiresIn * 1000;
    this.token = {
      value: data.access_token,
      expiresAt: Date.now() + Math.max(0, lifetimeMs - TOKEN_EXPIRY_MARGIN_MS),
    };
    return this.token.value;
  }

  private parseRecord(record: unknown): { studentKey: string; status: string; accountExists: boolean } {
    if (!isRecord(record) || typeof record.student_key !== 'string' || typeof record.status !== 'string') {
      throw new DownstreamError('Enrollment system returned a record without student_key or status');
    }
    return {
      studentKey: record.student_key,
      status: record.status,
      accountExists: record.account_exists === true,
    };
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, [this.options.clientSecret]);
  }
}

/** A grade record carries either an error or the full set of grade fields. */
function parseGrade(record: unknown): CourseGrade {
  if (!isRecord(record) || typeof record.student_key !== 'string') {
    throw new DownstreamError('Invalid grade data from enrollment system: record without student_key');
  }
  const studentKey = record.student_key;
  const gradeFields = ['letter_grade', 'percent', 'passed'].filter((field) => field in record);
  if (typeof record.error === 'string' && gradeFields.length === 0) {
    return { studentKey, error: record.error };
  }
  const { letter_grade: letterGrade, percent, passed } = record;
  if (
    'error' in record ||
    gradeFields.length !== 3 ||
    (letterGrade !== null && typeof letterGrade !== 'string') ||
    typeof percent !== 'number' ||
    typeof passed !== 'boolean'
  ) {
    throw new DownstreamError(
      `Invalid grade data from enrollment system for ${studentKey}: expected either error or letter_grade, percent and passed`,
    );
  }
  return { studentKey, letterGrade, percent, passed };
}

/** Per-item results from a write response body; anything else yields none. */
function parseResults(text: string): Record<string, string> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return {};
  }
  if (!isRecord(data)) return {};
  const results: Record<string, string> = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string') results[key] = value;
  }
  return results;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
