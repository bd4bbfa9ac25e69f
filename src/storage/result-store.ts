/**
 * Result Store contract.
 *
 * Durable blob storage for job output, addressed by job id. The job
 * registry and executor depend only on this interface; the backend is
 * chosen by configuration.
 */

import { ResultArtifact, ResultRef } from '../domain/job';

export interface ResultStore {
  readonly backend: ResultRef['backend'];
  put(jobId: string, payload: Buffer | string, contentType: string): Promise<ResultRef>;
  /** Returns null when nothing is stored under the reference. */
  get(ref: ResultRef): Promise<ResultArtifact | null>;
  /** A URL the caller can download the artifact from, or null if the backend offers none. */
  getUrl(ref: ResultRef): Promise<string | null>;
}

const EXTENSIONS: Record<string, string> = {
  'application/json': 'json',
  'text/csv': 'csv',
  'text/plain': 'txt',
};

export function extensionFor(contentType: string): string {
  const base = contentType.split(';')[0].trim().toLowerCase();
  return EXTENSIONS[base] ?? 'bin';
}

export function contentTypeForKey(key: string): string {
  const ext = key.slice(key.lastIndexOf('.') + 1);
  const match = Object.entries(EXTENSIONS).find(([, e]) => e === ext);
  return match ? match[0] : 'application/octet-stream';
}

/** Relative key of a job's artifact, e.g. "job-results/<jobId>.json". */
export function resultKey(jobId: string, contentType: string): string {
  return `job-results/${jobId}.${extensionFor(contentType)}`;
}

export function toBuffer(payload: Buffer | string): Buffer {
  return typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload;
}
