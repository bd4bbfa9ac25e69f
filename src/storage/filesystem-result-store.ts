/**
 * Local filesystem result store for single-node deployments.
 *
 * Each artifact is written beside a `<key>.meta.json` file holding the
 * content type it was stored with.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ResultArtifact, ResultRef } from '../domain/job';
import { ResultStore, contentTypeForKey, resultKey, toBuffer } from './result-store';

export class FilesystemResultStore implements ResultStore {
  readonly backend = 'filesystem' as const;

  constructor(private readonly rootDir: string) {}

  async put(jobId: string, payload: Buffer | string, contentType: string): Promise<ResultRef> {
    const key = resultKey(jobId, contentType);
    const resolved = this.resolvePath(key);
    await mkdir(path.dirname(resolved), { recursive: true });
    await writeFile(resolved, toBuffer(payload));
    await writeFile(metaPath(resolved), JSON.stringify({ contentType }));
    return { backend: this.backend, key };
  }

  async get(ref: ResultRef): Promise<ResultArtifact | null> {
    if (ref.backend !== this.backend) return null;
    const resolved = this.resolvePath(ref.key);
    try {
      const payload = await readFile(resolved);
      return { payload, contentType: (await readContentType(resolved)) ?? contentTypeForKey(ref.key) };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async getUrl(ref: ResultRef): Promise<string | null> {
    if (ref.backend !== this.backend) return null;
    return pathToFileURL(this.resolvePath(ref.key)).toString();
  }

  private resolvePath(key: string): string {
    const root = path.resolve(this.rootDir);
    const resolved = path.resolve(root, key.replace(/^\/+/, ''));
    if (!resolved.startsWith(root + path.sep)) {
      throw new Error(`Result key escapes the store root: ${key}`);
    }
    return resolved;
  }
}

function metaPath(artifactPath: string): string {
  return `${artifactPath}.meta.json`;
}

/** Stored content type, or null for artifacts written without a metadata file. */
async function readContentType(artifactPath: string): Promise<string | null> {
  let raw: string;
  try {
    raw = await readFile(metaPath(artifactPath), 'utf8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
  const meta: unknown = JSON.parse(raw);
  if (typeof meta === 'object' && meta !== null && 'contentType' in meta && typeof meta.contentType === 'string') {
    return meta.contentType;
  }
  return null;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
