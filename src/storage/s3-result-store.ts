/**
 * S3-compatible object storage result store for multi-node deployments.
 * Downloads go through presigned URLs with a bounded lifetime.
 */

import { GetObjectCommand, NoSuchKey, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { ResultArtifact, ResultRef } from '../domain/job';
import { ResultStore, contentTypeForKey, resultKey, toBuffer } from './result-store';

export interface S3ResultStoreOptions {
  bucket: string;
  /** Key prefix, without trailing slash. */
  prefix?: string;
  urlTtlSeconds?: number;
}

export class S3ResultStore implements ResultStore {
  readonly backend = 's3' as const;
  private readonly prefix: string;
  private readonly urlTtlSeconds: number;

  constructor(
    private readonly client: S3Client,
    private readonly options: S3ResultStoreOptions,
  ) {
    this.prefix = (options.prefix ?? '').replace(/\/+$/, '');
    this.urlTtlSeconds = options.urlTtlSeconds ?? 300;
  }

  async put(jobId: string, payload: Buffer | string, contentType: string): Promise<ResultRef> {
    const key = this.objectKey(resultKey(jobId, contentType));
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: toBuffer(payload),
        ContentType: contentType,
      }),
    );
    return { backend: this.backend, key };
  }

  async get(ref: ResultRef): Promise<ResultArtifact | null> {
    if (ref.backend !== this.backend) return null;
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.options.bucket, Key: ref.key }),
      );
      if (!response.Body) return null;
      const bytes = await response.Body.transformToByteArray();
      return {
        payload: Buffer.from(bytes),
        contentType: response.ContentType ?? contentTypeForKey(ref.key),
      };
    } catch (err) {
      if (err instanceof NoSuchKey) return null;
      throw err;
    }
  }

  async getUrl(ref: ResultRef): Promise<string | null> {
    if (ref.backend !== this.backend) return null;
    const command = new GetObjectCommand({ Bucket: this.options.bucket, Key: ref.key });
    return getSignedUrl(this.client, command, { expiresIn: this.urlTtlSeconds });
  }

  private objectKey(key: string): string {
    return this.prefix ? `${this.prefix}/${key}` : key;
  }
}
