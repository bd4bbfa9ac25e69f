/**
 * Result store selection from configuration.
 */

import { S3Client } from '@aws-sdk/client-s3';
import { RegistrarConfig } from '../config';
import { configError, RegistrarError } from '../domain/errors';
import { FilesystemResultStore } from './filesystem-result-store';
import { ResultStore } from './result-store';
import { S3ResultStore } from './s3-result-store';

export function createResultStore(config: RegistrarConfig, client?: S3Client): ResultStore {
  switch (config.resultStore) {
    case 'filesystem':
      return new FilesystemResultStore(config.resultDir);
    case 's3': {
      const bucket = config.s3.bucket;
      if (!bucket) {
        throw new RegistrarError(configError(['s3.bucket is required when resultStore is "s3"']));
      }
      // Credentials come from the SDK's default provider chain.
      const s3 =
        client ??
        new S3Client({
          region: config.s3.region,
          endpoint: config.s3.endpoint,
          forcePathStyle: config.s3.endpoint !== undefined,
        });
      return new S3ResultStore(s3, {
        bucket,
        prefix: config.s3.prefix,
        urlTtlSeconds: config.resultUrlTtlSeconds,
      });
    }
  }
}
