import { NoSuchKey, S3Client } from '@aws-sdk/client-s3';
import { S3ResultStore } from '../../src/storage/s3-result-store';

const credentials = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };

/** A client whose commands stop before the network and report their input. */
function capturingClient(respond: () => void = () => undefined): { client: S3Client; sent: unknown[] } {
  const client = new S3Client({ region: 'us-east-1', credentials });
  const sent: unknown[] = [];
  client.middlewareStack.add(
    () => async (args) => {
      sent.push(args.input);
      respond();
      return { output: { $metadata: {} }, response: {} };
    },
    { step: 'initialize', name: 'captureCommands' },
  );
  return { client, sent };
}

describe('S3ResultStore', () => {
  test('put writes under the prefix with the content type', async () => {
    const { client, sent } = capturingClient();
    const store = new S3ResultStore(client, { bucket: 'results-bucket', prefix: 'exports/' });

    const ref = await store.put('job_1', '{"ok":true}', 'application/json');

    expect(ref).toEqual({ backend: 's3', key: 'exports/job-results/job_1.json' });
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      Bucket: 'results-bucket',
      Key: 'exports/job-results/job_1.json',
      ContentType: 'application/json',
      Body: Buffer.from('{"ok":true}'),
    });
  });

  test('get returns null when the object does not exist', async () => {
    const { client } = capturingClient(() => {
      throw new NoSuchKey({ message: 'The specified key does not exist.', $metadata: {} });
    });
    const store = new S3ResultStore(client, { bucket: 'results-bucket' });

    expect(await store.get({ backend: 's3', key: 'job-results/missing.json' })).toBeNull();
  });

  test('get rethrows other storage errors', async () => {
    const { client } = capturingClient(() => {
      throw new Error('Access Denied');
    });
    const store = new S3ResultStore(client, { bucket: 'results-bucket' });

    await expect(store.get({ backend: 's3', key: 'job-results/job_1.json' })).rejects.toThrow('Access Denied');
  });

  test('references from another backend are not served', async () => {
    const { client, sent } = capturingClient();
    const store = new S3ResultStore(client, { bucket: 'results-bucket' });

    expect(await store.get({ backend: 'filesystem', key: 'job-results/job_1.json' })).toBeNull();
    expect(await store.getUrl({ backend: 'filesystem', key: 'job-results/job_1.json' })).toBeNull();
    expect(sent).toHaveLength(0);
  });

  test('getUrl presigns a GET with the configured lifetime', async () => {
    const client = new S3Client({ region: 'us-east-1', credentials });
    const store = new S3ResultStore(client, { bucket: 'results-bucket', urlTtlSeconds: 120 });

    const url = new URL((await store.getUrl({ backend: 's3', key: 'exports/job-results/job_1.json' })) ?? '');

    expect(url.pathname).toBe('/exports/job-results/job_1.json');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('120');
    expect(url.searchParams.get('X-Amz-Credential')).toMatch(/^test-access-key\//);
  });
});
