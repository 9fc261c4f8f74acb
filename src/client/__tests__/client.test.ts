import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { inspect } from 'node:util';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AuthenticationInputError,
  ConfigurationError,
  NotFoundError,
  TransferError,
  ValidationError,
} from '../../errors/index.js';
import { MIN_PART_SIZE } from '../../multipart/index.js';
import type { Logger } from '../../observability/index.js';
import {
  createTestConfig,
  createTestData,
  InMemoryS3Transport,
  TEST_BUCKET,
} from '../../testing/index.js';
import { createClient, createClientFromEnv, createClientFromProfile } from '../factory.js';

const decoder = new TextDecoder();

const credentials = {
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
  region: 'us-east-1',
};

function createLogger(): Logger {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn(), trace: vi.fn() };
}

describe('createClient', () => {
  it('resolves the bucket address up front', () => {
    const client = createClient(createTestConfig(), { transport: new InMemoryS3Transport() });

    expect(client.address.baseUrl).toBe('https://test-bucket.s3.us-east-1.amazonaws.com');
    expect(client.address.addressStyle).toBe('virtual-hosted');
    expect(client.getConfig().region).toBe('us-east-1');
  });

  it('uses path-style for bucket names that are not DNS labels', () => {
    const client = createClient(createTestConfig({ bucket: 'My_Bucket' }), {
      transport: new InMemoryS3Transport(),
    });

    expect(client.address.baseUrl).toBe('https://s3.us-east-1.amazonaws.com/My_Bucket');
  });

  it('rejects a plain HTTP endpoint', () => {
    expect(() => createClient(createTestConfig({ endpoint: 'http://localhost:9000' }))).toThrow(ConfigurationError);
  });

  it('rejects missing credentials', () => {
    expect(() => createClient(createTestConfig({ secretAccessKey: '' }))).toThrow('secretAccessKey is required');
  });
});

describe('createClientFromEnv', () => {
  it('builds a client from environment variables', () => {
    const client = createClientFromEnv('logs', {
      env: {
        AWS_ACCESS_KEY_ID: 'test-access-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_REGION: 'eu-west-1',
        AWS_ENDPOINT_URL: 'https://minio.example.com',
        S3_ADDRESS_STYLE: 'path-style',
      },
      transport: new InMemoryS3Transport(),
    });

    expect(client.address.baseUrl).toBe('https://minio.example.com/logs');
    expect(client.getConfig().region).toBe('eu-west-1');
  });
});

describe('createClientFromProfile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'client-profile-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('builds a client from a profile', async () => {
    const credentialsPath = join(dir, 'credentials');
    await writeFile(
      credentialsPath,
      '[minio]\naws_access_key_id = k\naws_secret_access_key = s\nregion = eu-central-1\n' +
        'endpoint_url = https://storage.example.com\n'
    );

    const client = await createClientFromProfile(
      'backups',
      { profile: 'minio', credentialsPath, configPath: join(dir, 'config'), env: {} },
      { transport: new InMemoryS3Transport() }
    );

    expect(client.address.baseUrl).toBe('https://backups.storage.example.com');
    expect(client.getConfig().region).toBe('eu-central-1');
  });
});

describe('S3Client', () => {
  let transport: InMemoryS3Transport;

  beforeEach(() => {
    transport = new InMemoryS3Transport({ buckets: [TEST_BUCKET], credentials });
  });

  it('round-trips an object', async () => {
    const client = createClient(createTestConfig(), { transport });

    await client.putObject('greeting.txt', 'hello world', { metadata: { lang: 'en' } });
    const head = await client.headObject('greeting.txt');
    const object = await client.getObject('greeting.txt');

    expect(head.contentLength).toBe(11);
    expect(head.metadata).toEqual({ lang: 'en' });
    expect(decoder.decode(object.body)).toBe('hello world');

    await client.deleteObject('greeting.txt');
    await expect(client.getObject('greeting.txt')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists objects', async () => {
    const client = createClient(createTestConfig(), { transport });
    await client.putObject('a/1.txt', '1');
    await client.putObject('a/2.txt', '2');
    await client.putObject('b/3.txt', '3');

    const page = await client.listObjects({ prefix: 'a/' });

    expect(page.contents.map((item) => item.key)).toEqual(['a/1.txt', 'a/2.txt']);
  });

  it('creates and deletes its bucket', async () => {
    const client = createClient(createTestConfig({ bucket: 'fresh-bucket' }), { transport });

    await client.createBucket();
    expect(transport.hasBucket('fresh-bucket')).toBe(true);

    await client.deleteBucket();
    expect(transport.hasBucket('fresh-bucket')).toBe(false);
  });

  it('uploads large bodies in parts and assembles them in order', async () => {
    const logger = createLogger();
    const client = createClient(
      createTestConfig({ transfer: { multipartThreshold: MIN_PART_SIZE, partSize: MIN_PART_SIZE, maxConcurrency: 3 } }),
      { transport, logger }
    );
    transport.setDelay('UploadPart', 5);
    const data = createTestData(3 * MIN_PART_SIZE + 100);

    const result = await client.upload('big.bin', data, { contentType: 'application/octet-stream' });

    expect(result.uploadType).toBe('multipart');
    expect(result.partsCount).toBe(4);
    expect(result.eTag).toMatch(/-4$/);
    expect(transport.getObject(TEST_BUCKET, 'big.bin')).toEqual(data);
    expect(transport.count('UploadPart')).toBe(4);
    expect(transport.maxInFlight('UploadPart')).toBeLessThanOrEqual(3);
    expect(transport.openUploads).toBe(0);
    expect(logger.info).toHaveBeenCalledWith('Multipart upload completed', expect.objectContaining({ parts: 4 }));
  });

  it('aborts the session when a part fails', async () => {
    const logger = createLogger();
    const client = createClient(
      createTestConfig({ transfer: { multipartThreshold: MIN_PART_SIZE, partSize: MIN_PART_SIZE, maxConcurrency: 2 } }),
      { transport, logger }
    );
    transport.failOn({ operation: 'UploadPart', partNumber: 2, status: 500, code: 'InternalError' });

    const error = await client.upload('big.bin', createTestData(2 * MIN_PART_SIZE + 1)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferError);
    expect(error).toMatchObject({ code: 'TRANSFER_FAILED', isRetryable: true });
    expect(transport.count('AbortMultipartUpload')).toBe(1);
    expect(transport.count('CompleteMultipartUpload')).toBe(0);
    expect(transport.openUploads).toBe(0);
    expect(transport.getObject(TEST_BUCKET, 'big.bin')).toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith(
      'Multipart upload failed, aborting',
      expect.objectContaining({ uploadId: 'upload-1', errorCode: 'InternalError' })
    );
  });

  it('uploads a file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'client-upload-'));
    try {
      const path = join(dir, 'report.csv');
      await writeFile(path, 'id,total\n1,42\n');
      const client = createClient(createTestConfig(), { transport });

      const result = await client.uploadFile(path, 'reports/report.csv', { contentType: 'text/csv' });

      expect(result.uploadType).toBe('single-part');
      expect(result.size).toBe(14);
      expect(decoder.decode(transport.getObject(TEST_BUCKET, 'reports/report.csv'))).toBe('id,total\n1,42\n');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('exposes the low-level multipart session API', async () => {
    const client = createClient(createTestConfig(), { transport });

    const uploadId = await client.multipart.initiate('manual.txt');
    const part = await client.multipart.uploadPart('manual.txt', uploadId, 1, new TextEncoder().encode('manual'));
    await client.multipart.complete('manual.txt', uploadId, [part]);

    expect(decoder.decode(transport.getObject(TEST_BUCKET, 'manual.txt'))).toBe('manual');
  });

  it('refuses keys that would leave the bucket (virtual-hosted)', async () => {
    transport.putObject(TEST_BUCKET, 'kept.txt', new TextEncoder().encode('kept'));
    const client = createClient(createTestConfig(), { transport });

    await expect(client.deleteObject('..')).rejects.toBeInstanceOf(ValidationError);

    expect(transport.requests).toHaveLength(0);
    expect(transport.hasBucket(TEST_BUCKET)).toBe(true);
  });

  it('refuses keys that would leave the bucket (path-style)', async () => {
    transport = new InMemoryS3Transport({ buckets: [TEST_BUCKET, 'other'], credentials });
    const client = createClient(createTestConfig({ addressStyle: 'path-style' }), { transport });

    await expect(client.putObject('../other/x', 'hi')).rejects.toMatchObject({ code: 'INVALID_KEY' });
    await expect(client.upload('../other/x', 'hi')).rejects.toBeInstanceOf(ValidationError);
    await expect(client.multipart.initiate('a/../../other/x')).rejects.toBeInstanceOf(ValidationError);

    expect(transport.requests).toHaveLength(0);
    expect(transport.getObject('other', 'x')).toBeUndefined();
  });

  it('keeps credentials out of serialized and inspected output', () => {
    const client = createClient(createTestConfig(), { transport });

    const json = JSON.stringify(client);

    expect(JSON.parse(json)).toMatchObject({ bucket: TEST_BUCKET, region: 'us-east-1' });
    expect(json).not.toContain('test-secret');
    expect(inspect(client, { depth: 10 })).not.toContain('test-secret');
    expect(client.getConfig()).not.toHaveProperty('secretAccessKey');
  });

  describe('generatePresignedUrl', () => {
    const now = new Date(Date.UTC(2024, 0, 15, 12, 0, 0));

    it('presigns an object URL', () => {
      const client = createClient(createTestConfig(), { transport });

      const presigned = client.generatePresignedUrl('get', 'docs/a b.txt', { expiresIn: 600 }, now);
      const url = new URL(presigned.url);

      expect(presigned.method).toBe('GET');
      expect(presigned.expiresAt.toISOString()).toBe('2024-01-15T12:10:00.000Z');
      expect(url.origin + url.pathname).toBe('https://test-bucket.s3.us-east-1.amazonaws.com/docs/a%20b.txt');
      expect(url.searchParams.get('X-Amz-Credential')).toBe('test-access-key/20240115/us-east-1/s3/aws4_request');
      expect(url.searchParams.get('X-Amz-Date')).toBe('20240115T120000Z');
      expect(url.searchParams.get('X-Amz-Expires')).toBe('600');
      expect(url.searchParams.get('X-Amz-SignedHeaders')).toBe('host');
      expect(url.searchParams.get('X-Amz-Signature')).toMatch(/^[0-9a-f]{64}$/);
    });

    it('defaults to one hour and signs extra parameters', () => {
      const client = createClient(createTestConfig(), { transport });

      const presigned = client.generatePresignedUrl(
        'GET',
        'a.txt',
        { params: { 'response-content-type': 'text/plain' } },
        now
      );
      const url = new URL(presigned.url);

      expect(url.searchParams.get('X-Amz-Expires')).toBe('3600');
      expect(url.searchParams.get('response-content-type')).toBe('text/plain');
    });

    it('rejects expirations over seven days', () => {
      const client = createClient(createTestConfig(), { transport });
      expect(() => client.generatePresignedUrl('GET', 'a.txt', { expiresIn: 604801 })).toThrow(
        AuthenticationInputError
      );
    });

    it('rejects an empty key', () => {
      const client = createClient(createTestConfig(), { transport });
      expect(() => client.generatePresignedUrl('GET', '')).toThrow(ValidationError);
    });

    it('rejects keys with dot segments', () => {
      const client = createClient(createTestConfig(), { transport });
      expect(() => client.generatePresignedUrl('GET', '../other/x')).toThrow(ValidationError);
    });
  });

  describe('close', () => {
    it('closes the transport once', async () => {
      const client = createClient(createTestConfig(), { transport });

      await client.close();

      expect(client.isClosed).toBe(true);
      expect(transport.isClosed).toBe(true);
      await expect(client.close()).rejects.toThrow('Client is already closed');
    });
  });
});
