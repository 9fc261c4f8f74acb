import { beforeEach, describe, expect, it } from 'vitest';
import { resolveBucketAddress } from '../../addressing/index.js';
import { RequestDispatcher } from '../../dispatch/index.js';
import { NotFoundError, ProtocolLimitError, ServerError, ValidationError } from '../../errors/index.js';
import { SigV4Signer, sha256Hex } from '../../signing/index.js';
import { InMemoryS3Transport, TEST_BUCKET, TEST_ENDPOINT } from '../../testing/index.js';
import { MultipartService } from '../service.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const credentials = {
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
  region: 'us-east-1',
};

describe('MultipartService', () => {
  let transport: InMemoryS3Transport;
  let service: MultipartService;

  beforeEach(() => {
    transport = new InMemoryS3Transport({ buckets: [TEST_BUCKET], credentials });
    const dispatcher = new RequestDispatcher(
      transport,
      new SigV4Signer(credentials),
      resolveBucketAddress(TEST_ENDPOINT, TEST_BUCKET)
    );
    service = new MultipartService(dispatcher);
  });

  it('initiates a session with content type and metadata', async () => {
    const uploadId = await service.initiate('docs/report.pdf', {
      contentType: 'application/pdf',
      metadata: { Owner: 'qa' },
    });

    expect(uploadId).toBe('upload-1');
    expect(transport.openUploads).toBe(1);

    const [request] = transport.requests;
    expect(request?.operation).toBe('CreateMultipartUpload');
    expect(request?.headers['content-type']).toBe('application/pdf');
    expect(request?.headers['x-amz-meta-owner']).toBe('qa');
  });

  it('returns the part number, ETag and size of an uploaded part', async () => {
    const uploadId = await service.initiate('a.bin');
    const body = encoder.encode('part one');

    const part = await service.uploadPart('a.bin', uploadId, 1, body);

    expect(part).toEqual({ partNumber: 1, eTag: sha256Hex(body).slice(0, 32), size: 8 });
  });

  it('rejects part numbers outside the protocol range before sending', async () => {
    await expect(service.uploadPart('a.bin', 'upload-1', 0, encoder.encode('x'))).rejects.toBeInstanceOf(
      ProtocolLimitError
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('completes with sorted, de-duplicated parts', async () => {
    const uploadId = await service.initiate('a.txt');
    const second = await service.uploadPart('a.txt', uploadId, 2, encoder.encode('world'));
    const stale = await service.uploadPart('a.txt', uploadId, 1, encoder.encode('stale '));
    const first = await service.uploadPart('a.txt', uploadId, 1, encoder.encode('hello '));

    const completed = await service.complete('a.txt', uploadId, [second, stale, first]);

    expect(decoder.decode(transport.getObject(TEST_BUCKET, 'a.txt'))).toBe('hello world');
    expect(completed.bucket).toBe(TEST_BUCKET);
    expect(completed.key).toBe('a.txt');
    expect(completed.eTag).toMatch(/^[0-9a-f]{32}-2$/);
    expect(completed.location).toBe('/test-bucket/a.txt');
    expect(transport.openUploads).toBe(0);

    const manifest = transport.requests.find((request) => request.operation === 'CompleteMultipartUpload');
    expect(manifest?.headers['content-type']).toBe('application/xml');
    expect(decoder.decode(manifest?.body)).toBe(
      '<CompleteMultipartUpload>' +
        `<Part><PartNumber>1</PartNumber><ETag>"${first.eTag}"</ETag></Part>` +
        `<Part><PartNumber>2</PartNumber><ETag>"${second.eTag}"</ETag></Part>` +
        '</CompleteMultipartUpload>'
    );
  });

  it('refuses to complete without parts', async () => {
    await expect(service.complete('a.txt', 'upload-1', [])).rejects.toBeInstanceOf(ValidationError);
    expect(transport.requests).toHaveLength(0);
  });

  it('treats an error document in a 200 answer as a failure', async () => {
    const uploadId = await service.initiate('a.txt');
    const part = await service.uploadPart('a.txt', uploadId, 1, encoder.encode('data'));
    transport.failOn({ operation: 'CompleteMultipartUpload', asSuccess: true, code: 'InternalError' });

    const error = await service.complete('a.txt', uploadId, [part]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerError);
    expect(error).toMatchObject({ status: 200, code: 'InternalError', requestId: 'test-request' });
  });

  it('aborts a session', async () => {
    const uploadId = await service.initiate('a.txt');
    await service.abort('a.txt', uploadId);

    expect(transport.openUploads).toBe(0);
    await expect(service.abort('a.txt', uploadId)).rejects.toBeInstanceOf(NotFoundError);
  });
});
