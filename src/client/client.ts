/**
 * S3-compatible client
 */

import { inspect } from 'node:util';
import { buildObjectUrl, type BucketAddress } from '../addressing/index.js';
import {
  BucketService,
  type CreateBucketOptions,
  type CreateBucketOutput,
  type ListObjectsOptions,
} from '../buckets/index.js';
import {
  withoutCredentials,
  type NormalizedS3Config,
  type PublicS3Config,
} from '../config/index.js';
import { RequestDispatcher } from '../dispatch/index.js';
import {
  fileSource,
  MultipartService,
  TransferOrchestrator,
  type MultipartSessionApi,
  type UploadBody,
  type UploadOptions,
  type UploadResult,
} from '../multipart/index.js';
import {
  ObjectService,
  type DeleteObjectOutput,
  type GetObjectOptions,
  type GetObjectOutput,
  type HeadObjectOutput,
  type PutObjectOptions,
  type PutObjectOutput,
} from '../objects/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { PresignedUrl, SigV4Signer } from '../signing/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { ListObjectsPage } from '../xml/index.js';

export interface PresignOptions {
  /** Seconds. Default 3600 */
  expiresIn?: number;
  /** Extra query parameters to sign, e.g. response-content-type */
  params?: Record<string, string>;
}

/**
 * Client bound to one bucket.
 *
 * Holds the signer, the resolved bucket address and one dispatcher shared
 * by the object, bucket and multipart services. The client owns the
 * transport and closes it in `close()`.
 */
export class S3Client {
  readonly address: BucketAddress;

  /** Low-level multipart session operations */
  readonly multipart: MultipartSessionApi;

  private readonly objects: ObjectService;
  private readonly buckets: BucketService;
  private readonly orchestrator: TransferOrchestrator;
  private readonly signer: SigV4Signer;
  private readonly transport: HttpTransport;
  private closed = false;

  constructor(
    private readonly config: NormalizedS3Config,
    transport: HttpTransport,
    signer: SigV4Signer,
    address: BucketAddress,
    logger: Logger = new NoopLogger()
  ) {
    this.transport = transport;
    this.signer = signer;
    this.address = address;

    const dispatcher = new RequestDispatcher(transport, signer, address, logger);
    this.objects = new ObjectService(dispatcher);
    this.buckets = new BucketService(dispatcher, config.provider, config.region);
    this.multipart = new MultipartService(dispatcher);
    this.orchestrator = new TransferOrchestrator(
      this.multipart,
      this.objects,
      address.bucket,
      config.transfer,
      logger
    );
  }

  putObject(key: string, data: Uint8Array | string, options?: PutObjectOptions): Promise<PutObjectOutput> {
    return this.objects.putObject(key, data, options);
  }

  getObject(key: string, options?: GetObjectOptions): Promise<GetObjectOutput> {
    return this.objects.getObject(key, options);
  }

  headObject(key: string): Promise<HeadObjectOutput> {
    return this.objects.headObject(key);
  }

  deleteObject(key: string): Promise<DeleteObjectOutput> {
    return this.objects.deleteObject(key);
  }

  createBucket(options?: CreateBucketOptions): Promise<CreateBucketOutput> {
    return this.buckets.createBucket(options);
  }

  deleteBucket(): Promise<void> {
    return this.buckets.deleteBucket();
  }

  listObjects(options?: ListObjectsOptions): Promise<ListObjectsPage> {
    return this.buckets.listObjects(options);
  }

  /**
   * Presign a request for one object. No network call is made.
   */
  generatePresignedUrl(
    method: string,
    key: string,
    options: PresignOptions = {},
    now?: Date
  ): PresignedUrl {
    return this.signer.presignUrl(
      {
        method,
        url: buildObjectUrl(this.address, key),
        expiresIn: options.expiresIn ?? 3600,
        query: options.params,
      },
      now
    );
  }

  /**
   * Upload bytes, text or any UploadSource, single-part or multipart
   * depending on size
   */
  upload(key: string, body: UploadBody, options?: UploadOptions): Promise<UploadResult> {
    return this.orchestrator.upload(key, body, options);
  }

  /**
   * Upload a local file. The file is read part by part, never whole.
   */
  async uploadFile(path: string, key: string, options?: UploadOptions): Promise<UploadResult> {
    const source = await fileSource(path);
    return this.orchestrator.upload(key, source, options);
  }

  /**
   * Closes the transport. The client cannot be used afterwards.
   *
   * @throws {Error} If the client is already closed
   */
  async close(): Promise<void> {
    if (this.closed) {
      throw new Error('Client is already closed');
    }
    this.closed = true;
    await this.transport.close();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Client settings with the credentials left out
   */
  getConfig(): PublicS3Config {
    return withoutCredentials(this.config);
  }

  toJSON(): PublicS3Config {
    return this.getConfig();
  }

  [inspect.custom](): string {
    return `S3Client ${JSON.stringify(this.getConfig())}`;
  }
}
