/**
 * Bucket-level operations on the client's bucket
 */

import type { ProviderProfile } from '../config/providers.js';
import type { RequestDispatcher } from '../dispatch/index.js';
import { ValidationError } from '../errors/index.js';
import { bodyText, getHeader } from '../transport/index.js';
import {
  buildCreateBucketXml,
  parseListObjectsResponse,
  type CreateBucketConfiguration,
  type ListObjectsPage,
} from '../xml/index.js';

export interface CreateBucketOptions extends CreateBucketConfiguration {
  /** Canned ACL, e.g. 'private' */
  acl?: string;
  grantFullControl?: string;
  grantRead?: string;
  grantReadAcp?: string;
  grantWrite?: string;
  grantWriteAcp?: string;
  objectLockEnabled?: boolean;
  /** e.g. 'BucketOwnerEnforced' */
  objectOwnership?: string;
}

export interface CreateBucketOutput {
  location?: string;
}

export interface ListObjectsOptions {
  prefix?: string;
  /** Default 1000 */
  maxKeys?: number;
  continuationToken?: string;
  signal?: AbortSignal;
}

export class BucketService {
  constructor(
    private readonly dispatcher: RequestDispatcher,
    private readonly provider: ProviderProfile,
    private readonly region: string
  ) {}

  /**
   * Create the bucket. The location constraint defaults to the client's
   * region and is left out for us-east-1.
   */
  async createBucket(options: CreateBucketOptions = {}): Promise<CreateBucketOutput> {
    const headers: Record<string, string> = {};
    const accessHeaders: Array<[string, string | undefined]> = [
      ['x-amz-acl', options.acl],
      ['x-amz-grant-full-control', options.grantFullControl],
      ['x-amz-grant-read', options.grantRead],
      ['x-amz-grant-read-acp', options.grantReadAcp],
      ['x-amz-grant-write', options.grantWrite],
      ['x-amz-grant-write-acp', options.grantWriteAcp],
      ['x-amz-object-ownership', options.objectOwnership],
    ];
    for (const [header, value] of accessHeaders) {
      if (value) {
        headers[header] = value;
      }
    }
    if (options.objectLockEnabled !== undefined) {
      headers['x-amz-bucket-object-lock-enabled'] = String(options.objectLockEnabled);
    }

    const document = buildCreateBucketXml({ ...options, region: options.region ?? this.region });
    if (document) {
      headers['content-type'] = 'application/xml';
    }

    const response = await this.dispatcher.send({
      method: 'PUT',
      headers,
      body: document ? new TextEncoder().encode(document) : undefined,
    });

    return { location: getHeader(response.headers, 'location') };
  }

  async deleteBucket(): Promise<void> {
    await this.dispatcher.send({ method: 'DELETE' });
  }

  /**
   * One page of a ListObjectsV2 listing
   */
  async listObjects(options: ListObjectsOptions = {}): Promise<ListObjectsPage> {
    const maxKeys = options.maxKeys ?? 1000;
    if (!Number.isInteger(maxKeys) || maxKeys < 1) {
      throw new ValidationError({
        message: `maxKeys must be a positive integer, got ${maxKeys}`,
        code: 'INVALID_MAX_KEYS',
      });
    }

    const query: Record<string, string> = {
      'list-type': '2',
      'max-keys': String(maxKeys),
    };

    if (options.prefix) {
      query['prefix'] =
        this.provider.listPrefixLeadingSlash && !options.prefix.startsWith('/')
          ? `/${options.prefix}`
          : options.prefix;
    }
    if (options.continuationToken) {
      query['continuation-token'] = options.continuationToken;
    }

    const response = await this.dispatcher.send({ method: 'GET', query, signal: options.signal });

    return parseListObjectsResponse(bodyText(response), {
      stripLeadingSlashFromKeys: this.provider.stripLeadingSlashFromKeys,
    });
  }
}
