/**
 * Single-object operations
 */

import { assertKey } from '../addressing/index.js';
import type { RequestDispatcher } from '../dispatch/index.js';
import { parseDate } from '../xml/index.js';
import { getContentLength, getETag, getHeader, type HttpResponse } from '../transport/index.js';
import { buildMetadataHeaders, extractMetadata } from './metadata.js';

export interface PutObjectOptions {
  contentType?: string;
  metadata?: Record<string, string>;
  signal?: AbortSignal;
}

export interface PutObjectOutput {
  /** ETag, quotes removed */
  eTag: string;
  versionId?: string;
  serverSideEncryption?: string;
}

export interface GetObjectOptions {
  /** HTTP range, e.g. 'bytes=0-1023' */
  range?: string;
  signal?: AbortSignal;
}

export interface HeadObjectOutput {
  eTag: string;
  contentType?: string;
  contentLength: number;
  lastModified?: Date;
  versionId?: string;
  serverSideEncryption?: string;
  metadata: Record<string, string>;
}

export interface GetObjectOutput extends HeadObjectOutput {
  body: Uint8Array;
}

export interface DeleteObjectOutput {
  deleteMarker: boolean;
  versionId?: string;
}

export class ObjectService {
  constructor(private readonly dispatcher: RequestDispatcher) {}

  async putObject(
    key: string,
    data: Uint8Array | string,
    options: PutObjectOptions = {}
  ): Promise<PutObjectOutput> {
    assertKey(key);
    const body = typeof data === 'string' ? new TextEncoder().encode(data) : data;

    const headers = buildMetadataHeaders(options.metadata);
    if (options.contentType) {
      headers['content-type'] = options.contentType;
    }

    const response = await this.dispatcher.send({
      method: 'PUT',
      key,
      headers,
      body,
      signal: options.signal,
    });

    return {
      eTag: getETag(response.headers) ?? '',
      versionId: getHeader(response.headers, 'x-amz-version-id'),
      serverSideEncryption: getHeader(response.headers, 'x-amz-server-side-encryption'),
    };
  }

  async getObject(key: string, options: GetObjectOptions = {}): Promise<GetObjectOutput> {
    assertKey(key);
    const headers: Record<string, string> = {};
    if (options.range) {
      headers['range'] = options.range;
    }

    const response = await this.dispatcher.send({
      method: 'GET',
      key,
      headers,
      signal: options.signal,
    });

    return {
      ...describeObject(response),
      contentLength: getContentLength(response.headers) ?? response.body.length,
      body: response.body,
    };
  }

  async headObject(key: string): Promise<HeadObjectOutput> {
    assertKey(key);
    const response = await this.dispatcher.send({ method: 'HEAD', key });
    return describeObject(response);
  }

  async deleteObject(key: string): Promise<DeleteObjectOutput> {
    assertKey(key);
    const response = await this.dispatcher.send({ method: 'DELETE', key });
    return {
      deleteMarker: getHeader(response.headers, 'x-amz-delete-marker') === 'true',
      versionId: getHeader(response.headers, 'x-amz-version-id'),
    };
  }
}

function describeObject(response: HttpResponse): HeadObjectOutput {
  const { headers } = response;
  return {
    eTag: getETag(headers) ?? '',
    contentType: getHeader(headers, 'content-type'),
    contentLength: getContentLength(headers) ?? 0,
    lastModified: parseDate(getHeader(headers, 'last-modified')),
    versionId: getHeader(headers, 'x-amz-version-id'),
    serverSideEncryption: getHeader(headers, 'x-amz-server-side-encryption'),
    metadata: extractMetadata(headers),
  };
}

