/**
 * Multipart upload session operations over the request dispatcher
 */

import type { RequestDispatcher } from '../dispatch/index.js';
import { classifyServiceError, RemoteServiceError, ValidationError } from '../errors/index.js';
import { buildMetadataHeaders } from '../objects/metadata.js';
import { bodyText, getETag, getRequestId } from '../transport/index.js';
import {
  buildCompleteMultipartXml,
  parseCompleteMultipartResponse,
  parseErrorResponse,
  parseInitiateMultipartResponse,
  type CompleteMultipartResult,
} from '../xml/index.js';
import type { Part } from './registry.js';
import { validatePartNumber } from './strategy.js';

export interface InitiateOptions {
  contentType?: string;
  metadata?: Record<string, string>;
  signal?: AbortSignal;
}

export interface CompletedUpload {
  bucket: string;
  key: string;
  /** ETag of the assembled object, quotes removed */
  eTag: string;
  location?: string;
}

/**
 * The four session operations. One session is identified by key and
 * upload id; ids are opaque and valid until completed or aborted.
 */
export interface MultipartSessionApi {
  initiate(key: string, options?: InitiateOptions): Promise<string>;
  uploadPart(
    key: string,
    uploadId: string,
    partNumber: number,
    body: Uint8Array,
    signal?: AbortSignal
  ): Promise<Part>;
  complete(key: string, uploadId: string, parts: readonly Part[]): Promise<CompletedUpload>;
  abort(key: string, uploadId: string): Promise<void>;
}

export class MultipartService implements MultipartSessionApi {
  constructor(private readonly dispatcher: RequestDispatcher) {}

  async initiate(key: string, options: InitiateOptions = {}): Promise<string> {
    const headers = buildMetadataHeaders(options.metadata);
    if (options.contentType) {
      headers['content-type'] = options.contentType;
    }

    const response = await this.dispatcher.send({
      method: 'POST',
      key,
      query: { uploads: '' },
      headers,
      signal: options.signal,
    });

    return parseInitiateMultipartResponse(bodyText(response)).uploadId;
  }

  async uploadPart(
    key: string,
    uploadId: string,
    partNumber: number,
    body: Uint8Array,
    signal?: AbortSignal
  ): Promise<Part> {
    validatePartNumber(partNumber);

    const response = await this.dispatcher.send({
      method: 'PUT',
      key,
      query: { partNumber: String(partNumber), uploadId },
      body,
      signal,
    });

    const eTag = getETag(response.headers);
    if (!eTag) {
      throw new RemoteServiceError({
        message: `UploadPart response for part ${partNumber} has no ETag`,
        status: response.status,
        code: 'MissingETag',
        requestId: getRequestId(response.headers),
        details: { key, uploadId, partNumber },
      });
    }

    return { partNumber, eTag, size: body.length };
  }

  /**
   * Completes the session. Parts are sorted by number; when a number
   * appears twice the later record wins.
   */
  async complete(key: string, uploadId: string, parts: readonly Part[]): Promise<CompletedUpload> {
    if (parts.length === 0) {
      throw new ValidationError({
        message: 'Cannot complete a multipart upload without parts',
        code: 'NO_PARTS',
        details: { key, uploadId },
      });
    }

    const byNumber = new Map<number, Part>();
    for (const part of parts) {
      validatePartNumber(part.partNumber);
      byNumber.set(part.partNumber, part);
    }
    const manifest = Array.from(byNumber.values()).sort((a, b) => a.partNumber - b.partNumber);

    const response = await this.dispatcher.send({
      method: 'POST',
      key,
      query: { uploadId },
      headers: { 'content-type': 'application/xml' },
      body: new TextEncoder().encode(buildCompleteMultipartXml(manifest)),
    });

    // The service can answer 200 and still fail the assembly
    const text = bodyText(response);
    const error = parseErrorResponse(text);
    if (error) {
      throw classifyServiceError(
        response.status,
        error.code,
        error.message,
        error.requestId ?? getRequestId(response.headers),
        { key, uploadId }
      );
    }

    const result: CompleteMultipartResult = text.trim() ? parseCompleteMultipartResponse(text) : {};
    return {
      bucket: this.dispatcher.address.bucket,
      key,
      eTag: result.eTag ?? getETag(response.headers) ?? '',
      location: result.location,
    };
  }

  async abort(key: string, uploadId: string): Promise<void> {
    await this.dispatcher.send({
      method: 'DELETE',
      key,
      query: { uploadId },
    });
  }
}
