/**
 * Request dispatcher: address, sign, send, classify
 */

import { buildObjectUrl, type BucketAddress } from '../addressing/index.js';
import { classifyServiceError, type RemoteServiceError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { getCanonicalQueryString, type SigV4Signer } from '../signing/index.js';
import {
  bodyText,
  getRequestId,
  isSuccessResponse,
  type HttpResponse,
  type HttpTransport,
} from '../transport/index.js';
import { parseErrorResponse } from '../xml/index.js';

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'HEAD';

export interface DispatchRequest {
  method: HttpMethod;
  /** Object key; the bucket itself when omitted */
  key?: string;
  /** Raw query parameters */
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: Uint8Array;
  signal?: AbortSignal;
}

/**
 * Sends signed requests against one bucket.
 *
 * Any non-2xx answer becomes a RemoteServiceError classified from the
 * status and the `<Error>` document, when the service sent one.
 */
export class RequestDispatcher {
  private readonly transport: HttpTransport;
  private readonly signer: SigV4Signer;
  private readonly logger: Logger;
  readonly address: BucketAddress;

  constructor(
    transport: HttpTransport,
    signer: SigV4Signer,
    address: BucketAddress,
    logger: Logger = new NoopLogger()
  ) {
    this.transport = transport;
    this.signer = signer;
    this.address = address;
    this.logger = logger;
  }

  async send(request: DispatchRequest): Promise<HttpResponse> {
    const url = buildObjectUrl(this.address, request.key);
    const query = request.query ?? {};

    const headers = this.signer.signRequest({
      method: request.method,
      url,
      headers: request.headers,
      payload: request.body,
      query,
    });

    const queryString = getCanonicalQueryString(query);
    const target = queryString ? `${url.href}?${queryString}` : url.href;

    const context = {
      method: request.method,
      bucket: this.address.bucket,
      key: request.key,
    };
    this.logger.debug('Sending request', context);

    const response = await this.transport.send({
      method: request.method,
      url: target,
      headers,
      body: request.body,
      signal: request.signal,
    });

    this.logger.debug('Received response', { ...context, status: response.status });

    if (!isSuccessResponse(response)) {
      throw this.toServiceError(response, request.key);
    }

    return response;
  }

  private toServiceError(response: HttpResponse, key?: string): RemoteServiceError {
    const parsed = parseErrorResponse(bodyText(response));

    return classifyServiceError(
      response.status,
      parsed?.code,
      parsed?.message,
      parsed?.requestId ?? getRequestId(response.headers),
      { bucket: this.address.bucket, key, resource: parsed?.resource }
    );
  }
}
