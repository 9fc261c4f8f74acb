/**
 * Fetch-based HTTP transport implementation
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { NetworkError, S3Error } from '../errors/index.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeout: number;
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Uses the global Fetch API. Non-2xx responses are returned as they are;
 * classifying them is left to the caller.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeout);

    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      if (request.signal?.aborted) {
        throw NetworkError.aborted();
      }

      const response = await fetch(request.url, {
        method: request.method,
        headers: withoutHost(request.headers),
        body: request.body,
        signal: controller.signal,
      });

      const arrayBuffer = await response.arrayBuffer();

      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body: new Uint8Array(arrayBuffer),
      };
    } catch (error) {
      throw this.handleError(error, request, timedOut);
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Closes the transport (no-op for fetch-based transport)
   */
  async close(): Promise<void> {
    // Fetch API doesn't require explicit cleanup
  }

  /**
   * Converts Headers object to plain object
   */
  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  /**
   * Maps fetch failures to NetworkError
   */
  private handleError(error: unknown, request: HttpRequest, timedOut: boolean): S3Error {
    if (error instanceof S3Error) {
      return error;
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return timedOut ? NetworkError.timeout(this.options.timeout) : NetworkError.aborted(error);
      }

      // undici reports the underlying socket error as the cause
      const detail = error.cause instanceof Error ? error.cause.message : error.message;
      const message = detail.toLowerCase();

      if (message.includes('enotfound') || message.includes('eai_again')) {
        return NetworkError.dnsError(request.url, error);
      }

      return NetworkError.connectionFailed(detail, error);
    }

    return NetworkError.connectionFailed(String(error), error);
  }
}

/**
 * fetch derives the host header from the URL and may refuse an explicit one
 */
function withoutHost(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== 'host') {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout: number = 300000): HttpTransport {
  return new FetchTransport({ timeout });
}
