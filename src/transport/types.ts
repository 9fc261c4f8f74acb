/**
 * HTTP transport type definitions
 */

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method (GET, PUT, POST, DELETE, HEAD) */
  method: string;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: Uint8Array;
  /** Aborts the request when signalled */
  signal?: AbortSignal;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers, lowercase names */
  headers: Record<string, string>;
  /** Response body as buffer */
  body: Uint8Array;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns the buffered response, whatever its
   * status. Only connection-level failures reject.
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Closes the transport and releases resources
   */
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Helper to check if response is successful (2xx status)
 */
export function isSuccessResponse(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Helper to extract ETag from response headers
 */
export function getETag(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'etag')?.replace(/^"|"$/g, ''); // Remove quotes
}

/**
 * Helper to extract Content-Length from response headers
 */
export function getContentLength(headers: Record<string, string>): number | undefined {
  const value = getHeader(headers, 'content-length');
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Helper to extract request ID from response headers
 */
export function getRequestId(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'x-amz-request-id');
}

/**
 * Decode a response body as UTF-8 text
 */
export function bodyText(response: HttpResponse): string {
  return new TextDecoder().decode(response.body);
}
