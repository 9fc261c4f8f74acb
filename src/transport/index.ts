/**
 * HTTP transport layer
 */

export type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

export {
  bodyText,
  getContentLength,
  getETag,
  getHeader,
  getRequestId,
  isSuccessResponse,
} from './types.js';

export { FetchTransport, createFetchTransport, type FetchTransportOptions } from './fetch-transport.js';
