/**
 * XML parsing for S3 error responses
 */

import { getElement, getText, parseXml, type XmlElement } from './parser.js';

/**
 * Parsed error information from an S3 error document
 */
export interface ParsedError {
  /** Error code (e.g., 'NoSuchKey', 'AccessDenied') */
  readonly code?: string;
  readonly message?: string;
  readonly requestId?: string;
  readonly resource?: string;
  readonly hostId?: string;
}

/**
 * Checks if a response body is an S3 `<Error>` document
 *
 * @example
 * ```typescript
 * isErrorResponse('<Error><Code>NoSuchKey</Code></Error>'); // true
 * isErrorResponse('<ListBucketResult></ListBucketResult>'); // false
 * ```
 */
export function isErrorResponse(xml: string): boolean {
  if (!xml.includes('<Error>') && !xml.includes('<Error ')) {
    return false;
  }
  return parseErrorResponse(xml) !== undefined;
}

/**
 * Parses an S3 error document.
 * Returns undefined when the body is not a well-formed `<Error>` document,
 * e.g. an HTML page from a proxy or an empty HEAD response.
 */
export function parseErrorResponse(xml: string): ParsedError | undefined {
  if (!xml.trim()) {
    return undefined;
  }

  let document: XmlElement;
  try {
    document = parseXml(xml);
  } catch {
    // Not XML; the caller falls back to the HTTP status alone
    return undefined;
  }

  const error = getElement(document, 'Error');
  if (!error) {
    return undefined;
  }

  return {
    code: getText(error, 'Code') || undefined,
    message: getText(error, 'Message') || undefined,
    requestId: getText(error, 'RequestId') || undefined,
    resource: getText(error, 'Resource') || undefined,
    hostId: getText(error, 'HostId') || undefined,
  };
}

/**
 * Creates a readable message from a parsed error
 *
 * @example
 * ```typescript
 * formatErrorMessage({ code: 'NoSuchKey', message: 'The specified key does not exist.' });
 * // 'NoSuchKey: The specified key does not exist.'
 * ```
 */
export function formatErrorMessage(error: ParsedError): string {
  if (error.code && error.message) {
    return `${error.code}: ${error.message}`;
  }
  return error.message ?? error.code ?? 'Unknown error';
}
