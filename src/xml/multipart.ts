/**
 * XML payloads of the multipart upload protocol
 */

import { RemoteServiceError } from '../errors/index.js';
import { buildXml, cleanETag, getElement, getText, parseXml } from './parser.js';

export interface InitiateMultipartResult {
  bucket?: string;
  key?: string;
  uploadId: string;
}

export interface CompleteMultipartResult {
  location?: string;
  bucket?: string;
  key?: string;
  eTag?: string;
}

export interface ManifestPart {
  partNumber: number;
  eTag: string;
}

/**
 * Parses an InitiateMultipartUploadResult document
 *
 * @throws RemoteServiceError when no UploadId is present
 */
export function parseInitiateMultipartResponse(xml: string): InitiateMultipartResult {
  const result = getElement(parseXml(xml), 'InitiateMultipartUploadResult');
  const uploadId = getText(result, 'UploadId');

  if (!uploadId) {
    throw new RemoteServiceError({
      message: 'Invalid InitiateMultipartUpload response: missing UploadId',
      code: 'MalformedResponse',
    });
  }

  return {
    bucket: getText(result, 'Bucket'),
    key: getText(result, 'Key'),
    uploadId,
  };
}

/**
 * Parses a CompleteMultipartUploadResult document. Quotes are removed from
 * the ETag.
 */
export function parseCompleteMultipartResponse(xml: string): CompleteMultipartResult {
  const result = getElement(parseXml(xml), 'CompleteMultipartUploadResult');
  const eTag = getText(result, 'ETag');

  return {
    location: getText(result, 'Location'),
    bucket: getText(result, 'Bucket'),
    key: getText(result, 'Key'),
    eTag: eTag === undefined ? undefined : cleanETag(eTag),
  };
}

/**
 * Builds the CompleteMultipartUpload manifest. Parts are written in the
 * order given with every ETag in double quotes.
 *
 * @example
 * ```typescript
 * buildCompleteMultipartXml([{ partNumber: 1, eTag: 'e1' }]);
 * // <CompleteMultipartUpload><Part><PartNumber>1</PartNumber><ETag>"e1"</ETag></Part></CompleteMultipartUpload>
 * ```
 */
export function buildCompleteMultipartXml(parts: readonly ManifestPart[]): string {
  return buildXml(
    {
      CompleteMultipartUpload: {
        Part: parts.map((part) => ({
          PartNumber: String(part.partNumber),
          ETag: `"${cleanETag(part.eTag)}"`,
        })),
      },
    },
    false
  );
}
