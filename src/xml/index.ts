/**
 * XML encoding and decoding of S3 payloads
 */

export {
  buildXml,
  cleanETag,
  createXmlBuilder,
  createXmlParser,
  getElement,
  getElements,
  getText,
  getTexts,
  isXmlElement,
  normalizeArray,
  parseBooleanSafe,
  parseDate,
  parseIntSafe,
  parseXml,
  S3_XML_NAMESPACE,
  XML_DECLARATION,
  type XmlElement,
} from './parser.js';

export { formatErrorMessage, isErrorResponse, parseErrorResponse, type ParsedError } from './error.js';

export {
  buildCompleteMultipartXml,
  parseCompleteMultipartResponse,
  parseInitiateMultipartResponse,
  type CompleteMultipartResult,
  type InitiateMultipartResult,
  type ManifestPart,
} from './multipart.js';

export {
  parseListObjectsResponse,
  type ListedObject,
  type ListObjectsPage,
  type ListParseOptions,
} from './list-objects.js';

export { buildCreateBucketXml, type CreateBucketConfiguration } from './bucket.js';
