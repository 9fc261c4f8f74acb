/**
 * XML parsing for ListObjectsV2 responses
 */

import {
  cleanETag,
  getElement,
  getElements,
  getText,
  parseBooleanSafe,
  parseDate,
  parseIntSafe,
  parseXml,
} from './parser.js';

export interface ListedObject {
  key: string;
  lastModified?: Date;
  eTag: string;
  size: number;
  storageClass: string;
}

export interface ListObjectsPage {
  name?: string;
  prefix?: string;
  keyCount?: number;
  maxKeys?: number;
  isTruncated: boolean;
  continuationToken?: string;
  nextContinuationToken?: string;
  contents: ListedObject[];
  commonPrefixes: string[];
}

export interface ListParseOptions {
  /** Remove one leading '/' from every returned key */
  stripLeadingSlashFromKeys?: boolean;
}

/**
 * Parses a ListBucketResult (ListObjectsV2) document.
 * An empty body is an empty, non-truncated listing.
 */
export function parseListObjectsResponse(xml: string, options: ListParseOptions = {}): ListObjectsPage {
  if (!xml.trim()) {
    return { isTruncated: false, contents: [], commonPrefixes: [] };
  }

  const result = getElement(parseXml(xml), 'ListBucketResult');
  const normalizeKey = (key: string): string =>
    options.stripLeadingSlashFromKeys && key.startsWith('/') ? key.slice(1) : key;

  const contents = getElements(result, 'Contents').map((item) => ({
    key: normalizeKey(getText(item, 'Key') ?? ''),
    lastModified: parseDate(getText(item, 'LastModified')),
    eTag: cleanETag(getText(item, 'ETag') ?? ''),
    size: parseIntSafe(getText(item, 'Size'), 0),
    storageClass: getText(item, 'StorageClass') || 'STANDARD',
  }));

  const commonPrefixes = getElements(result, 'CommonPrefixes')
    .map((item) => getText(item, 'Prefix'))
    .filter((prefix): prefix is string => prefix !== undefined);

  const keyCount = getText(result, 'KeyCount');
  const maxKeys = getText(result, 'MaxKeys');

  return {
    name: getText(result, 'Name'),
    prefix: getText(result, 'Prefix') || undefined,
    keyCount: keyCount === undefined ? undefined : parseIntSafe(keyCount, 0),
    maxKeys: maxKeys === undefined ? undefined : parseIntSafe(maxKeys, 0),
    isTruncated: parseBooleanSafe(getText(result, 'IsTruncated'), false),
    continuationToken: getText(result, 'ContinuationToken') || undefined,
    nextContinuationToken: getText(result, 'NextContinuationToken') || undefined,
    contents,
    commonPrefixes,
  };
}
