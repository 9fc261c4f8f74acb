/**
 * Core XML parsing utilities for S3 API payloads
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { RemoteServiceError } from '../errors/index.js';

export const S3_XML_NAMESPACE = 'http://s3.amazonaws.com/doc/2006-03-01/';
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * A parsed element: child element names map to strings (text-only
 * elements), nested elements, or arrays of either when repeated.
 */
export type XmlElement = { [name: string]: unknown };

/**
 * Parser options for S3 XML responses
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
};

/**
 * Builder options for S3 XML request bodies
 */
const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: false,
  suppressEmptyNode: true,
};

export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Creates an XML builder. With `escapeText` false, text is written as
 * given, so a quoted ETag stays `"…"` instead of `&quot;…&quot;`.
 */
export function createXmlBuilder(escapeText = true): XMLBuilder {
  return new XMLBuilder({ ...BUILDER_OPTIONS, processEntities: escapeText });
}

/**
 * Parses and validates an XML document
 *
 * @throws RemoteServiceError when the document is not well-formed
 */
export function parseXml(xml: string): XmlElement {
  let parsed: unknown;
  try {
    parsed = createXmlParser().parse(xml, true);
  } catch (error) {
    throw new RemoteServiceError({
      message: `Failed to parse XML: ${error instanceof Error ? error.message : String(error)}`,
      code: 'MalformedXML',
      cause: error,
    });
  }

  if (!isXmlElement(parsed)) {
    throw new RemoteServiceError({
      message: 'Failed to parse XML: no root element',
      code: 'MalformedXML',
    });
  }
  return parsed;
}

/**
 * Converts an object to an XML string (no declaration)
 *
 * @example
 * ```typescript
 * buildXml({ Root: { Value: 'example' } }); // <Root><Value>example</Value></Root>
 * ```
 */
export function buildXml(obj: XmlElement, escapeText = true): string {
  return createXmlBuilder(escapeText).build(obj);
}

export function isXmlElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalizes array-or-single-item XML parsing behavior
 * A repeated element parses to an array, a single one to the item itself
 */
export function normalizeArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Child element of a node, when it is an element
 */
export function getElement(node: unknown, name: string): XmlElement | undefined {
  if (!isXmlElement(node)) {
    return undefined;
  }
  const child = node[name];
  return isXmlElement(child) ? child : undefined;
}

/**
 * All child elements with the given name
 */
export function getElements(node: unknown, name: string): XmlElement[] {
  if (!isXmlElement(node)) {
    return [];
  }
  return normalizeArray(node[name]).filter(isXmlElement);
}

/**
 * Text content of a child element. Empty elements give ''.
 */
export function getText(node: unknown, name: string): string | undefined {
  if (!isXmlElement(node)) {
    return undefined;
  }
  return textOf(node[name]);
}

/**
 * Text content of every child element with the given name
 */
export function getTexts(node: unknown, name: string): string[] {
  if (!isXmlElement(node)) {
    return [];
  }
  const texts: string[] = [];
  for (const item of normalizeArray(node[name])) {
    const text = textOf(item);
    if (text !== undefined) {
      texts.push(text);
    }
  }
  return texts;
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isXmlElement(value)) {
    const text = value['#text'];
    return text === undefined ? '' : textOf(text);
  }
  return undefined;
}

/**
 * Removes surrounding quotes from ETag values
 *
 * @example
 * ```typescript
 * cleanETag('"abc123"'); // 'abc123'
 * cleanETag('abc123'); // 'abc123'
 * ```
 */
export function cleanETag(eTag: string): string {
  return eTag.replace(/^"(.*)"$/, '$1');
}

/**
 * Parses an ISO 8601 or HTTP date, undefined when absent or invalid
 */
export function parseDate(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return isNaN(date.getTime()) ? undefined : date;
}

/**
 * Safely parses an integer from a string
 */
export function parseIntSafe(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Safely parses a boolean from a string ('true'/'false')
 */
export function parseBooleanSafe(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}
