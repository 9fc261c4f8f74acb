/**
 * Canonical request construction for Signature V4
 */

const encoder = new TextEncoder();

/**
 * URI encode following S3 requirements (RFC 3986).
 * Only the unreserved characters A-Z a-z 0-9 - _ . ~ are left as is;
 * '/' is kept when encodeSlash is false.
 */
export function uriEncode(str: string, encodeSlash = true): string {
  let encoded = '';
  for (const char of str) {
    const code = char.charCodeAt(0);

    if (
      (code >= 0x41 && code <= 0x5a) || // A-Z
      (code >= 0x61 && code <= 0x7a) || // a-z
      (code >= 0x30 && code <= 0x39) || // 0-9
      code === 0x2d || // -
      code === 0x5f || // _
      code === 0x2e || // .
      code === 0x7e // ~
    ) {
      encoded += char;
    } else if (char === '/' && !encodeSlash) {
      encoded += '/';
    } else {
      for (const byte of encoder.encode(char)) {
        encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
      }
    }
  }
  return encoded;
}

/**
 * URI encode path (preserve slashes)
 */
export function uriEncodePath(path: string): string {
  return uriEncode(path, false);
}

/**
 * Decode a percent-encoded URL path one segment at a time.
 * Segments that are not valid percent-encoding are returned unchanged.
 */
export function decodePath(path: string): string {
  return path
    .split('/')
    .map((segment) => safeDecode(segment))
    .join('/');
}

/**
 * Parse a raw query string (with or without the leading '?') into a
 * parameter map, decoding every key and value once. '+' is kept literally.
 */
export function parseQueryString(search: string): Record<string, string> {
  const params: Record<string, string> = {};
  const query = search.startsWith('?') ? search.slice(1) : search;

  for (const pair of query.split('&')) {
    if (!pair) continue;

    const idx = pair.indexOf('=');
    if (idx === -1) {
      params[safeDecode(pair)] = '';
    } else {
      params[safeDecode(pair.substring(0, idx))] = safeDecode(pair.substring(idx + 1));
    }
  }

  return params;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Get canonical URI from a raw (decoded) path
 */
export function getCanonicalUri(path: string): string {
  if (!path) {
    return '/';
  }

  const normalized = path.startsWith('/') ? path : '/' + path;
  return uriEncodePath(normalized);
}

/**
 * Get canonical query string.
 * Keys and values are encoded with no safe characters and the pairs are
 * sorted by encoded key, then by encoded value.
 */
export function getCanonicalQueryString(query: Record<string, string>): string {
  const params: Array<[string, string]> = Object.entries(query).map(([key, value]) => [
    uriEncode(key),
    uriEncode(value),
  ]);

  params.sort((a, b) => {
    if (a[0] < b[0]) return -1;
    if (a[0] > b[0]) return 1;
    if (a[1] < b[1]) return -1;
    if (a[1] > b[1]) return 1;
    return 0;
  });

  return params.map(([key, value]) => `${key}=${value}`).join('&');
}

/**
 * Get signed headers (semicolon-separated list of lowercase header names)
 */
export function getSignedHeaders(names: readonly string[]): string {
  return normalizeHeaderNames(names).join(';');
}

/**
 * Get canonical headers block for the given signed header names.
 * Every line ends with a newline, including the last one.
 */
export function getCanonicalHeaders(
  headers: Record<string, string>,
  signedHeaders: readonly string[]
): string {
  const lowered = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    lowered.set(name.toLowerCase(), value);
  }

  let canonical = '';
  for (const name of normalizeHeaderNames(signedHeaders)) {
    const value = lowered.get(name) ?? '';
    canonical += `${name}:${value.trim().replace(/\s+/g, ' ')}\n`;
  }
  return canonical;
}

function normalizeHeaderNames(names: readonly string[]): string[] {
  return Array.from(new Set(names.map((name) => name.toLowerCase()))).sort();
}

export interface CanonicalRequestInput {
  method: string;
  /** Raw, not yet encoded, URI path */
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  signedHeaders: readonly string[];
  payloadHash: string;
}

/**
 * Create canonical request for Signature V4
 * Format:
 * HTTP_METHOD\n
 * CANONICAL_URI\n
 * CANONICAL_QUERY_STRING\n
 * CANONICAL_HEADERS\n
 * SIGNED_HEADERS\n
 * PAYLOAD_HASH
 */
export function createCanonicalRequest(input: CanonicalRequestInput): string {
  return [
    input.method.toUpperCase(),
    getCanonicalUri(input.path),
    getCanonicalQueryString(input.query),
    getCanonicalHeaders(input.headers, input.signedHeaders),
    getSignedHeaders(input.signedHeaders),
    input.payloadHash,
  ].join('\n');
}
