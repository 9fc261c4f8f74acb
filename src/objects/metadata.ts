/**
 * User metadata travels as x-amz-meta-* headers
 */

const METADATA_PREFIX = 'x-amz-meta-';

export function buildMetadataHeaders(metadata?: Record<string, string>): Record<string, string> {
  const headers: Record<string, string> = {};
  if (metadata) {
    for (const [name, value] of Object.entries(metadata)) {
      headers[`${METADATA_PREFIX}${name.toLowerCase()}`] = value;
    }
  }
  return headers;
}

export function extractMetadata(headers: Record<string, string>): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (lower.startsWith(METADATA_PREFIX)) {
      metadata[lower.slice(METADATA_PREFIX.length)] = value;
    }
  }
  return metadata;
}
