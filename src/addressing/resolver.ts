/**
 * Bucket address resolution: endpoint + bucket + style -> bucket base URL
 */

import { ConfigurationError, ValidationError } from '../errors/index.js';
import { uriEncodePath } from '../signing/index.js';
import { isValidBucketSubdomain } from './bucket-name.js';

export type AddressStyle = 'auto' | 'virtual-hosted' | 'path-style';

export const ADDRESS_STYLES: readonly AddressStyle[] = ['auto', 'virtual-hosted', 'path-style'];

export interface BucketAddress {
  /** Bucket base URL without a trailing slash */
  readonly baseUrl: string;
  /** The style actually chosen ('auto' is resolved) */
  readonly addressStyle: Exclude<AddressStyle, 'auto'>;
  readonly bucket: string;
  readonly endpoint: string;
}

export function isAddressStyle(value: string): value is AddressStyle {
  return ADDRESS_STYLES.some((style) => style === value);
}

/**
 * Resolve the base URL of a bucket.
 *
 * Virtual-hosted prefixes the endpoint host with the bucket, unless the
 * host already starts with `<bucket>.`. Path-style appends the bucket as a
 * path segment after any path the endpoint carries.
 */
export function resolveBucketAddress(
  endpoint: string,
  bucket: string,
  style: AddressStyle = 'auto'
): BucketAddress {
  const name = bucket.replace(/^\/+|\/+$/g, '');

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigurationError({
      message: `Invalid endpoint URL '${endpoint}': not a valid URL`,
      code: 'INVALID_ENDPOINT',
      details: { endpoint },
      cause: error,
    });
  }

  if (url.protocol !== 'https:') {
    throw ConfigurationError.invalidEndpoint(endpoint, 'must be an HTTPS URL');
  }
  if (!url.hostname) {
    throw ConfigurationError.invalidEndpoint(endpoint, 'missing host');
  }
  if (!name) {
    throw ConfigurationError.invalidBucket(bucket, endpoint, 'bucket name is empty');
  }

  const prefix = url.pathname.replace(/\/+$/, '');
  const hostHasBucket = url.hostname.startsWith(`${name}.`);

  if (hostHasBucket && prefix.endsWith(name)) {
    throw ConfigurationError.invalidBucket(
      bucket,
      endpoint,
      'bucket is in both the host and the path of the endpoint'
    );
  }

  const validSubdomain = isValidBucketSubdomain(name);

  const virtualHosted = (): BucketAddress => {
    const host = hostHasBucket ? url.host : `${name}.${url.host}`;
    return freeze(`${url.protocol}//${host}${prefix}`, 'virtual-hosted', name, endpoint);
  };
  const pathStyle = (): BucketAddress =>
    freeze(
      `${url.protocol}//${url.host}${prefix}/${uriEncodePath(name)}`,
      'path-style',
      name,
      endpoint
    );

  switch (style) {
    case 'auto':
      return validSubdomain ? virtualHosted() : pathStyle();
    case 'virtual-hosted':
      if (!validSubdomain) {
        throw ConfigurationError.invalidBucket(
          bucket,
          endpoint,
          'not usable as a DNS subdomain for virtual-hosted addressing'
        );
      }
      return virtualHosted();
    case 'path-style':
      return pathStyle();
  }
}

/**
 * URL of an object (or of the bucket itself when key is omitted).
 * The key is URI-encoded with slashes preserved.
 */
export function buildObjectUrl(address: BucketAddress, key?: string): URL {
  if (key === undefined) {
    return new URL(`${address.baseUrl}/`);
  }
  assertKey(key);
  return new URL(`${address.baseUrl}/${uriEncodePath(key)}`);
}

/**
 * Rejects keys that cannot be addressed inside the bucket. URL parsing
 * folds `.` and `..` path segments, which would move the request to
 * another resource.
 */
export function assertKey(key: string): void {
  if (!key) {
    throw new ValidationError({ message: 'Object key must not be empty', code: 'EMPTY_KEY' });
  }
  if (key.split('/').some((segment) => segment === '.' || segment === '..')) {
    throw new ValidationError({
      message: `Object key must not contain '.' or '..' path segments: ${key}`,
      code: 'INVALID_KEY',
      details: { key },
    });
  }
}

function freeze(
  baseUrl: string,
  addressStyle: Exclude<AddressStyle, 'auto'>,
  bucket: string,
  endpoint: string
): BucketAddress {
  return Object.freeze({ baseUrl, addressStyle, bucket, endpoint });
}
