/**
 * Default configuration values
 */

import type { AddressStyle } from '../addressing/index.js';

export const DEFAULT_REGION = 'us-east-1';

export const DEFAULT_SERVICE = 's3';

export const DEFAULT_ADDRESS_STYLE: AddressStyle = 'auto';

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_TIMEOUT = 300000;

/**
 * Regional AWS endpoint, used when no endpoint is configured
 */
export function defaultEndpoint(region: string): string {
  return `https://s3.${region}.amazonaws.com`;
}
