/**
 * Configuration types for the S3-compatible client
 */

import type { AddressStyle } from '../addressing/index.js';
import type { TransferConfig } from '../multipart/index.js';
import type { ProviderName, ProviderProfile } from './providers.js';

/**
 * Client configuration as supplied by the caller
 */
export interface S3ClientConfig {
  accessKeyId: string;
  secretAccessKey: string;
  /** Temporary credentials only */
  sessionToken?: string;

  /** Default: us-east-1 */
  region?: string;

  /** Signing service name. Default: s3 */
  service?: string;

  /** HTTPS endpoint. Default: https://s3.<region>.amazonaws.com */
  endpoint?: string;

  bucket: string;

  /** Default: auto */
  addressStyle?: AddressStyle;

  /** Request timeout in milliseconds. Default: 300000 */
  timeout?: number;

  transfer?: Partial<TransferConfig>;

  /** Provider quirks. Default: generic */
  provider?: ProviderName | ProviderProfile;
}

/**
 * Configuration with every default applied
 */
export interface NormalizedS3Config {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string;
  readonly region: string;
  readonly service: string;
  readonly endpoint: string;
  readonly bucket: string;
  readonly addressStyle: AddressStyle;
  readonly timeout: number;
  readonly transfer: Readonly<TransferConfig>;
  readonly provider: Readonly<ProviderProfile>;
}

/**
 * Normalized configuration without credentials
 */
export type PublicS3Config = Omit<
  NormalizedS3Config,
  'accessKeyId' | 'secretAccessKey' | 'sessionToken'
>;

export function withoutCredentials(config: NormalizedS3Config): PublicS3Config {
  const { accessKeyId: _accessKeyId, secretAccessKey: _secret, sessionToken: _token, ...rest } =
    config;
  return rest;
}
