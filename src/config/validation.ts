/**
 * Configuration validation and normalization
 */

import { isAddressStyle } from '../addressing/index.js';
import { ConfigurationError } from '../errors/index.js';
import { normalizeTransferConfig } from '../multipart/index.js';
import {
  DEFAULT_ADDRESS_STYLE,
  DEFAULT_REGION,
  DEFAULT_SERVICE,
  DEFAULT_TIMEOUT,
  defaultEndpoint,
} from './defaults.js';
import { resolveProvider } from './providers.js';
import type { NormalizedS3Config, S3ClientConfig } from './types.js';

/**
 * Validates client configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: Partial<S3ClientConfig>): void {
  if (!config.accessKeyId) {
    throw ConfigurationError.missingSetting('accessKeyId');
  }

  if (!config.secretAccessKey) {
    throw ConfigurationError.missingSetting('secretAccessKey');
  }

  if (!config.bucket || !config.bucket.replace(/\//g, '')) {
    throw ConfigurationError.missingSetting('bucket');
  }

  if (config.region !== undefined && !/^[a-z0-9-]+$/.test(config.region)) {
    throw ConfigurationError.invalidSetting(
      'region',
      `region must contain only lowercase letters, digits and hyphens, got '${config.region}'`
    );
  }

  if (config.addressStyle !== undefined && !isAddressStyle(config.addressStyle)) {
    throw ConfigurationError.invalidSetting(
      'addressStyle',
      `addressStyle must be one of auto, virtual-hosted, path-style, got '${String(config.addressStyle)}'`
    );
  }

  if (config.timeout !== undefined) {
    if (!Number.isInteger(config.timeout) || config.timeout <= 0) {
      throw ConfigurationError.invalidSetting('timeout', 'timeout must be a positive integer');
    }
  }
}

/**
 * Normalizes configuration by applying defaults and validating.
 * The endpoint and bucket are checked later, when the bucket address is
 * resolved.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function normalizeConfig(config: S3ClientConfig): NormalizedS3Config {
  validateConfig(config);

  const region = config.region ?? DEFAULT_REGION;

  return {
    accessKeyId: config.accessKeyId,
    secretAccessKey: config.secretAccessKey,
    sessionToken: config.sessionToken || undefined,
    region,
    service: config.service ?? DEFAULT_SERVICE,
    endpoint: config.endpoint || defaultEndpoint(region),
    bucket: config.bucket,
    addressStyle: config.addressStyle ?? DEFAULT_ADDRESS_STYLE,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    transfer: normalizeTransferConfig(config.transfer),
    provider: resolveProvider(config.provider),
  };
}
