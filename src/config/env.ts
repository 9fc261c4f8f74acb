/**
 * Environment variable configuration loading
 */

import { isAddressStyle, type AddressStyle } from '../addressing/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { TransferConfig } from '../multipart/index.js';
import { isProviderName, type ProviderName } from './providers.js';
import type { S3ClientConfig } from './types.js';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  ACCESS_KEY_ID: 'AWS_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'AWS_SECRET_ACCESS_KEY',
  SESSION_TOKEN: 'AWS_SESSION_TOKEN',
  REGION: 'AWS_REGION',
  DEFAULT_REGION: 'AWS_DEFAULT_REGION',
  ENDPOINT_URL: 'AWS_ENDPOINT_URL',
  ADDRESS_STYLE: 'S3_ADDRESS_STYLE',
  MULTIPART_THRESHOLD_BYTES: 'S3_MULTIPART_THRESHOLD_BYTES',
  MULTIPART_PART_SIZE_BYTES: 'S3_MULTIPART_PART_SIZE_BYTES',
  MAX_CONCURRENCY: 'S3_MAX_CONCURRENCY',
  PROVIDER: 'S3_PROVIDER',
} as const;

export type Environment = Record<string, string | undefined>;

/**
 * Parses an integer from an environment variable.
 *
 * @returns Parsed integer or undefined if value is empty
 * @throws {ConfigurationError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  if (!/^\s*\d+\s*$/.test(value)) {
    throw ConfigurationError.invalidSetting(name, `${name} must be a valid integer, got: ${value}`);
  }

  return parseInt(value, 10);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function parseAddressStyle(value: string | undefined): AddressStyle | undefined {
  const style = nonEmpty(value);
  if (style === undefined) {
    return undefined;
  }
  if (!isAddressStyle(style)) {
    throw ConfigurationError.invalidSetting(
      ENV_VARS.ADDRESS_STYLE,
      `${ENV_VARS.ADDRESS_STYLE} must be one of auto, virtual-hosted, path-style, got: ${style}`
    );
  }
  return style;
}

function parseProvider(value: string | undefined): ProviderName | undefined {
  const provider = nonEmpty(value)?.toLowerCase();
  if (provider === undefined) {
    return undefined;
  }
  if (!isProviderName(provider)) {
    throw ConfigurationError.invalidSetting(
      ENV_VARS.PROVIDER,
      `${ENV_VARS.PROVIDER} must be one of aws, minio, ovh, generic, got: ${provider}`
    );
  }
  return provider;
}

/**
 * Creates client configuration from environment variables.
 *
 * - AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY (required)
 * - AWS_SESSION_TOKEN
 * - AWS_REGION, falling back to AWS_DEFAULT_REGION
 * - AWS_ENDPOINT_URL
 * - S3_ADDRESS_STYLE: auto | virtual-hosted | path-style
 * - S3_MULTIPART_THRESHOLD_BYTES, S3_MULTIPART_PART_SIZE_BYTES, S3_MAX_CONCURRENCY
 * - S3_PROVIDER: aws | minio | ovh | generic
 *
 * @throws {ConfigurationError} If required variables are missing or invalid
 */
export function createConfigFromEnv(bucket: string, env: Environment = process.env): S3ClientConfig {
  const accessKeyId = nonEmpty(env[ENV_VARS.ACCESS_KEY_ID]);
  const secretAccessKey = nonEmpty(env[ENV_VARS.SECRET_ACCESS_KEY]);

  if (!accessKeyId) {
    throw ConfigurationError.missingSetting(
      ENV_VARS.ACCESS_KEY_ID,
      `${ENV_VARS.ACCESS_KEY_ID} environment variable is required`
    );
  }
  if (!secretAccessKey) {
    throw ConfigurationError.missingSetting(
      ENV_VARS.SECRET_ACCESS_KEY,
      `${ENV_VARS.SECRET_ACCESS_KEY} environment variable is required`
    );
  }

  const transfer: Partial<TransferConfig> = {};
  const threshold = parseIntEnv(env[ENV_VARS.MULTIPART_THRESHOLD_BYTES], ENV_VARS.MULTIPART_THRESHOLD_BYTES);
  const partSize = parseIntEnv(env[ENV_VARS.MULTIPART_PART_SIZE_BYTES], ENV_VARS.MULTIPART_PART_SIZE_BYTES);
  const concurrency = parseIntEnv(env[ENV_VARS.MAX_CONCURRENCY], ENV_VARS.MAX_CONCURRENCY);
  if (threshold !== undefined) transfer.multipartThreshold = threshold;
  if (partSize !== undefined) transfer.partSize = partSize;
  if (concurrency !== undefined) transfer.maxConcurrency = concurrency;

  return {
    accessKeyId,
    secretAccessKey,
    sessionToken: nonEmpty(env[ENV_VARS.SESSION_TOKEN]),
    region: nonEmpty(env[ENV_VARS.REGION]) ?? nonEmpty(env[ENV_VARS.DEFAULT_REGION]),
    endpoint: nonEmpty(env[ENV_VARS.ENDPOINT_URL]),
    bucket,
    addressStyle: parseAddressStyle(env[ENV_VARS.ADDRESS_STYLE]),
    transfer,
    provider: parseProvider(env[ENV_VARS.PROVIDER]),
  };
}
