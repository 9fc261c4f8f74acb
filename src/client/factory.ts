/**
 * Factory functions for creating clients
 */

import { resolveBucketAddress } from '../addressing/index.js';
import {
  createConfigFromEnv,
  loadProfileConfig,
  normalizeConfig,
  type Environment,
  type ProfileOptions,
  type S3ClientConfig,
} from '../config/index.js';
import type { Logger } from '../observability/index.js';
import { SigV4Signer } from '../signing/index.js';
import { createFetchTransport, type HttpTransport } from '../transport/index.js';
import { S3Client } from './client.js';

export interface ClientOptions {
  /** Default: a fetch-based transport with the configured timeout */
  transport?: HttpTransport;
  logger?: Logger;
}

/**
 * Creates a client from a configuration object
 *
 * Validates the configuration and resolves the bucket address up front,
 * so a bad endpoint or bucket fails here rather than on the first request.
 *
 * @throws {ConfigurationError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   accessKeyId: 'my-key',
 *   secretAccessKey: 'my-secret',
 *   endpoint: 'https://minio.example.com',
 *   bucket: 'backups',
 *   addressStyle: 'path-style',
 * });
 *
 * try {
 *   await client.putObject('notes.txt', 'hello');
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createClient(config: S3ClientConfig, options: ClientOptions = {}): S3Client {
  const normalized = normalizeConfig(config);
  const address = resolveBucketAddress(normalized.endpoint, normalized.bucket, normalized.addressStyle);

  const signer = new SigV4Signer({
    accessKeyId: normalized.accessKeyId,
    secretAccessKey: normalized.secretAccessKey,
    sessionToken: normalized.sessionToken,
    region: normalized.region,
    service: normalized.service,
  });

  const transport = options.transport ?? createFetchTransport(normalized.timeout);

  return new S3Client(normalized, transport, signer, address, options.logger);
}

/**
 * Creates a client from AWS_* and S3_* environment variables
 *
 * @throws {ConfigurationError} If required variables are missing or invalid
 */
export function createClientFromEnv(
  bucket: string,
  options: ClientOptions & { env?: Environment } = {}
): S3Client {
  return createClient(createConfigFromEnv(bucket, options.env), options);
}

/**
 * Creates a client from a profile in the shared config and credentials files
 */
export async function createClientFromProfile(
  bucket: string,
  profileOptions: ProfileOptions = {},
  options: ClientOptions = {}
): Promise<S3Client> {
  const config = await loadProfileConfig(bucket, profileOptions);
  return createClient(config, options);
}
