/**
 * Test data helpers
 */

import type { S3ClientConfig } from '../config/index.js';

export const TEST_BUCKET = 'test-bucket';
export const TEST_ENDPOINT = 'https://s3.us-east-1.amazonaws.com';

/**
 * Client configuration with placeholder credentials
 */
export function createTestConfig(overrides: Partial<S3ClientConfig> = {}): S3ClientConfig {
  return {
    accessKeyId: 'test-access-key',
    secretAccessKey: 'test-secret',
    region: 'us-east-1',
    endpoint: TEST_ENDPOINT,
    bucket: TEST_BUCKET,
    ...overrides,
  };
}

/**
 * Deterministic bytes; the same size and seed always give the same data
 */
export function createTestData(size: number, seed = 0): Uint8Array {
  const data = new Uint8Array(size);
  for (let i = 0; i < size; i++) {
    data[i] = (i * 31 + seed) & 0xff;
  }
  return data;
}
