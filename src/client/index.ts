/**
 * Client module
 */

export { S3Client, type PresignOptions } from './client.js';
export {
  createClient,
  createClientFromEnv,
  createClientFromProfile,
  type ClientOptions,
} from './factory.js';
