export {
  ObjectService,
  type DeleteObjectOutput,
  type GetObjectOptions,
  type GetObjectOutput,
  type HeadObjectOutput,
  type PutObjectOptions,
  type PutObjectOutput,
} from './service.js';
export { buildMetadataHeaders, extractMetadata } from './metadata.js';
