export {
  BucketService,
  type CreateBucketOptions,
  type CreateBucketOutput,
  type ListObjectsOptions,
} from './service.js';
