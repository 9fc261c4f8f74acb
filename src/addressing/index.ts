/**
 * Bucket addressing
 */

export { isValidBucketSubdomain } from './bucket-name.js';
export {
  ADDRESS_STYLES,
  assertKey,
  buildObjectUrl,
  isAddressStyle,
  resolveBucketAddress,
  type AddressStyle,
  type BucketAddress,
} from './resolver.js';
