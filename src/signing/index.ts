/**
 * S3 Signature V4 signing module
 *
 * - Request signing with Authorization header
 * - Presigned URL generation
 * - Canonical request construction
 * - Signing key derivation
 */

export type { Credentials, SigningRequest, PresignRequest, PresignedUrl } from './types.js';

export {
  SigV4Signer,
  ALGORITHM,
  UNSIGNED_PAYLOAD,
  EMPTY_SHA256,
  MAX_PRESIGN_EXPIRES,
} from './signer.js';

export { hmacSha256, sha256Hash, sha256Hex, toHex } from './crypto.js';

export {
  createCanonicalRequest,
  type CanonicalRequestInput,
  decodePath,
  getCanonicalHeaders,
  getCanonicalQueryString,
  getCanonicalUri,
  getSignedHeaders,
  parseQueryString,
  uriEncode,
  uriEncodePath,
} from './canonical.js';

export { formatAmzDate, formatDateStamp, parseAmzDate } from './format.js';

export { deriveSigningKey } from './key-derivation.js';
