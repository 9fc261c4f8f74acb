/**
 * S3-compatible object storage client
 *
 * - Signature V4 request signing and URL presigning
 * - Virtual-hosted and path-style bucket addressing
 * - Object and bucket operations, ListObjectsV2
 * - Multipart uploads with bounded concurrency and abort on failure
 * - Typed error taxonomy
 *
 * @example
 * ```typescript
 * import { createClient } from 's3-compat-client';
 *
 * const client = createClient({
 *   accessKeyId: 'my-key',
 *   secretAccessKey: 'my-secret',
 *   region: 'eu-west-1',
 *   bucket: 'reports',
 * });
 *
 * await client.uploadFile('./q3.csv', 'reports/q3.csv', { contentType: 'text/csv' });
 * await client.close();
 * ```
 */

// ============================================================================
// Client
// ============================================================================

export {
  S3Client,
  createClient,
  createClientFromEnv,
  createClientFromProfile,
  type ClientOptions,
  type PresignOptions,
} from './client/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_ADDRESS_STYLE,
  DEFAULT_REGION,
  DEFAULT_SERVICE,
  DEFAULT_TIMEOUT,
  ENV_VARS,
  PROVIDERS,
  createConfigFromEnv,
  defaultEndpoint,
  loadProfileConfig,
  normalizeConfig,
  parseIni,
  resolveProvider,
  validateConfig,
  type Environment,
  type NormalizedS3Config,
  type ProfileOptions,
  type ProviderName,
  type ProviderProfile,
  type S3ClientConfig,
} from './config/index.js';

// ============================================================================
// Signing
// ============================================================================

export {
  ALGORITHM,
  EMPTY_SHA256,
  MAX_PRESIGN_EXPIRES,
  SigV4Signer,
  UNSIGNED_PAYLOAD,
  createCanonicalRequest,
  deriveSigningKey,
  getCanonicalQueryString,
  getCanonicalUri,
  uriEncode,
  type CanonicalRequestInput,
  type Credentials,
  type PresignRequest,
  type PresignedUrl,
  type SigningRequest,
} from './signing/index.js';

// ============================================================================
// Addressing
// ============================================================================

export {
  assertKey,
  buildObjectUrl,
  isValidBucketSubdomain,
  resolveBucketAddress,
  type AddressStyle,
  type BucketAddress,
} from './addressing/index.js';

// ============================================================================
// Operations
// ============================================================================

export { RequestDispatcher, type DispatchRequest, type HttpMethod } from './dispatch/index.js';

export {
  ObjectService,
  type DeleteObjectOutput,
  type GetObjectOptions,
  type GetObjectOutput,
  type HeadObjectOutput,
  type PutObjectOptions,
  type PutObjectOutput,
} from './objects/index.js';

export {
  BucketService,
  type CreateBucketOptions,
  type CreateBucketOutput,
  type ListObjectsOptions,
} from './buckets/index.js';

export type { ListObjectsPage, ListedObject } from './xml/index.js';

// ============================================================================
// Multipart
// ============================================================================

export {
  DEFAULT_TRANSFER_CONFIG,
  MAX_PARTS,
  MAX_PART_SIZE,
  MAX_SINGLE_UPLOAD_SIZE,
  MIN_PART_SIZE,
  MultipartService,
  PartRegistry,
  TransferOrchestrator,
  adjustPartSize,
  bytesSource,
  decideStrategy,
  fileSource,
  planParts,
  type CompletedUpload,
  type MultipartSessionApi,
  type Part,
  type PartPlan,
  type TransferConfig,
  type UploadBody,
  type UploadOptions,
  type UploadResult,
  type UploadSource,
  type UploadStrategy,
} from './multipart/index.js';

// ============================================================================
// Transport
// ============================================================================

export {
  FetchTransport,
  createFetchTransport,
  type FetchTransportOptions,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './transport/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  AccessDeniedError,
  AuthenticationInputError,
  ClientRequestError,
  ConfigurationError,
  InvalidRequestError,
  NetworkError,
  NotFoundError,
  ProtocolLimitError,
  RemoteServiceError,
  S3Error,
  ServerError,
  TransferError,
  ValidationError,
  classifyServiceError,
  isRetryableError,
  isS3Error,
  type S3ErrorParams,
} from './errors/index.js';

// ============================================================================
// Logging and retry
// ============================================================================

export { ConsoleLogger, NoopLogger, type LogContext, type LogLevel, type Logger } from './observability/index.js';

export { DEFAULT_RETRY_OPTIONS, RetryExecutor, type RetryOptions } from './resilience/index.js';
