/**
 * Multipart transfers
 */

export {
  DEFAULT_TRANSFER_CONFIG,
  MAX_PARTS,
  MAX_PART_SIZE,
  MAX_SINGLE_UPLOAD_SIZE,
  MIN_PART_SIZE,
  adjustPartSize,
  decideStrategy,
  normalizeTransferConfig,
  planParts,
  validatePartNumber,
  type PartPlan,
  type TransferConfig,
  type UploadStrategy,
} from './strategy.js';

export {
  bytesSource,
  fileSource,
  isUploadSource,
  toUploadSource,
  type UploadBody,
  type UploadSource,
} from './source.js';

export { PartRegistry, type Part } from './registry.js';

export {
  MultipartService,
  type CompletedUpload,
  type InitiateOptions,
  type MultipartSessionApi,
} from './service.js';

export {
  TransferOrchestrator,
  type SinglePartUploader,
  type UploadOptions,
  type UploadResult,
} from './orchestrator.js';
