/**
 * Transfer limits, configuration and part planning
 */

import { ConfigurationError, ProtocolLimitError } from '../errors/index.js';

const MiB = 1024 * 1024;
const GiB = 1024 * MiB;

export const MIN_PART_SIZE = 5 * MiB;
export const MAX_PART_SIZE = 5 * GiB;
export const MAX_PARTS = 10_000;
export const MAX_SINGLE_UPLOAD_SIZE = 5 * GiB;

export interface TransferConfig {
  /** Sources strictly larger than this go multipart */
  multipartThreshold: number;
  /** Requested part size; adjusted per source */
  partSize: number;
  /** Maximum parts in flight at once */
  maxConcurrency: number;
}

export const DEFAULT_TRANSFER_CONFIG: Readonly<TransferConfig> = Object.freeze({
  multipartThreshold: 8 * MiB,
  partSize: 8 * MiB,
  maxConcurrency: 10,
});

export type UploadStrategy = 'single-part' | 'multipart';

export interface PartPlan {
  partNumber: number;
  /** Inclusive byte offset */
  start: number;
  /** Exclusive byte offset */
  end: number;
}

/**
 * Fill in defaults and validate. Returns a new object.
 */
export function normalizeTransferConfig(partial: Partial<TransferConfig> = {}): TransferConfig {
  const config: TransferConfig = {
    multipartThreshold: partial.multipartThreshold ?? DEFAULT_TRANSFER_CONFIG.multipartThreshold,
    partSize: partial.partSize ?? DEFAULT_TRANSFER_CONFIG.partSize,
    maxConcurrency: partial.maxConcurrency ?? DEFAULT_TRANSFER_CONFIG.maxConcurrency,
  };

  for (const [name, value] of Object.entries(config)) {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw ConfigurationError.invalidSetting(name, `${name} must be a positive integer, got ${value}`);
    }
  }

  if (config.multipartThreshold > MAX_SINGLE_UPLOAD_SIZE) {
    throw ConfigurationError.invalidSetting(
      'multipartThreshold',
      `multipartThreshold cannot exceed ${MAX_SINGLE_UPLOAD_SIZE} bytes (the single upload limit)`
    );
  }

  return config;
}

export function decideStrategy(size: number, threshold: number): UploadStrategy {
  return size > threshold ? 'multipart' : 'single-part';
}

/**
 * Double the part size until the source fits in MAX_PARTS parts, then
 * clamp to [MIN_PART_SIZE, MAX_PART_SIZE].
 */
export function adjustPartSize(requested: number, sourceSize: number): number {
  let partSize = requested;

  while (Math.ceil(sourceSize / partSize) > MAX_PARTS) {
    partSize *= 2;
  }

  return Math.min(Math.max(partSize, MIN_PART_SIZE), MAX_PART_SIZE);
}

/**
 * Split [0, sourceSize) into consecutive parts numbered from 1.
 * Every part but the last is exactly partSize bytes.
 */
export function planParts(sourceSize: number, partSize: number): PartPlan[] {
  const count = Math.ceil(sourceSize / partSize);
  if (count > MAX_PARTS) {
    throw new ProtocolLimitError({
      message: `A source of ${sourceSize} bytes needs ${count} parts of ${partSize} bytes; the limit is ${MAX_PARTS}`,
      code: 'TOO_MANY_PARTS',
      details: { sourceSize, partSize, count },
    });
  }

  const parts: PartPlan[] = [];
  for (let index = 0; index < count; index++) {
    const start = index * partSize;
    parts.push({
      partNumber: index + 1,
      start,
      end: Math.min(start + partSize, sourceSize),
    });
  }
  return parts;
}

export function validatePartNumber(partNumber: number): void {
  if (!Number.isInteger(partNumber) || partNumber < 1 || partNumber > MAX_PARTS) {
    throw new ProtocolLimitError({
      message: `Part number must be between 1 and ${MAX_PARTS}, got ${partNumber}`,
      code: 'INVALID_PART_NUMBER',
      details: { partNumber },
    });
  }
}
