/**
 * High-level upload orchestration
 */

import { assertKey } from '../addressing/index.js';
import { isRetryableError, TransferError } from '../errors/index.js';
import { errorContext, NoopLogger, type Logger } from '../observability/index.js';
import { PartRegistry } from './registry.js';
import type { CompletedUpload, MultipartSessionApi } from './service.js';
import { toUploadSource, type UploadBody, type UploadSource } from './source.js';
import {
  adjustPartSize,
  decideStrategy,
  normalizeTransferConfig,
  planParts,
  type PartPlan,
  type TransferConfig,
  type UploadStrategy,
} from './strategy.js';

export interface UploadOptions {
  contentType?: string;
  /** Custom metadata (x-amz-meta-* headers) */
  metadata?: Record<string, string>;
  /**
   * Called once per successfully uploaded part with that part's size, or
   * once with the whole size for a single-part upload
   */
  onProgress?: (bytes: number) => void;
  /** Cancels the transfer: no new parts start and the session is aborted */
  signal?: AbortSignal;
  /** Per-call overrides of the client's transfer settings */
  transfer?: Partial<TransferConfig>;
}

export interface UploadResult {
  bucket: string;
  key: string;
  eTag: string;
  size: number;
  uploadType: UploadStrategy;
  location?: string;
  partSize?: number;
  partsCount?: number;
}

/**
 * What the orchestrator needs for uploads at or below the threshold
 */
export interface SinglePartUploader {
  putObject(
    key: string,
    data: Uint8Array,
    options: { contentType?: string; metadata?: Record<string, string>; signal?: AbortSignal }
  ): Promise<{ eTag: string }>;
}

/**
 * Uploads a source of known size with a single PUT or a multipart session.
 *
 * For multipart transfers a bounded pool of workers uploads the planned
 * parts. The first failure, or a cancellation, stops new parts from
 * starting; once the in-flight parts settle the session is aborted exactly
 * once and a TransferError carrying the original failure is thrown. An
 * abort that fails is logged and does not replace that error. Nothing is
 * retried here.
 */
export class TransferOrchestrator {
  constructor(
    private readonly sessions: MultipartSessionApi,
    private readonly objects: SinglePartUploader,
    private readonly bucket: string,
    private readonly config: TransferConfig,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  async upload(key: string, body: UploadBody, options: UploadOptions = {}): Promise<UploadResult> {
    const source = toUploadSource(body);

    let result: UploadResult;
    try {
      assertKey(key);
      const config = options.transfer
        ? normalizeTransferConfig({ ...this.config, ...options.transfer })
        : this.config;

      if (options.signal?.aborted) {
        throw cancelledError(key, options.signal);
      }

      result =
        decideStrategy(source.size, config.multipartThreshold) === 'multipart'
          ? await this.uploadMultipart(key, source, config, options)
          : await this.uploadSinglePart(key, source, options);
    } catch (error) {
      await this.closeAfterFailure(source, key);
      throw error;
    }

    await source.close?.();
    return result;
  }

  private async uploadSinglePart(
    key: string,
    source: UploadSource,
    options: UploadOptions
  ): Promise<UploadResult> {
    const data = await source.read(0, source.size);

    const { eTag } = await this.objects.putObject(key, data, {
      contentType: options.contentType,
      metadata: options.metadata,
      signal: options.signal,
    });
    options.onProgress?.(data.length);

    return {
      bucket: this.bucket,
      key,
      eTag,
      size: data.length,
      uploadType: 'single-part',
    };
  }

  private async uploadMultipart(
    key: string,
    source: UploadSource,
    config: TransferConfig,
    options: UploadOptions
  ): Promise<UploadResult> {
    const partSize = adjustPartSize(config.partSize, source.size);
    const plan = planParts(source.size, partSize);

    // A failed initiate leaves nothing to abort
    const uploadId = await this.sessions.initiate(key, {
      contentType: options.contentType,
      metadata: options.metadata,
      signal: options.signal,
    });

    const context = { bucket: this.bucket, key, uploadId };
    this.logger.info('Multipart upload started', {
      ...context,
      size: source.size,
      partSize,
      parts: plan.length,
    });

    const registry = new PartRegistry();

    try {
      await this.uploadParts(key, uploadId, source, plan, registry, config.maxConcurrency, options);
    } catch (error) {
      throw await this.abortAfterFailure(key, uploadId, error);
    }

    let completed: CompletedUpload;
    try {
      completed = await this.sessions.complete(key, uploadId, registry.sorted());
    } catch (error) {
      throw await this.abortAfterFailure(key, uploadId, error);
    }

    this.logger.info('Multipart upload completed', { ...context, parts: registry.size });

    return {
      bucket: this.bucket,
      key,
      eTag: completed.eTag,
      size: source.size,
      uploadType: 'multipart',
      location: completed.location,
      partSize,
      partsCount: registry.size,
    };
  }

  /**
   * Runs at most `concurrency` part uploads at a time. Resolves once every
   * started part has settled; rejects with the first failure.
   */
  private async uploadParts(
    key: string,
    uploadId: string,
    source: UploadSource,
    plan: readonly PartPlan[],
    registry: PartRegistry,
    concurrency: number,
    options: UploadOptions
  ): Promise<void> {
    const { signal, onProgress } = options;
    let next = 0;
    const state: { failure?: { error: unknown } } = {};

    const worker = async (): Promise<void> => {
      while (!state.failure && !signal?.aborted && next < plan.length) {
        const part = plan[next];
        next++;

        try {
          const bytes = await source.read(part.start, part.end);
          const uploaded = await this.sessions.uploadPart(
            key,
            uploadId,
            part.partNumber,
            bytes,
            signal
          );
          if (registry.record(uploaded)) {
            onProgress?.(bytes.length);
          }
        } catch (error) {
          state.failure ??= { error };
          registry.freeze();
        }
      }
    };

    const onAbort = (): void => registry.freeze();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const workers = Array.from({ length: Math.min(concurrency, plan.length) }, () => worker());
      await Promise.all(workers);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (signal?.aborted) {
      throw cancelledError(key, signal);
    }
    if (state.failure) {
      throw state.failure.error;
    }
  }

  private async abortAfterFailure(key: string, uploadId: string, error: unknown): Promise<TransferError> {
    const context = { bucket: this.bucket, key, uploadId };
    this.logger.error('Multipart upload failed, aborting', { ...context, ...errorContext(error) });

    try {
      await this.sessions.abort(key, uploadId);
    } catch (abortError) {
      this.logger.warn('Failed to abort multipart upload', {
        ...context,
        ...errorContext(abortError),
      });
    }

    if (error instanceof TransferError) {
      return error;
    }

    const reason = error instanceof Error ? error.message : String(error);
    return new TransferError({
      message: `Multipart upload of '${key}' failed: ${reason}`,
      code: 'TRANSFER_FAILED',
      isRetryable: isRetryableError(error),
      details: context,
      cause: error,
    });
  }

  private async closeAfterFailure(source: UploadSource, key: string): Promise<void> {
    try {
      await source.close?.();
    } catch (closeError) {
      this.logger.warn('Failed to close upload source', { bucket: this.bucket, key, ...errorContext(closeError) });
    }
  }
}

function cancelledError(key: string, signal: AbortSignal): TransferError {
  return new TransferError({
    message: `Upload of '${key}' was cancelled`,
    code: 'TRANSFER_CANCELLED',
    cause: signal.reason,
  });
}
