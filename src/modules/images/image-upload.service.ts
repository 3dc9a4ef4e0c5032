import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { basename } from 'path';
import type { Readable } from 'stream';
import { IMAGE_PROCESSING_TIMEOUT_MS } from '../common/upload.constants';
import { BUFFER_POOL, BufferPool, ByteBuffer } from './buffer-pool';
import {
  ImageDecodeError,
  ImageTimeoutError,
  isOptimizationFailure,
  OptimizationResult,
  toDecodeError,
} from './image-errors';
import { ImageOptimizerService } from './image-optimizer.service';

export type RawUploadSource = Buffer | Readable;

/**
 * Runs the optimizer under a deadline. The caller gets exactly one result; on
 * timeout the work is told to stop at its next stage boundary and whatever it
 * produces afterwards is dropped.
 *
 * The deadline starts once the upload has been read into the pooled buffer, so
 * it bounds optimization only, not ingestion.
 */
@Injectable()
export class ImageUploadService {
  private readonly logger = new Logger(ImageUploadService.name);

  constructor(
    private readonly optimizer: ImageOptimizerService,
    @Inject(BUFFER_POOL) private readonly bufferPool: BufferPool,
  ) {}

  async run(
    source: RawUploadSource,
    destinationPath: string,
    extension: string,
    timeoutMs = IMAGE_PROCESSING_TIMEOUT_MS,
  ): Promise<OptimizationResult> {
    const buffer = this.bufferPool.acquire();
    try {
      await this.ingest(source, buffer);
    } catch (error) {
      this.bufferPool.release(buffer);
      const reason = error instanceof Error ? error.message : String(error);
      return { error: new ImageDecodeError(`Upload could not be read: ${reason}`, { cause: error }) };
    }

    const controller = new AbortController();
    let timedOut = false;
    // The pooled bytes stay checked out until sharp is done with them, even if we stop waiting.
    const work = this.optimizer
      .optimize(buffer.view(), destinationPath, extension, {
        signal: controller.signal,
        timeoutMs,
      })
      .catch((error: unknown): OptimizationResult => ({ error: toDecodeError(error) }))
      .then((result) => (timedOut ? this.discardLateResult(result) : result))
      .finally(() => this.bufferPool.release(buffer));

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<OptimizationResult>((resolve) => {
      timer = setTimeout(() => {
        timedOut = true;
        const error = new ImageTimeoutError(timeoutMs);
        controller.abort(error);
        resolve({ error });
      }, timeoutMs);
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async discardLateResult(result: OptimizationResult) {
    if (isOptimizationFailure(result)) {
      this.logger.debug(`Abandoned image work ended with: ${result.error.message}`);
      return result;
    }
    // The caller was already told this call timed out, so the file is an orphan.
    this.logger.debug(`Removing ${basename(result.path)} written after timeout`);
    await fs.rm(result.path, { force: true }).catch((error: unknown) => {
      this.logger.warn(`Could not remove late image ${result.path}: ${String(error)}`);
    });
    return result;
  }

  private async ingest(source: RawUploadSource, buffer: ByteBuffer) {
    if (Buffer.isBuffer(source)) {
      buffer.write(source);
      return;
    }
    const chunks: AsyncIterable<unknown> = source;
    for await (const chunk of chunks) {
      if (typeof chunk === 'string') {
        buffer.write(Buffer.from(chunk));
      } else if (chunk instanceof Uint8Array) {
        buffer.write(chunk);
      } else {
        throw new TypeError('Upload stream produced a non-binary chunk');
      }
    }
  }
}
