import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import sharp = require('sharp');
import {
  IMAGE_MAX_DIMENSION,
  JPEG_QUALITY,
  PNG_COMPRESSION_LEVEL,
} from '../common/upload.constants';
import {
  ImageDecodeError,
  ImageProcessingError,
  ImageTimeoutError,
  OptimizationResult,
  OptimizedImageFormat,
  toDecodeError,
  toWriteError,
} from './image-errors';

export interface OptimizeOptions {
  /** Checked between stages; an aborted call writes nothing. */
  signal?: AbortSignal;
  /** Forwarded to sharp so libvips gives up on its own as well. */
  timeoutMs?: number;
}

export const resolveOutputFormat = (extension: string): OptimizedImageFormat => {
  const normalized = extension.trim().toLowerCase().replace(/^\./, '');
  if (normalized === 'png') {
    return 'png';
  }
  // jpg, jpeg and anything unrecognized are written as JPEG.
  return 'jpeg';
};

// sharp takes whole seconds; anything under a second still gets one.
export const toSharpTimeoutSeconds = (timeoutMs: number) => Math.max(1, Math.ceil(timeoutMs / 1000));

const abortReason = (signal: AbortSignal) =>
  signal.reason instanceof ImageProcessingError ? signal.reason : new ImageTimeoutError();

const throwIfAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
};

@Injectable()
export class ImageOptimizerService {
  private readonly logger = new Logger(ImageOptimizerService.name);

  async optimize(
    input: Buffer,
    destinationPath: string,
    extension: string,
    options: OptimizeOptions = {},
  ): Promise<OptimizationResult> {
    const startedAt = Date.now();
    const format = resolveOutputFormat(extension);

    let encoded: { data: Buffer; info: sharp.OutputInfo };
    try {
      encoded = await this.encode(input, format, options);
    } catch (error) {
      // sharp's own timeout surfaces as a pipeline error once we have given up.
      return { error: options.signal?.aborted ? abortReason(options.signal) : toDecodeError(error) };
    }

    try {
      await this.writeAtomically(encoded.data, destinationPath, options.signal);
    } catch (error) {
      return { error: toWriteError(error) };
    }

    this.logger.debug(
      `Optimized ${basename(destinationPath)} to ${encoded.info.width}x${encoded.info.height} ${format} in ${Date.now() - startedAt}ms`,
    );
    return {
      path: destinationPath,
      width: encoded.info.width,
      height: encoded.info.height,
      format,
    };
  }

  private async encode(input: Buffer, format: OptimizedImageFormat, options: OptimizeOptions) {
    throwIfAborted(options.signal);
    const image = sharp(input, { failOn: 'warning' });
    const metadata = await image.metadata();
    if (!metadata.width || !metadata.height) {
      throw new ImageDecodeError('Image has no readable dimensions');
    }

    throwIfAborted(options.signal);
    let pipeline = image.resize({
      width: IMAGE_MAX_DIMENSION,
      height: IMAGE_MAX_DIMENSION,
      fit: 'inside',
      withoutEnlargement: true,
      kernel: sharp.kernel.nearest,
    });
    pipeline =
      format === 'png'
        ? pipeline.png({ compressionLevel: PNG_COMPRESSION_LEVEL })
        : pipeline.jpeg({ quality: JPEG_QUALITY });
    if (options.timeoutMs !== undefined) {
      pipeline = pipeline.timeout({ seconds: toSharpTimeoutSeconds(options.timeoutMs) });
    }
    return pipeline.toBuffer({ resolveWithObject: true });
  }

  private async writeAtomically(data: Buffer, destinationPath: string, signal?: AbortSignal) {
    const tempPath = join(
      dirname(destinationPath),
      `.${basename(destinationPath)}.${randomUUID()}.tmp`,
    );
    try {
      throwIfAborted(signal);
      await fs.writeFile(tempPath, data);
      throwIfAborted(signal);
      await fs.rename(tempPath, destinationPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Could not remove temporary file ${tempPath}: ${String(cleanupError)}`);
      });
      throw error;
    }
  }
}
