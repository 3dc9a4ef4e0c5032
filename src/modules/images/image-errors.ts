export type ImageErrorKind = 'decode' | 'write' | 'timeout';

export abstract class ImageProcessingError extends Error {
  abstract readonly kind: ImageErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input bytes are not an image we can decode. */
export class ImageDecodeError extends ImageProcessingError {
  readonly kind = 'decode';
}

/** The encoded image could not be written to its destination. */
export class ImageWriteError extends ImageProcessingError {
  readonly kind = 'write';
}

/** No result was produced before the deadline. */
export class ImageTimeoutError extends ImageProcessingError {
  readonly kind = 'timeout';

  constructor(readonly timeoutMs?: number) {
    super(
      timeoutMs === undefined
        ? 'Image processing was cancelled'
        : `Image processing timed out after ${timeoutMs}ms`,
    );
  }
}

export type OptimizedImageFormat = 'jpeg' | 'png';

export interface OptimizedImage {
  path: string;
  width: number;
  height: number;
  format: OptimizedImageFormat;
}

export interface OptimizationFailure {
  error: ImageProcessingError;
}

export type OptimizationResult = OptimizedImage | OptimizationFailure;

export const isOptimizationFailure = (result: OptimizationResult): result is OptimizationFailure =>
  'error' in result;

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const toDecodeError = (error: unknown) =>
  error instanceof ImageProcessingError
    ? error
    : new ImageDecodeError(`Unable to decode image: ${errorMessage(error)}`, { cause: error });

export const toWriteError = (error: unknown) =>
  error instanceof ImageProcessingError
    ? error
    : new ImageWriteError(`Unable to write image: ${errorMessage(error)}`, { cause: error });
