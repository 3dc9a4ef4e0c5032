import {
  BUFFER_POOL_MAX_RETAINED,
  BUFFER_POOL_MAX_RETAINED_BYTES,
} from '../common/upload.constants';

export const BUFFER_POOL = Symbol('BUFFER_POOL');

const INITIAL_CAPACITY = 64 * 1024;

/**
 * Growable byte container. Writes append; `reset` empties it without giving the
 * backing memory back, so a reused instance skips reallocation for uploads of a
 * similar size.
 */
export class ByteBuffer {
  private storage: Buffer;
  private written = 0;

  constructor(initialCapacity = INITIAL_CAPACITY) {
    this.storage = Buffer.allocUnsafe(Math.max(1, initialCapacity));
  }

  get length() {
    return this.written;
  }

  get capacity() {
    return this.storage.length;
  }

  write(chunk: Uint8Array) {
    this.ensureCapacity(this.written + chunk.length);
    this.storage.set(chunk, this.written);
    this.written += chunk.length;
  }

  /** Shares memory with the buffer: only valid until the next write, reset or release. */
  view(): Buffer {
    return this.storage.subarray(0, this.written);
  }

  reset() {
    this.written = 0;
  }

  private ensureCapacity(required: number) {
    if (required <= this.storage.length) {
      return;
    }
    let next = this.storage.length;
    while (next < required) {
      next *= 2;
    }
    const grown = Buffer.allocUnsafe(next);
    this.storage.copy(grown, 0, 0, this.written);
    this.storage = grown;
  }
}

export interface BufferPool {
  /** Returns a buffer with length 0 that no other caller holds. */
  acquire(): ByteBuffer;
  release(buffer: ByteBuffer): void;
}

export interface ReusableBufferPoolOptions {
  maxRetained?: number;
  maxRetainedBytes?: number;
}

export class ReusableBufferPool implements BufferPool {
  private readonly free: ByteBuffer[] = [];
  private readonly maxRetained: number;
  private readonly maxRetainedBytes: number;

  constructor(options: ReusableBufferPoolOptions = {}) {
    this.maxRetained = options.maxRetained ?? BUFFER_POOL_MAX_RETAINED;
    this.maxRetainedBytes = options.maxRetainedBytes ?? BUFFER_POOL_MAX_RETAINED_BYTES;
  }

  get size() {
    return this.free.length;
  }

  acquire() {
    const buffer = this.free.pop() ?? new ByteBuffer();
    buffer.reset();
    return buffer;
  }

  release(buffer: ByteBuffer) {
    if (this.free.includes(buffer)) {
      return;
    }
    // Buffers grown by an outsized upload are left to the GC.
    if (this.free.length >= this.maxRetained || buffer.capacity > this.maxRetainedBytes) {
      return;
    }
    buffer.reset();
    this.free.push(buffer);
  }
}

export class AllocatingBufferPool implements BufferPool {
  acquire() {
    return new ByteBuffer();
  }

  release(_buffer: ByteBuffer) {}
}
