import type { PixelBuffer } from '../types/cube.ts';

export const BYTES_PER_PIXEL = 4;

/**
 * Lock the buffer for reading, run `fn` over its bytes, and unlock on every
 * exit path. `fn` receives null when the buffer has no accessible memory.
 */
export function withLockedBuffer<T>(
  buffer: PixelBuffer,
  fn: (data: Uint8Array | null) => T
): T {
  const data = buffer.lockBaseAddress();
  try {
    return fn(data);
  } finally {
    buffer.unlockBaseAddress();
  }
}

/** True when `data` holds every pixel of `height` rows at `bytesPerRow` stride. */
export function coversFrame(
  data: Uint8Array,
  width: number,
  height: number,
  bytesPerRow: number
): boolean {
  if (bytesPerRow < width * BYTES_PER_PIXEL) return false;
  if (height === 0 || width === 0) return true;
  return data.length >= (height - 1) * bytesPerRow + width * BYTES_PER_PIXEL;
}

export interface PixelBufferInit {
  width: number;
  height: number;
  data: Uint8Array | null;
  bytesPerRow?: number;
}

/**
 * In-memory BGRA frame, for hosts that receive raw frames as bytes.
 * Tracks its lock depth so callers can check that every lock was released.
 */
export class MemoryPixelBuffer implements PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly bytesPerRow: number;
  private readonly data: Uint8Array | null;
  private locks = 0;

  constructor({ width, height, data, bytesPerRow = width * BYTES_PER_PIXEL }: PixelBufferInit) {
    this.width = width;
    this.height = height;
    this.bytesPerRow = bytesPerRow;
    this.data = data;
  }

  lockBaseAddress(): Uint8Array | null {
    this.locks++;
    return this.data;
  }

  unlockBaseAddress(): void {
    if (this.locks > 0) this.locks--;
  }

  get lockCount(): number {
    return this.locks;
  }
}

export function createPixelBuffer(init: PixelBufferInit): MemoryPixelBuffer {
  return new MemoryPixelBuffer(init);
}
