import type { ColorSample, PixelBuffer, SampleResult, Triple } from '../types/cube.ts';
import { GRID_SIZE, MIN_PATCH_HALF_WIDTH, STICKER_COUNT } from './constants.ts';
import { rgbToHsv } from './colorClassifier.ts';
import { BYTES_PER_PIXEL, coversFrame, withLockedBuffer } from './pixelBuffer.ts';

export interface GridGeometry {
  stepX: number;
  stepY: number;
  originX: number;
  originY: number;
  halfWidth: number;
  centers: { x: number; y: number }[]; // row-major
}

/**
 * Fixed 3x3 grid centered in the frame, one quarter of each dimension apart.
 */
export function gridGeometry(width: number, height: number): GridGeometry {
  const stepX = Math.floor(width / 4);
  const stepY = Math.floor(height / 4);
  const originX = Math.floor(width / 2) - stepX;
  const originY = Math.floor(height / 2) - stepY;
  const halfWidth = Math.max(MIN_PATCH_HALF_WIDTH, Math.floor(Math.min(stepX, stepY) / 6));

  const centers: { x: number; y: number }[] = [];
  for (let row = 0; row < GRID_SIZE; row++) {
    for (let col = 0; col < GRID_SIZE; col++) {
      centers.push({ x: originX + col * stepX, y: originY + row * stepY });
    }
  }

  return { stepX, stepY, originX, originY, halfWidth, centers };
}

/**
 * Average the square patch around (cx, cy). Pixels outside the frame are
 * skipped; returns null when none are left.
 */
export function samplePatch(
  data: Uint8Array,
  width: number,
  height: number,
  bytesPerRow: number,
  cx: number,
  cy: number,
  halfWidth: number
): ColorSample | null {
  const x0 = Math.max(0, cx - halfWidth);
  const x1 = Math.min(width - 1, cx + halfWidth);
  const y0 = Math.max(0, cy - halfWidth);
  const y1 = Math.min(height - 1, cy + halfWidth);

  let rSum = 0, gSum = 0, bSum = 0, count = 0;
  for (let y = y0; y <= y1; y++) {
    const rowStart = y * bytesPerRow;
    for (let x = x0; x <= x1; x++) {
      const idx = rowStart + x * BYTES_PER_PIXEL;
      bSum += data[idx];
      gSum += data[idx + 1];
      rSum += data[idx + 2];
      count++;
    }
  }

  if (count === 0) return null;

  const rgb: Triple = [
    rSum / (count * 255),
    gSum / (count * 255),
    bSum / (count * 255),
  ];
  return { rgb, hsv: rgbToHsv(rgb[0], rgb[1], rgb[2]) };
}

/**
 * Extract the 9 sticker samples of one frame. The buffer stays locked only
 * while its bytes are read.
 */
export function sampleFrame(buffer: PixelBuffer): SampleResult {
  const { width, height, bytesPerRow } = buffer;

  return withLockedBuffer(buffer, (data): SampleResult => {
    if (!data || !coversFrame(data, width, height, bytesPerRow)) {
      return { ok: false, reason: 'buffer-unavailable', validPatches: 0 };
    }

    const { centers, halfWidth } = gridGeometry(width, height);
    const samples: ColorSample[] = [];
    for (const { x, y } of centers) {
      const sample = samplePatch(data, width, height, bytesPerRow, x, y, halfWidth);
      if (sample) samples.push(sample);
    }

    if (samples.length !== STICKER_COUNT) {
      return { ok: false, reason: 'incomplete-sample', validPatches: samples.length };
    }
    return { ok: true, samples };
  });
}
