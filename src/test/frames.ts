import type { CubeColor, DetectedColor, FaceReading } from '../types/cube.ts';
import { gridGeometry } from '../lib/frameSampler.ts';
import { BYTES_PER_PIXEL, MemoryPixelBuffer } from '../lib/pixelBuffer.ts';

export type Rgb8 = [number, number, number];

/** Pure sticker colors as 8-bit RGB */
export const STICKER_RGB: Record<CubeColor, Rgb8> = {
  W: [255, 255, 255],
  Y: [255, 255, 0],
  R: [255, 0, 0],
  O: [255, 128, 0],
  B: [0, 0, 255],
  G: [0, 255, 0],
};

export const DARK_GRAY: Rgb8 = [13, 13, 13];

export interface FrameOptions {
  width?: number;
  height?: number;
  bytesPerRow?: number;
  background?: Rgb8;
}

/**
 * BGRA frame with each of the 9 grid cells filled with one color. Cells are
 * painted one step wide around their center, so patches never straddle two.
 */
export function paintFace(cells: Rgb8[], { width = 64, height = 64, bytesPerRow, background = [0, 0, 0] }: FrameOptions = {}): MemoryPixelBuffer {
  const stride = bytesPerRow ?? width * BYTES_PER_PIXEL;
  const data = new Uint8Array(stride * height);

  const put = (x: number, y: number, [r, g, b]: Rgb8) => {
    const idx = y * stride + x * BYTES_PER_PIXEL;
    data[idx] = b;
    data[idx + 1] = g;
    data[idx + 2] = r;
    data[idx + 3] = 255;
  };

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) put(x, y, background);
  }

  const { centers, stepX, stepY } = gridGeometry(width, height);
  const halfX = Math.floor(stepX / 2);
  const halfY = Math.floor(stepY / 2);
  centers.forEach(({ x: cx, y: cy }, i) => {
    for (let y = Math.max(0, cy - halfY); y < Math.min(height, cy + halfY); y++) {
      for (let x = Math.max(0, cx - halfX); x < Math.min(width, cx + halfX); x++) {
        put(x, y, cells[i]);
      }
    }
  });

  return new MemoryPixelBuffer({ width, height, data, bytesPerRow: stride });
}

/** Frame whose cells show the given sticker labels; 'X' cells are dark gray. */
export function faceFrame(reading: DetectedColor[], options?: FrameOptions): MemoryPixelBuffer {
  return paintFace(
    reading.map((c) => (c === 'X' ? DARK_GRAY : STICKER_RGB[c])),
    options
  );
}

export function reading(labels: string): FaceReading {
  return labels.split('').map(toDetected);
}

function toDetected(label: string): DetectedColor {
  switch (label) {
    case 'W':
    case 'Y':
    case 'R':
    case 'O':
    case 'B':
    case 'G':
    case 'X':
      return label;
    default:
      throw new Error(`Unknown label ${label}`);
  }
}
