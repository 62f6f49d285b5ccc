import type { ColorSample, CubeColor, DetectedColor, DistanceWeights, FaceReading, Triple } from '../types/cube.ts';
import { DEFAULT_WEIGHTS, MIN_VALUE, REJECTION_THRESHOLD, UNKNOWN_COLOR } from './constants.ts';

// ── HSV Classification ──────────────────────────────────────────────
// Weighted distance in HSV space against one reference per cube color.
// Hue is circular, so it gets its own distance and the heaviest weight.
// An achromatic color (s = 0) has no hue, so the hue term is dropped for it.

/**
 * Convert normalized RGB [0-1] to normalized HSV: H=[0-1), S=[0-1], V=[0-1]
 */
export function rgbToHsv(r: number, g: number, b: number): Triple {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;

  const v = max;
  const s = max === 0 ? 0 : delta / max;

  let h = 0;
  if (delta !== 0) {
    if (max === r) {
      h = ((g - b) / delta) % 6;
    } else if (max === g) {
      h = (b - r) / delta + 2;
    } else {
      h = (r - g) / delta + 4;
    }
    h /= 6;
    if (h < 0) h += 1;
  }

  return [h, s, v];
}

// ── Reference Palette ───────────────────────────────────────────────

interface ColorRef {
  color: CubeColor;
  hsv: Triple;
}

function ref(color: CubeColor, r: number, g: number, b: number): ColorRef {
  return { color, hsv: rgbToHsv(r, g, b) };
}

/** Order matters: the first entry wins a distance tie. */
export const REFERENCE_PALETTE: readonly ColorRef[] = [
  ref('W', 1, 1, 1),
  ref('Y', 1, 1, 0),
  ref('R', 1, 0, 0),
  ref('O', 1, 0.5, 0),
  ref('B', 0, 0, 1),
  ref('G', 0, 1, 0),
];

/** Shortest way around the [0,1) hue circle */
export function hueDistance(h1: number, h2: number): number {
  const diff = Math.abs(h1 - h2) % 1;
  return Math.min(diff, 1 - diff);
}

export function colorDistance(
  hsv: Triple,
  reference: Triple,
  weights: DistanceWeights = DEFAULT_WEIGHTS
): number {
  const hueTerm = hsv[1] === 0 || reference[1] === 0 ? 0 : hueDistance(hsv[0], reference[0]) * weights.hue;
  return (
    hueTerm +
    Math.abs(hsv[1] - reference[1]) * weights.saturation +
    Math.abs(hsv[2] - reference[2]) * weights.value
  );
}

export interface ClassifierOptions {
  minValue?: number;
  rejectionThreshold?: number;
  weights?: DistanceWeights;
}

/**
 * Classify an HSV sample into a cube color, or 'X' when the patch is too dark
 * or nothing in the palette is close enough.
 */
export function classifyHsv(hsv: Triple, options: ClassifierOptions = {}): DetectedColor {
  const {
    minValue = MIN_VALUE,
    rejectionThreshold = REJECTION_THRESHOLD,
    weights = DEFAULT_WEIGHTS,
  } = options;

  if (hsv[2] <= minValue) return UNKNOWN_COLOR;

  let bestColor: DetectedColor = UNKNOWN_COLOR;
  let bestDist = Infinity;

  for (const entry of REFERENCE_PALETTE) {
    const d = colorDistance(hsv, entry.hsv, weights);
    if (d < bestDist) {
      bestDist = d;
      bestColor = entry.color;
    }
  }

  return bestDist > rejectionThreshold ? UNKNOWN_COLOR : bestColor;
}

export function classifySample(sample: ColorSample, options?: ClassifierOptions): DetectedColor {
  return classifyHsv(sample.hsv, options);
}

/** Classify the 9 samples of one frame, keeping their row-major order. */
export function classifyFrame(samples: ColorSample[], options?: ClassifierOptions): FaceReading {
  return samples.map((s) => classifySample(s, options));
}
