import type { CubeColor, DetectedColor, DistanceWeights, FaceName, QuorumPolicy } from '../types/cube.ts';

// ── Grid ────────────────────────────────────────────────────────────

export const GRID_SIZE = 3;
export const STICKER_COUNT = GRID_SIZE * GRID_SIZE;
export const CENTER_INDEX = 4;
export const FACE_COUNT = 6;
export const MIN_PATCH_HALF_WIDTH = 2;

export const UNKNOWN_COLOR: DetectedColor = 'X';

// ── Classification Thresholds ───────────────────────────────────────
// HSV components normalized to [0,1]

export const MIN_VALUE = 0.1;           // at or below: shadow / underexposed
export const REJECTION_THRESHOLD = 0.6; // nearest palette entry farther than this → 'X'

export const DEFAULT_WEIGHTS: DistanceWeights = {
  hue: 2.0,
  saturation: 1.0,
  value: 1.0,
};

// ── Frame Voting ────────────────────────────────────────────────────

export const HISTORY_LENGTH = 5;
export const QUORUM_POLICY: QuorumPolicy = 'all-but-one';

// ── Color Display Map ───────────────────────────────────────────────

export const COLOR_NAMES: Record<DetectedColor, string> = {
  W: 'White',
  Y: 'Yellow',
  R: 'Red',
  O: 'Orange',
  B: 'Blue',
  G: 'Green',
  X: 'Unknown',
};

// ── Face Names ──────────────────────────────────────────────────────

export const FACE_NAMES: Record<FaceName, string> = {
  U: 'Up',
  R: 'Right',
  F: 'Front',
  D: 'Down',
  L: 'Left',
  B: 'Back',
};

/** Face slot order; also the solver facelet string order */
export const FACE_ORDER: FaceName[] = ['U', 'R', 'F', 'D', 'L', 'B'];

// ── Center color → face slot ────────────────────────────────────────
// White up, green front → red right, orange left

export const CENTER_FACE_INDEX: Record<DetectedColor, number | null> = {
  W: 0,
  R: 1,
  G: 2,
  Y: 3,
  O: 4,
  B: 5,
  X: null,
};

export const CUBE_COLORS: CubeColor[] = ['W', 'Y', 'R', 'O', 'B', 'G'];
