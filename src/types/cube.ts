// ── Color & Face Types ──────────────────────────────────────────────

export type CubeColor = 'W' | 'Y' | 'R' | 'O' | 'B' | 'G';

/** A classified sticker. 'X' marks a patch that could not be classified. */
export type DetectedColor = CubeColor | 'X';

/** Standard face names matching solver facelet order */
export type FaceName = 'U' | 'R' | 'F' | 'D' | 'L' | 'B';

export type Triple = [number, number, number];

/** Averaged patch color. Every component is normalized to [0,1]; hue wraps. */
export interface ColorSample {
  rgb: Triple;
  hsv: Triple;
}

/** 9 labels, row-major: [0]=top-left → [8]=bottom-right, [4]=center */
export type FaceReading = DetectedColor[];

// ── Frame Input ─────────────────────────────────────────────────────

/**
 * One locked-for-reading video frame, 4 bytes per pixel in B, G, R, A order.
 * Only valid for the duration of a single frame callback.
 */
export interface PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly bytesPerRow: number;
  /** Returns the backing bytes, or null when no memory is accessible. */
  lockBaseAddress(): Uint8Array | null;
  unlockBaseAddress(): void;
}

// ── Pipeline Types ──────────────────────────────────────────────────

export type SampleFailure = 'buffer-unavailable' | 'incomplete-sample';

export type SampleResult =
  | { ok: true; samples: ColorSample[] }
  | { ok: false; reason: SampleFailure; validPatches: number };

export type QuorumPolicy = 'unanimous' | 'all-but-one';

export interface DistanceWeights {
  hue: number;
  saturation: number;
  value: number;
}

export type FrameOutcome =
  | { kind: 'buffer-unavailable' }
  | { kind: 'incomplete-sample'; validPatches: number }
  | { kind: 'accumulating'; reading: FaceReading; depth: number }
  | { kind: 'quorum-not-reached'; reading: FaceReading; unstable: number[] }
  | { kind: 'unresolvable-center'; consensus: FaceReading }
  | { kind: 'redundant-reading'; faceIndex: number; consensus: FaceReading }
  | { kind: 'committed'; faceIndex: number; consensus: FaceReading };

export type FrameOutcomeKind = FrameOutcome['kind'];

export interface FaceCommit {
  faceIndex: number;
  reading: FaceReading;
}

/** The single owner of the assembled cube state. */
export interface CubeFaceOwner {
  faceIndexFor(center: DetectedColor): number | null;
  getFace(faceIndex: number): FaceReading;
  update(faceIndex: number, reading: FaceReading): boolean;
}

// ── Cube State ──────────────────────────────────────────────────────

export interface CubeState {
  faces: FaceReading[]; // 6 faces, indexed U R F D L B
  revision: number;
  scannedCount: number;
  isComplete: boolean;
  isValid: boolean;
  facelets: string | null;
  errors: string[];
}

// ── Scanner State ───────────────────────────────────────────────────

export interface ScanStats {
  framesReceived: number;
  framesSkipped: number;
  consensusReached: number;
  commitsSent: number;
  redundantReadings: number;
  unresolvedCenters: number;
}
