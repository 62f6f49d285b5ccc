import { createStore } from 'zustand/vanilla';
import type { CubeColor, CubeFaceOwner, CubeState, DetectedColor, FaceName, FaceReading } from '../types/cube.ts';
import {
  CENTER_INDEX,
  CUBE_COLORS,
  FACE_COUNT,
  FACE_ORDER,
  STICKER_COUNT,
  UNKNOWN_COLOR,
} from '../lib/constants.ts';
import { faceIndexFor, sameReading } from '../lib/faceResolver.ts';

export interface CubeStore extends CubeState, CubeFaceOwner {
  // Actions
  update: (faceIndex: number, reading: FaceReading) => boolean;
  resetCube: () => void;

  // Queries
  getFace: (faceIndex: number) => FaceReading;
  faceIndexFor: (center: DetectedColor) => number | null;
  getScannedCenterColors: () => CubeColor[];
  getMissingFaces: () => FaceName[];
}

export function emptyFace(): FaceReading {
  return Array.from({ length: STICKER_COUNT }, () => UNKNOWN_COLOR);
}

function initialState(): CubeState {
  return {
    faces: Array.from({ length: FACE_COUNT }, emptyFace),
    revision: 0,
    scannedCount: 0,
    isComplete: false,
    isValid: false,
    facelets: null,
    errors: [],
  };
}

function isCubeColor(color: DetectedColor): color is CubeColor {
  return color !== UNKNOWN_COLOR;
}

function isScanned(face: FaceReading): boolean {
  return face.every(isCubeColor);
}

/**
 * Owner of the six scanned faces. `update` is the only mutation the scan
 * pipeline uses, and it is delivered through a CommitChannel.
 */
export const createCubeStore = () =>
  createStore<CubeStore>()((set, get) => ({
    ...initialState(),

    update: (faceIndex: number, reading: FaceReading) => {
      if (!Number.isInteger(faceIndex) || faceIndex < 0 || faceIndex >= FACE_COUNT) return false;
      if (reading.length !== STICKER_COUNT || !isScanned(reading)) return false;

      const state = get();
      if (sameReading(state.faces[faceIndex], reading)) return false;

      const faces = state.faces.map((face, i) => (i === faceIndex ? [...reading] : face));
      set({ faces, revision: state.revision + 1, ...deriveStatus(faces) });
      return true;
    },

    resetCube: () => {
      set({ ...initialState(), revision: get().revision + 1 });
    },

    getFace: (faceIndex: number) => {
      const face = get().faces[faceIndex];
      return face ? [...face] : emptyFace();
    },

    faceIndexFor,

    getScannedCenterColors: () => {
      return get()
        .faces.filter(isScanned)
        .map((face) => face[CENTER_INDEX])
        .filter(isCubeColor);
    },

    getMissingFaces: () => {
      return FACE_ORDER.filter((_, i) => !isScanned(get().faces[i]));
    },
  }));

export type CubeStoreApi = ReturnType<typeof createCubeStore>;

/** Adapt a store to the owner interface the pipeline and channel expect. */
export function cubeFaceOwner(store: CubeStoreApi): CubeFaceOwner {
  return {
    faceIndexFor: (center) => store.getState().faceIndexFor(center),
    getFace: (faceIndex) => store.getState().getFace(faceIndex),
    update: (faceIndex, reading) => store.getState().update(faceIndex, reading),
  };
}

// ── Status ──────────────────────────────────────────────────────────

function deriveStatus(faces: FaceReading[]): Pick<CubeState, 'scannedCount' | 'isComplete' | 'isValid' | 'facelets' | 'errors'> {
  const scannedCount = faces.filter(isScanned).length;
  const isComplete = scannedCount === FACE_COUNT;

  if (!isComplete) {
    return { scannedCount, isComplete, isValid: false, facelets: null, errors: [] };
  }

  const errors = validateFaces(faces);
  if (errors.length > 0) {
    return { scannedCount, isComplete, isValid: false, facelets: null, errors };
  }

  const facelets = buildFaceletString(faces);
  if (!facelets) {
    return {
      scannedCount,
      isComplete,
      isValid: false,
      facelets: null,
      errors: ['Failed to build facelet string: color mapping error'],
    };
  }
  return { scannedCount, isComplete, isValid: true, facelets, errors: [] };
}

// ── Validation ──────────────────────────────────────────────────────

export function validateFaces(faces: FaceReading[]): string[] {
  const errors: string[] = [];

  // Check 6 unique center colors
  const uniqueCenters = new Set(faces.map((f) => f[CENTER_INDEX]));
  if (uniqueCenters.size !== FACE_COUNT) {
    errors.push(`Expected 6 unique center colors, got ${uniqueCenters.size}`);
  }

  // Check each color appears exactly 9 times
  const counts = new Map<DetectedColor, number>();
  for (const face of faces) {
    for (const color of face) {
      counts.set(color, (counts.get(color) ?? 0) + 1);
    }
  }
  for (const color of CUBE_COLORS) {
    const count = counts.get(color) ?? 0;
    if (count !== STICKER_COUNT) {
      errors.push(`Color ${color}: ${count} stickers (expected 9)`);
    }
  }

  return errors;
}

// ── Facelet String Builder ──────────────────────────────────────────
// 54 chars in order U R F D L B, each face 9 stickers.
// Each char is the face letter whose center matches that sticker's color.

export function buildFaceletString(faces: FaceReading[]): string | null {
  const colorToFace = new Map<DetectedColor, FaceName>();
  FACE_ORDER.forEach((name, i) => {
    colorToFace.set(faces[i][CENTER_INDEX], name);
  });

  let result = '';
  for (const face of faces) {
    for (const color of face) {
      const mapped = colorToFace.get(color);
      if (!mapped) return null;
      result += mapped;
    }
  }

  return result.length === FACE_COUNT * STICKER_COUNT ? result : null;
}
