import type { CubeFaceOwner, DetectedColor, FaceReading } from '../types/cube.ts';
import { CENTER_FACE_INDEX, CENTER_INDEX, STICKER_COUNT } from './constants.ts';

export type Resolution =
  | { kind: 'unresolvable-center' }
  | { kind: 'redundant-reading'; faceIndex: number }
  | { kind: 'commit'; faceIndex: number; reading: FaceReading };

/** Face slot for a center color; null for 'X' */
export function faceIndexFor(center: DetectedColor): number | null {
  return CENTER_FACE_INDEX[center];
}

export function sameReading(a: readonly DetectedColor[], b: readonly DetectedColor[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Decide what a consensus reading means for the cube. Only reads from the
 * owner; the caller delivers any commit.
 */
export function resolveFace(consensus: FaceReading, owner: CubeFaceOwner): Resolution {
  if (consensus.length !== STICKER_COUNT) return { kind: 'unresolvable-center' };

  const faceIndex = owner.faceIndexFor(consensus[CENTER_INDEX]);
  if (faceIndex === null) return { kind: 'unresolvable-center' };

  if (sameReading(owner.getFace(faceIndex), consensus)) {
    return { kind: 'redundant-reading', faceIndex };
  }
  return { kind: 'commit', faceIndex, reading: [...consensus] };
}
