import { createStore } from 'zustand/vanilla';
import type { FaceName, FaceReading, FrameOutcome, ScanStats } from '../types/cube.ts';
import { FACE_COUNT, FACE_NAMES, FACE_ORDER } from '../lib/constants.ts';

export interface ScannerStore {
  // Detection
  liveReading: FaceReading | null;
  historyDepth: number;
  lastOutcome: FrameOutcome | null;
  stats: ScanStats;

  // Guidance
  guidanceText: string;

  // Actions
  recordOutcome: (outcome: FrameOutcome, historyDepth: number) => void;
  setGuidanceText: (text: string) => void;
  reset: () => void;
}

const IDLE_GUIDANCE = 'Hold cube face in front of camera';

export function emptyStats(): ScanStats {
  return {
    framesReceived: 0,
    framesSkipped: 0,
    consensusReached: 0,
    commitsSent: 0,
    redundantReadings: 0,
    unresolvedCenters: 0,
  };
}

function countOutcome(stats: ScanStats, outcome: FrameOutcome): ScanStats {
  const next = { ...stats, framesReceived: stats.framesReceived + 1 };
  switch (outcome.kind) {
    case 'buffer-unavailable':
    case 'incomplete-sample':
      next.framesSkipped++;
      break;
    case 'unresolvable-center':
      next.consensusReached++;
      next.unresolvedCenters++;
      break;
    case 'redundant-reading':
      next.consensusReached++;
      next.redundantReadings++;
      break;
    case 'committed':
      next.consensusReached++;
      next.commitsSent++;
      break;
    case 'accumulating':
    case 'quorum-not-reached':
      break;
  }
  return next;
}

function readingOf(outcome: FrameOutcome): FaceReading | null {
  switch (outcome.kind) {
    case 'accumulating':
    case 'quorum-not-reached':
      return outcome.reading;
    case 'unresolvable-center':
    case 'redundant-reading':
    case 'committed':
      return outcome.consensus;
    default:
      return null;
  }
}

export const createScannerStore = () =>
  createStore<ScannerStore>()((set) => ({
    liveReading: null,
    historyDepth: 0,
    lastOutcome: null,
    stats: emptyStats(),
    guidanceText: IDLE_GUIDANCE,

    recordOutcome: (outcome, historyDepth) =>
      set((state) => ({
        liveReading: readingOf(outcome),
        historyDepth,
        lastOutcome: outcome,
        stats: countOutcome(state.stats, outcome),
      })),
    setGuidanceText: (text) => set({ guidanceText: text }),
    reset: () =>
      set({
        liveReading: null,
        historyDepth: 0,
        lastOutcome: null,
        stats: emptyStats(),
        guidanceText: IDLE_GUIDANCE,
      }),
  }));

export type ScannerStoreApi = ReturnType<typeof createScannerStore>;

/**
 * Text for the scan overlay, given which faces the owner still lacks. A face
 * committed by this frame is counted as scanned even though its delivery to
 * the owner is still queued.
 */
export function guidanceFor(missing: FaceName[], outcome: FrameOutcome | null): string {
  const captured = outcome?.kind === 'committed' ? FACE_ORDER[outcome.faceIndex] : null;
  const remaining = missing.filter((f) => f !== captured);
  const scannedCount = FACE_COUNT - remaining.length;
  if (remaining.length === 0) {
    return 'All faces scanned!';
  }

  const missingNames = remaining.map((f) => FACE_NAMES[f]).join(' or ');
  if (!outcome || outcome.kind === 'buffer-unavailable' || outcome.kind === 'incomplete-sample') {
    return `Show ${missingNames} face (${scannedCount}/6)`;
  }
  if (outcome.kind === 'committed') {
    return `Face captured! (${scannedCount}/6 scanned)`;
  }
  return `Hold steady... (${scannedCount}/6 scanned)`;
}
