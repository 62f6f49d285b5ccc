import type { DetectedColor, FaceReading, QuorumPolicy } from '../types/cube.ts';
import { HISTORY_LENGTH, QUORUM_POLICY, STICKER_COUNT, UNKNOWN_COLOR } from './constants.ts';

// ── Frame Voting ────────────────────────────────────────────────────
// The rolling history is a plain value owned by the caller. Every step takes
// the current history and returns the next one; nothing is mutated in place.

export type History = readonly FaceReading[];

export interface StabilizerOptions {
  historyLength?: number;
  quorumPolicy?: QuorumPolicy;
}

export interface StabilizeResult {
  history: History;
  consensus: FaceReading | null;
  /** Positions that failed quorum; empty while accumulating or on consensus */
  unstable: number[];
}

export function createHistory(): History {
  return [];
}

/** Votes a position needs out of a full history */
export function requiredVotes(historyLength: number, policy: QuorumPolicy): number {
  return policy === 'unanimous' ? historyLength : Math.max(1, historyLength - 1);
}

/**
 * Most frequent label at one position. Counting walks the history oldest
 * first, and a later label only wins with a strictly higher count.
 */
export function tallyPosition(history: History, position: number): { color: DetectedColor; count: number } {
  const counts = new Map<DetectedColor, number>();
  for (const frame of history) {
    const color = frame[position];
    counts.set(color, (counts.get(color) ?? 0) + 1);
  }

  let bestColor: DetectedColor = UNKNOWN_COLOR;
  let bestCount = 0;
  for (const [color, count] of counts) {
    if (count > bestCount) {
      bestCount = count;
      bestColor = color;
    }
  }
  return { color: bestColor, count: bestCount };
}

/**
 * Add one classified frame and decide whether the last `historyLength`
 * frames agree. A consensus clears the history; a failed evaluation keeps it
 * so the next frame can still tip it over.
 */
export function stabilize(
  history: History,
  reading: FaceReading,
  options: StabilizerOptions = {}
): StabilizeResult {
  const { historyLength = HISTORY_LENGTH, quorumPolicy = QUORUM_POLICY } = options;
  if (reading.length !== STICKER_COUNT) return { history, consensus: null, unstable: [] };

  const next = [...history, [...reading]];
  const trimmed = next.length > historyLength ? next.slice(next.length - historyLength) : next;

  if (trimmed.length < historyLength) {
    return { history: trimmed, consensus: null, unstable: [] };
  }

  const required = requiredVotes(historyLength, quorumPolicy);
  const consensus: FaceReading = [];
  const unstable: number[] = [];

  for (let i = 0; i < STICKER_COUNT; i++) {
    const { color, count } = tallyPosition(trimmed, i);
    if (count < required || color === UNKNOWN_COLOR) {
      unstable.push(i);
    } else {
      consensus.push(color);
    }
  }

  if (unstable.length > 0) {
    return { history: trimmed, consensus: null, unstable };
  }
  return { history: createHistory(), consensus, unstable };
}
