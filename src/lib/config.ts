import type { DistanceWeights, QuorumPolicy } from '../types/cube.ts';
import type { LogThreshold } from './logger.ts';
import {
  DEFAULT_WEIGHTS,
  HISTORY_LENGTH,
  MIN_VALUE,
  QUORUM_POLICY,
  REJECTION_THRESHOLD,
} from './constants.ts';

export interface ScannerConfig {
  historyLength: number;
  quorumPolicy: QuorumPolicy;
  rejectionThreshold: number;
  minValue: number;
  weights: DistanceWeights;
  logLevel: LogThreshold;
}

export type ScannerConfigOverrides = Partial<Omit<ScannerConfig, 'weights'>> & {
  weights?: Partial<DistanceWeights>;
};

export const DEFAULT_SCANNER_CONFIG: ScannerConfig = {
  historyLength: HISTORY_LENGTH,
  quorumPolicy: QUORUM_POLICY,
  rejectionThreshold: REJECTION_THRESHOLD,
  minValue: MIN_VALUE,
  weights: DEFAULT_WEIGHTS,
  logLevel: 'info',
};

export class ScannerConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid scanner config "${field}": ${message}`);
    this.name = 'ScannerConfigError';
    this.field = field;
  }
}

const QUORUM_POLICIES: readonly QuorumPolicy[] = ['unanimous', 'all-but-one'];
const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

const isQuorumPolicy = (value: string): value is QuorumPolicy =>
  (QUORUM_POLICIES as readonly string[]).includes(value);

const isLogThreshold = (value: string): value is LogThreshold =>
  (LOG_THRESHOLDS as readonly string[]).includes(value);

/**
 * Merge overrides over the defaults. Explicit values that make no sense throw
 * instead of being clamped, since they come from code rather than a user.
 */
export function resolveScannerConfig(overrides: ScannerConfigOverrides = {}): ScannerConfig {
  const config: ScannerConfig = {
    ...DEFAULT_SCANNER_CONFIG,
    ...overrides,
    weights: { ...DEFAULT_SCANNER_CONFIG.weights, ...overrides.weights },
  };

  if (!Number.isInteger(config.historyLength) || config.historyLength < 1) {
    throw new ScannerConfigError('historyLength', `expected a positive integer, got ${config.historyLength}`);
  }
  if (!isQuorumPolicy(config.quorumPolicy)) {
    throw new ScannerConfigError('quorumPolicy', `unknown policy ${String(config.quorumPolicy)}`);
  }
  if (!Number.isFinite(config.rejectionThreshold) || config.rejectionThreshold < 0) {
    throw new ScannerConfigError('rejectionThreshold', `expected a finite value >= 0, got ${config.rejectionThreshold}`);
  }
  if (!Number.isFinite(config.minValue) || config.minValue < 0 || config.minValue > 1) {
    throw new ScannerConfigError('minValue', `expected a value in [0,1], got ${config.minValue}`);
  }
  for (const [name, weight] of Object.entries(config.weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ScannerConfigError(`weights.${name}`, `expected a finite value >= 0, got ${weight}`);
    }
  }
  if (!isLogThreshold(config.logLevel)) {
    throw new ScannerConfigError('logLevel', `unknown level ${String(config.logLevel)}`);
  }

  return config;
}

// ── Environment ─────────────────────────────────────────────────────

export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

export type EnvSource = Record<string, string | undefined>;

/** Build a config from CUBE_SCAN_* variables; bad or missing values keep defaults. */
export function scannerConfigFromEnv(env: EnvSource = process.env): ScannerConfig {
  const overrides: ScannerConfigOverrides = {};

  const historyLength = parseNumericEnv(env.CUBE_SCAN_HISTORY_LENGTH, { min: 1, max: 60, integer: true });
  if (historyLength !== null) overrides.historyLength = historyLength;

  const quorum = env.CUBE_SCAN_QUORUM?.trim().toLowerCase();
  if (quorum && isQuorumPolicy(quorum)) overrides.quorumPolicy = quorum;

  const rejection = parseNumericEnv(env.CUBE_SCAN_REJECTION_THRESHOLD, { min: 0, max: 10 });
  if (rejection !== null) overrides.rejectionThreshold = rejection;

  const minValue = parseNumericEnv(env.CUBE_SCAN_MIN_VALUE, { min: 0, max: 1 });
  if (minValue !== null) overrides.minValue = minValue;

  const logLevel = env.CUBE_SCAN_LOG_LEVEL?.trim().toLowerCase();
  if (logLevel && isLogThreshold(logLevel)) overrides.logLevel = logLevel;

  return resolveScannerConfig(overrides);
}
