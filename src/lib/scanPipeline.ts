import type { CubeFaceOwner, FaceName, FrameOutcome, PixelBuffer } from '../types/cube.ts';
import type { ScannerStoreApi } from '../stores/scannerStore.ts';
import { guidanceFor } from '../stores/scannerStore.ts';
import { CENTER_INDEX, COLOR_NAMES, FACE_ORDER, UNKNOWN_COLOR } from './constants.ts';
import { classifyFrame, type ClassifierOptions } from './colorClassifier.ts';
import { CommitChannel } from './commitChannel.ts';
import { resolveScannerConfig, type ScannerConfig, type ScannerConfigOverrides } from './config.ts';
import { resolveFace } from './faceResolver.ts';
import { sampleFrame } from './frameSampler.ts';
import { getLogger, setLogLevel, type Logger } from './logger.ts';
import { createHistory, stabilize, type History } from './temporalStabilizer.ts';

export interface ScanPipelineOptions {
  owner: CubeFaceOwner;
  config?: ScannerConfigOverrides;
  channel?: CommitChannel;
  scanner?: ScannerStoreApi;
  logger?: Logger;
}

/**
 * Per-frame pipeline: sample → classify → stabilize → resolve.
 *
 * `processFrame` is synchronous and must be called serially from the capture
 * callback; the history it owns is never touched from anywhere else. Commits
 * leave through the channel and reach the owner later, in order.
 */
export class ScanPipeline {
  readonly config: ScannerConfig;
  readonly channel: CommitChannel;
  private readonly owner: CubeFaceOwner;
  private readonly scanner: ScannerStoreApi | null;
  private readonly logger: Logger;
  private readonly classifierOptions: ClassifierOptions;
  private history: History = createHistory();

  constructor({ owner, config, channel, scanner, logger }: ScanPipelineOptions) {
    this.config = resolveScannerConfig(config);
    // The threshold is process-wide; only an explicit level replaces it.
    if (config?.logLevel !== undefined) setLogLevel(config.logLevel);

    this.owner = owner;
    this.logger = logger ?? getLogger('Scanner');
    this.channel = channel ?? new CommitChannel(owner, { logger: this.logger });
    this.scanner = scanner ?? null;
    this.classifierOptions = {
      minValue: this.config.minValue,
      rejectionThreshold: this.config.rejectionThreshold,
      weights: this.config.weights,
    };
  }

  get historyDepth(): number {
    return this.history.length;
  }

  processFrame(buffer: PixelBuffer): FrameOutcome {
    const outcome = this.step(buffer);

    if (this.scanner) {
      const { recordOutcome, setGuidanceText } = this.scanner.getState();
      recordOutcome(outcome, this.history.length);
      setGuidanceText(guidanceFor(this.missingFaces(), outcome));
    }
    return outcome;
  }

  reset(): void {
    this.history = createHistory();
    this.scanner?.getState().reset();
  }

  private step(buffer: PixelBuffer): FrameOutcome {
    const sampled = sampleFrame(buffer);
    if (!sampled.ok) {
      this.logger.debug('Frame skipped', { reason: sampled.reason, validPatches: sampled.validPatches });
      return sampled.reason === 'buffer-unavailable'
        ? { kind: 'buffer-unavailable' }
        : { kind: 'incomplete-sample', validPatches: sampled.validPatches };
    }

    const reading = classifyFrame(sampled.samples, this.classifierOptions);
    const { history, consensus, unstable } = stabilize(this.history, reading, {
      historyLength: this.config.historyLength,
      quorumPolicy: this.config.quorumPolicy,
    });
    this.history = history;

    if (!consensus) {
      if (unstable.length === 0) {
        return { kind: 'accumulating', reading, depth: history.length };
      }
      this.logger.debug('Quorum not reached', {
        unstable,
        center: COLOR_NAMES[reading[CENTER_INDEX]],
      });
      return { kind: 'quorum-not-reached', reading, unstable };
    }

    const resolution = resolveFace(consensus, this.owner);
    switch (resolution.kind) {
      case 'unresolvable-center':
        this.logger.debug('Consensus discarded: center has no face', { consensus: consensus.join('') });
        return { kind: 'unresolvable-center', consensus };
      case 'redundant-reading':
        this.logger.debug('Consensus matches stored face', { faceIndex: resolution.faceIndex });
        return { kind: 'redundant-reading', faceIndex: resolution.faceIndex, consensus };
      case 'commit':
        this.logger.info('Committing face', {
          faceIndex: resolution.faceIndex,
          face: FACE_ORDER[resolution.faceIndex],
          reading: consensus.join(''),
        });
        this.channel.send({ faceIndex: resolution.faceIndex, reading: resolution.reading });
        return { kind: 'committed', faceIndex: resolution.faceIndex, consensus };
    }
  }

  private missingFaces(): FaceName[] {
    return FACE_ORDER.filter((_, i) => this.owner.getFace(i).includes(UNKNOWN_COLOR));
  }
}
