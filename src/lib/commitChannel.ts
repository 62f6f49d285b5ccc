import type { CubeFaceOwner, FaceCommit } from '../types/cube.ts';
import { getLogger, type Logger } from './logger.ts';

export type Scheduler = (task: () => void) => void;

export interface CommitChannelOptions {
  schedule?: Scheduler;
  logger?: Logger;
}

/**
 * Ordered hand-off from the capture callback to the single owner of cube
 * state. `send` never delivers inline; queued commits reach the owner one at
 * a time, in the order they were sent.
 */
export class CommitChannel {
  private readonly owner: CubeFaceOwner;
  private readonly schedule: Scheduler;
  private readonly logger: Logger;
  private queue: FaceCommit[] = [];
  private scheduled = false;
  private idleWaiters: (() => void)[] = [];
  private deliveredCount = 0;
  private appliedCount = 0;
  private failedCount = 0;

  constructor(owner: CubeFaceOwner, { schedule = queueMicrotask, logger = getLogger('CommitChannel') }: CommitChannelOptions = {}) {
    this.owner = owner;
    this.schedule = schedule;
    this.logger = logger;
  }

  send(commit: FaceCommit): void {
    this.queue.push({ faceIndex: commit.faceIndex, reading: [...commit.reading] });
    if (!this.scheduled) {
      this.scheduled = true;
      this.schedule(() => this.drain());
    }
  }

  /** Resolves once every commit sent so far has been handed to the owner. */
  whenIdle(): Promise<void> {
    if (!this.scheduled && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  get delivered(): number {
    return this.deliveredCount;
  }

  /** Deliveries the owner accepted as a state change */
  get applied(): number {
    return this.appliedCount;
  }

  get failedDeliveries(): number {
    return this.failedCount;
  }

  private drain(): void {
    // Commits sent by the owner while we deliver land at the tail and are
    // picked up by this same loop.
    let commit = this.queue.shift();
    while (commit) {
      this.deliver(commit);
      commit = this.queue.shift();
    }

    this.scheduled = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private deliver({ faceIndex, reading }: FaceCommit): void {
    try {
      const changed = this.owner.update(faceIndex, reading);
      this.deliveredCount++;
      if (changed) this.appliedCount++;
    } catch (error) {
      this.failedCount++;
      this.logger.error('Face commit failed', {
        faceIndex,
        reading: reading.join(''),
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
