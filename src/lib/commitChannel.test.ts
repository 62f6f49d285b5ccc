import { describe, it, expect, vi } from 'vitest';
import type { CubeFaceOwner, FaceReading } from '../types/cube.ts';
import { CommitChannel } from './commitChannel.ts';
import { faceIndexFor } from './faceResolver.ts';
import type { Logger } from './logger.ts';
import { reading } from '../test/frames.ts';

function recordingOwner() {
  const calls: [number, string][] = [];
  const owner: CubeFaceOwner = {
    faceIndexFor,
    getFace: () => reading('XXXXXXXXX'),
    update: (faceIndex: number, r: FaceReading) => {
      calls.push([faceIndex, r.join('')]);
      return true;
    },
  };
  return { owner, calls };
}

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('CommitChannel', () => {
  it('does not deliver inside send', async () => {
    const { owner, calls } = recordingOwner();
    const channel = new CommitChannel(owner);

    channel.send({ faceIndex: 2, reading: reading('GGGGGGGGG') });
    expect(calls).toEqual([]);
    expect(channel.pending).toBe(1);

    await channel.whenIdle();
    expect(calls).toEqual([[2, 'GGGGGGGGG']]);
    expect(channel.pending).toBe(0);
  });

  it('delivers commits in the order they were sent', async () => {
    const { owner, calls } = recordingOwner();
    const channel = new CommitChannel(owner);

    channel.send({ faceIndex: 2, reading: reading('GGGGGGGGG') });
    channel.send({ faceIndex: 0, reading: reading('WWWWWWWWW') });
    channel.send({ faceIndex: 2, reading: reading('GGGGGGGGB') });
    await channel.whenIdle();

    expect(calls.map(([i, r]) => `${i}:${r}`)).toEqual(['2:GGGGGGGGG', '0:WWWWWWWWW', '2:GGGGGGGGB']);
    expect(channel.delivered).toBe(3);
    expect(channel.applied).toBe(3);
  });

  it('runs deliveries on the scheduler it was given', () => {
    const { owner, calls } = recordingOwner();
    const tasks: (() => void)[] = [];
    const channel = new CommitChannel(owner, { schedule: (task) => tasks.push(task) });

    channel.send({ faceIndex: 0, reading: reading('WWWWWWWWW') });
    channel.send({ faceIndex: 5, reading: reading('BBBBBBBBB') });
    expect(tasks).toHaveLength(1);

    tasks[0]();
    expect(calls).toEqual([
      [0, 'WWWWWWWWW'],
      [5, 'BBBBBBBBB'],
    ]);
  });

  it('copies the reading at send time', async () => {
    const { owner, calls } = recordingOwner();
    const channel = new CommitChannel(owner);
    const face = reading('GGGGGGGGG');

    channel.send({ faceIndex: 2, reading: face });
    face[0] = 'R';
    await channel.whenIdle();

    expect(calls).toEqual([[2, 'GGGGGGGGG']]);
  });

  it('delivers commits sent by the owner after the current one', async () => {
    const order: number[] = [];
    let channel: CommitChannel | null = null;
    const owner: CubeFaceOwner = {
      faceIndexFor,
      getFace: () => reading('XXXXXXXXX'),
      update: (faceIndex) => {
        order.push(faceIndex);
        if (faceIndex === 0) channel?.send({ faceIndex: 3, reading: reading('YYYYYYYYY') });
        return true;
      },
    };
    channel = new CommitChannel(owner);

    channel.send({ faceIndex: 0, reading: reading('WWWWWWWWW') });
    channel.send({ faceIndex: 1, reading: reading('RRRRRRRRR') });
    await channel.whenIdle();

    expect(order).toEqual([0, 1, 3]);
  });

  it('logs a failed delivery and keeps delivering the rest', async () => {
    const logger = silentLogger();
    const { owner, calls } = recordingOwner();
    const failing: CubeFaceOwner = {
      ...owner,
      update: (faceIndex, r) => {
        if (faceIndex === 4) throw new Error('owner rejected');
        return owner.update(faceIndex, r);
      },
    };
    const channel = new CommitChannel(failing, { logger });

    channel.send({ faceIndex: 4, reading: reading('OOOOOOOOO') });
    channel.send({ faceIndex: 5, reading: reading('BBBBBBBBB') });
    await channel.whenIdle();

    expect(calls).toEqual([[5, 'BBBBBBBBB']]);
    expect(channel.failedDeliveries).toBe(1);
    expect(channel.delivered).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('Face commit failed', {
      faceIndex: 4,
      reading: 'OOOOOOOOO',
      error: 'owner rejected',
    });
  });

  it('counts deliveries the owner ignored as delivered but not applied', async () => {
    const owner: CubeFaceOwner = {
      faceIndexFor,
      getFace: () => reading('XXXXXXXXX'),
      update: () => false,
    };
    const channel = new CommitChannel(owner);
    channel.send({ faceIndex: 0, reading: reading('WWWWWWWWW') });
    await channel.whenIdle();

    expect(channel.delivered).toBe(1);
    expect(channel.applied).toBe(0);
  });

  it('is idle straight away when nothing was sent', async () => {
    const { owner } = recordingOwner();
    await expect(new CommitChannel(owner).whenIdle()).resolves.toBeUndefined();
  });
});
