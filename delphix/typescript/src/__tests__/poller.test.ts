/**
 * Tests for the status poller.
 */

import { describe, it, expect, vi } from 'vitest';
import { InMemoryLogger, StatusPoller, waitFor } from '../index.js';

type State = 'running' | 'done' | 'failed';

function poller(options: { signal?: AbortSignal; logger?: InMemoryLogger } = {}): StatusPoller<State> {
  return new StatusPoller<State>({
    intervalMs: 1,
    isRunning: (state) => state === 'running',
    signal: options.signal,
    logger: options.logger,
  });
}

function sequence(...states: State[]): () => Promise<State> {
  let index = 0;
  return async () => states[Math.min(index++, states.length - 1)];
}

describe('waitFor', () => {
  it('should resolve true once the delay elapsed', async () => {
    await expect(waitFor(1)).resolves.toBe(true);
  });

  it('should resolve false when aborted', async () => {
    const controller = new AbortController();
    const pending = waitFor(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBe(false);
  });

  it('should resolve false at once for an aborted signal', async () => {
    await expect(waitFor(60_000, AbortSignal.abort())).resolves.toBe(false);
  });
});

describe('StatusPoller', () => {
  it('should return a terminal first status without waiting', async () => {
    const fetcher = vi.fn(sequence('done'));

    await expect(poller().poll(fetcher)).resolves.toBe('done');
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('should poll until the status leaves the running state', async () => {
    const seen: State[] = [];

    const result = await poller().poll(sequence('running', 'running', 'failed'), {
      onUpdate: (state) => seen.push(state),
    });

    expect(result).toBe('failed');
    expect(seen).toEqual(['running', 'running', 'failed']);
  });

  it('should return the last status when interrupted', async () => {
    const controller = new AbortController();
    const logger = new InMemoryLogger();
    let calls = 0;

    const result = await poller({ signal: controller.signal, logger }).poll(async () => {
      calls += 1;
      if (calls === 2) {
        controller.abort(new Error('Build aborted'));
      }
      return 'running';
    });

    expect(result).toBe('running');
    expect(calls).toBe(2);
    expect(logger.getMessages()).toEqual(['Wait interrupted!', 'Build aborted']);
  });

  it('should return null when interrupted before the first fetch', async () => {
    const fetcher = vi.fn(sequence('running'));
    const controller = new AbortController();
    controller.abort(new Error('Build aborted'));

    const result = await poller({ signal: controller.signal }).poll(fetcher);

    expect(result).toBeNull();
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('should keep polling after a reported fetch error', async () => {
    const errors: unknown[] = [];
    let calls = 0;

    const result = await poller().poll(
      async () => {
        calls += 1;
        if (calls === 1) {
          throw new Error('connection reset');
        }
        return 'done';
      },
      { onError: (error) => errors.push(error) }
    );

    expect(result).toBe('done');
    expect(errors).toHaveLength(1);
    expect(calls).toBe(2);
  });

  it('should propagate a fetch error without an error handler', async () => {
    await expect(
      poller().poll(async () => {
        throw new Error('connection reset');
      })
    ).rejects.toThrow('connection reset');
  });
});
