/**
 * Status Poller
 *
 * Re-fetches a remote status at a fixed interval until it leaves its
 * running state. There is no backoff and no iteration cap; the only way
 * out besides a terminal status is the abort signal.
 * @module monitoring/poller
 */

import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';

export interface StatusPollerConfig<T> {
  /** Delay between fetches in milliseconds */
  intervalMs: number;
  /** True while the status still counts as running */
  isRunning: (status: T) => boolean;
  /** Interrupts polling; the poll returns the last status it saw */
  signal?: AbortSignal;
  logger?: Logger;
}

export type StatusFetcher<T> = () => Promise<T>;
export type StatusCallback<T> = (status: T) => void;

export interface PollHandlers<T> {
  /** Called with every fetched status */
  onUpdate?: StatusCallback<T>;
  /**
   * Called when a fetch fails. When present, polling carries on with the
   * last known status; when absent, the error propagates.
   */
  onError?: (error: unknown) => void;
}

/**
 * Waits `ms` milliseconds. Resolves true when the time elapsed, false when
 * the signal fired first.
 */
export function waitFor(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class StatusPoller<T> {
  private readonly logger: Logger;

  constructor(private readonly config: StatusPollerConfig<T>) {
    this.logger = config.logger ?? new NoopLogger();
  }

  /**
   * Poll until the status is terminal.
   *
   * @returns The terminal status; on interruption, the last status seen,
   *   which may still be running, or null if none was fetched yet.
   */
  async poll(fetcher: StatusFetcher<T>, handlers: PollHandlers<T> = {}): Promise<T | null> {
    const { intervalMs, isRunning, signal } = this.config;
    let last: T | null = null;

    while (true) {
      if (signal?.aborted) {
        this.reportInterrupted(signal);
        return last;
      }

      try {
        last = await fetcher();
        handlers.onUpdate?.(last);
      } catch (error) {
        if (!handlers.onError) {
          throw error;
        }
        handlers.onError(error);
      }

      if (last !== null && !isRunning(last)) {
        return last;
      }

      if (!(await waitFor(intervalMs, signal))) {
        this.reportInterrupted(signal);
        return last;
      }
    }
  }

  private reportInterrupted(signal?: AbortSignal): void {
    this.logger.warn('Wait interrupted!');
    const reason: unknown = signal?.reason;
    if (reason instanceof Error && reason.message) {
      this.logger.warn(reason.message);
    }
  }
}
