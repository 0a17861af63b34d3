/**
 * Clock
 *
 * Every suspension point of a capture (backend readiness polling, the
 * pre-capture wait, the wait between recording frames) goes through a Clock,
 * so cancellation behaves the same everywhere and tests can run on a manual
 * clock instead of real time.
 */

import { performance } from 'perf_hooks';
import { CaptureAbortedError } from '../errors/index.js';

export interface Clock {
  /** Milliseconds on a monotonic timeline; only differences are meaningful */
  now(): number;
  /**
   * Suspend for `ms` milliseconds. Rejects with CaptureAbortedError as soon as
   * `signal` aborts (or immediately when it already has).
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function interruptibleSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CaptureAbortedError('cancelled while waiting'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CaptureAbortedError('cancelled while waiting'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: interruptibleSleep,
};
