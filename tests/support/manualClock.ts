/**
 * A clock whose time only moves when something sleeps or the test advances it
 */

import { CaptureAbortedError } from '../../src/lib/errors/index.js';
import type { Clock } from '../../src/lib/timing/index.js';

export class ManualClock implements Clock {
  private current: number;
  readonly sleeps: number[] = [];
  /** Runs at the start of every sleep, before cancellation is checked */
  onSleep: ((ms: number) => void) | null = null;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.onSleep?.(ms);
    if (signal?.aborted) {
      throw new CaptureAbortedError('cancelled while waiting');
    }
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
  }
}
