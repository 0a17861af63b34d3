/**
 * Capture Scheduler
 *
 * Decides when frames are taken. A still capture is one frame after the
 * initial wait. A recording takes frames on interval boundaries measured from
 * the first frame; a slow capture that overruns one or more boundaries is
 * followed by a single immediate capture, never a burst of catch-up frames.
 */

import { CaptureAbortedError } from '../errors/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Clock } from '../timing/index.js';
import { computeFrameDelays } from '../image/index.js';
import type { CaptureMode, CaptureResult, Frame } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface FrameSource {
  captureFrame(offsetMs: number, signal?: AbortSignal): Promise<Frame>;
}

export interface CapturePlan {
  /** Pause before anything is captured */
  waitMs: number;
  mode: Readonly<CaptureMode>;
  /** Runs once after the wait, before the first frame */
  beforeCapture?: (signal?: AbortSignal) => Promise<void>;
}

export interface ScheduleOutcome {
  frames: Frame[];
  /** The recording stopped before its duration elapsed */
  partial: boolean;
  warnings: string[];
}

export interface SchedulerOptions {
  clock?: Clock;
  logger?: Logger;
}

// ============================================================================
// Scheduler
// ============================================================================

export class CaptureScheduler {
  private clock: Clock;
  private logger: Logger;

  constructor(options: SchedulerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async run(plan: CapturePlan, source: FrameSource, signal?: AbortSignal): Promise<ScheduleOutcome> {
    if (plan.waitMs > 0) {
      this.logger.debug(`Waiting ${plan.waitMs}ms before capturing`);
      await this.clock.sleep(plan.waitMs, signal);
    }
    if (plan.beforeCapture) {
      await plan.beforeCapture(signal);
    }
    throwIfAborted(signal);

    if (plan.mode.kind === 'still') {
      const frame = await source.captureFrame(0, signal);
      return { frames: [frame], partial: false, warnings: [] };
    }

    return this.record(plan.mode.durationMs, plan.mode.frameIntervalMs, source, signal);
  }

  private async record(
    durationMs: number,
    intervalMs: number,
    source: FrameSource,
    signal?: AbortSignal
  ): Promise<ScheduleOutcome> {
    const frames: Frame[] = [];
    const start = this.clock.now();
    let target = 0;

    try {
      for (;;) {
        throwIfAborted(signal);

        frames.push(await source.captureFrame(this.clock.now() - start, signal));

        const elapsed = this.clock.now() - start;
        const next = Math.max(target + intervalMs, Math.floor(elapsed / intervalMs) * intervalMs);
        if (next >= durationMs) break;
        if (next > target + intervalMs) {
          this.logger.debug(`Frame ${frames.length} overran its slot, skipping to ${next}ms`);
        }

        target = next;
        const delay = next - elapsed;
        if (delay > 0) {
          await this.clock.sleep(delay, signal);
        }
      }
    } catch (error) {
      if (frames.length === 0) {
        if (signal?.aborted && !(error instanceof CaptureAbortedError)) {
          throw new CaptureAbortedError(undefined, { cause: error });
        }
        throw error;
      }

      const reason = error instanceof CaptureAbortedError
        ? 'capture was cancelled'
        : error instanceof Error ? error.message : String(error);
      const warning = `Recording stopped after ${frames.length} frame${frames.length === 1 ? '' : 's'}: ${reason}`;
      this.logger.warn(warning);
      return { frames, partial: true, warnings: [warning] };
    }

    this.logger.debug(`Recorded ${frames.length} frames in ${this.clock.now() - start}ms`);
    return { frames, partial: false, warnings: [] };
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CaptureAbortedError();
  }
}

/**
 * Attach display timing to scheduled frames
 */
export function buildCaptureResult(mode: Readonly<CaptureMode>, outcome: ScheduleOutcome): CaptureResult {
  if (mode.kind === 'still') {
    const [frame] = outcome.frames;
    if (!frame) {
      throw new CaptureAbortedError('no frame was captured');
    }
    return { kind: 'still', frame };
  }

  return {
    kind: 'recording',
    frames: outcome.frames,
    delaysCs: computeFrameDelays(outcome.frames, mode.frameIntervalMs),
    partial: outcome.partial,
  };
}

export function createCaptureScheduler(options?: SchedulerOptions): CaptureScheduler {
  return new CaptureScheduler(options);
}
