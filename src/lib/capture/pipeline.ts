/**
 * Capture Pipeline
 *
 * Runs one capture end to end: start the backend, open a browser session,
 * navigate, schedule frames, close everything and encode the result. The
 * backend is stopped on every exit path, including cancellation.
 */

import { createBackendSupervisor, type BackendHandle, type BackendSupervisor } from '../backend/index.js';
import type { ResolvedConfig } from '../config/index.js';
import { CaptureAbortedError, ProtocolError, ScriptExecutionError } from '../errors/index.js';
import { createFrameAssembler, type EncodedImage, type FrameAssembler } from '../image/index.js';
import { createLogger, silentLogger, type Logger } from '../logging/index.js';
import { createOutputSink, describeTarget, type OutputSink } from '../output/index.js';
import { systemClock, type Clock } from '../timing/index.js';
import { createUserAgentPool, type UserAgentPool } from '../useragent/index.js';
import { createBrowserSession, type BrowserSession, type LogEntry, type SessionHandle } from '../webdriver/index.js';
import { buildCaptureResult, CaptureScheduler, type ScheduleOutcome } from './scheduler.js';
import type { CaptureRequest, CaptureResult } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface CaptureOutcome {
  result: CaptureResult;
  image: EncodedImage;
  /** A recording that ended early */
  partial: boolean;
  /** Non-fatal problems (script failures, early stops) */
  warnings: string[];
  /** Browser console entries; empty unless the request asked for them */
  consoleLog: LogEntry[];
}

/**
 * What front ends (command line, remote control) need from the core
 */
export interface CaptureService {
  capture(request: CaptureRequest, signal?: AbortSignal): Promise<CaptureOutcome>;
}

export interface CapturePipelineOptions {
  supervisor: BackendSupervisor;
  /** First port tried for the backend */
  port: number;
  session: BrowserSession;
  userAgents: UserAgentPool;
  assembler?: FrameAssembler;
  sink?: OutputSink;
  clock?: Clock;
  /** Pause after a successful script injection */
  scriptSettleMs?: number;
  logger?: Logger;
}

// ============================================================================
// Capture Pipeline
// ============================================================================

export class CapturePipeline implements CaptureService {
  private supervisor: BackendSupervisor;
  private port: number;
  private session: BrowserSession;
  private userAgents: UserAgentPool;
  private assembler: FrameAssembler;
  private sink: OutputSink;
  private scheduler: CaptureScheduler;
  private scriptSettleMs: number;
  private logger: Logger;

  constructor(options: CapturePipelineOptions) {
    this.supervisor = options.supervisor;
    this.port = options.port;
    this.session = options.session;
    this.userAgents = options.userAgents;
    this.assembler = options.assembler ?? createFrameAssembler();
    this.sink = options.sink ?? createOutputSink();
    this.scriptSettleMs = options.scriptSettleMs ?? 500;
    this.logger = options.logger ?? silentLogger;
    this.scheduler = new CaptureScheduler({
      clock: options.clock ?? systemClock,
      logger: this.logger,
    });
  }

  /**
   * Capture and encode, without delivering the bytes anywhere
   */
  async capture(request: CaptureRequest, signal?: AbortSignal): Promise<CaptureOutcome> {
    const warnings: string[] = [];
    let consoleLog: LogEntry[] = [];

    let scheduled: ScheduleOutcome;
    try {
      scheduled = await this.supervisor.withBackend(
        this.port,
        async (backend) => {
          this.supervisor.markInUse(backend);
          const userAgent = this.userAgents.pick();
          this.logger.debug(`User agent: ${userAgent}`);

          let handle: SessionHandle;
          try {
            handle = await this.session.open(backend, request.viewport, userAgent, {
              consoleLog: request.consoleLogPath !== undefined,
              signal,
            });
          } catch (error) {
            this.noteBackendFailure(backend, error);
            throw error;
          }

          try {
            await this.session.navigate(handle, request.url, signal);
            return await this.scheduler.run(
              {
                waitMs: request.waitMs,
                mode: request.mode,
                beforeCapture: async (innerSignal) => {
                  await this.prepare(handle, request, warnings, innerSignal);
                  if (request.consoleLogPath !== undefined) {
                    consoleLog = await this.session.readConsoleLog(handle, innerSignal);
                  }
                },
              },
              { captureFrame: (offsetMs, innerSignal) => this.session.captureFrame(handle, offsetMs, innerSignal) },
              signal
            );
          } catch (error) {
            this.noteBackendFailure(backend, error);
            throw error;
          } finally {
            await this.session.close(handle);
          }
        },
        signal
      );
    } catch (error) {
      if (signal?.aborted && !(error instanceof CaptureAbortedError)) {
        throw new CaptureAbortedError(undefined, { cause: error });
      }
      throw error;
    }

    warnings.push(...scheduled.warnings);
    const result = buildCaptureResult(request.mode, scheduled);
    const image = await this.assembler.assemble(result);

    return {
      result,
      image,
      partial: result.kind === 'recording' && result.partial,
      warnings,
      consoleLog,
    };
  }

  /**
   * Capture, then write the image (and the console log, when requested)
   */
  async run(request: CaptureRequest, signal?: AbortSignal): Promise<CaptureOutcome> {
    const outcome = await this.capture(request, signal);

    await this.sink.write(outcome.image.bytes, request.output);
    if (request.consoleLogPath !== undefined) {
      await this.sink.writeConsoleLog(request.consoleLogPath, outcome.consoleLog);
      this.logger.debug(`Wrote ${outcome.consoleLog.length} console entries to ${request.consoleLogPath}`);
    }

    const target = describeTarget(request.output);
    if (outcome.image.format === 'gif') {
      const suffix = outcome.partial ? ' (partial)' : '';
      this.logger.info(`Recording saved to ${target}: ${outcome.image.frameCount} frames${suffix}`);
    } else {
      this.logger.info(`Screenshot saved to ${target}`);
    }

    return outcome;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async prepare(
    handle: SessionHandle,
    request: CaptureRequest,
    warnings: string[],
    signal?: AbortSignal
  ): Promise<void> {
    if (request.script === undefined) return;

    try {
      await this.session.inject(handle, request.script, signal);
    } catch (error) {
      if (error instanceof ScriptExecutionError) {
        this.logger.warn(error.message);
        warnings.push(error.message);
        return;
      }
      throw error;
    }

    await this.session.wait(handle, this.scriptSettleMs, signal);
  }

  /** A request that never got an answer means the backend is gone */
  private noteBackendFailure(backend: BackendHandle, error: unknown): void {
    if (isUnanswered(error)) {
      this.logger.debug(`Backend on port ${backend.port} stopped answering`);
      this.supervisor.markFailed(backend);
    }
  }
}

/**
 * True when `error`, or an error it wraps, is a WebDriver request that got no
 * HTTP response at all
 */
function isUnanswered(error: unknown): boolean {
  let current = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof ProtocolError) {
      return current.status === undefined && !current.timedOut;
    }
    current = current.cause;
  }
  return false;
}

// ============================================================================
// Factory
// ============================================================================

export interface PipelineOverrides {
  supervisor?: BackendSupervisor;
  session?: BrowserSession;
  userAgents?: UserAgentPool;
  sink?: OutputSink;
  clock?: Clock;
  logger?: Logger;
  port?: number;
}

/**
 * Wire a pipeline from resolved configuration
 */
export function createCapturePipeline(config: ResolvedConfig, overrides: PipelineOverrides = {}): CapturePipeline {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const clock = overrides.clock ?? systemClock;

  return new CapturePipeline({
    supervisor:
      overrides.supervisor ??
      createBackendSupervisor({
        command: config.backend.command,
        args: config.backend.args,
        startupTimeoutMs: config.backend.startupTimeoutMs,
        maxPortAttempts: config.backend.maxPortAttempts,
        shutdownGraceMs: config.backend.shutdownGraceMs,
        clock,
        logger: logger.child('Backend'),
      }),
    port: overrides.port ?? config.backend.port,
    session:
      overrides.session ??
      createBrowserSession({
        headless: config.capture.headless,
        requestTimeoutMs: config.backend.requestTimeoutMs,
        clock,
        logger: logger.child('Session'),
      }),
    userAgents: overrides.userAgents ?? createUserAgentPool(),
    sink: overrides.sink,
    clock,
    scriptSettleMs: config.capture.scriptSettleMs,
    logger: logger.child('Capture'),
  });
}
