/**
 * Backend Supervisor
 *
 * Owns the automation backend (chromedriver) process: finds a free port,
 * spawns the process, polls it until ready and guarantees it is stopped.
 * `withBackend` is the scoped form every capture uses, so the process is
 * released however the capture ends.
 */

import { createServer } from 'net';
import {
  BackendLaunchError,
  BackendStartTimeoutError,
  CaptureAbortedError,
  PortInUseError,
} from '../errors/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Clock } from '../timing/index.js';
import {
  createExecaLauncher,
  type BackendExit,
  type BackendLauncher,
  type BackendProcess,
} from './launcher.js';

// ============================================================================
// Types
// ============================================================================

export type BackendStatus =
  | 'not-started'
  | 'starting'
  | 'ready'
  | 'in-use'
  | 'stopping'
  | 'stopped'
  | 'failed';

export interface SupervisorOptions {
  /** Backend executable (default: chromedriver) */
  command?: string;
  /** Extra arguments after --port */
  args?: string[];
  /** How long to wait for readiness, in ms */
  startupTimeoutMs?: number;
  /** Ports tried, starting at the preferred one */
  maxPortAttempts?: number;
  /** Time allowed for a graceful exit before the process is killed */
  shutdownGraceMs?: number;
  /** First readiness poll delay; doubles up to maxPollDelayMs */
  initialPollDelayMs?: number;
  maxPollDelayMs?: number;
  host?: string;
  launcher?: BackendLauncher;
  portProbe?: (port: number, host: string) => Promise<boolean>;
  clock?: Clock;
  logger?: Logger;
}

type ReadinessOutcome =
  | { kind: 'ready'; via: 'output' | 'status' }
  | { kind: 'exited'; exit: BackendExit; output: string }
  | { kind: 'timeout' }
  | { kind: 'aborted' };

const NEXT_STATUS: Record<BackendStatus, readonly BackendStatus[]> = {
  'not-started': ['starting'],
  starting: ['ready', 'failed'],
  ready: ['in-use', 'stopping', 'failed'],
  'in-use': ['stopping', 'failed'],
  failed: ['stopping'],
  stopping: ['stopped'],
  stopped: [],
};

const READY_OUTPUT = /started successfully/i;
const PORT_REFUSED_OUTPUT = /address already in use|bind\(\) failed|cannot bind|port not available/i;

// ============================================================================
// Backend Handle
// ============================================================================

export class BackendHandle {
  readonly port: number;
  readonly host: string;
  private currentStatus: BackendStatus = 'not-started';
  private processId: number | undefined;

  constructor(port: number, host: string) {
    this.port = port;
    this.host = host;
  }

  get status(): BackendStatus {
    return this.currentStatus;
  }

  get pid(): number | undefined {
    return this.processId;
  }

  get baseUrl(): string {
    return `http://${this.host}:${this.port}`;
  }

  /** Sessions may only run while the backend is ready or in use */
  get isUsable(): boolean {
    return this.currentStatus === 'ready' || this.currentStatus === 'in-use';
  }

  /** @internal lifecycle only moves forward */
  transition(next: BackendStatus): void {
    if (!NEXT_STATUS[this.currentStatus].includes(next)) {
      throw new Error(`Invalid backend transition ${this.currentStatus} -> ${next}`);
    }
    this.currentStatus = next;
  }

  /** @internal */
  attach(pid: number | undefined): void {
    this.processId = pid;
  }
}

// ============================================================================
// Backend Supervisor
// ============================================================================

export class BackendSupervisor {
  private command: string;
  private args: string[];
  private startupTimeoutMs: number;
  private maxPortAttempts: number;
  private shutdownGraceMs: number;
  private initialPollDelayMs: number;
  private maxPollDelayMs: number;
  private host: string;
  private launcher: BackendLauncher;
  private portProbe: (port: number, host: string) => Promise<boolean>;
  private clock: Clock;
  private logger: Logger;
  private processes = new Map<BackendHandle, BackendProcess>();

  constructor(options: SupervisorOptions = {}) {
    this.command = options.command || 'chromedriver';
    this.args = options.args ?? [];
    this.startupTimeoutMs = options.startupTimeoutMs ?? 5000;
    this.maxPortAttempts = options.maxPortAttempts ?? 5;
    this.shutdownGraceMs = options.shutdownGraceMs ?? 2000;
    this.initialPollDelayMs = options.initialPollDelayMs ?? 50;
    this.maxPollDelayMs = options.maxPollDelayMs ?? 500;
    this.host = options.host || '127.0.0.1';
    this.launcher = options.launcher ?? createExecaLauncher();
    this.portProbe = options.portProbe ?? isPortFree;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start the backend on the first free port at or after `preferredPort`
   */
  async start(preferredPort: number, signal?: AbortSignal): Promise<BackendHandle> {
    const attempted: number[] = [];

    for (let attempt = 0; attempt < this.maxPortAttempts; attempt++) {
      const port = preferredPort + attempt;
      if (port > 65535) break;
      attempted.push(port);

      if (signal?.aborted) {
        throw new CaptureAbortedError('cancelled before the backend started');
      }

      if (!(await this.portProbe(port, this.host))) {
        this.logger.debug(`Port ${port} is in use, trying ${port + 1}`);
        continue;
      }

      const handle = new BackendHandle(port, this.host);
      handle.transition('starting');

      this.logger.debug(`Starting ${this.command} on port ${port}...`);
      const child = this.launcher.launch(this.command, [`--port=${port}`, ...this.args]);
      handle.attach(child.pid);
      this.processes.set(handle, child);

      const outcome = await this.waitUntilReady(handle, child, signal);

      if (outcome.kind === 'ready') {
        handle.transition('ready');
        this.logger.debug(`Using port ${port} (pid ${child.pid ?? 'unknown'}, ready via ${outcome.via})`);
        return handle;
      }

      handle.transition('failed');
      await this.stop(handle);

      if (outcome.kind === 'exited') {
        if (PORT_REFUSED_OUTPUT.test(outcome.output)) {
          this.logger.debug(`Backend could not bind port ${port}, trying ${port + 1}`);
          continue;
        }
        const detail = outcome.exit.failed && outcome.exit.code === null
          ? 'the executable could not be run (is it installed and on PATH?)'
          : `exited with code ${outcome.exit.code ?? 'none'}${outcome.exit.signal ? ` (${outcome.exit.signal})` : ''} before becoming ready`;
        throw new BackendLaunchError(this.command, detail);
      }

      if (outcome.kind === 'aborted') {
        throw new CaptureAbortedError('cancelled while the backend was starting');
      }

      throw new BackendStartTimeoutError(port, this.startupTimeoutMs);
    }

    throw new PortInUseError(attempted);
  }

  /**
   * Stop a backend started by this supervisor. Never rejects: a backend that
   * ignores the shutdown request is killed after the grace window.
   */
  async stop(handle: BackendHandle): Promise<void> {
    const child = this.processes.get(handle);
    if (!child) return;
    this.processes.delete(handle);

    handle.transition('stopping');
    this.logger.debug(`Stopping backend on port ${handle.port}...`);

    const requested = await this.requestShutdown(handle);
    if (!requested) {
      child.kill('SIGTERM');
    }

    const exitedGracefully = await waitForExit(child, this.shutdownGraceMs);
    if (!exitedGracefully) {
      this.logger.warn(`Backend on port ${handle.port} did not exit after ${this.shutdownGraceMs}ms, killing it`);
      child.kill('SIGKILL');
      await child.exited;
    }

    handle.transition('stopped');
    this.logger.debug('Backend stopped');
  }

  /**
   * Run `fn` with a ready backend; the backend is stopped when `fn` settles
   */
  async withBackend<T>(
    preferredPort: number,
    fn: (handle: BackendHandle) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const handle = await this.start(preferredPort, signal);
    try {
      return await fn(handle);
    } finally {
      await this.stop(handle);
    }
  }

  markInUse(handle: BackendHandle): void {
    if (handle.status === 'ready') {
      handle.transition('in-use');
    }
  }

  markFailed(handle: BackendHandle): void {
    if (handle.isUsable) {
      handle.transition('failed');
    }
  }

  /** Number of backends started and not yet stopped */
  get runningCount(): number {
    return this.processes.size;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async waitUntilReady(
    handle: BackendHandle,
    child: BackendProcess,
    signal?: AbortSignal
  ): Promise<ReadinessOutcome> {
    const state: { exit: BackendExit | null; output: string; announced: boolean } = {
      exit: null,
      output: '',
      announced: false,
    };

    child.onOutput((chunk) => {
      // Keep the buffer small; only the latest lines matter
      state.output = (state.output + chunk).slice(-2000);
      if (READY_OUTPUT.test(chunk)) {
        state.announced = true;
      }
    });
    void child.exited.then((exit) => {
      state.exit = exit;
    });

    const deadline = this.clock.now() + this.startupTimeoutMs;
    let delay = this.initialPollDelayMs;

    while (true) {
      if (state.exit) {
        return { kind: 'exited', exit: state.exit, output: state.output };
      }
      if (state.announced) {
        return { kind: 'ready', via: 'output' };
      }
      if (await this.probeStatus(handle)) {
        return { kind: 'ready', via: 'status' };
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        return { kind: 'timeout' };
      }

      try {
        await this.clock.sleep(Math.min(delay, remaining), signal);
      } catch {
        return { kind: 'aborted' };
      }
      delay = Math.min(delay * 2, this.maxPollDelayMs);
    }
  }

  private async probeStatus(handle: BackendHandle): Promise<boolean> {
    try {
      const response = await fetch(`${handle.baseUrl}/status`, {
        signal: AbortSignal.timeout(1000),
      });
      if (!response.ok) return false;

      const body: unknown = await response.json();
      return isReadyStatus(body);
    } catch {
      return false;
    }
  }

  private async requestShutdown(handle: BackendHandle): Promise<boolean> {
    try {
      const response = await fetch(`${handle.baseUrl}/shutdown`, {
        signal: AbortSignal.timeout(1000),
      });
      return response.ok;
    } catch (error) {
      this.logger.debug(`Shutdown request failed, sending SIGTERM: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}

// ============================================================================
// Port & Process Utilities
// ============================================================================

/**
 * True when nothing is listening on host:port
 */
export function isPortFree(port: number, host: string = '127.0.0.1'): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.once('error', () => resolve(false));
    server.listen(port, host, () => {
      server.close(() => resolve(true));
    });
  });
}

function isReadyStatus(body: unknown): boolean {
  if (typeof body !== 'object' || body === null || !('value' in body)) {
    return true;
  }
  const value = body.value;
  if (typeof value !== 'object' || value === null || !('ready' in value)) {
    return true;
  }
  return value.ready !== false;
}

function waitForExit(child: BackendProcess, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    void child.exited.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

// ============================================================================
// Factory
// ============================================================================

export function createBackendSupervisor(options?: SupervisorOptions): BackendSupervisor {
  return new BackendSupervisor(options);
}
