/**
 * Browser Session
 *
 * One headless browser page driven over WebDriver: open it at a viewport
 * size, navigate, wait, inject a script, read the console log, grab frames
 * and close it. Every operation except close requires an open session on a
 * usable backend.
 */

import type { BackendHandle } from '../backend/index.js';
import type { Frame, Viewport } from '../capture/types.js';
import {
  CaptureAbortedError,
  NavigationFailedError,
  ScriptExecutionError,
  SessionClosedError,
  SessionCreationFailedError,
  isWeblookError,
} from '../errors/index.js';
import { decodeImage } from '../image/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { systemClock, type Clock } from '../timing/index.js';
import { createWebDriverClient, type LogEntry, type WebDriverClient } from './client.js';

// ============================================================================
// Types
// ============================================================================

export interface BrowserSessionOptions {
  /** Pass --headless=new to the browser (default: true) */
  headless?: boolean;
  /** Per-command timeout in ms */
  requestTimeoutMs?: number;
  clientFactory?: (baseUrl: string) => WebDriverClient;
  clock?: Clock;
  logger?: Logger;
}

export interface OpenOptions {
  /** Ask the backend to buffer browser console entries */
  consoleLog?: boolean;
  signal?: AbortSignal;
}

export class SessionHandle {
  readonly id: string;
  readonly viewport: Readonly<Viewport>;
  readonly userAgent: string;
  readonly backend: BackendHandle;
  readonly client: WebDriverClient;
  private isClosed = false;

  constructor(
    id: string,
    viewport: Readonly<Viewport>,
    userAgent: string,
    backend: BackendHandle,
    client: WebDriverClient
  ) {
    this.id = id;
    this.viewport = viewport;
    this.userAgent = userAgent;
    this.backend = backend;
    this.client = client;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  markClosed(): void {
    this.isClosed = true;
  }
}

// ============================================================================
// Capabilities
// ============================================================================

export function buildCapabilities(
  viewport: Readonly<Viewport>,
  userAgent: string,
  options: { headless?: boolean; consoleLog?: boolean } = {}
): Record<string, unknown> {
  const args = [
    ...(options.headless === false ? [] : ['--headless=new']),
    '--disable-gpu',
    `--window-size=${viewport.width},${viewport.height}`,
    `--user-agent=${userAgent}`,
  ];

  return {
    browserName: 'chrome',
    'goog:chromeOptions': { args },
    ...(options.consoleLog ? { 'goog:loggingPrefs': { browser: 'ALL' } } : {}),
  };
}

// ============================================================================
// Browser Session
// ============================================================================

export class BrowserSession {
  private headless: boolean;
  private clientFactory: (baseUrl: string) => WebDriverClient;
  private clock: Clock;
  private logger: Logger;

  constructor(options: BrowserSessionOptions = {}) {
    this.headless = options.headless ?? true;
    this.clientFactory =
      options.clientFactory ??
      ((baseUrl) => createWebDriverClient({ baseUrl, requestTimeoutMs: options.requestTimeoutMs }));
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Create a browser session on a ready backend and size its window
   */
  async open(
    backend: BackendHandle,
    viewport: Readonly<Viewport>,
    userAgent: string,
    options: OpenOptions = {}
  ): Promise<SessionHandle> {
    if (!backend.isUsable) {
      throw new SessionCreationFailedError(`backend on port ${backend.port} is ${backend.status}`);
    }

    const client = this.clientFactory(backend.baseUrl);
    const capabilities = buildCapabilities(viewport, userAgent, {
      headless: this.headless,
      consoleLog: options.consoleLog,
    });

    let sessionId: string;
    try {
      const created = await client.createSession(capabilities, options.signal);
      sessionId = created.sessionId;
    } catch (error) {
      throw rethrowAs(error, (message) => new SessionCreationFailedError(message, { cause: error }));
    }

    const handle = new SessionHandle(sessionId, viewport, userAgent, backend, client);
    this.logger.debug(`Session ${sessionId} opened (${viewport.width}x${viewport.height})`);

    try {
      await client.setWindowRect(sessionId, { x: 0, y: 0, width: viewport.width, height: viewport.height }, options.signal);
    } catch (error) {
      await this.close(handle);
      throw rethrowAs(error, (message) => new SessionCreationFailedError(`could not size the window: ${message}`, { cause: error }));
    }

    return handle;
  }

  async navigate(handle: SessionHandle, url: string, signal?: AbortSignal): Promise<void> {
    this.ensureOpen(handle);
    this.logger.debug(`Navigating to ${url}`);
    try {
      await handle.client.navigateTo(handle.id, url, signal);
    } catch (error) {
      throw rethrowAs(error, (message) => new NavigationFailedError(url, message, { cause: error }));
    }
  }

  async wait(handle: SessionHandle, ms: number, signal?: AbortSignal): Promise<void> {
    this.ensureOpen(handle);
    if (ms > 0) {
      await this.clock.sleep(ms, signal);
    }
  }

  /**
   * Run a script in the page. Page state changes persist for later captures.
   */
  async inject(handle: SessionHandle, script: string, signal?: AbortSignal): Promise<void> {
    this.ensureOpen(handle);
    try {
      await handle.client.executeSync(handle.id, script, [], signal);
    } catch (error) {
      throw rethrowAs(error, (message) => new ScriptExecutionError(message, { cause: error }));
    }
  }

  /**
   * Drain buffered console entries. A backend that cannot provide them yields
   * an empty list and a warning.
   */
  async readConsoleLog(handle: SessionHandle, signal?: AbortSignal): Promise<LogEntry[]> {
    this.ensureOpen(handle);
    try {
      return await handle.client.getLog(handle.id, 'browser', signal);
    } catch (error) {
      if (error instanceof CaptureAbortedError) throw error;
      this.logger.warn(`Could not read the browser console log: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Take one screenshot and decode it into RGBA pixels
   */
  async captureFrame(handle: SessionHandle, offsetMs: number, signal?: AbortSignal): Promise<Frame> {
    this.ensureOpen(handle);
    const encoded = await handle.client.takeScreenshot(handle.id, signal);
    const image = await decodeImage(Buffer.from(encoded, 'base64'));
    return { width: image.width, height: image.height, data: image.data, offsetMs };
  }

  /**
   * End the session. Idempotent; failures are logged, never thrown.
   */
  async close(handle: SessionHandle): Promise<void> {
    if (handle.closed) return;
    handle.markClosed();

    if (!handle.backend.isUsable) {
      this.logger.debug(`Backend already ${handle.backend.status}, not deleting session ${handle.id}`);
      return;
    }

    try {
      await handle.client.deleteSession(handle.id);
      this.logger.debug(`Session ${handle.id} closed`);
    } catch (error) {
      this.logger.warn(`Could not close session ${handle.id}: ${errorMessage(error)}`);
    }
  }

  private ensureOpen(handle: SessionHandle): void {
    if (handle.closed || !handle.backend.isUsable) {
      throw new SessionClosedError(handle.id);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Cancellation passes through unchanged; anything else is wrapped */
function rethrowAs(error: unknown, wrap: (message: string) => Error): unknown {
  if (error instanceof CaptureAbortedError) return error;
  if (isWeblookError(error) && error.code !== 'PROTOCOL_ERROR') return error;
  return wrap(errorMessage(error));
}

export function createBrowserSession(options?: BrowserSessionOptions): BrowserSession {
  return new BrowserSession(options);
}
