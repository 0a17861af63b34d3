/**
 * Capture Errors
 *
 * Every failure the capture pipeline can surface has its own class and code,
 * so callers (the CLI, the remote-control server) can report a specific,
 * human-readable message and pick an exit status.
 */

// ============================================================================
// Types
// ============================================================================

export type WeblookErrorCode =
  | 'PORT_IN_USE'
  | 'BACKEND_START_TIMEOUT'
  | 'BACKEND_LAUNCH_FAILED'
  | 'SESSION_CREATION_FAILED'
  | 'SESSION_CLOSED'
  | 'NAVIGATION_FAILED'
  | 'PROTOCOL_ERROR'
  | 'SCRIPT_EXECUTION_ERROR'
  | 'SCREENSHOT_DECODE_ERROR'
  | 'GIF_ENCODING_ERROR'
  | 'OUTPUT_WRITE_ERROR'
  | 'CAPTURE_ABORTED'
  | 'INVALID_REQUEST';

interface WeblookErrorOptions {
  cause?: unknown;
  /** Non-fatal errors are reported but do not stop the pipeline */
  fatal?: boolean;
}

// ============================================================================
// Base Class
// ============================================================================

export class WeblookError extends Error {
  readonly code: WeblookErrorCode;
  readonly fatal: boolean;

  constructor(code: WeblookErrorCode, message: string, options: WeblookErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.fatal = options.fatal ?? true;
  }
}

// ============================================================================
// Backend
// ============================================================================

export class PortInUseError extends WeblookError {
  readonly attemptedPorts: number[];

  constructor(attemptedPorts: number[], options?: WeblookErrorOptions) {
    super(
      'PORT_IN_USE',
      `No free port for the automation backend (tried ${attemptedPorts.join(', ')})`,
      options
    );
    this.attemptedPorts = attemptedPorts;
  }
}

export class BackendStartTimeoutError extends WeblookError {
  readonly port: number;
  readonly timeoutMs: number;

  constructor(port: number, timeoutMs: number, options?: WeblookErrorOptions) {
    super(
      'BACKEND_START_TIMEOUT',
      `Automation backend on port ${port} was not ready after ${timeoutMs}ms`,
      options
    );
    this.port = port;
    this.timeoutMs = timeoutMs;
  }
}

export class BackendLaunchError extends WeblookError {
  readonly command: string;

  constructor(command: string, detail: string, options?: WeblookErrorOptions) {
    super('BACKEND_LAUNCH_FAILED', `Failed to start ${command}: ${detail}`, options);
    this.command = command;
  }
}

// ============================================================================
// Browser Session
// ============================================================================

export class SessionCreationFailedError extends WeblookError {
  constructor(detail: string, options?: WeblookErrorOptions) {
    super('SESSION_CREATION_FAILED', `Could not create a browser session: ${detail}`, options);
  }
}

export class SessionClosedError extends WeblookError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('SESSION_CLOSED', `Browser session ${sessionId} is already closed`);
    this.sessionId = sessionId;
  }
}

export class NavigationFailedError extends WeblookError {
  readonly url: string;

  constructor(url: string, detail: string, options?: WeblookErrorOptions) {
    super('NAVIGATION_FAILED', `Navigation to ${url} failed: ${detail}`, options);
    this.url = url;
  }
}

export class ProtocolError extends WeblookError {
  /** HTTP status of the backend's answer, when one arrived */
  readonly status: number | undefined;
  /** WebDriver error code from the response body, e.g. "no such window" */
  readonly webdriverError: string | undefined;
  readonly timedOut: boolean;

  constructor(
    message: string,
    details: { status?: number; webdriverError?: string; timedOut?: boolean } = {},
    options?: WeblookErrorOptions
  ) {
    super('PROTOCOL_ERROR', message, options);
    this.status = details.status;
    this.webdriverError = details.webdriverError;
    this.timedOut = details.timedOut ?? false;
  }
}

export class ScriptExecutionError extends WeblookError {
  constructor(detail: string, options: Omit<WeblookErrorOptions, 'fatal'> = {}) {
    super('SCRIPT_EXECUTION_ERROR', `Injected script failed: ${detail}`, {
      ...options,
      fatal: false,
    });
  }
}

export class ScreenshotDecodeError extends WeblookError {
  constructor(detail: string, options?: WeblookErrorOptions) {
    super('SCREENSHOT_DECODE_ERROR', `Screenshot is not a valid image: ${detail}`, options);
  }
}

// ============================================================================
// Encoding & Output
// ============================================================================

export class GifEncodingError extends WeblookError {
  constructor(detail: string, options?: WeblookErrorOptions) {
    super('GIF_ENCODING_ERROR', `Could not encode animation: ${detail}`, options);
  }
}

export class OutputWriteError extends WeblookError {
  readonly path: string;

  constructor(path: string, options?: WeblookErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('OUTPUT_WRITE_ERROR', `Could not write output to ${path}${reason}`, options);
    this.path = path;
  }
}

export class CaptureAbortedError extends WeblookError {
  constructor(detail = 'capture was cancelled before any frame was captured', options?: WeblookErrorOptions) {
    super('CAPTURE_ABORTED', `Capture aborted: ${detail}`, options);
  }
}

export class InvalidRequestError extends WeblookError {
  readonly issues: string[];

  constructor(issues: string[], options?: WeblookErrorOptions) {
    super('INVALID_REQUEST', `Invalid capture request: ${issues.join('; ')}`, options);
    this.issues = issues;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isWeblookError(error: unknown): error is WeblookError {
  return error instanceof WeblookError;
}

export function describeError(error: unknown): string {
  if (error instanceof WeblookError) {
    return `${error.message} [${error.code}]`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
  if (!(error instanceof WeblookError)) return 1;

  switch (error.code) {
    case 'CAPTURE_ABORTED':
      return 130;
    case 'INVALID_REQUEST':
      return 2;
    default:
      return error.fatal ? 1 : 0;
  }
}
