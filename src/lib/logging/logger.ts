/**
 * Logger
 *
 * Scoped, levelled logging to standard error. Standard output is reserved for
 * image bytes when the capture is piped, so nothing here ever writes to it.
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** Shown in brackets before every message, e.g. "Backend" */
  scope?: string;
  /** Minimum level that is written (default: info) */
  level?: LogLevel;
  /** Where formatted lines go (default: console.error) */
  sink?: LogSink;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// ============================================================================
// Formatting
// ============================================================================

function formatTimestamp(date: Date): string {
  const hrs = String(date.getHours()).padStart(2, '0');
  const mins = String(date.getMinutes()).padStart(2, '0');
  const secs = String(date.getSeconds()).padStart(2, '0');
  const ms = String(date.getMilliseconds()).padStart(3, '0');
  return `${hrs}:${mins}:${secs}.${ms}`;
}

function formatError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// ============================================================================
// Logger
// ============================================================================

class ScopedLogger implements Logger {
  readonly level: LogLevel;
  private scope: string | undefined;
  private sink: LogSink;

  constructor(options: LoggerOptions) {
    this.level = options.level ?? 'info';
    this.scope = options.scope;
    this.sink = options.sink ?? ((line) => console.error(line));
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string, error?: unknown): void {
    this.write('error', error === undefined ? message : `${message}: ${formatError(error)}`);
  }

  child(scope: string): Logger {
    return new ScopedLogger({ level: this.level, sink: this.sink, scope });
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const prefix = this.scope ? `[${this.scope}] ` : '';
    const marker = level === 'warn' ? 'warning: ' : level === 'error' ? 'error: ' : '';
    this.sink(`[${formatTimestamp(new Date())}] ${prefix}${marker}${message}`);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ScopedLogger(options);
}

/** A logger that drops everything; the default for library callers */
export const silentLogger: Logger = createLogger({ level: 'silent' });
