/**
 * WebDriver Client
 *
 * Thin JSON-over-HTTP client for the subset of the W3C WebDriver protocol a
 * capture needs. Every response is validated with zod; a non-2xx status or a
 * payload missing expected fields becomes a ProtocolError.
 */

import { z } from 'zod';
import { CaptureAbortedError, ProtocolError } from '../errors/index.js';

// ============================================================================
// Types & Schemas
// ============================================================================

const EnvelopeSchema = z.object({
  value: z.unknown(),
});

const ErrorValueSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
});

const NewSessionSchema = z.object({
  sessionId: z.string().min(1),
  capabilities: z.record(z.unknown()).optional(),
});

const ScreenshotSchema = z.string().min(1);

const LogEntrySchema = z.object({
  level: z.string(),
  message: z.string(),
  timestamp: z.number(),
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;
export type NewSession = z.infer<typeof NewSessionSchema>;

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface WindowRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface WebDriverClientConfig {
  baseUrl: string;
  /** Per-request timeout in ms */
  requestTimeoutMs?: number;
}

// ============================================================================
// WebDriver Client
// ============================================================================

export class WebDriverClient {
  private baseUrl: string;
  private requestTimeoutMs: number;

  constructor(config: WebDriverClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = config.requestTimeoutMs ?? 30000;
  }

  // --------------------------------------------------------------------------
  // Core Request
  // --------------------------------------------------------------------------

  async command<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    const label = `${method} ${path}`;
    const request = this.createRequestSignal(signal);

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json; charset=utf-8' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: request.signal,
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new CaptureAbortedError(`cancelled during ${label}`, { cause: error });
      }
      if (request.didTimeOut()) {
        throw new ProtocolError(`${label} timed out after ${this.requestTimeoutMs}ms`, { timedOut: true }, { cause: error });
      }
      throw new ProtocolError(`${label} failed: ${errorMessage(error)}`, {}, { cause: error });
    } finally {
      request.dispose();
    }

    const json = parseJson(text);

    if (!ok) {
      const envelope = EnvelopeSchema.safeParse(json);
      const detail = envelope.success ? ErrorValueSchema.safeParse(envelope.data.value) : null;
      if (detail?.success) {
        const message = detail.data.message ? ` - ${firstLine(detail.data.message)}` : '';
        throw new ProtocolError(`${label} returned ${status}: ${detail.data.error}${message}`, {
          status,
          webdriverError: detail.data.error,
        });
      }
      throw new ProtocolError(`${label} returned ${status}`, { status });
    }

    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new ProtocolError(`${label} returned a malformed payload (no "value")`, { status });
    }

    const parsed = schema.safeParse(envelope.data.value);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message).join(', ');
      throw new ProtocolError(`${label} returned a malformed payload: ${issues}`, { status });
    }

    return parsed.data;
  }

  // --------------------------------------------------------------------------
  // Protocol Commands
  // --------------------------------------------------------------------------

  async createSession(capabilities: Record<string, unknown>, signal?: AbortSignal): Promise<NewSession> {
    return this.command('POST', '/session', { capabilities: { alwaysMatch: capabilities } }, NewSessionSchema, signal);
  }

  async deleteSession(sessionId: string): Promise<void> {
    await this.command('DELETE', `/session/${sessionId}`, undefined, z.unknown());
  }

  async navigateTo(sessionId: string, url: string, signal?: AbortSignal): Promise<void> {
    await this.command('POST', `/session/${sessionId}/url`, { url }, z.unknown(), signal);
  }

  async setWindowRect(sessionId: string, rect: WindowRect, signal?: AbortSignal): Promise<void> {
    await this.command('POST', `/session/${sessionId}/window/rect`, rect, z.unknown(), signal);
  }

  async executeSync(sessionId: string, script: string, args: unknown[] = [], signal?: AbortSignal): Promise<unknown> {
    return this.command('POST', `/session/${sessionId}/execute/sync`, { script, args }, z.unknown(), signal);
  }

  /** Base64-encoded PNG of the current viewport */
  async takeScreenshot(sessionId: string, signal?: AbortSignal): Promise<string> {
    return this.command('GET', `/session/${sessionId}/screenshot`, undefined, ScreenshotSchema, signal);
  }

  /** Drain the backend's buffered log entries of the given type */
  async getLog(sessionId: string, type: string, signal?: AbortSignal): Promise<LogEntry[]> {
    return this.command('POST', `/session/${sessionId}/se/log`, { type }, z.array(LogEntrySchema), signal);
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private createRequestSignal(external?: AbortSignal): {
    signal: AbortSignal;
    didTimeOut: () => boolean;
    dispose: () => void;
  } {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);

    const onAbort = () => controller.abort();
    if (external?.aborted) {
      controller.abort();
    } else {
      external?.addEventListener('abort', onAbort, { once: true });
    }

    return {
      signal: controller.signal,
      didTimeOut: () => timedOut,
      dispose: () => {
        clearTimeout(timer);
        external?.removeEventListener('abort', onAbort);
      },
    };
  }
}

function parseJson(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function firstLine(message: string): string {
  return message.split('\n')[0];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Factory
// ============================================================================

export function createWebDriverClient(config: WebDriverClientConfig): WebDriverClient {
  return new WebDriverClient(config);
}
