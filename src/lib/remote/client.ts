/**
 * Remote Control Client
 *
 * Talks to a RemoteControlServer: lists its actions and invokes one, returning
 * the decoded image bytes.
 */

import { z } from 'zod';
import { CaptureAbortedError, ProtocolError } from '../errors/index.js';
import type { CaptureRequest } from '../capture/index.js';
import type { ActionName } from './server.js';

// ============================================================================
// Types & Schemas
// ============================================================================

const ActionListSchema = z.object({
  actions: z.array(
    z.object({
      name: z.string(),
      description: z.string().optional(),
      parameters: z.record(z.string()).optional(),
    })
  ),
});

const ActionResultSchema = z.object({
  image_data: z.string().min(1),
  format: z.enum(['png', 'gif']),
  width: z.number(),
  height: z.number(),
  frame_count: z.number(),
  partial: z.boolean(),
  warnings: z.array(z.string()),
});

const ErrorBodySchema = z.object({
  error: z.string(),
  message: z.string(),
});

export interface RemoteActionParams {
  url: string;
  wait?: number;
  size?: string;
  js?: string;
  duration?: number;
}

export interface RemoteCaptureResult {
  bytes: Buffer;
  format: 'png' | 'gif';
  width: number;
  height: number;
  frameCount: number;
  partial: boolean;
  warnings: string[];
}

export interface RemoteControlClientConfig {
  endpoint: string;
  timeoutMs?: number;
}

// ============================================================================
// Remote Control Client
// ============================================================================

export class RemoteControlClient {
  private endpoint: string;
  private timeoutMs: number;

  constructor(config: RemoteControlClientConfig) {
    this.endpoint = config.endpoint.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 60000;
  }

  async listActions(signal?: AbortSignal): Promise<string[]> {
    const body = await this.request('GET', '/actions', undefined, signal);
    const parsed = ActionListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError('GET /actions returned a malformed payload');
    }
    return parsed.data.actions.map((action) => action.name);
  }

  async invoke(action: ActionName, params: RemoteActionParams, signal?: AbortSignal): Promise<RemoteCaptureResult> {
    const body = await this.request('POST', `/actions/${action}`, params, signal);
    const parsed = ActionResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError(`POST /actions/${action} returned no image data`);
    }

    const result = parsed.data;
    return {
      bytes: Buffer.from(result.image_data, 'base64'),
      format: result.format,
      width: result.width,
      height: result.height,
      frameCount: result.frame_count,
      partial: result.partial,
      warnings: result.warnings,
    };
  }

  // --------------------------------------------------------------------------
  // Core Request
  // --------------------------------------------------------------------------

  private async request(method: 'GET' | 'POST', path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(`${this.endpoint}${path}`, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      const text = await response.text();
      const json: unknown = text.length > 0 ? safeJson(text) : undefined;

      if (!response.ok) {
        const detail = ErrorBodySchema.safeParse(json);
        const message = detail.success ? `${detail.data.error}: ${detail.data.message}` : text;
        throw new ProtocolError(`Remote ${method} ${path} failed (${response.status}): ${message}`, {
          status: response.status,
        });
      }

      return json;
    } catch (error) {
      if (error instanceof ProtocolError) throw error;
      if (signal?.aborted) {
        throw new CaptureAbortedError(`cancelled during remote ${method} ${path}`, { cause: error });
      }
      if (controller.signal.aborted) {
        throw new ProtocolError(`Remote ${method} ${path} timed out after ${this.timeoutMs}ms`, { timedOut: true });
      }
      throw new ProtocolError(
        `Remote ${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        {},
        { cause: error }
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function createRemoteControlClient(config: RemoteControlClientConfig): RemoteControlClient {
  return new RemoteControlClient(config);
}

// ============================================================================
// Request Mapping
// ============================================================================

/**
 * The remote action and parameters that reproduce a local capture request
 */
export function toRemoteAction(request: CaptureRequest): { action: ActionName; params: RemoteActionParams } {
  const params: RemoteActionParams = {
    url: request.url,
    wait: request.waitMs / 1000,
    size: `${request.viewport.width}x${request.viewport.height}`,
    js: request.script,
  };

  if (request.mode.kind === 'recording') {
    return { action: 'record_interaction', params: { ...params, duration: request.mode.durationMs / 1000 } };
  }
  return { action: 'capture_screenshot', params };
}
