/**
 * Remote Control Server
 *
 * Experimental HTTP/JSON front end that lets another process request
 * captures. It only builds CaptureRequests and hands them to a CaptureService;
 * it never touches the backend or the browser itself.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { z } from 'zod';
import type { CaptureRequest, CaptureService } from '../capture/index.js';
import { buildCaptureRequest, DEFAULT_CONFIG, type CaptureDefaults } from '../config/index.js';
import { InvalidRequestError, isWeblookError } from '../errors/index.js';
import { silentLogger, type Logger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export interface RemoteControlConfig {
  service: CaptureService;
  /** 0 picks a free port */
  port?: number;
  host?: string;
  defaults?: CaptureDefaults;
  logger?: Logger;
}

export type ActionName = 'capture_screenshot' | 'record_interaction';

export interface ActionDescription {
  name: ActionName;
  description: string;
  parameters: Record<string, string>;
}

export interface ActionResponse {
  image_data: string;
  format: 'png' | 'gif';
  width: number;
  height: number;
  frame_count: number;
  partial: boolean;
  warnings: string[];
}

export interface ErrorResponse {
  error: string;
  message: string;
}

const ActionParamsSchema = z.object({
  url: z.string().min(1),
  wait: z.number().min(0).optional(),
  size: z.string().optional(),
  js: z.string().min(1).optional(),
  duration: z.number().positive().optional(),
});

type ActionParams = z.infer<typeof ActionParamsSchema>;

const MAX_BODY_BYTES = 1024 * 1024;

export const ACTIONS: readonly ActionDescription[] = [
  {
    name: 'capture_screenshot',
    description: 'Capture a still PNG of a page',
    parameters: {
      url: 'string (required)',
      wait: 'number of seconds to wait before capturing',
      size: 'viewport as WIDTHxHEIGHT',
      js: 'script to run before capturing',
    },
  },
  {
    name: 'record_interaction',
    description: 'Record an animated GIF of a page',
    parameters: {
      url: 'string (required)',
      wait: 'number of seconds to wait before recording',
      size: 'viewport as WIDTHxHEIGHT',
      js: 'script to run before recording',
      duration: 'recording length in seconds',
    },
  },
];

// ============================================================================
// Remote Control Server
// ============================================================================

export class RemoteControlServer {
  private service: CaptureService;
  private port: number;
  private host: string;
  private defaults: CaptureDefaults;
  private logger: Logger;
  private server: Server | null = null;
  private active: AbortController | null = null;

  constructor(config: RemoteControlConfig) {
    this.service = config.service;
    this.port = config.port ?? 9516;
    this.host = config.host || '127.0.0.1';
    this.defaults = config.defaults ?? DEFAULT_CONFIG.capture;
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Start listening; resolves with the bound port
   */
  async start(): Promise<number> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error('Unhandled request failure', error);
        if (!res.headersSent) {
          this.sendJson(res, 500, { error: 'INTERNAL', message: 'internal error' });
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.info(`Remote control listening at http://${this.host}:${port}`);
        resolve(port);
      });
    });
  }

  /**
   * Stop listening and cancel a capture still in progress
   */
  async stop(): Promise<void> {
    this.active?.abort();
    const server = this.server;
    this.server = null;
    if (!server) return;

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  get busy(): boolean {
    return this.active !== null;
  }

  // --------------------------------------------------------------------------
  // Request Handling
  // --------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = new URL(req.url || '/', 'http://localhost').pathname;

    if (pathname === '/actions') {
      if (req.method !== 'GET') {
        this.sendJson(res, 405, { error: 'METHOD_NOT_ALLOWED', message: `${req.method} ${pathname}` });
        return;
      }
      this.sendJson(res, 200, { actions: ACTIONS });
      return;
    }

    const match = /^\/actions\/([a-z_]+)$/.exec(pathname);
    const action = match ? ACTIONS.find((candidate) => candidate.name === match[1]) : undefined;
    if (!action) {
      this.sendJson(res, 404, { error: 'NOT_FOUND', message: `No route for ${pathname}` });
      return;
    }
    if (req.method !== 'POST') {
      this.sendJson(res, 405, { error: 'METHOD_NOT_ALLOWED', message: `${req.method} ${pathname}` });
      return;
    }

    if (this.active) {
      this.sendJson(res, 409, { error: 'BUSY', message: 'A capture is already running' });
      return;
    }

    const controller = new AbortController();
    this.active = controller;
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const request = this.toCaptureRequest(action.name, await readJsonBody(req));
      this.logger.info(`${action.name} ${request.url}`);

      const outcome = await this.service.capture(request, controller.signal);
      const body: ActionResponse = {
        image_data: outcome.image.bytes.toString('base64'),
        format: outcome.image.format,
        width: outcome.image.width,
        height: outcome.image.height,
        frame_count: outcome.image.frameCount,
        partial: outcome.partial,
        warnings: outcome.warnings,
      };
      this.sendJson(res, 200, body);
    } catch (error) {
      this.sendError(res, error);
    } finally {
      this.active = null;
    }
  }

  private toCaptureRequest(action: ActionName, body: unknown): CaptureRequest {
    const parsed = ActionParamsSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidRequestError(
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      );
    }

    const params: ActionParams = parsed.data;
    return buildCaptureRequest({
      url: params.url,
      waitSeconds: params.wait ?? this.defaults.waitSeconds,
      size: params.size ?? this.defaults.size,
      record:
        action === 'record_interaction'
          ? {
              durationSeconds: params.duration ?? this.defaults.recordDurationSeconds,
              frameIntervalMs: this.defaults.frameIntervalMs,
            }
          : undefined,
      script: params.js,
      output: '-',
    });
  }

  private sendError(res: ServerResponse, error: unknown): void {
    if (error instanceof InvalidRequestError) {
      this.sendJson(res, 400, { error: error.code, message: error.message });
      return;
    }
    if (isWeblookError(error)) {
      this.logger.warn(`Capture failed: ${error.message}`);
      this.sendJson(res, 502, { error: error.code, message: error.message });
      return;
    }
    this.logger.error('Capture failed', error);
    this.sendJson(res, 500, {
      error: 'INTERNAL',
      message: error instanceof Error ? error.message : String(error),
    });
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    if (res.writableEnded || res.destroyed) return;
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new InvalidRequestError([`body exceeds ${MAX_BODY_BYTES} bytes`]);
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString('utf-8').trim();
  if (text.length === 0) return {};

  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidRequestError(['body is not valid JSON']);
  }
}

export function createRemoteControlServer(config: RemoteControlConfig): RemoteControlServer {
  return new RemoteControlServer(config);
}
