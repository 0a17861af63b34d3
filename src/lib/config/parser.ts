/**
 * Configuration Parser
 *
 * Parse .weblook.yml (or .json) files into backend and capture settings, and
 * validate individual capture requests before they reach the pipeline.
 */

import { access, readFile } from 'fs/promises';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { InvalidRequestError } from '../errors/index.js';
import type { LogLevel } from '../logging/index.js';
import type { CaptureMode, CaptureRequest, OutputTarget, Viewport } from '../capture/types.js';

// ============================================================================
// Schemas
// ============================================================================

const SIZE_PATTERN = /^(\d+)x(\d+)$/;

const BackendSchema = z.object({
  command: z.string().min(1).optional(),
  args: z.array(z.string()).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  startup_timeout_ms: z.number().int().positive().optional(),
  max_port_attempts: z.number().int().min(1).max(100).optional(),
  shutdown_grace_ms: z.number().int().min(0).optional(),
  request_timeout_ms: z.number().int().positive().optional(),
});

const CaptureDefaultsSchema = z.object({
  url: z.string().url().optional(),
  wait: z.number().min(0).optional(),
  size: z.string().regex(SIZE_PATTERN, 'expected WIDTHxHEIGHT').optional(),
  record_duration: z.number().positive().optional(),
  frame_interval_ms: z.number().int().min(1).optional(),
  script_settle_ms: z.number().int().min(0).optional(),
  headless: z.boolean().optional(),
});

const ExperimentalSchema = z.object({
  remote_control: z.boolean().optional(),
});

export const WeblookConfigSchema = z.object({
  backend: BackendSchema.optional(),
  capture: CaptureDefaultsSchema.optional(),
  experimental: ExperimentalSchema.optional(),
  log_level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

const CaptureRequestInputSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'URL must start with http:// or https://'),
  waitSeconds: z.number().min(0),
  size: z.string().regex(SIZE_PATTERN, 'expected WIDTHxHEIGHT'),
  record: z
    .object({
      durationSeconds: z.number().positive(),
      frameIntervalMs: z.number().int().min(1),
    })
    .optional(),
  script: z.string().min(1).optional(),
  consoleLogPath: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
});

// ============================================================================
// Types
// ============================================================================

export type WeblookConfig = z.infer<typeof WeblookConfigSchema>;
export type CaptureRequestInput = z.infer<typeof CaptureRequestInputSchema>;

export interface BackendSettings {
  command: string;
  args: string[];
  port: number;
  startupTimeoutMs: number;
  maxPortAttempts: number;
  shutdownGraceMs: number;
  requestTimeoutMs: number;
}

export interface CaptureDefaults {
  url: string;
  waitSeconds: number;
  size: string;
  recordDurationSeconds: number;
  frameIntervalMs: number;
  scriptSettleMs: number;
  headless: boolean;
}

export interface ResolvedConfig {
  backend: BackendSettings;
  capture: CaptureDefaults;
  remoteControl: boolean;
  logLevel: LogLevel;
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG: ResolvedConfig = {
  backend: {
    command: 'chromedriver',
    args: [],
    port: 9515,
    startupTimeoutMs: 5000,
    maxPortAttempts: 5,
    shutdownGraceMs: 2000,
    requestTimeoutMs: 30000,
  },
  capture: {
    url: 'http://127.0.0.1:8080',
    waitSeconds: 10,
    size: '1280x720',
    recordDurationSeconds: 10,
    frameIntervalMs: 100,
    scriptSettleMs: 500,
    headless: true,
  },
  remoteControl: false,
  logLevel: 'info',
};

export const DEFAULT_STILL_OUTPUT = 'weblook.png';
export const DEFAULT_RECORDING_OUTPUT = 'weblook.gif';
export const CONFIG_FILENAMES = ['.weblook.yml', '.weblook.yaml', '.weblook.json'];

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<ResolvedConfig> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new InvalidRequestError([`Cannot read config file ${path}: ${errorMessage(error)}`], {
        cause: error,
      });
    }
    return this.parse(content, path);
  }

  /**
   * Load the first config file found in `dir`, or the defaults when there is none
   */
  async discover(dir: string): Promise<{ config: ResolvedConfig; path?: string }> {
    for (const name of CONFIG_FILENAMES) {
      const path = join(dir, name);
      try {
        await access(path);
      } catch {
        continue;
      }
      return { config: await this.loadFile(path), path };
    }
    return { config: DEFAULT_CONFIG };
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): ResolvedConfig {
    let parsed: unknown;

    try {
      parsed = filename.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new InvalidRequestError([`${filename} is not valid: ${errorMessage(error)}`], {
        cause: error,
      });
    }

    // An empty YAML document parses to null
    return this.mergeWithDefaults(this.validate(parsed ?? {}));
  }

  /**
   * Validate config object
   */
  validate(config: unknown): WeblookConfig {
    const result = WeblookConfigSchema.safeParse(config);
    if (!result.success) {
      throw new InvalidRequestError(formatIssues(result.error));
    }
    return result.data;
  }

  /**
   * Merge config with defaults
   */
  mergeWithDefaults(config: WeblookConfig): ResolvedConfig {
    const backend = config.backend ?? {};
    const capture = config.capture ?? {};
    const defaults = DEFAULT_CONFIG;

    return {
      backend: {
        command: backend.command ?? defaults.backend.command,
        args: backend.args ?? defaults.backend.args,
        port: backend.port ?? defaults.backend.port,
        startupTimeoutMs: backend.startup_timeout_ms ?? defaults.backend.startupTimeoutMs,
        maxPortAttempts: backend.max_port_attempts ?? defaults.backend.maxPortAttempts,
        shutdownGraceMs: backend.shutdown_grace_ms ?? defaults.backend.shutdownGraceMs,
        requestTimeoutMs: backend.request_timeout_ms ?? defaults.backend.requestTimeoutMs,
      },
      capture: {
        url: capture.url ?? defaults.capture.url,
        waitSeconds: capture.wait ?? defaults.capture.waitSeconds,
        size: capture.size ?? defaults.capture.size,
        recordDurationSeconds: capture.record_duration ?? defaults.capture.recordDurationSeconds,
        frameIntervalMs: capture.frame_interval_ms ?? defaults.capture.frameIntervalMs,
        scriptSettleMs: capture.script_settle_ms ?? defaults.capture.scriptSettleMs,
        headless: capture.headless ?? defaults.capture.headless,
      },
      remoteControl: config.experimental?.remote_control ?? defaults.remoteControl,
      logLevel: config.log_level ?? defaults.logLevel,
    };
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# weblook configuration

backend:
  command: chromedriver
  port: 9515
  startup_timeout_ms: 5000
  max_port_attempts: 5
  shutdown_grace_ms: 2000

capture:
  url: http://127.0.0.1:8080
  wait: 10              # seconds before the first capture
  size: 1280x720
  record_duration: 10   # seconds, used by --record without a value
  frame_interval_ms: 100

experimental:
  remote_control: false

log_level: info
`;
  }
}

// ============================================================================
// Capture Requests
// ============================================================================

/**
 * Parse "WIDTHxHEIGHT" into a viewport with positive integer dimensions
 */
export function parseViewportSize(size: string): Viewport {
  const match = SIZE_PATTERN.exec(size.trim());
  if (!match) {
    throw new InvalidRequestError([`Invalid viewport size "${size}". Expected WIDTHxHEIGHT`]);
  }

  const width = Number(match[1]);
  const height = Number(match[2]);
  if (width < 1 || height < 1 || width > 65535 || height > 65535) {
    throw new InvalidRequestError([`Viewport dimensions out of range: ${size}`]);
  }

  return { width, height };
}

/**
 * Resolve the output option: "-" means the standard stream, nothing means the
 * default file for the mode.
 */
export function resolveOutputTarget(output: string | undefined, mode: CaptureMode): OutputTarget {
  if (output === '-') {
    return { kind: 'stdout' };
  }
  if (output) {
    return { kind: 'file', path: output };
  }
  return {
    kind: 'file',
    path: mode.kind === 'recording' ? DEFAULT_RECORDING_OUTPUT : DEFAULT_STILL_OUTPUT,
  };
}

/**
 * Validate raw request input and build the immutable CaptureRequest
 */
export function buildCaptureRequest(input: CaptureRequestInput): CaptureRequest {
  const result = CaptureRequestInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidRequestError(formatIssues(result.error));
  }

  const data = result.data;
  const mode: CaptureMode = data.record
    ? {
        kind: 'recording',
        durationMs: Math.round(data.record.durationSeconds * 1000),
        frameIntervalMs: data.record.frameIntervalMs,
      }
    : { kind: 'still' };

  const request: CaptureRequest = {
    url: data.url,
    waitMs: Math.round(data.waitSeconds * 1000),
    mode: Object.freeze(mode),
    viewport: Object.freeze(parseViewportSize(data.size)),
    script: data.script,
    consoleLogPath: data.consoleLogPath,
    output: Object.freeze(resolveOutputTarget(data.output, mode)),
  };

  return Object.freeze(request);
}

// ============================================================================
// Helpers
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Quick load function
 */
export async function loadConfig(path: string): Promise<ResolvedConfig> {
  return new ConfigParser().loadFile(path);
}
