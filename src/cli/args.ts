/**
 * Command-line argument parsing shared by the weblook entry points
 */

import type { CaptureDefaults, CaptureRequestInput } from '../lib/config/index.js';
import { InvalidRequestError } from '../lib/errors/index.js';

export interface CliOptions {
  url?: string;
  output?: string;
  waitSeconds?: number;
  /** -r was given; the length falls back to the configured default */
  record: boolean;
  recordSeconds?: number;
  size?: string;
  script?: string;
  consoleLogPath?: string;
  configPath?: string;
  port?: number;
  host?: string;
  remote?: string;
  debug: boolean;
  help: boolean;
}

const VALUE_FLAGS = new Map<string, keyof CliOptions>([
  ['-o', 'output'],
  ['--output', 'output'],
  ['-w', 'waitSeconds'],
  ['--wait', 'waitSeconds'],
  ['-s', 'size'],
  ['--size', 'size'],
  ['-j', 'script'],
  ['--js', 'script'],
  ['--console-log', 'consoleLogPath'],
  ['--config', 'configPath'],
  ['--port', 'port'],
  ['--host', 'host'],
  ['--remote', 'remote'],
]);

const NUMERIC = /^\d+(\.\d+)?$/;

/** Options only the remote control server takes */
const SERVER_ONLY = new Set<keyof CliOptions>(['host']);

export interface ParseContext {
  /** Parsing for weblook-remote rather than a capture */
  server?: boolean;
}

export function parseCliArgs(args: readonly string[], context: ParseContext = {}): CliOptions {
  const options: CliOptions = { record: false, debug: false, help: false };
  const issues: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const valueKey = VALUE_FLAGS.get(arg);

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '-d' || arg === '--debug') {
      options.debug = true;
    } else if (arg === '-r' || arg === '--record') {
      options.record = true;
      // The recording length is optional
      if (i + 1 < args.length && NUMERIC.test(args[i + 1])) {
        options.recordSeconds = Number(args[++i]);
      }
    } else if (valueKey) {
      const value = args[i + 1];
      if (value === undefined || (value.startsWith('-') && value !== '-')) {
        issues.push(`${arg} needs a value`);
        continue;
      }
      i++;
      if (SERVER_ONLY.has(valueKey) && !context.server) {
        issues.push(`${arg} only applies to weblook-remote`);
        continue;
      }
      assignValue(options, valueKey, arg, value, issues);
    } else if (arg.startsWith('-') && arg !== '-') {
      issues.push(`Unknown option ${arg}`);
    } else if (options.url === undefined) {
      options.url = arg;
    } else {
      issues.push(`Unexpected argument ${arg}`);
    }
  }

  if (issues.length > 0) {
    throw new InvalidRequestError(issues);
  }
  return options;
}

function assignValue(
  options: CliOptions,
  key: keyof CliOptions,
  flag: string,
  value: string,
  issues: string[]
): void {
  switch (key) {
    case 'waitSeconds':
      if (!NUMERIC.test(value)) {
        issues.push(`${flag} expects seconds, got "${value}"`);
        return;
      }
      options.waitSeconds = Number(value);
      return;
    case 'port': {
      const port = Number(value);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        issues.push(`${flag} expects a port number, got "${value}"`);
        return;
      }
      options.port = port;
      return;
    }
    case 'output':
      options.output = value;
      return;
    case 'size':
      options.size = value;
      return;
    case 'script':
      options.script = value;
      return;
    case 'consoleLogPath':
      options.consoleLogPath = value;
      return;
    case 'configPath':
      options.configPath = value;
      return;
    case 'host':
      options.host = value;
      return;
    case 'remote':
      options.remote = value;
      return;
    default:
      issues.push(`Unsupported option ${flag}`);
  }
}

/**
 * Merge command-line options over configured defaults. A URL piped on
 * standard input is used when none was given as an argument.
 */
export function resolveCaptureInput(
  options: CliOptions,
  defaults: CaptureDefaults,
  stdinUrl?: string
): CaptureRequestInput {
  return {
    url: options.url ?? (stdinUrl || defaults.url),
    waitSeconds: options.waitSeconds ?? defaults.waitSeconds,
    size: options.size ?? defaults.size,
    record: options.record
      ? {
          durationSeconds: options.recordSeconds ?? defaults.recordDurationSeconds,
          frameIntervalMs: defaults.frameIntervalMs,
        }
      : undefined,
    script: options.script,
    consoleLogPath: options.consoleLogPath,
    output: options.output,
  };
}
