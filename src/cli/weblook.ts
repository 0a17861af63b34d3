#!/usr/bin/env tsx
/**
 * CLI: weblook
 *
 * Usage:
 *   weblook [url] [options]
 *
 * Example:
 *   weblook http://localhost:3000 -w 2 -o page.png
 *   weblook http://localhost:3000 -r 5 -o - > demo.gif
 */

import { createCapturePipeline } from '../lib/capture/index.js';
import { buildCaptureRequest, createConfigParser, type ResolvedConfig } from '../lib/config/index.js';
import { describeError, exitCodeFor } from '../lib/errors/index.js';
import { createLogger, type Logger } from '../lib/logging/index.js';
import { createOutputSink } from '../lib/output/index.js';
import { createRemoteControlClient, toRemoteAction } from '../lib/remote/index.js';
import { parseCliArgs, resolveCaptureInput } from './args.js';
import type { CaptureRequest } from '../lib/capture/index.js';

const HELP = `
weblook - capture a web page as a PNG or an animated GIF

Usage:
  weblook [url] [options]

Arguments:
  url                 Page to capture (default: http://127.0.0.1:8080,
                      or a URL piped on standard input)

Options:
  -o, --output        Output file, or - for standard output
                      (default: weblook.png, or weblook.gif when recording)
  -w, --wait          Seconds to wait before capturing (default: 10)
  -r, --record [sec]  Record an animated GIF (default length: 10)
  -s, --size          Viewport as WIDTHxHEIGHT (default: 1280x720)
  -j, --js            Script to run in the page before capturing
  --console-log       Write the browser console log to this file
  --config            Config file (default: .weblook.yml in the current directory)
  --port              First port to try for chromedriver (default: 9515)
  --remote            Capture through a remote control endpoint (experimental)
  -d, --debug         Verbose output on standard error
  -h, --help          Show this help

Examples:
  weblook http://localhost:3000 -w 2 -o page.png
  weblook http://localhost:3000 -r 5 -s 800x600
  echo http://localhost:3000 | weblook -o - | display
`;

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8').trim();
}

async function loadSettings(configPath: string | undefined, logger: Logger): Promise<ResolvedConfig> {
  const parser = createConfigParser();
  if (configPath) {
    logger.debug(`Using config ${configPath}`);
    return parser.loadFile(configPath);
  }

  const found = await parser.discover(process.cwd());
  if (found.path) {
    logger.debug(`Using config ${found.path}`);
  }
  return found.config;
}

async function captureRemotely(
  endpoint: string,
  request: CaptureRequest,
  signal: AbortSignal,
  logger: Logger
): Promise<void> {
  logger.warn(`Remote control is experimental; connecting to ${endpoint}`);
  const client = createRemoteControlClient({ endpoint });

  const actions = await client.listActions(signal);
  logger.debug(`Available actions: ${actions.join(', ')}`);

  const { action, params } = toRemoteAction(request);
  const result = await client.invoke(action, params, signal);
  for (const warning of result.warnings) {
    logger.warn(warning);
  }

  await createOutputSink().write(result.bytes, request.output);
  const target = request.output.kind === 'file' ? request.output.path : 'standard output';
  logger.info(`${result.format === 'gif' ? 'Recording' : 'Screenshot'} saved to ${target}`);
}

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(HELP);
    return 0;
  }

  const bootstrap = createLogger({ level: options.debug ? 'debug' : 'info', scope: 'weblook' });
  const config = await loadSettings(options.configPath, bootstrap);
  const logLevel = options.debug ? 'debug' : config.logLevel;
  const logger = createLogger({ level: logLevel, scope: 'weblook' });

  const stdinUrl = options.url === undefined && !process.stdin.isTTY ? await readStdin() : undefined;
  const request = buildCaptureRequest(resolveCaptureInput(options, config.capture, stdinUrl));

  const controller = new AbortController();
  const onSignal = (name: string) => () => {
    if (controller.signal.aborted) return;
    logger.warn(`Received ${name}, stopping capture...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal('SIGINT'));
  process.once('SIGTERM', onSignal('SIGTERM'));

  if (options.remote) {
    await captureRemotely(options.remote, request, controller.signal, logger);
    return 0;
  }

  const what = request.mode.kind === 'recording' ? `Recording ${request.mode.durationMs / 1000}s of` : 'Capturing';
  logger.info(`${what} ${request.url} at ${request.viewport.width}x${request.viewport.height}`);

  const pipeline = createCapturePipeline(
    { ...config, logLevel },
    { logger, port: options.port }
  );
  await pipeline.run(request, controller.signal);
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = exitCodeFor(error);
  }
);
