#!/usr/bin/env tsx
/**
 * CLI: Remote Control Server (experimental)
 *
 * Usage:
 *   weblook-remote [options]
 *
 * Example:
 *   weblook-remote --port 9516 --config .weblook.yml
 */

import { createCapturePipeline } from '../lib/capture/index.js';
import { createConfigParser } from '../lib/config/index.js';
import { describeError, exitCodeFor, InvalidRequestError } from '../lib/errors/index.js';
import { createLogger } from '../lib/logging/index.js';
import { createRemoteControlServer } from '../lib/remote/index.js';
import { parseCliArgs } from './args.js';

const HELP = `
weblook - remote control server (experimental)

Usage:
  weblook-remote [options]

Options:
  --port      Server port (default: 9516)
  --host      Host to bind (default: 127.0.0.1)
  --config    Config file (default: .weblook.yml in the current directory)
  -d, --debug Verbose output

The server only starts when the config enables it:

  experimental:
    remote_control: true
`;

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2), { server: true });

  if (options.help) {
    console.log(HELP);
    return;
  }

  const parser = createConfigParser();
  const config = options.configPath
    ? await parser.loadFile(options.configPath)
    : (await parser.discover(process.cwd())).config;

  if (!config.remoteControl) {
    throw new InvalidRequestError(['remote control is disabled; set experimental.remote_control: true']);
  }

  const logLevel = options.debug ? 'debug' : config.logLevel;
  const logger = createLogger({ level: logLevel, scope: 'Remote' });
  const pipeline = createCapturePipeline({ ...config, logLevel }, { logger });

  const server = createRemoteControlServer({
    service: pipeline,
    port: options.port ?? 9516,
    host: options.host,
    defaults: config.capture,
    logger,
  });

  await server.start();
  logger.warn('Remote control is experimental');

  const shutdown = () => {
    logger.info('Shutting down...');
    server.stop().then(
      () => {
        process.exitCode = 0;
      },
      (error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exitCode = 1;
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exitCode = exitCodeFor(error);
});
