/**
 * Capture Pipeline Tests
 *
 * End to end against the in-process fake backend: real HTTP, real PNG and
 * GIF encoding, manual time.
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { PassThrough } from 'stream';
import { mkdir, readFile, rm } from 'fs/promises';
import { join } from 'path';
import omggif from 'omggif';
import { BackendHandle, createBackendSupervisor } from '../src/lib/backend/index.js';
import { createCapturePipeline } from '../src/lib/capture/index.js';
import { buildCaptureRequest, DEFAULT_CONFIG, type CaptureRequestInput } from '../src/lib/config/index.js';
import {
  BackendStartTimeoutError,
  CaptureAbortedError,
  NavigationFailedError,
  ProtocolError,
  ScreenshotDecodeError,
  SessionCreationFailedError,
} from '../src/lib/errors/index.js';
import { decodeImage, isPng } from '../src/lib/image/index.js';
import { createLogger } from '../src/lib/logging/index.js';
import { createOutputSink } from '../src/lib/output/index.js';
import { createUserAgentPool } from '../src/lib/useragent/index.js';
import { FakeBackendLauncher, type FakeLauncherOptions } from './support/fakeLauncher.js';
import { findFreePort, type InjectedFailure, type Stage } from './support/fakeWebDriver.js';
import { ManualClock } from './support/manualClock.js';

const { GifReader } = omggif;

const OUTPUT_DIR = './test-output/pipeline';

async function setup(options: FakeLauncherOptions = {}) {
  const launcher = new FakeBackendLauncher(options);
  const clock = new ManualClock();
  const lines: string[] = [];
  const logger = createLogger({ level: 'debug', sink: (line) => lines.push(line) });
  const supervisor = createBackendSupervisor({
    launcher,
    clock,
    shutdownGraceMs: 500,
    logger: logger.child('Backend'),
  });

  const chunks: Buffer[] = [];
  const stdout = new PassThrough();
  stdout.on('data', (chunk: Buffer) => chunks.push(chunk));

  const pipeline = createCapturePipeline(DEFAULT_CONFIG, {
    supervisor,
    clock,
    logger,
    port: await findFreePort(),
    sink: createOutputSink(stdout),
    userAgents: createUserAgentPool({ seed: 1 }),
  });

  return { launcher, clock, lines, supervisor, pipeline, stdoutBytes: () => Buffer.concat(chunks) };
}

function request(input: Partial<CaptureRequestInput> = {}) {
  return buildCaptureRequest({
    url: 'http://127.0.0.1:8080',
    waitSeconds: 0,
    size: '320x240',
    ...input,
  });
}

describe('CapturePipeline', () => {
  beforeAll(async () => {
    await mkdir(OUTPUT_DIR, { recursive: true });
  });

  afterAll(async () => {
    await rm(OUTPUT_DIR, { recursive: true, force: true });
  });

  it('should write a still PNG at the viewport size', async () => {
    const { pipeline, clock, supervisor, lines } = await setup();
    const output = join(OUTPUT_DIR, 'weblook.png');

    const outcome = await pipeline.run(request({ waitSeconds: 10, size: '1280x720', output }));

    const bytes = await readFile(output);
    const image = await decodeImage(bytes);
    expect(isPng(bytes)).toBe(true);
    expect(image.width).toBe(1280);
    expect(image.height).toBe(720);
    expect(outcome.result.kind).toBe('still');
    expect(outcome.image.frameCount).toBe(1);
    expect(clock.sleeps).toContain(10000);
    expect(supervisor.runningCount).toBe(0);
    expect(lines.some((line) => line.endsWith(`[Capture] Screenshot saved to ${output}`))).toBe(true);
  });

  it('should record six looping frames for 3s at 500ms', async () => {
    const { pipeline } = await setup();
    const output = join(OUTPUT_DIR, 'weblook.gif');

    const outcome = await pipeline.run(
      request({ record: { durationSeconds: 3, frameIntervalMs: 500 }, output })
    );

    const reader = new GifReader(await readFile(output));
    const delays = Array.from({ length: reader.numFrames() }, (_, i) => reader.frameInfo(i).delay);
    expect(outcome.image.frameCount).toBe(6);
    expect(reader.numFrames()).toBe(6);
    expect(reader.loopCount()).toBe(0);
    expect(delays).toEqual([50, 50, 50, 50, 50, 50]);
    expect(delays.reduce((sum, delay) => sum + delay, 0)).toBe(300);
    expect(outcome.partial).toBe(false);
  });

  it('should keep the first frames when cancelled mid-recording', async () => {
    const { pipeline, clock, launcher, supervisor } = await setup();
    const controller = new AbortController();
    clock.onSleep = () => {
      if ((launcher.lastWebDriver?.screenshotsServed ?? 0) >= 2) controller.abort();
    };
    const output = join(OUTPUT_DIR, 'partial.gif');

    const outcome = await pipeline.run(
      request({ record: { durationSeconds: 3, frameIntervalMs: 500 }, output }),
      controller.signal
    );

    expect(outcome.image.frameCount).toBe(2);
    expect(outcome.partial).toBe(true);
    expect(outcome.warnings).toEqual(['Recording stopped after 2 frames: capture was cancelled']);
    expect(new GifReader(await readFile(output)).numFrames()).toBe(2);
    expect(supervisor.runningCount).toBe(0);
    expect(launcher.running).toBe(0);
  });

  it('should report cancellation before the first frame', async () => {
    const { pipeline, clock, launcher, supervisor } = await setup();
    const controller = new AbortController();
    clock.onSleep = (ms) => {
      if (ms === 5000) controller.abort();
    };

    await expect(pipeline.run(request({ waitSeconds: 5 }), controller.signal)).rejects.toBeInstanceOf(
      CaptureAbortedError
    );
    expect(supervisor.runningCount).toBe(0);
    expect(launcher.running).toBe(0);
  });

  const fatalStages: Array<[Stage, new (...args: never[]) => Error]> = [
    ['session', SessionCreationFailedError],
    ['rect', SessionCreationFailedError],
    ['url', NavigationFailedError],
    ['screenshot', ProtocolError],
  ];

  it.each(fatalStages)('should stop the backend exactly once when %s fails', async (stage, errorClass) => {
    const failures: Partial<Record<Stage, InjectedFailure>> = {};
    failures[stage] = { status: 500, error: 'unknown error', message: `${stage} broke` };
    const { pipeline, launcher, supervisor } = await setup({ webdriver: { failures } });

    await expect(pipeline.run(request())).rejects.toBeInstanceOf(errorClass);

    expect(supervisor.runningCount).toBe(0);
    expect(launcher.running).toBe(0);
    expect(launcher.processes).toHaveLength(1);
    expect(launcher.lastWebDriver?.shutdownRequests).toBe(1);
  });

  describe('backend health', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should mark the backend failed when navigation gets no answer', async () => {
      const transitions = vi.spyOn(BackendHandle.prototype, 'transition');
      const { pipeline, launcher, supervisor } = await setup({ webdriver: { disconnects: ['url'] } });

      await expect(pipeline.run(request())).rejects.toBeInstanceOf(NavigationFailedError);

      expect(transitions.mock.calls.map(([status]) => status)).toEqual([
        'starting',
        'ready',
        'in-use',
        'failed',
        'stopping',
        'stopped',
      ]);
      expect(launcher.lastWebDriver?.deletedSessions).toEqual([]);
      expect(launcher.lastWebDriver?.shutdownRequests).toBe(1);
      expect(supervisor.runningCount).toBe(0);
    });

    it('should keep the backend usable when navigation is answered with an error', async () => {
      const transitions = vi.spyOn(BackendHandle.prototype, 'transition');
      const { pipeline, launcher } = await setup({
        webdriver: { failures: { url: { status: 500, error: 'unknown error', message: 'net::ERR_FAILED' } } },
      });

      await expect(pipeline.run(request())).rejects.toBeInstanceOf(NavigationFailedError);

      expect(transitions.mock.calls.map(([status]) => status)).not.toContain('failed');
      expect(launcher.lastWebDriver?.deletedSessions).toEqual(['session-1']);
    });
  });

  it('should fail on screenshots that are not images and still clean up', async () => {
    const { pipeline, launcher } = await setup({ webdriver: { corruptScreenshots: true } });

    await expect(pipeline.run(request())).rejects.toBeInstanceOf(ScreenshotDecodeError);
    expect(launcher.running).toBe(0);
  });

  it('should surface a backend that never becomes ready', async () => {
    const { pipeline, launcher } = await setup({ behavior: 'never-ready' });

    await expect(pipeline.run(request())).rejects.toBeInstanceOf(BackendStartTimeoutError);
    expect(launcher.running).toBe(0);
  });

  it('should run the script and let the page settle before capturing', async () => {
    const { pipeline, clock, launcher } = await setup();
    const script = 'document.body.style.background = "black"';

    const outcome = await pipeline.run(request({ waitSeconds: 1, script, output: join(OUTPUT_DIR, 'script.png') }));

    expect(launcher.lastWebDriver?.scripts).toEqual([script]);
    expect(clock.sleeps.slice(-2)).toEqual([1000, 500]);
    expect(outcome.warnings).toEqual([]);
  });

  it('should continue after a failing script', async () => {
    const { pipeline } = await setup({
      webdriver: { failures: { execute: { status: 500, error: 'javascript error', message: 'boom' } } },
    });

    const outcome = await pipeline.capture(request({ script: 'throw new Error("boom")' }));

    expect(outcome.image.format).toBe('png');
    expect(outcome.warnings).toEqual([
      'Injected script failed: POST /session/session-1/execute/sync returned 500: javascript error - boom',
    ]);
  });

  it('should write the console log when requested', async () => {
    const { pipeline, launcher } = await setup({
      webdriver: {
        consoleEntries: [
          { level: 'SEVERE', message: 'Uncaught Error: boom', timestamp: Date.UTC(2024, 0, 2, 3, 4, 5) },
          { level: 'INFO', message: 'ready', timestamp: Date.UTC(2024, 0, 2, 3, 4, 6) },
        ],
      },
    });
    const consoleLogPath = join(OUTPUT_DIR, 'console.log');

    const outcome = await pipeline.run(request({ consoleLogPath, output: join(OUTPUT_DIR, 'console.png') }));

    expect(outcome.consoleLog).toHaveLength(2);
    expect(launcher.lastWebDriver?.requests).toContain('POST /session/session-1/se/log');
    expect(await readFile(consoleLogPath, 'utf-8')).toBe(
      '2024-01-02T03:04:05.000Z SEVERE Uncaught Error: boom\n2024-01-02T03:04:06.000Z INFO ready\n'
    );
  });

  it('should write byte-identical output to a file and to stdout', async () => {
    const { pipeline, stdoutBytes } = await setup();
    const recording = { durationSeconds: 1, frameIntervalMs: 500 };
    const output = join(OUTPUT_DIR, 'same.gif');

    await pipeline.run(request({ size: '32x24', record: recording, output }));
    await pipeline.run(request({ size: '32x24', record: recording, output: '-' }));

    const fromFile = await readFile(output);
    expect(fromFile.length).toBeGreaterThan(0);
    expect(stdoutBytes().equals(fromFile)).toBe(true);
  });
});
