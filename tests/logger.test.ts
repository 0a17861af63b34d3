/**
 * Logger & Clock Tests
 */

import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../src/lib/logging/index.js';
import { CaptureAbortedError } from '../src/lib/errors/index.js';
import { interruptibleSleep, systemClock } from '../src/lib/timing/index.js';

function collect() {
  const lines: string[] = [];
  return { lines, sink: (line: string) => lines.push(line) };
}

describe('Logger', () => {
  it('should prefix timestamp and scope', () => {
    const { lines, sink } = collect();
    const logger = createLogger({ scope: 'Backend', sink });

    logger.info('Using port 9516');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[Backend\] Using port 9516$/);
  });

  it('should drop messages below the level', () => {
    const { lines, sink } = collect();
    const logger = createLogger({ level: 'warn', sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('slow backend');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\] warning: slow backend$/);
  });

  it('should append error messages', () => {
    const { lines, sink } = collect();
    createLogger({ sink }).error('Capture failed', new Error('socket hang up'));

    expect(lines[0]).toMatch(/\] error: Capture failed: socket hang up$/);
  });

  it('should create children with their own scope and the same sink', () => {
    const { lines, sink } = collect();
    const child = createLogger({ scope: 'weblook', level: 'debug', sink }).child('Session');

    child.debug('opened');

    expect(child.level).toBe('debug');
    expect(lines[0]).toMatch(/ \[Session\] opened$/);
  });

  it('should stay silent when asked to', () => {
    expect(silentLogger.level).toBe('silent');
    expect(() => silentLogger.error('nothing')).not.toThrow();
  });
});

describe('interruptibleSleep', () => {
  it('should resolve after the delay', async () => {
    const start = systemClock.now();
    await systemClock.sleep(20);
    expect(systemClock.now() - start).toBeGreaterThanOrEqual(15);
  });

  it('should reject at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(interruptibleSleep(10_000, controller.signal)).rejects.toBeInstanceOf(CaptureAbortedError);
  });

  it('should reject when aborted while sleeping', async () => {
    const controller = new AbortController();
    const sleeping = interruptibleSleep(10_000, controller.signal);
    setTimeout(() => controller.abort(), 10);

    await expect(sleeping).rejects.toThrow('Capture aborted: cancelled while waiting');
  });
});
