/**
 * Output Sink Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { PassThrough, Writable } from 'stream';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { OutputWriteError } from '../src/lib/errors/index.js';
import { createOutputSink, describeTarget, formatConsoleEntry, STDOUT_LABEL } from '../src/lib/output/index.js';

const OUTPUT_DIR = './test-output/output-sink';

describe('OutputSink', () => {
  beforeAll(async () => {
    await mkdir(OUTPUT_DIR, { recursive: true });
  });

  afterAll(async () => {
    await rm(OUTPUT_DIR, { recursive: true, force: true });
  });

  it('should write the bytes to a file', async () => {
    const path = join(OUTPUT_DIR, 'image.bin');
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0xff]);

    await createOutputSink().write(bytes, { kind: 'file', path });

    expect((await readFile(path)).equals(bytes)).toBe(true);
  });

  it('should replace an existing file', async () => {
    const path = join(OUTPUT_DIR, 'existing.bin');
    await writeFile(path, 'a much longer previous content');

    await createOutputSink().write(Buffer.from('new'), { kind: 'file', path });

    expect(await readFile(path, 'utf-8')).toBe('new');
  });

  it('should name the path when the file cannot be written', async () => {
    const path = join(OUTPUT_DIR, 'missing-dir', 'image.png');

    const error = await createOutputSink()
      .write(Buffer.from('x'), { kind: 'file', path })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OutputWriteError);
    expect(error instanceof OutputWriteError ? error.path : null).toBe(path);
  });

  it('should write unmodified bytes to the stream for stdout', async () => {
    const stream = new PassThrough();
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    const bytes = Buffer.from([0, 10, 13, 255, 71, 73, 70]);

    await createOutputSink(stream).write(bytes, { kind: 'stdout' });

    expect(Buffer.concat(chunks).equals(bytes)).toBe(true);
  });

  it('should report a failing stream as a stdout write error', async () => {
    const streamErrors: Error[] = [];
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('broken pipe'));
      },
    });
    stream.on('error', (error) => streamErrors.push(error));

    const error = await createOutputSink(stream)
      .write(Buffer.from('x'), { kind: 'stdout' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OutputWriteError);
    expect(error instanceof OutputWriteError ? error.message : '').toBe(
      'Could not write output to <stdout>: broken pipe'
    );
  });

  it('should write one line per console entry', async () => {
    const path = join(OUTPUT_DIR, 'console.log');

    await createOutputSink().writeConsoleLog(path, [
      { level: 'SEVERE', message: 'Uncaught TypeError: x is undefined', timestamp: Date.UTC(2024, 4, 6, 7, 8, 9, 10) },
      { level: 'warning', message: 'first\nsecond', timestamp: Date.UTC(2024, 4, 6, 7, 8, 10) },
    ]);

    expect(await readFile(path, 'utf-8')).toBe(
      '2024-05-06T07:08:09.010Z SEVERE Uncaught TypeError: x is undefined\n' +
        '2024-05-06T07:08:10.000Z WARNING first second\n'
    );
  });

  it('should write an empty console log when nothing was logged', async () => {
    const path = join(OUTPUT_DIR, 'empty.log');

    await createOutputSink().writeConsoleLog(path, []);

    expect(await readFile(path, 'utf-8')).toBe('');
  });
});

describe('formatConsoleEntry', () => {
  it('should use a dash for a timestamp that is not a number', () => {
    expect(formatConsoleEntry({ level: 'info', message: 'hi', timestamp: Number.NaN })).toBe('- INFO hi');
  });
});

describe('describeTarget', () => {
  it('should name files by path and stdout by label', () => {
    expect(describeTarget({ kind: 'file', path: 'out.gif' })).toBe('out.gif');
    expect(describeTarget({ kind: 'stdout' })).toBe(STDOUT_LABEL);
  });
});
