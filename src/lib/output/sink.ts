/**
 * Output Sink
 *
 * Delivers encoded bytes to a file or, unmodified, to standard output, and
 * writes the optional console log file.
 */

import { writeFile } from 'fs/promises';
import type { Writable } from 'stream';
import type { OutputTarget } from '../capture/types.js';
import { OutputWriteError } from '../errors/index.js';
import type { LogEntry } from '../webdriver/index.js';

export const STDOUT_LABEL = '<stdout>';

export class OutputSink {
  private stream: Writable;

  constructor(stream: Writable = process.stdout) {
    this.stream = stream;
  }

  /**
   * Write the whole buffer, replacing any existing file
   */
  async write(bytes: Buffer, target: Readonly<OutputTarget>): Promise<void> {
    if (target.kind === 'file') {
      try {
        await writeFile(target.path, bytes);
      } catch (error) {
        throw new OutputWriteError(target.path, { cause: error });
      }
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.stream.write(bytes, (error) => {
        if (error) {
          reject(new OutputWriteError(STDOUT_LABEL, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  async writeConsoleLog(path: string, entries: readonly LogEntry[]): Promise<void> {
    const content = entries.map((entry) => `${formatConsoleEntry(entry)}\n`).join('');
    try {
      await writeFile(path, content, 'utf-8');
    } catch (error) {
      throw new OutputWriteError(path, { cause: error });
    }
  }
}

/**
 * One console entry as a log file line: `<ISO timestamp> <LEVEL> <message>`
 */
export function formatConsoleEntry(entry: LogEntry): string {
  const time = Number.isFinite(entry.timestamp) ? new Date(entry.timestamp).toISOString() : '-';
  return `${time} ${entry.level.toUpperCase()} ${entry.message.replace(/\r?\n/g, ' ')}`;
}

export function describeTarget(target: Readonly<OutputTarget>): string {
  return target.kind === 'file' ? target.path : STDOUT_LABEL;
}

export function createOutputSink(stream?: Writable): OutputSink {
  return new OutputSink(stream);
}
