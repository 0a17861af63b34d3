/**
 * Backend Launcher
 *
 * Spawns the automation backend executable. The supervisor only talks to the
 * BackendProcess interface, so tests can substitute an in-process fake.
 */

import { execa, type ExecaChildProcess } from 'execa';

// ============================================================================
// Types
// ============================================================================

export interface BackendExit {
  code: number | null;
  signal: string | null;
  /** True when the process could not be spawned or exited with an error */
  failed: boolean;
}

export interface BackendProcess {
  readonly pid: number | undefined;
  /** Resolves once the process has exited; never rejects */
  readonly exited: Promise<BackendExit>;
  /** Subscribe to decoded stdout/stderr chunks */
  onOutput(listener: (chunk: string) => void): void;
  kill(signal: NodeJS.Signals): void;
}

export interface BackendLauncher {
  launch(command: string, args: string[]): BackendProcess;
}

// ============================================================================
// execa Launcher
// ============================================================================

class ExecaBackendProcess implements BackendProcess {
  readonly pid: number | undefined;
  readonly exited: Promise<BackendExit>;
  private subprocess: ExecaChildProcess;
  private listeners: Array<(chunk: string) => void> = [];

  constructor(command: string, args: string[]) {
    this.subprocess = execa(command, args, {
      reject: false,
      buffer: false,
      stdin: 'ignore',
      cleanup: true,
    });
    this.pid = this.subprocess.pid;

    const forward = (data: Buffer) => {
      const text = data.toString();
      for (const listener of this.listeners) {
        listener(text);
      }
    };
    this.subprocess.stdout?.on('data', forward);
    this.subprocess.stderr?.on('data', forward);

    this.exited = this.subprocess.then(
      (result) => ({
        code: result.exitCode ?? null,
        signal: result.signal ?? null,
        failed: result.failed,
      }),
      () => ({ code: null, signal: null, failed: true })
    );
  }

  onOutput(listener: (chunk: string) => void): void {
    this.listeners.push(listener);
  }

  kill(signal: NodeJS.Signals): void {
    this.subprocess.kill(signal);
  }
}

export function createExecaLauncher(): BackendLauncher {
  return {
    launch: (command, args) => new ExecaBackendProcess(command, args),
  };
}
