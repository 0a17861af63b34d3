/**
 * Capture data model shared by the scheduler, the session, the assembler and
 * the output sink.
 */

export interface Viewport {
  width: number;
  height: number;
}

export type CaptureMode =
  | { kind: 'still' }
  | {
      kind: 'recording';
      /** Total recording length in ms, measured from the first frame */
      durationMs: number;
      /** Spacing of capture boundaries in ms (at least 1) */
      frameIntervalMs: number;
    };

export type OutputTarget = { kind: 'file'; path: string } | { kind: 'stdout' };

/**
 * Everything one invocation needs. Built (and frozen) by `buildCaptureRequest`
 * and never modified afterwards.
 */
export interface CaptureRequest {
  readonly url: string;
  /** Pause after navigation, before the first capture */
  readonly waitMs: number;
  readonly mode: Readonly<CaptureMode>;
  readonly viewport: Readonly<Viewport>;
  /** Script executed in page context before capturing */
  readonly script?: string;
  /** When set, browser console entries are collected and written here */
  readonly consoleLogPath?: string;
  readonly output: Readonly<OutputTarget>;
}

/** One decoded screenshot: width × height RGBA pixels */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;
  /** Offset from the start of capturing, in ms */
  readonly offsetMs: number;
}

export type CaptureResult =
  | { kind: 'still'; frame: Frame }
  | {
      kind: 'recording';
      frames: Frame[];
      /** Display delay per frame, in hundredths of a second */
      delaysCs: number[];
      /** True when the recording ended early (cancellation or a late failure) */
      partial: boolean;
    };
