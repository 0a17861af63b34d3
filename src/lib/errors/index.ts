/**
 * Errors Module
 *
 * Provides:
 * - One error class per capture failure kind
 * - Human-readable descriptions and exit codes
 */

export {
  WeblookError,
  PortInUseError,
  BackendStartTimeoutError,
  BackendLaunchError,
  SessionCreationFailedError,
  SessionClosedError,
  NavigationFailedError,
  ProtocolError,
  ScriptExecutionError,
  ScreenshotDecodeError,
  GifEncodingError,
  OutputWriteError,
  CaptureAbortedError,
  InvalidRequestError,
  isWeblookError,
  describeError,
  exitCodeFor,
  type WeblookErrorCode,
} from './errors.js';
