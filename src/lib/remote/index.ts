/**
 * Remote Control Module (experimental)
 *
 * Provides:
 * - An HTTP/JSON server exposing capture_screenshot and record_interaction
 * - A matching client
 */

export {
  RemoteControlServer,
  createRemoteControlServer,
  ACTIONS,
  type ActionDescription,
  type ActionName,
  type ActionResponse,
  type ErrorResponse,
  type RemoteControlConfig,
} from './server.js';

export {
  RemoteControlClient,
  createRemoteControlClient,
  toRemoteAction,
  type RemoteActionParams,
  type RemoteCaptureResult,
  type RemoteControlClientConfig,
} from './client.js';
