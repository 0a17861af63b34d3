/**
 * WebDriver Module
 *
 * Provides:
 * - A zod-validated JSON client for the WebDriver commands a capture uses
 * - Browser sessions with navigation, script injection, console log access
 *   and frame capture
 */

export {
  WebDriverClient,
  createWebDriverClient,
  type HttpMethod,
  type LogEntry,
  type NewSession,
  type WebDriverClientConfig,
  type WindowRect,
} from './client.js';

export {
  BrowserSession,
  SessionHandle,
  buildCapabilities,
  createBrowserSession,
  type BrowserSessionOptions,
  type OpenOptions,
} from './session.js';
