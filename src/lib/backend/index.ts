/**
 * Backend Module
 *
 * Provides:
 * - chromedriver process supervision with port fallback
 * - Readiness polling with exponential backoff
 * - Graceful shutdown with a forced kill fallback
 * - Scoped acquisition (withBackend)
 */

export {
  BackendSupervisor,
  BackendHandle,
  createBackendSupervisor,
  isPortFree,
  type BackendStatus,
  type SupervisorOptions,
} from './supervisor.js';

export {
  createExecaLauncher,
  type BackendLauncher,
  type BackendProcess,
  type BackendExit,
} from './launcher.js';
