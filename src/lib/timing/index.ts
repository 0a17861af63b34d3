/**
 * Timing Module
 *
 * Provides:
 * - The Clock abstraction used at every suspension point
 * - An interruptible sleep that honours AbortSignal
 */

export { systemClock, interruptibleSleep, type Clock } from './clock.js';
