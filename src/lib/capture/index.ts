/**
 * Capture Module
 *
 * Provides:
 * - Capture request and result types
 * - Frame scheduling for stills and recordings
 * - The end-to-end capture pipeline behind the CaptureService interface
 */

export type { CaptureMode, CaptureRequest, CaptureResult, Frame, OutputTarget, Viewport } from './types.js';

export {
  CaptureScheduler,
  buildCaptureResult,
  createCaptureScheduler,
  type CapturePlan,
  type FrameSource,
  type ScheduleOutcome,
  type SchedulerOptions,
} from './scheduler.js';

export {
  CapturePipeline,
  createCapturePipeline,
  type CaptureOutcome,
  type CaptureService,
  type CapturePipelineOptions,
  type PipelineOverrides,
} from './pipeline.js';
