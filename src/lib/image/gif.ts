/**
 * Frame Assembler
 *
 * Turns a capture result into the bytes written to the output target:
 * a still capture becomes a PNG, a recording becomes an infinitely looping
 * GIF whose per-frame delays follow the actual capture timestamps.
 */

import omggif from 'omggif';
import type { CaptureResult, Frame } from '../capture/types.js';
import { GifEncodingError } from '../errors/index.js';
import { buildSharedPalette, indexPixels } from './palette.js';
import { encodePng, type RgbaImage } from './png.js';

const { GifWriter } = omggif;

// ============================================================================
// Types
// ============================================================================

export type ImageFormat = 'png' | 'gif';

export interface EncodedImage {
  bytes: Buffer;
  format: ImageFormat;
  width: number;
  height: number;
  frameCount: number;
}

/** GIF logical screen dimensions are 16-bit */
export const MAX_GIF_DIMENSION = 65535;
/** GIF delays are 16-bit hundredths of a second */
export const MAX_DELAY_CS = 65535;

// ============================================================================
// Frame Delays
// ============================================================================

/**
 * Delay of each frame in hundredths of a second, taken from the gap to the
 * next frame's capture offset. The last frame shows for `lastFrameMs`.
 */
export function computeFrameDelays(frames: readonly Pick<Frame, 'offsetMs'>[], lastFrameMs: number): number[] {
  return frames.map((frame, index) => {
    const next = frames[index + 1];
    const gapMs = next ? next.offsetMs - frame.offsetMs : lastFrameMs;
    return toCentiseconds(gapMs);
  });
}

function toCentiseconds(ms: number): number {
  return Math.min(MAX_DELAY_CS, Math.max(1, Math.round(ms / 10)));
}

// ============================================================================
// Frame Assembler
// ============================================================================

export class FrameAssembler {
  async assemble(result: CaptureResult): Promise<EncodedImage> {
    if (result.kind === 'still') {
      return {
        bytes: await this.encodeStill(result.frame),
        format: 'png',
        width: result.frame.width,
        height: result.frame.height,
        frameCount: 1,
      };
    }

    const { width, height } = validateFrames(result.frames);
    return {
      bytes: this.encodeAnimation(result.frames, result.delaysCs),
      format: 'gif',
      width,
      height,
      frameCount: result.frames.length,
    };
  }

  async encodeStill(frame: RgbaImage): Promise<Buffer> {
    validateFrames([frame]);
    return encodePng(frame);
  }

  encodeAnimation(frames: readonly RgbaImage[], delaysCs: readonly number[]): Buffer {
    const { width, height } = validateFrames(frames);
    if (delaysCs.length !== frames.length) {
      throw new GifEncodingError(`expected ${frames.length} delays, got ${delaysCs.length}`);
    }

    const palette = buildSharedPalette(frames);
    const buffer = Buffer.allocUnsafe(estimateGifSize(width, height, frames.length));

    try {
      const writer = new GifWriter(buffer, width, height, { loop: 0, palette: palette.colors });
      frames.forEach((frame, index) => {
        writer.addFrame(0, 0, width, height, indexPixels(frame, palette), {
          delay: toCentiseconds(delaysCs[index] * 10),
        });
      });
      const length = writer.end();
      return Buffer.from(buffer.subarray(0, length));
    } catch (error) {
      throw new GifEncodingError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function validateFrames(frames: readonly RgbaImage[]): { width: number; height: number } {
  if (frames.length === 0) {
    throw new GifEncodingError('no frames to encode');
  }

  const { width, height } = frames[0];
  if (width <= 0 || height <= 0) {
    throw new GifEncodingError(`invalid frame size ${width}x${height}`);
  }
  if (width > MAX_GIF_DIMENSION || height > MAX_GIF_DIMENSION) {
    throw new GifEncodingError(`frame size ${width}x${height} exceeds ${MAX_GIF_DIMENSION}x${MAX_GIF_DIMENSION}`);
  }

  frames.forEach((frame, index) => {
    if (frame.width !== width || frame.height !== height) {
      throw new GifEncodingError(
        `frame ${index} is ${frame.width}x${frame.height}, expected ${width}x${height}`
      );
    }
    if (frame.data.length !== width * height * 4) {
      throw new GifEncodingError(`frame ${index} holds ${frame.data.length} bytes, expected ${width * height * 4}`);
    }
  });

  return { width, height };
}

/**
 * Worst-case output size: 12-bit LZW codes for every pixel plus sub-block
 * length bytes, per-frame headers and the global palette.
 */
function estimateGifSize(width: number, height: number, frameCount: number): number {
  const perFrameData = Math.ceil((width * height * 12) / 8);
  const perFrame = perFrameData + Math.ceil(perFrameData / 255) + 64;
  return 1024 + frameCount * perFrame;
}

export function createFrameAssembler(): FrameAssembler {
  return new FrameAssembler();
}
