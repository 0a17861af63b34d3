/**
 * PNG Codec
 *
 * Screenshots arrive as encoded images and still captures leave as PNG; in
 * between, frames are plain RGBA buffers. sharp does both conversions.
 */

import sharp from 'sharp';
import { ScreenshotDecodeError } from '../errors/index.js';

export interface RgbaImage {
  width: number;
  height: number;
  /** width × height × 4 bytes, row-major RGBA */
  data: Buffer;
}

/**
 * Decode any image sharp understands into RGBA pixels
 */
export async function decodeImage(bytes: Buffer): Promise<RgbaImage> {
  if (bytes.length === 0) {
    throw new ScreenshotDecodeError('empty image payload');
  }

  try {
    const { data, info } = await sharp(bytes)
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 4) {
      throw new ScreenshotDecodeError(`expected 4 channels, got ${info.channels}`);
    }

    return { width: info.width, height: info.height, data };
  } catch (error) {
    if (error instanceof ScreenshotDecodeError) throw error;
    throw new ScreenshotDecodeError(error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}

/**
 * Encode RGBA pixels as a lossless PNG
 */
export async function encodePng(image: RgbaImage): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 4 },
  })
    .png()
    .toBuffer();
}

/** PNG files start with these 8 bytes */
export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function isPng(bytes: Buffer): boolean {
  return bytes.length >= PNG_SIGNATURE.length && bytes.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE);
}
