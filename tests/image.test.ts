/**
 * PNG, Palette & GIF Tests
 */

import { describe, it, expect } from 'vitest';
import omggif from 'omggif';
import sharp from 'sharp';
import {
  buildSharedPalette,
  computeFrameDelays,
  createFrameAssembler,
  decodeImage,
  encodePng,
  indexPixels,
  isPng,
  type RgbaImage,
} from '../src/lib/image/index.js';
import { GifEncodingError, ScreenshotDecodeError } from '../src/lib/errors/index.js';

const { GifReader } = omggif;

function solid(width: number, height: number, [r, g, b]: [number, number, number]): RgbaImage {
  const data = Buffer.alloc(width * height * 4);
  for (let p = 0; p < data.length; p += 4) {
    data[p] = r;
    data[p + 1] = g;
    data[p + 2] = b;
    data[p + 3] = 255;
  }
  return { width, height, data };
}

function gradient(width: number, height: number): RgbaImage {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const p = (y * width + x) * 4;
      data[p] = x * 8;
      data[p + 1] = y * 8;
      data[p + 2] = 128;
      data[p + 3] = 255;
    }
  }
  return { width, height, data };
}

describe('PNG codec', () => {
  it('should round-trip pixels losslessly', async () => {
    const image = gradient(16, 8);

    const png = await encodePng(image);
    const decoded = await decodeImage(png);

    expect(isPng(png)).toBe(true);
    expect(decoded.width).toBe(16);
    expect(decoded.height).toBe(8);
    expect(decoded.data.equals(image.data)).toBe(true);
  });

  it('should add an alpha channel to RGB input', async () => {
    const rgb = await sharp({ create: { width: 2, height: 2, channels: 3, background: { r: 1, g: 2, b: 3 } } })
      .png()
      .toBuffer();

    const decoded = await decodeImage(rgb);

    expect(decoded.data.length).toBe(16);
    expect([...decoded.data.subarray(0, 4)]).toEqual([1, 2, 3, 255]);
  });

  it('should reject bytes that are not an image', async () => {
    await expect(decodeImage(Buffer.from('nope'))).rejects.toBeInstanceOf(ScreenshotDecodeError);
    await expect(decodeImage(Buffer.alloc(0))).rejects.toThrow('Screenshot is not a valid image: empty image payload');
  });
});

describe('buildSharedPalette', () => {
  it('should keep exact colors when there are few', () => {
    const frames = [solid(2, 2, [255, 0, 0]), solid(2, 2, [0, 0, 255]), solid(2, 2, [255, 0, 0])];

    const palette = buildSharedPalette(frames);

    expect(palette.exact).toBe(true);
    expect(palette.size).toBe(2);
    expect(palette.colors).toEqual([0xff0000, 0x0000ff]);
    expect(palette.indexOf(0x0000ff)).toBe(1);
  });

  it('should pad to a power of two', () => {
    const frames = [solid(1, 1, [1, 1, 1]), solid(1, 1, [2, 2, 2]), solid(1, 1, [3, 3, 3])];

    const palette = buildSharedPalette(frames);

    expect(palette.size).toBe(3);
    expect(palette.colors).toEqual([0x010101, 0x020202, 0x030303, 0]);
  });

  it('should reduce many colors to at most 256', () => {
    const image = gradient(32, 32);

    const palette = buildSharedPalette([image]);
    const indexed = indexPixels(image, palette);

    expect(palette.exact).toBe(false);
    expect(palette.size).toBeLessThanOrEqual(256);
    expect(palette.colors).toHaveLength(256);
    expect(indexed).toHaveLength(32 * 32);
    expect(indexed.every((index) => index >= 0 && index < palette.size)).toBe(true);
  });

  it('should map reduced colors close to the source', () => {
    const image = gradient(32, 32);
    const palette = buildSharedPalette([image]);

    // first pixel is (0, 0, 128)
    const color = palette.colors[palette.indexOf(0x000080)];
    expect(Math.abs(((color >> 16) & 0xff) - 0)).toBeLessThanOrEqual(24);
    expect(Math.abs((color & 0xff) - 128)).toBeLessThanOrEqual(24);
  });
});

describe('computeFrameDelays', () => {
  it('should use gaps between offsets and the interval for the last frame', () => {
    expect(computeFrameDelays([{ offsetMs: 0 }, { offsetMs: 500 }, { offsetMs: 1000 }], 500)).toEqual([50, 50, 50]);
  });

  it('should follow jittered timestamps', () => {
    expect(computeFrameDelays([{ offsetMs: 0 }, { offsetMs: 100 }, { offsetMs: 350 }], 100)).toEqual([10, 25, 10]);
  });

  it('should clamp to the GIF range', () => {
    expect(computeFrameDelays([{ offsetMs: 0 }, { offsetMs: 0 }], 1_000_000)).toEqual([1, 65535]);
  });
});

describe('FrameAssembler', () => {
  const assembler = createFrameAssembler();

  it('should encode a still result as PNG', async () => {
    const frame = { ...solid(4, 3, [10, 20, 30]), offsetMs: 0 };

    const encoded = await assembler.assemble({ kind: 'still', frame });

    expect(encoded.format).toBe('png');
    expect(encoded.frameCount).toBe(1);
    expect(isPng(encoded.bytes)).toBe(true);
    expect((await decodeImage(encoded.bytes)).data.equals(frame.data)).toBe(true);
  });

  it('should encode a looping GIF with per-frame delays', async () => {
    const colors: Array<[number, number, number]> = [
      [255, 0, 0],
      [0, 255, 0],
      [0, 0, 255],
    ];
    const frames = colors.map((color, index) => ({ ...solid(4, 3, color), offsetMs: index * 100 }));

    const encoded = await assembler.assemble({
      kind: 'recording',
      frames,
      delaysCs: [10, 25, 10],
      partial: false,
    });

    expect(encoded.format).toBe('gif');
    expect(encoded.bytes.subarray(0, 6).toString('latin1')).toBe('GIF89a');
    expect(encoded.width).toBe(4);
    expect(encoded.height).toBe(3);

    const reader = new GifReader(encoded.bytes);
    expect(reader.numFrames()).toBe(3);
    expect(reader.loopCount()).toBe(0);
    expect([0, 1, 2].map((i) => reader.frameInfo(i).delay)).toEqual([10, 25, 10]);

    const { data, info } = await sharp(encoded.bytes, { pages: -1 })
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    expect(info.width).toBe(4);
    const frameBytes = 4 * 3 * info.channels;
    colors.forEach((color, index) => {
      expect([...data.subarray(index * frameBytes, index * frameBytes + 3)]).toEqual(color);
    });
  });

  it('should encode a one-frame recording as a GIF', async () => {
    const encoded = await assembler.assemble({
      kind: 'recording',
      frames: [{ ...solid(2, 2, [9, 9, 9]), offsetMs: 0 }],
      delaysCs: [10],
      partial: true,
    });

    expect(encoded.format).toBe('gif');
    expect(new GifReader(encoded.bytes).numFrames()).toBe(1);
  });

  it('should reject frames of different sizes', () => {
    const frames = [solid(4, 3, [0, 0, 0]), solid(3, 4, [0, 0, 0])];

    expect(() => assembler.encodeAnimation(frames, [10, 10])).toThrow(
      'Could not encode animation: frame 1 is 3x4, expected 4x3'
    );
  });

  it('should reject empty and zero-size input', () => {
    expect(() => assembler.encodeAnimation([], [])).toThrow(GifEncodingError);
    expect(() => assembler.encodeAnimation([{ width: 0, height: 3, data: Buffer.alloc(0) }], [10])).toThrow(
      'invalid frame size 0x3'
    );
  });

  it('should reject short pixel buffers and missing delays', () => {
    const bad = { width: 2, height: 2, data: Buffer.alloc(8) };
    expect(() => assembler.encodeAnimation([bad], [10])).toThrow('frame 0 holds 8 bytes, expected 16');
    expect(() => assembler.encodeAnimation([solid(2, 2, [0, 0, 0])], [])).toThrow('expected 1 delays, got 0');
  });
});
