/**
 * Shared Palette
 *
 * GIF frames are indexed images. All frames of a recording share one global
 * palette of at most 256 colors: exact when the recording uses few enough
 * colors, otherwise reduced with median cut over a 15-bit color histogram.
 */

import type { RgbaImage } from './png.js';

// ============================================================================
// Types
// ============================================================================

export interface Palette {
  /** 0xRRGGBB entries, padded with black to a power of two (GIF requirement) */
  colors: number[];
  /** Entries actually used by the image data */
  size: number;
  /** True when every source color is present exactly */
  exact: boolean;
  /** Palette index for a 0xRRGGBB color */
  indexOf(rgb: number): number;
}

interface HistogramEntry {
  r: number;
  g: number;
  b: number;
  count: number;
}

export const MAX_PALETTE_SIZE = 256;

// ============================================================================
// Palette Construction
// ============================================================================

export function buildSharedPalette(images: readonly RgbaImage[], maxColors: number = MAX_PALETTE_SIZE): Palette {
  if (maxColors < 2 || maxColors > MAX_PALETTE_SIZE) {
    throw new RangeError(`Palette size must be between 2 and ${MAX_PALETTE_SIZE}`);
  }

  const exact = collectExactColors(images, maxColors);
  if (exact) {
    const lookup = new Map<number, number>();
    exact.forEach((rgb, index) => lookup.set(rgb, index));
    return {
      colors: padPalette(exact),
      size: exact.length,
      exact: true,
      indexOf: (rgb) => lookup.get(rgb) ?? nearestIndex(exact, rgb),
    };
  }

  const histogram = buildHistogram(images);
  const colors = medianCut(histogram, maxColors);
  const binIndex = new Int16Array(32768).fill(-1);

  return {
    colors: padPalette(colors),
    size: colors.length,
    exact: false,
    indexOf: (rgb) => {
      const bin = toBin(rgb);
      let index = binIndex[bin];
      if (index < 0) {
        index = nearestIndex(colors, rgb);
        binIndex[bin] = index;
      }
      return index;
    },
  };
}

/**
 * Map every pixel of an image to its palette index (alpha is ignored)
 */
export function indexPixels(image: RgbaImage, palette: Palette): number[] {
  const pixelCount = image.width * image.height;
  const indexed = new Array<number>(pixelCount);
  const data = image.data;

  for (let i = 0, p = 0; i < pixelCount; i++, p += 4) {
    indexed[i] = palette.indexOf((data[p] << 16) | (data[p + 1] << 8) | data[p + 2]);
  }

  return indexed;
}

// ============================================================================
// Helpers
// ============================================================================

function collectExactColors(images: readonly RgbaImage[], maxColors: number): number[] | null {
  const seen = new Set<number>();

  for (const image of images) {
    const data = image.data;
    for (let p = 0; p + 3 < data.length; p += 4) {
      seen.add((data[p] << 16) | (data[p + 1] << 8) | data[p + 2]);
      if (seen.size > maxColors) return null;
    }
  }

  return Array.from(seen);
}

function toBin(rgb: number): number {
  return (((rgb >> 19) & 0x1f) << 10) | (((rgb >> 11) & 0x1f) << 5) | ((rgb >> 3) & 0x1f);
}

function buildHistogram(images: readonly RgbaImage[]): HistogramEntry[] {
  const counts = new Uint32Array(32768);

  for (const image of images) {
    const data = image.data;
    for (let p = 0; p + 3 < data.length; p += 4) {
      counts[((data[p] >> 3) << 10) | ((data[p + 1] >> 3) << 5) | (data[p + 2] >> 3)]++;
    }
  }

  const entries: HistogramEntry[] = [];
  for (let bin = 0; bin < counts.length; bin++) {
    if (counts[bin] === 0) continue;
    entries.push({
      r: (((bin >> 10) & 0x1f) << 3) | 4,
      g: (((bin >> 5) & 0x1f) << 3) | 4,
      b: ((bin & 0x1f) << 3) | 4,
      count: counts[bin],
    });
  }
  return entries;
}

type Channel = 'r' | 'g' | 'b';

function widestChannel(entries: HistogramEntry[]): { channel: Channel; range: number } {
  let best: { channel: Channel; range: number } = { channel: 'r', range: -1 };
  for (const channel of ['r', 'g', 'b'] as const) {
    let min = 255;
    let max = 0;
    for (const entry of entries) {
      if (entry[channel] < min) min = entry[channel];
      if (entry[channel] > max) max = entry[channel];
    }
    if (max - min > best.range) {
      best = { channel, range: max - min };
    }
  }
  return best;
}

function medianCut(histogram: HistogramEntry[], maxColors: number): number[] {
  const boxes: HistogramEntry[][] = [histogram];

  while (boxes.length < maxColors) {
    // Split the most populated box that still holds more than one color
    let target = -1;
    let targetPixels = 0;
    boxes.forEach((box, index) => {
      if (box.length < 2) return;
      const pixels = box.reduce((sum, entry) => sum + entry.count, 0);
      if (pixels > targetPixels) {
        target = index;
        targetPixels = pixels;
      }
    });
    if (target < 0) break;

    const box = boxes[target];
    const { channel } = widestChannel(box);
    box.sort((a, b) => a[channel] - b[channel]);

    let cumulative = 0;
    let split = 1;
    for (let i = 0; i < box.length - 1; i++) {
      cumulative += box[i].count;
      split = i + 1;
      if (cumulative * 2 >= targetPixels) break;
    }

    boxes.splice(target, 1, box.slice(0, split), box.slice(split));
  }

  return boxes.map(averageColor);
}

function averageColor(box: HistogramEntry[]): number {
  let r = 0;
  let g = 0;
  let b = 0;
  let total = 0;
  for (const entry of box) {
    r += entry.r * entry.count;
    g += entry.g * entry.count;
    b += entry.b * entry.count;
    total += entry.count;
  }
  return (Math.round(r / total) << 16) | (Math.round(g / total) << 8) | Math.round(b / total);
}

function nearestIndex(colors: readonly number[], rgb: number): number {
  const r = (rgb >> 16) & 0xff;
  const g = (rgb >> 8) & 0xff;
  const b = rgb & 0xff;
  let best = 0;
  let bestDistance = Infinity;

  for (let i = 0; i < colors.length; i++) {
    const dr = ((colors[i] >> 16) & 0xff) - r;
    const dg = ((colors[i] >> 8) & 0xff) - g;
    const db = (colors[i] & 0xff) - b;
    const distance = dr * dr + dg * dg + db * db;
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
      if (distance === 0) break;
    }
  }
  return best;
}

function padPalette(colors: readonly number[]): number[] {
  let size = 2;
  while (size < colors.length) size *= 2;

  const padded = colors.slice();
  while (padded.length < size) padded.push(0);
  return padded;
}
