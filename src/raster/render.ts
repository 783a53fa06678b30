import sharp from 'sharp';
import { isNodata, valueRange } from './crop.js';
import type { ColorRange, Raster, RenderOptions, Rgba } from './types.js';

/** Stops of the terrain ramp, low to high */
const TERRAIN_STOPS: readonly Rgba[] = [
  { r: 0, g: 166, b: 0, a: 255 },
  { r: 99, g: 198, b: 0, a: 255 },
  { r: 230, g: 230, b: 0, a: 255 },
  { r: 234, g: 182, b: 78, a: 255 },
  { r: 242, g: 242, b: 242, a: 255 },
];

const COLORS = {
  background: { r: 255, g: 255, b: 255, a: 255 },
  nodata: { r: 0, g: 0, b: 0, a: 0 },
  text: '#222222',
} as const;

const TARGET_SIZE = 800;
const TITLE_HEIGHT = 32;
const LEGEND_WIDTH = 96;
const LEGEND_BAR_WIDTH = 16;
const LEGEND_MARGIN = 12;

/**
 * Colour for t in [0, 1]; values outside are clamped
 */
export function terrainColor(t: number): Rgba {
  const clamped = Math.min(1, Math.max(0, t));
  const position = clamped * (TERRAIN_STOPS.length - 1);
  const lower = Math.min(Math.floor(position), TERRAIN_STOPS.length - 2);
  const f = position - lower;
  const a = TERRAIN_STOPS[lower];
  const b = TERRAIN_STOPS[lower + 1];

  return {
    r: Math.round(a.r + (b.r - a.r) * f),
    g: Math.round(a.g + (b.g - a.g) * f),
    b: Math.round(a.b + (b.b - a.b) * f),
    a: 255,
  };
}

/**
 * Position of value on the colour scale, clamped to [0, 1]
 */
export function normalizeValue(value: number, range: ColorRange): number {
  const [lo, hi] = range;
  if (hi <= lo) return 0.5;
  return Math.min(1, Math.max(0, (value - lo) / (hi - lo)));
}

export function resolveScale(raster: Raster, scale?: number): number {
  if (scale !== undefined) {
    return Math.max(1, Math.floor(scale));
  }
  return Math.max(1, Math.floor(TARGET_SIZE / Math.max(raster.ncols, raster.nrows)));
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function formatLabel(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toPrecision(4);
}

export interface RasterImageLayout {
  width: number;
  height: number;
  mapWidth: number;
  mapHeight: number;
  scale: number;
}

export function layoutFor(raster: Raster, options: RenderOptions = {}): RasterImageLayout {
  const scale = resolveScale(raster, options.scale);
  const mapWidth = raster.ncols * scale;
  const mapHeight = raster.nrows * scale;
  return {
    width: mapWidth + LEGEND_WIDTH,
    height: mapHeight + TITLE_HEIGHT,
    mapWidth,
    mapHeight,
    scale,
  };
}

class RasterImage {
  private readonly pixels: Uint8ClampedArray;

  constructor(private readonly layout: RasterImageLayout) {
    this.pixels = new Uint8ClampedArray(layout.width * layout.height * 4);
  }

  fill(color: Rgba): void {
    for (let i = 0; i < this.pixels.length; i += 4) {
      this.setAt(i, color);
    }
  }

  fillRect(x: number, y: number, w: number, h: number, color: Rgba): void {
    for (let py = y; py < y + h; py++) {
      for (let px = x; px < x + w; px++) {
        this.setAt((py * this.layout.width + px) * 4, color);
      }
    }
  }

  toSharp(): sharp.Sharp {
    return sharp(Buffer.from(this.pixels.buffer), {
      raw: { width: this.layout.width, height: this.layout.height, channels: 4 },
    });
  }

  private setAt(i: number, color: Rgba): void {
    this.pixels[i] = color.r;
    this.pixels[i + 1] = color.g;
    this.pixels[i + 2] = color.b;
    this.pixels[i + 3] = color.a;
  }
}

function overlaySvg(layout: RasterImageLayout, title: string, range: ColorRange): string {
  const legendX = layout.mapWidth + LEGEND_MARGIN + LEGEND_BAR_WIDTH + 6;
  const top = TITLE_HEIGHT + 12;
  const bottom = TITLE_HEIGHT + layout.mapHeight;
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${layout.width}" height="${layout.height}">`,
    `<text x="8" y="22" font-family="sans-serif" font-size="16" fill="${COLORS.text}">${escapeXml(title)}</text>`,
    `<text x="${legendX}" y="${top}" font-family="sans-serif" font-size="11" fill="${COLORS.text}">${formatLabel(range[1])}</text>`,
    `<text x="${legendX}" y="${bottom}" font-family="sans-serif" font-size="11" fill="${COLORS.text}">${formatLabel(range[0])}</text>`,
    '</svg>',
  ].join('');
}

/**
 * Render raster to PNG: map on the left, colour bar on the right, title on
 * top. Values outside zlim take the end colours of the scale; nodata cells
 * are transparent.
 */
export async function renderRaster(raster: Raster, options: RenderOptions = {}): Promise<Buffer> {
  const layout = layoutFor(raster, options);
  const range: ColorRange = options.zlim ?? valueRange(raster) ?? [0, 0];
  const image = new RasterImage(layout);
  const { scale } = layout;

  image.fill(COLORS.background);

  for (let row = 0; row < raster.nrows; row++) {
    for (let col = 0; col < raster.ncols; col++) {
      const value = raster.values[row * raster.ncols + col];
      const color = isNodata(raster, value) ? COLORS.nodata : terrainColor(normalizeValue(value, range));
      image.fillRect(col * scale, TITLE_HEIGHT + row * scale, scale, scale, color);
    }
  }

  // Colour bar, high values at the top
  const barX = layout.mapWidth + LEGEND_MARGIN;
  for (let y = 0; y < layout.mapHeight; y++) {
    const t = layout.mapHeight > 1 ? 1 - y / (layout.mapHeight - 1) : 1;
    image.fillRect(barX, TITLE_HEIGHT + y, LEGEND_BAR_WIDTH, 1, terrainColor(t));
  }

  const svg = overlaySvg(layout, options.title ?? '', range);
  return image
    .toSharp()
    .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
    .png()
    .toBuffer();
}
