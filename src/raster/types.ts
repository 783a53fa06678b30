/**
 * Single-band raster as read back from Circuitscape outputs
 */

export interface Raster {
  ncols: number;
  nrows: number;
  /** Lower-left corner, map units */
  xll: number;
  yll: number;
  cellSize: number;
  nodata: number | null;
  /** Row-major, first row is the northernmost */
  values: Float64Array;
}

/** [xmin, xmax, ymin, ymax] in map units */
export type Extent = readonly [number, number, number, number];

/** [min, max] of the colour scale */
export type ColorRange = readonly [number, number];

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface RenderOptions {
  /** Clip the colour scale; defaults to the data range */
  zlim?: ColorRange;
  /** Pixels per cell; defaults to fitting the longer side in ~800px */
  scale?: number;
  title?: string;
}
