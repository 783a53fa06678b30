import { RasterError } from '../utils/errors.js';
import type { Extent, Raster } from './types.js';

export function getExtent(raster: Raster): Extent {
  return [
    raster.xll,
    raster.xll + raster.ncols * raster.cellSize,
    raster.yll,
    raster.yll + raster.nrows * raster.cellSize,
  ];
}

export function isNodata(raster: Raster, value: number): boolean {
  return !Number.isFinite(value) || (raster.nodata !== null && value === raster.nodata);
}

/**
 * Keep the cells whose centres fall inside extent (bounds inclusive)
 */
export function cropRaster(raster: Raster, extent: Extent): Raster {
  const [xmin, xmax, ymin, ymax] = extent;
  if (xmin > xmax || ymin > ymax) {
    throw RasterError.fromEmptyCrop(extent);
  }

  const { cellSize } = raster;
  const top = raster.yll + raster.nrows * cellSize;

  const cols: number[] = [];
  for (let c = 0; c < raster.ncols; c++) {
    const cx = raster.xll + (c + 0.5) * cellSize;
    if (cx >= xmin && cx <= xmax) cols.push(c);
  }

  const rows: number[] = [];
  for (let r = 0; r < raster.nrows; r++) {
    const cy = top - (r + 0.5) * cellSize;
    if (cy >= ymin && cy <= ymax) rows.push(r);
  }

  if (cols.length === 0 || rows.length === 0) {
    throw RasterError.fromEmptyCrop(extent);
  }

  const firstCol = cols[0];
  const firstRow = rows[0];
  const ncols = cols.length;
  const nrows = rows.length;

  const values = new Float64Array(ncols * nrows);
  for (let r = 0; r < nrows; r++) {
    const start = (firstRow + r) * raster.ncols + firstCol;
    values.set(raster.values.subarray(start, start + ncols), r * ncols);
  }

  return {
    ncols,
    nrows,
    xll: raster.xll + firstCol * cellSize,
    yll: top - (firstRow + nrows) * cellSize,
    cellSize,
    nodata: raster.nodata,
    values,
  };
}

/**
 * [min, max] over data cells, or null when every cell is nodata
 */
export function valueRange(raster: Raster): [number, number] | null {
  let min = Infinity;
  let max = -Infinity;

  for (const value of raster.values) {
    if (isNodata(raster, value)) continue;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return min <= max ? [min, max] : null;
}
