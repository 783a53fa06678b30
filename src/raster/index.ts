/**
 * Result visualizer: load an output raster, crop it, render it to PNG
 */

import { access, readFile, writeFile } from 'fs/promises';
import { getLogger } from '../utils/logger.js';
import { RasterError } from '../utils/errors.js';
import { getCumulativeCurrentMapPath, getCumulativeCurrentPlotPath, getExtension } from '../utils/paths.js';
import { parseAsciiGrid } from './ascii-grid.js';
import { readGeoTiff } from './geotiff.js';
import { cropRaster } from './crop.js';
import { renderRaster } from './render.js';
import type { ColorRange, Extent, Raster } from './types.js';

export { parseAsciiGrid } from './ascii-grid.js';
export { readGeoTiff } from './geotiff.js';
export { cropRaster, getExtent, valueRange, isNodata } from './crop.js';
export { renderRaster, terrainColor, normalizeValue, layoutFor } from './render.js';
export type { Raster, Extent, ColorRange, Rgba, RenderOptions } from './types.js';

export interface PlotOptions {
  extent?: Extent;
  zlim?: ColorRange;
  title?: string;
  scale?: number;
}

export async function loadRaster(path: string): Promise<Raster> {
  const ext = getExtension(path);

  if (ext === '.asc') {
    return parseAsciiGrid(await readFile(path, 'utf-8'), path);
  }
  if (ext === '.tif' || ext === '.tiff') {
    return readGeoTiff(await readFile(path), path);
  }

  throw RasterError.fromUnsupportedFormat(path);
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load rasterPath, crop to extent when given, render and write the PNG to
 * outPath
 */
export async function plotRasterFile(rasterPath: string, outPath: string, options: PlotOptions = {}): Promise<string> {
  const logger = getLogger();

  let raster = await loadRaster(rasterPath);
  logger.debug(`Loaded ${rasterPath}: ${raster.ncols}x${raster.nrows}, cellsize ${raster.cellSize}`);

  if (options.extent) {
    raster = cropRaster(raster, options.extent);
    logger.debug(`Cropped to ${raster.ncols}x${raster.nrows}`);
  }

  const png = await renderRaster(raster, {
    zlim: options.zlim,
    title: options.title,
    scale: options.scale,
  });
  await writeFile(outPath, png);

  logger.info(`Wrote plot to: ${outPath}`);
  return outPath;
}

/**
 * Plot <outputName>_cum_curmap.asc from outputDir. A missing map is a
 * warning, not an error; returns the PNG path, or undefined when skipped.
 */
export async function plotCumulativeCurrent(
  outputDir: string,
  outputName: string,
  options: Omit<PlotOptions, 'title'> = {}
): Promise<string | undefined> {
  const logger = getLogger();
  const mapPath = getCumulativeCurrentMapPath(outputDir, outputName);

  if (!(await fileExists(mapPath))) {
    logger.warn(
      `Could not find the expected cumulative current map: ${mapPath}. ` +
        'Check if Circuitscape generated a different name or if write_cum_cur_map_only is false.'
    );
    return undefined;
  }

  return plotRasterFile(mapPath, getCumulativeCurrentPlotPath(outputDir, outputName), {
    ...options,
    title: `Circuitscape Cumulative Current: ${outputName}`,
  });
}
