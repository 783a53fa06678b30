/**
 * Output layout: every file name Circuitscape and this tool derive from
 * <outputDir>/<outputName>
 */

import { extname, join } from 'path';

/**
 * Suffixes appended to the output name
 */
export const OUTPUT_LAYOUT = {
  /** Generated config */
  INI_EXT: '.ini',
  /** Circuitscape output file named in [Output options] */
  OUTPUT_EXT: '.out',
  /** Circuitscape log */
  LOG_EXT: '.log',
  /** Circuitscape profiler log */
  PROFILER_LOG_SUFFIX: '_rusages.log',
  /** Cumulative current map written by Circuitscape */
  CUM_CURRENT_MAP_SUFFIX: '_cum_curmap.asc',
  /** Rendered plot of the cumulative current map */
  CUM_CURRENT_PLOT_SUFFIX: '_cum_curmap.png',
} as const;

/**
 * Extensions that mark a vector dataset rather than a raster
 */
export const VECTOR_EXTENSIONS: readonly string[] = ['.shp', '.gpkg', '.geojson', '.json', '.kml', '.gml'];

/**
 * Get the path to the generated config
 * @param outputDir - Directory holding the run outputs
 * @param outputName - Base name of the run
 * @returns Full path to <outputName>.ini
 */
export function getIniPath(outputDir: string, outputName: string): string {
  return join(outputDir, `${outputName}${OUTPUT_LAYOUT.INI_EXT}`);
}

/**
 * Get the path Circuitscape writes its output file to
 * @param outputDir - Directory holding the run outputs
 * @param outputName - Base name of the run
 * @returns Full path to <outputName>.out
 */
export function getOutputFilePath(outputDir: string, outputName: string): string {
  return join(outputDir, `${outputName}${OUTPUT_LAYOUT.OUTPUT_EXT}`);
}

/**
 * Get the path to the Circuitscape log
 * @param outputDir - Directory holding the run outputs
 * @param outputName - Base name of the run
 * @returns Full path to <outputName>.log
 */
export function getLogFilePath(outputDir: string, outputName: string): string {
  return join(outputDir, `${outputName}${OUTPUT_LAYOUT.LOG_EXT}`);
}

/**
 * Get the path to the Circuitscape profiler log
 * @param outputDir - Directory holding the run outputs
 * @param outputName - Base name of the run
 * @returns Full path to <outputName>_rusages.log
 */
export function getProfilerLogPath(outputDir: string, outputName: string): string {
  return join(outputDir, `${outputName}${OUTPUT_LAYOUT.PROFILER_LOG_SUFFIX}`);
}

/**
 * Get the path to the cumulative current map
 * @param outputDir - Directory holding the run outputs
 * @param outputName - Base name of the run
 * @returns Full path to <outputName>_cum_curmap.asc
 */
export function getCumulativeCurrentMapPath(outputDir: string, outputName: string): string {
  return join(outputDir, `${outputName}${OUTPUT_LAYOUT.CUM_CURRENT_MAP_SUFFIX}`);
}

/**
 * Get the path the cumulative current plot is written to
 * @param outputDir - Directory holding the run outputs
 * @param outputName - Base name of the run
 * @returns Full path to <outputName>_cum_curmap.png
 */
export function getCumulativeCurrentPlotPath(outputDir: string, outputName: string): string {
  return join(outputDir, `${outputName}${OUTPUT_LAYOUT.CUM_CURRENT_PLOT_SUFFIX}`);
}

/**
 * Lowercased extension including the dot, or '' when there is none
 */
export function getExtension(path: string): string {
  return extname(path).toLowerCase();
}

export function isVectorPath(path: string): boolean {
  return VECTOR_EXTENSIONS.includes(getExtension(path));
}

/**
 * Output names become file names; reject separators and traversal
 */
export function isValidOutputName(name: string): boolean {
  if (name.length === 0 || name.length > 200) {
    return false;
  }

  if (name.includes('/') || name.includes('\\') || name === '.' || name === '..') {
    return false;
  }

  return true;
}
