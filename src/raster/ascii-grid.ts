/**
 * ESRI ASCII grid reader (the .asc files Circuitscape writes)
 */

import { RasterError } from '../utils/errors.js';
import type { Raster } from './types.js';

interface GridHeader {
  ncols: number;
  nrows: number;
  xll: number;
  yll: number;
  cellSize: number;
  nodata: number | null;
}

const HEADER_KEYS = ['ncols', 'nrows', 'xllcorner', 'xllcenter', 'yllcorner', 'yllcenter', 'cellsize', 'nodata_value'];

function parseNumber(source: string, label: string, raw: string): number {
  const value = Number(raw);
  if (raw === '' || Number.isNaN(value)) {
    throw RasterError.fromMalformed(source, `${label} is not a number: "${raw}"`);
  }
  return value;
}

function parseHeader(source: string, fields: Map<string, string>): GridHeader {
  const required = (key: string): number => {
    const raw = fields.get(key);
    if (raw === undefined) {
      throw RasterError.fromMalformed(source, `missing ${key}`);
    }
    return parseNumber(source, key, raw);
  };

  const ncols = required('ncols');
  const nrows = required('nrows');
  const cellSize = required('cellsize');

  if (!Number.isInteger(ncols) || !Number.isInteger(nrows) || ncols <= 0 || nrows <= 0) {
    throw RasterError.fromMalformed(source, `invalid dimensions ${ncols}x${nrows}`);
  }
  if (cellSize <= 0) {
    throw RasterError.fromMalformed(source, `cellsize must be positive, got ${cellSize}`);
  }

  // *center variants locate the lower-left cell's centre rather than its corner
  const half = cellSize / 2;
  const xll = fields.has('xllcorner') ? required('xllcorner') : required('xllcenter') - half;
  const yll = fields.has('yllcorner') ? required('yllcorner') : required('yllcenter') - half;

  const rawNodata = fields.get('nodata_value');
  const nodata = rawNodata === undefined ? null : parseNumber(source, 'NODATA_value', rawNodata);

  return { ncols, nrows, xll, yll, cellSize, nodata };
}

/**
 * Parse ASCII grid text. `source` names the file in error messages.
 */
export function parseAsciiGrid(text: string, source: string = '<ascii grid>'): Raster {
  const tokens = text.split(/\s+/).filter((token) => token !== '');
  const fields = new Map<string, string>();

  let index = 0;
  while (index + 1 < tokens.length) {
    const key = tokens[index].toLowerCase();
    if (!HEADER_KEYS.includes(key)) {
      break;
    }
    fields.set(key, tokens[index + 1]);
    index += 2;
  }

  const header = parseHeader(source, fields);
  const expected = header.ncols * header.nrows;
  const cells = tokens.slice(index);

  if (cells.length !== expected) {
    throw RasterError.fromMalformed(
      source,
      `expected ${expected} cell values (${header.ncols}x${header.nrows}), found ${cells.length}`
    );
  }

  const values = new Float64Array(expected);
  cells.forEach((raw, i) => {
    values[i] = parseNumber(source, `cell ${i}`, raw);
  });

  return { ...header, values };
}
