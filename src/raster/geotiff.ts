import { fromArrayBuffer } from 'geotiff';
import { RasterError } from '../utils/errors.js';
import type { Raster } from './types.js';

/**
 * Decode the first band of a GeoTIFF. Cells are assumed square; the x
 * resolution is used as the cell size.
 */
export async function readGeoTiff(data: Buffer, source: string = '<geotiff>'): Promise<Raster> {
  try {
    const arrayBuffer = new ArrayBuffer(data.byteLength);
    new Uint8Array(arrayBuffer).set(data);
    const tiff = await fromArrayBuffer(arrayBuffer);
    const image = await tiff.getImage();

    const ncols = image.getWidth();
    const nrows = image.getHeight();
    const [originX, originY] = image.getOrigin();
    const [resX, resY] = image.getResolution();

    const rasters = await image.readRasters({ samples: [0] });
    const band = Array.isArray(rasters) ? rasters[0] : rasters;
    if (!band) {
      throw RasterError.fromMalformed(source, 'no raster bands');
    }

    const cellSize = Math.abs(resX);
    return {
      ncols,
      nrows,
      xll: originX,
      yll: originY - nrows * Math.abs(resY),
      cellSize,
      nodata: image.getGDALNoData(),
      values: Float64Array.from(band),
    };
  } catch (error) {
    if (error instanceof RasterError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw RasterError.fromMalformed(source, message);
  }
}
