import { cropRaster, getExtent, valueRange } from './crop';
import type { Raster } from './types';
import { RasterError } from '../utils/errors';

function grid(): Raster {
  return {
    ncols: 3,
    nrows: 2,
    xll: 100,
    yll: 200,
    cellSize: 10,
    nodata: -9999,
    values: Float64Array.from([1, 2, 3, 4, -9999, 6]),
  };
}

describe('crop', () => {
  it('should compute the extent', () => {
    expect(getExtent(grid())).toEqual([100, 130, 200, 220]);
  });

  it('should keep cells whose centres fall inside the extent', () => {
    const cropped = cropRaster(grid(), [110, 130, 210, 220]);

    expect(cropped).toMatchObject({ ncols: 2, nrows: 1, xll: 110, yll: 210, cellSize: 10, nodata: -9999 });
    expect(Array.from(cropped.values)).toEqual([2, 3]);
  });

  it('should keep the southern row for a southern extent', () => {
    const cropped = cropRaster(grid(), [100, 112, 200, 209]);

    expect(cropped).toMatchObject({ ncols: 1, nrows: 1, xll: 100, yll: 200 });
    expect(Array.from(cropped.values)).toEqual([4]);
  });

  it('should return the same cells for an enclosing extent', () => {
    const cropped = cropRaster(grid(), [0, 1000, 0, 1000]);

    expect(getExtent(cropped)).toEqual([100, 130, 200, 220]);
    expect(Array.from(cropped.values)).toEqual([1, 2, 3, 4, -9999, 6]);
  });

  it('should reject an extent that misses the raster', () => {
    expect(() => cropRaster(grid(), [0, 50, 0, 50])).toThrow(RasterError);
    expect(() => cropRaster(grid(), [0, 50, 0, 50])).toThrow('Plot extent [0, 50, 0, 50] does not overlap the raster');
  });

  it('should ignore nodata when computing the value range', () => {
    expect(valueRange(grid())).toEqual([1, 6]);
  });

  it('should return null when every cell is nodata', () => {
    const empty: Raster = { ...grid(), values: Float64Array.from([-9999, NaN, -9999, -9999, -9999, -9999]) };
    expect(valueRange(empty)).toBeNull();
  });
});
