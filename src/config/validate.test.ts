/**
 * Tests for focal input validation
 */

import { validateFocalInput } from './validate';
import { InvalidInputError, getExitCode } from '../utils/errors';

describe('validateFocalInput', () => {
  it('should accept a points file on its own', () => {
    expect(validateFocalInput('pts.txt', undefined)).toEqual({ kind: 'points', path: 'pts.txt' });
  });

  it('should accept an ASCII polygon raster on its own', () => {
    expect(validateFocalInput(undefined, 'patches.asc')).toEqual({ kind: 'polygons', path: 'patches.asc' });
  });

  it('should reject both inputs together', () => {
    expect(() => validateFocalInput('pts.txt', 'patches.asc')).toThrow(InvalidInputError);
    expect(() => validateFocalInput('pts.txt', 'patches.asc')).toThrow('not both');
  });

  it('should reject a call with neither input', () => {
    expect(() => validateFocalInput()).toThrow('No focal node input provided');
  });

  it('should treat empty strings as not supplied', () => {
    expect(() => validateFocalInput('', '')).toThrow('No focal node input provided');
    expect(validateFocalInput('', 'patches.asc')).toEqual({ kind: 'polygons', path: 'patches.asc' });
  });

  it('should reject shapefiles as polygon input', () => {
    expect(() => validateFocalInput(undefined, 'patches.shp')).toThrow(InvalidInputError);
    expect(() => validateFocalInput(undefined, 'patches.shp')).toThrow('integer-coded ASCII file');
  });

  it('should match vector extensions case-insensitively', () => {
    expect(() => validateFocalInput(undefined, 'PATCHES.SHP')).toThrow(InvalidInputError);
    expect(() => validateFocalInput(undefined, 'patches.GeoJSON')).toThrow(InvalidInputError);
  });

  it('should not check the extension of a points file', () => {
    expect(validateFocalInput('points.shp', undefined)).toEqual({ kind: 'points', path: 'points.shp' });
  });

  it('should carry exit code 1 on usage errors', () => {
    let caught: unknown;
    try {
      validateFocalInput();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidInputError);
    expect(getExitCode(caught)).toBe(1);
  });
});
