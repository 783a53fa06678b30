import { InvalidInputError } from '../utils/errors.js';
import { isVectorPath } from '../utils/paths.js';

export type FocalKind = 'points' | 'polygons';

export interface FocalInput {
  kind: FocalKind;
  /** Written verbatim as point_file */
  path: string;
}

function isSupplied(value: string | undefined): value is string {
  return value !== undefined && value !== '';
}

/**
 * Exactly one of a point list ([ID X Y] rows, no header) or an
 * integer-coded ASCII polygon raster must be given.
 */
export function validateFocalInput(pointsFile?: string, polygonsAscii?: string): FocalInput {
  const hasPoints = isSupplied(pointsFile);
  const hasPolygons = isSupplied(polygonsAscii);

  if (hasPoints && hasPolygons) {
    throw InvalidInputError.fromBothFocalInputs();
  }

  if (isSupplied(pointsFile)) {
    return { kind: 'points', path: pointsFile };
  }

  if (isSupplied(polygonsAscii)) {
    if (isVectorPath(polygonsAscii)) {
      throw InvalidInputError.fromVectorPolygons(polygonsAscii);
    }
    return { kind: 'polygons', path: polygonsAscii };
  }

  throw InvalidInputError.fromMissingFocalInput();
}
