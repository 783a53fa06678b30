/**
 * Error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code (1-4)
 * - message: user-facing message
 * - details: optional verbose details
 */

import { getLogger } from './logger.js';

/**
 * Base error class with exit code
 */
export abstract class CircuitscapeRunError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, CircuitscapeRunError.prototype);
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: ambiguous or missing focal inputs, bad option values, bad options file
 */
export class InvalidInputError extends CircuitscapeRunError {
  readonly code = 1;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }

  static fromBothFocalInputs(): InvalidInputError {
    return new InvalidInputError(
      'Please specify EITHER `focal_points_file` OR `focal_polygons_ascii`, not both.',
      'Use --focal-points for a [ID X Y] text file or --focal-polygons for an integer-coded ASCII raster'
    );
  }

  static fromMissingFocalInput(): InvalidInputError {
    return new InvalidInputError(
      'No focal node input provided. Supply either `focal_points_file` (points) or `focal_polygons_ascii` (integer-coded ASCII raster).'
    );
  }

  static fromVectorPolygons(path: string): InvalidInputError {
    return new InvalidInputError(
      `For pairwise polygon nodes, provide an integer-coded ASCII file, not a vector file: "${path}"`,
      'Rasterize the polygons to an ASCII grid whose cells carry the focal node IDs'
    );
  }

  static fromInvalidOption(name: string, value: unknown, expected: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid value for ${name}: ${JSON.stringify(value)}. Expected ${expected}.`
    );
  }
}

/**
 * Dependency error (exit code 2)
 * Triggered by: Julia runtime or Circuitscape package missing and not installable
 */
export class DependencyError extends CircuitscapeRunError {
  readonly code = 2;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, DependencyError.prototype);
  }

  static fromMissingJulia(reason: string): DependencyError {
    return new DependencyError(
      'Julia was not found. Install it from https://julialang.org/downloads/ or rerun with --install-deps.',
      reason
    );
  }

  static fromMissingPackage(pkg: string, reason: string): DependencyError {
    return new DependencyError(
      `The Julia package ${pkg} is not installed. Run julia -e 'import Pkg; Pkg.add("${pkg}")' or rerun with --install-deps.`,
      reason
    );
  }

  static fromSpawnFailure(command: string, reason: string): DependencyError {
    return new DependencyError(
      `Could not start "${command}". Check that it is installed and on PATH, or set JULIA_BINARY.`,
      reason
    );
  }
}

/**
 * Solver error (exit code 3)
 * Triggered by: a non-zero exit from the Circuitscape compute call
 */
export class SolverError extends CircuitscapeRunError {
  readonly code = 3;
  readonly exitCode: number;

  constructor(message: string, exitCode: number, details?: string) {
    super(message, details);
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, SolverError.prototype);
  }

  static fromExit(iniPath: string, exitCode: number, tail: string[]): SolverError {
    return new SolverError(
      `Circuitscape exited with code ${exitCode} for ${iniPath}`,
      exitCode,
      tail.length > 0 ? tail.join('\n') : undefined
    );
  }
}

/**
 * Raster error (exit code 4)
 * Triggered by: malformed output rasters, unsupported raster formats, empty crops
 */
export class RasterError extends CircuitscapeRunError {
  readonly code = 4;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, RasterError.prototype);
  }

  static fromMalformed(source: string, reason: string): RasterError {
    return new RasterError(`Could not read raster ${source}: ${reason}`);
  }

  static fromUnsupportedFormat(path: string): RasterError {
    return new RasterError(
      `Unsupported raster format: ${path}`,
      'Supported formats are ESRI ASCII grids (.asc) and GeoTIFF (.tif, .tiff)'
    );
  }

  static fromEmptyCrop(extent: readonly number[]): RasterError {
    return new RasterError(
      `Plot extent [${extent.join(', ')}] does not overlap the raster`
    );
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CircuitscapeRunError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof CircuitscapeRunError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
