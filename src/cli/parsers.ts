import { InvalidArgumentError } from 'commander';
import type { ColorRange, Extent } from '../raster/index.js';

export function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);

  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got: ${value}`);
  }
  if (parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got: ${parsed}`);
  }

  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseNonNegativeInteger(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer, got: 0');
  }
  return parsed;
}

function parseNumberList(value: string, count: number, usage: string): number[] {
  const parts = value.split(',').map((part) => part.trim());
  const numbers = parts.map(Number);

  if (parts.length !== count || parts.some((part) => part === '') || numbers.some(Number.isNaN)) {
    throw new InvalidArgumentError(`Expected ${usage}, got: ${value}`);
  }

  return numbers;
}

/**
 * "xmin,xmax,ymin,ymax"
 */
export function parseExtent(value: string): Extent {
  const [xmin, xmax, ymin, ymax] = parseNumberList(value, 4, 'xmin,xmax,ymin,ymax');

  if (xmin >= xmax || ymin >= ymax) {
    throw new InvalidArgumentError(`Extent minimums must be below maximums, got: ${value}`);
  }

  return [xmin, xmax, ymin, ymax];
}

/**
 * "min,max"
 */
export function parseColorRange(value: string): ColorRange {
  const [min, max] = parseNumberList(value, 2, 'min,max');

  if (min >= max) {
    throw new InvalidArgumentError(`Colour range minimum must be below maximum, got: ${value}`);
  }

  return [min, max];
}
