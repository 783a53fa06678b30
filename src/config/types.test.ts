import { resolve } from 'path';
import { createRunConfig, DEFAULT_OPTIONS, isAdvancedScenario } from './types';
import type { CircuitscapeOptions } from './types';
import { InvalidInputError } from '../utils/errors';

const base: CircuitscapeOptions = { costFile: 'cost.asc', focalPointsFile: 'pts.txt' };

describe('createRunConfig', () => {
  it('should apply defaults', () => {
    const config = createRunConfig(base);

    expect(config.outputName).toBe('circuitscape_output');
    expect(config.outputDir).toBe(process.cwd());
    expect(config.scenario).toBe('pairwise');
    expect(config.solver).toBe('cholmod');
    expect(config.removeSrcOrGnd).toBe('keepall');
    expect(config.maxParallel).toBe(0);
    expect(config.focal).toEqual({ kind: 'points', path: 'pts.txt' });
    expect(config.habitatMapIsResistance).toBe(DEFAULT_OPTIONS.habitatMapIsResistance);
  });

  it('should resolve a relative output directory', () => {
    expect(createRunConfig({ ...base, outputDir: 'out' }).outputDir).toBe(resolve('out'));
  });

  it('should return a frozen config', () => {
    expect(Object.isFrozen(createRunConfig(base))).toBe(true);
  });

  it('should keep explicit false values', () => {
    const config = createRunConfig({ ...base, habitatMapIsResistance: false, writeCumCurMapOnly: false });

    expect(config.habitatMapIsResistance).toBe(false);
    expect(config.writeCumCurMapOnly).toBe(false);
  });

  it('should require a cost file', () => {
    expect(() => createRunConfig({ ...base, costFile: '' })).toThrow('Invalid value for costFile');
  });

  it('should validate focal inputs', () => {
    expect(() => createRunConfig({ costFile: 'cost.asc' })).toThrow(InvalidInputError);
    expect(() => createRunConfig({ ...base, focalPolygonsAscii: 'patches.asc' })).toThrow('not both');
  });

  it.each([
    [{ maxParallel: -1 }, 'maxParallel'],
    [{ maxParallel: 1.5 }, 'maxParallel'],
    [{ outputName: '' }, 'outputName'],
    [{ outputName: '../escape' }, 'outputName'],
    [{ scenario: '  ' }, 'scenario'],
  ])('should reject %j', (overrides, field) => {
    expect(() => createRunConfig({ ...base, ...overrides })).toThrow(`Invalid value for ${field}`);
  });

  it('should reject values outside the enums', () => {
    // Options files are parsed JSON, so enum fields can hold any string at runtime
    const fromJson: CircuitscapeOptions = JSON.parse(
      JSON.stringify({ ...base, solver: 'lu', logLevel: 'VERBOSE', removeSrcOrGnd: 'dropall' })
    );

    expect(() => createRunConfig(fromJson)).toThrow('Invalid value for solver: "lu"');
    expect(() => createRunConfig({ ...fromJson, solver: 'cholmod' })).toThrow('Invalid value for logLevel');
    expect(() => createRunConfig({ ...fromJson, solver: 'cholmod', logLevel: 'INFO' })).toThrow(
      'Invalid value for removeSrcOrGnd'
    );
  });

  it('should reject booleans given as strings', () => {
    const fromJson: CircuitscapeOptions = JSON.parse(JSON.stringify({ ...base, parallelize: 'yes' }));

    expect(() => createRunConfig(fromJson)).toThrow('Invalid value for parallelize: "yes". Expected true or false.');
  });
});

describe('isAdvancedScenario', () => {
  it('should ignore case', () => {
    expect(isAdvancedScenario('advanced')).toBe(true);
    expect(isAdvancedScenario('ADVANCED')).toBe(true);
    expect(isAdvancedScenario('pairwise')).toBe(false);
    expect(isAdvancedScenario('one-to-all')).toBe(false);
  });
});
