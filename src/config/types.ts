/**
 * Circuitscape run options, their defaults and validation
 */

import { resolve } from 'path';
import { InvalidInputError } from '../utils/errors.js';
import { isValidOutputName } from '../utils/paths.js';
import { validateFocalInput } from './validate.js';
import type { FocalInput } from './validate.js';

export const SOLVERS = ['cholmod', 'cg+amg'] as const;
export type Solver = (typeof SOLVERS)[number];

export const REMOVAL_POLICIES = ['keepall', 'rmvsrc', 'rmvgnd', 'rmvall'] as const;
export type RemovalPolicy = (typeof REMOVAL_POLICIES)[number];

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Everything a caller may set. Only costFile is required; one of the two
 * focal inputs must be given.
 */
export interface CircuitscapeOptions {
  costFile: string;
  focalPointsFile?: string;
  focalPolygonsAscii?: string;

  outputName?: string;
  /** Resolved to an absolute path; defaults to the current directory */
  outputDir?: string;

  /** "pairwise" or "advanced"; matched case-insensitively */
  scenario?: string;

  habitatMapIsResistance?: boolean;
  connectFourNeighborsOnly?: boolean;
  connectUsingAvgResistances?: boolean;

  parallelize?: boolean;
  maxParallel?: number;
  solver?: Solver;
  preemptiveMemoryRelease?: boolean;
  printTimings?: boolean;

  logLevel?: LogLevel;
  screenprintLog?: boolean;

  writeCurMaps?: boolean;
  writeCumCurMapOnly?: boolean;
  writeVoltMaps?: boolean;
  logTransformMaps?: boolean;
  compressGrids?: boolean;

  groundFileIsResistance?: boolean;
  removeSrcOrGnd?: RemovalPolicy;
  groundFile?: string;
  sourceFile?: string;
  useDirectGrounds?: boolean;
  useUnitCurrents?: boolean;
}

export type OptionKey = keyof CircuitscapeOptions;

/**
 * Options after defaults are applied and the focal input is resolved
 */
export interface RunConfig extends Readonly<Required<Omit<CircuitscapeOptions, 'focalPointsFile' | 'focalPolygonsAscii'>>> {
  readonly focal: FocalInput;
}

export const DEFAULT_OUTPUT_NAME = 'circuitscape_output';

type Defaults = Omit<RunConfig, 'costFile' | 'focal' | 'outputDir'>;

export const DEFAULT_OPTIONS: Defaults = {
  outputName: DEFAULT_OUTPUT_NAME,
  scenario: 'pairwise',
  habitatMapIsResistance: true,
  connectFourNeighborsOnly: false,
  connectUsingAvgResistances: true,
  parallelize: false,
  maxParallel: 0,
  solver: 'cholmod',
  preemptiveMemoryRelease: false,
  printTimings: true,
  logLevel: 'INFO',
  screenprintLog: true,
  writeCurMaps: true,
  writeCumCurMapOnly: true,
  writeVoltMaps: false,
  logTransformMaps: false,
  compressGrids: false,
  groundFileIsResistance: true,
  removeSrcOrGnd: 'keepall',
  groundFile: '',
  sourceFile: '',
  useDirectGrounds: false,
  useUnitCurrents: false,
};

const BOOLEAN_KEYS = [
  'habitatMapIsResistance',
  'connectFourNeighborsOnly',
  'connectUsingAvgResistances',
  'parallelize',
  'preemptiveMemoryRelease',
  'printTimings',
  'screenprintLog',
  'writeCurMaps',
  'writeCumCurMapOnly',
  'writeVoltMaps',
  'logTransformMaps',
  'compressGrids',
  'groundFileIsResistance',
  'useDirectGrounds',
  'useUnitCurrents',
] as const satisfies readonly OptionKey[];

const STRING_KEYS = [
  'costFile',
  'focalPointsFile',
  'focalPolygonsAscii',
  'outputName',
  'outputDir',
  'scenario',
  'groundFile',
  'sourceFile',
] as const satisfies readonly OptionKey[];

export const OPTION_KEYS: readonly OptionKey[] = [
  ...BOOLEAN_KEYS,
  ...STRING_KEYS,
  'maxParallel',
  'solver',
  'logLevel',
  'removeSrcOrGnd',
];

export function isAdvancedScenario(scenario: string): boolean {
  return scenario.toLowerCase() === 'advanced';
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && (values as readonly string[]).includes(value);
}

function checkTypes(options: CircuitscapeOptions): void {
  for (const key of BOOLEAN_KEYS) {
    const value = options[key];
    if (value !== undefined && typeof value !== 'boolean') {
      throw InvalidInputError.fromInvalidOption(key, value, 'true or false');
    }
  }

  for (const key of STRING_KEYS) {
    const value = options[key];
    if (value !== undefined && typeof value !== 'string') {
      throw InvalidInputError.fromInvalidOption(key, value, 'a string');
    }
  }
}

/**
 * Apply defaults and validate. Throws InvalidInputError before anything
 * touches the filesystem.
 */
export function createRunConfig(options: CircuitscapeOptions): RunConfig {
  checkTypes(options);

  if (!options.costFile) {
    throw InvalidInputError.fromInvalidOption('costFile', options.costFile, 'a path to a resistance or conductance raster');
  }

  const focal = validateFocalInput(options.focalPointsFile, options.focalPolygonsAscii);

  const scenario = options.scenario ?? DEFAULT_OPTIONS.scenario;
  if (scenario.trim() === '') {
    throw InvalidInputError.fromInvalidOption('scenario', scenario, 'a Circuitscape scenario such as "pairwise" or "advanced"');
  }

  const outputName = options.outputName ?? DEFAULT_OPTIONS.outputName;
  if (!isValidOutputName(outputName)) {
    throw InvalidInputError.fromInvalidOption('outputName', outputName, 'a file name without path separators');
  }

  const maxParallel = options.maxParallel ?? DEFAULT_OPTIONS.maxParallel;
  if (!Number.isInteger(maxParallel) || maxParallel < 0) {
    throw InvalidInputError.fromInvalidOption('maxParallel', maxParallel, 'a non-negative integer');
  }

  const solver = options.solver ?? DEFAULT_OPTIONS.solver;
  if (!isOneOf(SOLVERS, solver)) {
    throw InvalidInputError.fromInvalidOption('solver', solver, SOLVERS.join(' or '));
  }

  const logLevel = options.logLevel ?? DEFAULT_OPTIONS.logLevel;
  if (!isOneOf(LOG_LEVELS, logLevel)) {
    throw InvalidInputError.fromInvalidOption('logLevel', logLevel, `one of ${LOG_LEVELS.join(', ')}`);
  }

  const removeSrcOrGnd = options.removeSrcOrGnd ?? DEFAULT_OPTIONS.removeSrcOrGnd;
  if (!isOneOf(REMOVAL_POLICIES, removeSrcOrGnd)) {
    throw InvalidInputError.fromInvalidOption('removeSrcOrGnd', removeSrcOrGnd, `one of ${REMOVAL_POLICIES.join(', ')}`);
  }

  const config: RunConfig = {
    habitatMapIsResistance: options.habitatMapIsResistance ?? DEFAULT_OPTIONS.habitatMapIsResistance,
    connectFourNeighborsOnly: options.connectFourNeighborsOnly ?? DEFAULT_OPTIONS.connectFourNeighborsOnly,
    connectUsingAvgResistances: options.connectUsingAvgResistances ?? DEFAULT_OPTIONS.connectUsingAvgResistances,
    parallelize: options.parallelize ?? DEFAULT_OPTIONS.parallelize,
    preemptiveMemoryRelease: options.preemptiveMemoryRelease ?? DEFAULT_OPTIONS.preemptiveMemoryRelease,
    printTimings: options.printTimings ?? DEFAULT_OPTIONS.printTimings,
    screenprintLog: options.screenprintLog ?? DEFAULT_OPTIONS.screenprintLog,
    writeCurMaps: options.writeCurMaps ?? DEFAULT_OPTIONS.writeCurMaps,
    writeCumCurMapOnly: options.writeCumCurMapOnly ?? DEFAULT_OPTIONS.writeCumCurMapOnly,
    writeVoltMaps: options.writeVoltMaps ?? DEFAULT_OPTIONS.writeVoltMaps,
    logTransformMaps: options.logTransformMaps ?? DEFAULT_OPTIONS.logTransformMaps,
    compressGrids: options.compressGrids ?? DEFAULT_OPTIONS.compressGrids,
    groundFileIsResistance: options.groundFileIsResistance ?? DEFAULT_OPTIONS.groundFileIsResistance,
    groundFile: options.groundFile ?? DEFAULT_OPTIONS.groundFile,
    sourceFile: options.sourceFile ?? DEFAULT_OPTIONS.sourceFile,
    useDirectGrounds: options.useDirectGrounds ?? DEFAULT_OPTIONS.useDirectGrounds,
    useUnitCurrents: options.useUnitCurrents ?? DEFAULT_OPTIONS.useUnitCurrents,
    costFile: options.costFile,
    outputDir: resolve(options.outputDir ?? process.cwd()),
    outputName,
    scenario,
    maxParallel,
    solver,
    logLevel,
    removeSrcOrGnd,
    focal,
  };

  return Object.freeze(config);
}
