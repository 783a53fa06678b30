/**
 * CLI argument parsing types
 */

import type { LogLevel, RemovalPolicy, Solver } from '../config/index.js';
import type { ColorRange, Extent } from '../raster/index.js';

export interface CliOptions {
  focalPoints?: string;
  focalPolygons?: string;
  outputName?: string;
  outputDir?: string;
  scenario?: string;

  conductance?: boolean;
  fourNeighbors?: boolean;
  avgResistances: boolean;

  parallelize?: boolean;
  maxParallel?: number;
  solver?: Solver;
  preemptiveMemoryRelease?: boolean;
  printTimings: boolean;

  logLevel?: LogLevel;
  screenprintLog: boolean;

  curMaps: boolean;
  cumCurMapOnly: boolean;
  voltMaps?: boolean;
  logTransformMaps?: boolean;
  compressGrids?: boolean;

  groundFile?: string;
  sourceFile?: string;
  groundConductance?: boolean;
  removeSrcOrGnd?: RemovalPolicy;
  directGrounds?: boolean;
  unitCurrents?: boolean;

  optionsFile?: string;

  run?: boolean;
  installDeps?: boolean;
  julia?: string;
  plot?: boolean;
  plotExtent?: Extent;
  plotZlim?: ColorRange;
  printIni?: boolean;
  verbose?: boolean;
}

export interface PlotCliOptions {
  out?: string;
  extent?: Extent;
  zlim?: ColorRange;
  title?: string;
  scale?: number;
  verbose?: boolean;
}
