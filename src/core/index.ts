import { getLogger } from '../utils/logger.js';
import { RasterError } from '../utils/errors.js';
import { createRunConfig, writeIniFile } from '../config/index.js';
import type { CircuitscapeOptions } from '../config/index.js';
import { computeCircuitscape, requireCircuitscape } from '../julia/index.js';
import type { ComputeResult, ProcessRunner } from '../julia/index.js';
import { plotCumulativeCurrent } from '../raster/index.js';
import type { ColorRange, Extent } from '../raster/index.js';

export interface RunOptions {
  /** Call Circuitscape after writing the .ini; otherwise stop there */
  runInJulia?: boolean;
  /** Install Julia / Circuitscape when missing */
  installDeps?: boolean;
  /** Render the cumulative current map after a run */
  plot?: boolean;
  plotExtent?: Extent;
  plotZlim?: ColorRange;
  /** Echo the .ini lines to the console */
  printIniLines?: boolean;
  juliaBinary?: string;
  runner?: ProcessRunner;
}

export interface RunResult extends ComputeResult {
  /** PNG written by the plot step, if any */
  plotPath?: string;
}

/**
 * Write the .ini for options and, when asked, run Circuitscape on it and
 * plot the cumulative current map. Returns undefined when the run is
 * skipped.
 */
export async function runCircuitscape(
  options: CircuitscapeOptions,
  runOptions: RunOptions = {}
): Promise<RunResult | undefined> {
  const logger = getLogger();
  const { runInJulia = true, plot = false, printIniLines = false, installDeps = false } = runOptions;

  logger.phaseStart('validate');
  const config = createRunConfig(options);

  logger.phaseStart('write config');
  const ini = await writeIniFile(config);
  logger.info(`Wrote Circuitscape config to: ${ini.path}`);

  if (printIniLines) {
    logger.raw('=== Circuitscape .INI contents ===');
    ini.lines.forEach((line) => logger.raw(line));
    logger.raw('=== End of .INI ===\n');
  }

  if (!runInJulia) {
    logger.info('Circuitscape .ini file created. Rerun with --run to compute automatically.');
    return undefined;
  }

  const juliaOptions = { runner: runOptions.runner, juliaBinary: runOptions.juliaBinary };

  logger.phaseStart('dependencies');
  await requireCircuitscape({ ...juliaOptions, install: installDeps });

  logger.info(`Running Circuitscape with scenario='${config.scenario}' for point_file='${config.focal.path}' ...`);
  const result = await computeCircuitscape(ini.path, { ...juliaOptions, workingDir: config.outputDir });
  logger.phaseComplete('Circuitscape', `${result.output.length} output lines`);

  if (!plot) {
    return result;
  }

  logger.phaseStart('plot');
  try {
    const plotPath = await plotCumulativeCurrent(config.outputDir, config.outputName, {
      extent: runOptions.plotExtent,
      zlim: runOptions.plotZlim,
    });
    return { ...result, plotPath };
  } catch (error) {
    if (error instanceof RasterError) {
      logger.warn(`Skipping plot: ${error.message}`);
      return result;
    }
    throw error;
  }
}

export { createRunConfig, writeIniFile } from '../config/index.js';
export type { CircuitscapeOptions, RunConfig } from '../config/index.js';
export type { ComputeResult } from '../julia/index.js';
