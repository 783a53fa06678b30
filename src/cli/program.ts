import { Command, Option } from 'commander';
import { extname } from 'path';
import type { CliOptions, PlotCliOptions } from './types.js';
import { parseColorRange, parseExtent, parseNonNegativeInteger, parsePositiveInteger } from './parsers.js';
import { runCircuitscape } from '../core/index.js';
import type { RunOptions } from '../core/index.js';
import { loadOptionsFile, LOG_LEVELS, REMOVAL_POLICIES, SOLVERS } from '../config/index.js';
import type { CircuitscapeOptions } from '../config/index.js';
import { plotRasterFile } from '../raster/index.js';
import type { PlotOptions } from '../raster/index.js';
import { getLogger } from '../utils/logger.js';
import { handleError } from '../utils/errors.js';

export interface CliHandlers {
  run: (options: CircuitscapeOptions, runOptions: RunOptions) => Promise<unknown>;
  plot: (rasterPath: string, outPath: string, options: PlotOptions) => Promise<unknown>;
  onError: (error: unknown) => void;
}

const defaultHandlers: CliHandlers = {
  run: runCircuitscape,
  plot: plotRasterFile,
  onError: handleError,
};

type IsExplicit = (key: keyof CliOptions) => boolean;

/**
 * Options-file values first, then every flag given on the command line
 */
export function toCircuitscapeOptions(
  costFile: string | undefined,
  cli: CliOptions,
  fromFile: Partial<CircuitscapeOptions>,
  explicit: IsExplicit
): CircuitscapeOptions {
  const options: CircuitscapeOptions = { ...fromFile, costFile: costFile ?? fromFile.costFile ?? '' };

  if (explicit('focalPoints')) options.focalPointsFile = cli.focalPoints;
  if (explicit('focalPolygons')) options.focalPolygonsAscii = cli.focalPolygons;
  if (explicit('outputName')) options.outputName = cli.outputName;
  if (explicit('outputDir')) options.outputDir = cli.outputDir;
  if (explicit('scenario')) options.scenario = cli.scenario;

  if (explicit('conductance')) options.habitatMapIsResistance = !cli.conductance;
  if (explicit('fourNeighbors')) options.connectFourNeighborsOnly = cli.fourNeighbors;
  if (explicit('avgResistances')) options.connectUsingAvgResistances = cli.avgResistances;

  if (explicit('parallelize')) options.parallelize = cli.parallelize;
  if (explicit('maxParallel')) options.maxParallel = cli.maxParallel;
  if (explicit('solver')) options.solver = cli.solver;
  if (explicit('preemptiveMemoryRelease')) options.preemptiveMemoryRelease = cli.preemptiveMemoryRelease;
  if (explicit('printTimings')) options.printTimings = cli.printTimings;

  if (explicit('logLevel')) options.logLevel = cli.logLevel;
  if (explicit('screenprintLog')) options.screenprintLog = cli.screenprintLog;

  if (explicit('curMaps')) options.writeCurMaps = cli.curMaps;
  if (explicit('cumCurMapOnly')) options.writeCumCurMapOnly = cli.cumCurMapOnly;
  if (explicit('voltMaps')) options.writeVoltMaps = cli.voltMaps;
  if (explicit('logTransformMaps')) options.logTransformMaps = cli.logTransformMaps;
  if (explicit('compressGrids')) options.compressGrids = cli.compressGrids;

  if (explicit('groundFile')) options.groundFile = cli.groundFile;
  if (explicit('sourceFile')) options.sourceFile = cli.sourceFile;
  if (explicit('groundConductance')) options.groundFileIsResistance = !cli.groundConductance;
  if (explicit('removeSrcOrGnd')) options.removeSrcOrGnd = cli.removeSrcOrGnd;
  if (explicit('directGrounds')) options.useDirectGrounds = cli.directGrounds;
  if (explicit('unitCurrents')) options.useUnitCurrents = cli.unitCurrents;

  return options;
}

export function toRunOptions(cli: CliOptions): RunOptions {
  return {
    runInJulia: cli.run ?? false,
    installDeps: cli.installDeps ?? false,
    juliaBinary: cli.julia,
    plot: cli.plot ?? false,
    plotExtent: cli.plotExtent,
    plotZlim: cli.plotZlim,
    printIniLines: cli.printIni ?? false,
  };
}

function defaultPlotPath(rasterPath: string): string {
  const ext = extname(rasterPath);
  return `${ext ? rasterPath.slice(0, -ext.length) : rasterPath}.png`;
}

export function createProgram(handlers: Partial<CliHandlers> = {}): Command {
  const { run, plot, onError } = { ...defaultHandlers, ...handlers };
  const program = new Command();

  program
    .name('circuitscape-run')
    .description('Write a Circuitscape .ini file, optionally run Circuitscape through Julia and plot the result')
    .version('0.1.0');

  program
    .command('run', { isDefault: true })
    .description('Write <outputDir>/<outputName>.ini and optionally run Circuitscape on it')
    .argument('[costFile]', 'Resistance or conductance raster (ASCII grid or GeoTIFF)')
    .option('--focal-points <file>', 'Focal points text file with [ID X Y] rows and no header')
    .option('--focal-polygons <file>', 'Integer-coded ASCII raster of focal polygons')
    .option('--output-name <name>', 'Base name of the .ini and Circuitscape outputs (default: circuitscape_output)')
    .option('--output-dir <dir>', 'Directory for the .ini and outputs (default: current directory)')
    .option('--scenario <scenario>', 'Circuitscape scenario: pairwise or advanced (default: pairwise)')
    .option('--conductance', 'Treat the habitat raster as conductances instead of resistances')
    .option('--four-neighbors', 'Connect four neighbours only instead of eight')
    .option('--no-avg-resistances', 'Do not average resistances on diagonal connections')
    .option('--parallelize', 'Let Circuitscape use several workers')
    .option('--max-parallel <number>', 'Maximum parallel workers, 0 for all cores', parseNonNegativeInteger)
    .addOption(new Option('--solver <solver>', 'Linear solver (default: cholmod)').choices(SOLVERS))
    .option('--preemptive-memory-release', 'Release memory between solves')
    .option('--no-print-timings', 'Do not print solver timings')
    .addOption(new Option('--log-level <level>', 'Circuitscape log level (default: INFO)').choices(LOG_LEVELS))
    .option('--no-screenprint-log', 'Do not echo the Circuitscape log to the console')
    .option('--no-cur-maps', 'Do not write per-pair current maps')
    .option('--no-cum-cur-map-only', 'Write all maps, not only the cumulative current map')
    .option('--volt-maps', 'Write voltage maps')
    .option('--log-transform-maps', 'Log-transform current maps')
    .option('--compress-grids', 'Compress output grids')
    .option('--ground-file <file>', 'Ground raster or point file (advanced mode)')
    .option('--source-file <file>', 'Source raster or point file (advanced mode)')
    .option('--ground-conductance', 'Treat ground values as conductances (advanced mode)')
    .addOption(
      new Option('--remove-src-or-gnd <policy>', 'Conflict policy for cells that are both source and ground (default: keepall)').choices(
        REMOVAL_POLICIES
      )
    )
    .option('--direct-grounds', 'Tie grounds directly to ground (advanced mode)')
    .option('--unit-currents', 'Use unit currents for sources (advanced mode)')
    .option('--options-file <file>', 'JSON file of run options; command-line flags override it')
    .option('--run', 'Run Circuitscape through Julia after writing the .ini')
    .option('--install-deps', 'Install Julia (via juliaup) and the Circuitscape package when missing')
    .option('--julia <path>', 'Julia executable (default: $JULIA_BINARY or julia)')
    .option('--plot', 'Render the cumulative current map to PNG after the run')
    .option('--plot-extent <xmin,xmax,ymin,ymax>', 'Crop the plot to this extent', parseExtent)
    .option('--plot-zlim <min,max>', 'Clip the plot colour scale', parseColorRange)
    .option('--print-ini', 'Print the .ini contents')
    .option('--verbose', 'Enable verbose logging')
    .action(async (costFile: string | undefined, options: CliOptions, command: Command) => {
      try {
        const logger = getLogger({ verbose: options.verbose ?? false });

        if (!options.run && (options.plot || options.plotExtent || options.plotZlim)) {
          logger.warn('--plot, --plot-extent and --plot-zlim only take effect with --run; nothing will be plotted.');
        }

        const fromFile = options.optionsFile ? await loadOptionsFile(options.optionsFile) : {};
        const explicit: IsExplicit = (key) => command.getOptionValueSource(key) === 'cli';

        await run(toCircuitscapeOptions(costFile, options, fromFile, explicit), toRunOptions(options));
      } catch (err) {
        onError(err);
      }
    });

  program
    .command('plot')
    .description('Render an ASCII grid or GeoTIFF raster to PNG')
    .argument('<raster>', 'Raster file (.asc, .tif, .tiff)')
    .option('--out <file>', 'PNG path (default: raster path with .png)')
    .option('--extent <xmin,xmax,ymin,ymax>', 'Crop to this extent', parseExtent)
    .option('--zlim <min,max>', 'Clip the colour scale', parseColorRange)
    .option('--title <title>', 'Plot title')
    .option('--scale <pixels>', 'Pixels per cell', parsePositiveInteger)
    .option('--verbose', 'Enable verbose logging')
    .action(async (rasterPath: string, options: PlotCliOptions) => {
      try {
        getLogger({ verbose: options.verbose ?? false });

        await plot(rasterPath, options.out ?? defaultPlotPath(rasterPath), {
          extent: options.extent,
          zlim: options.zlim,
          title: options.title ?? rasterPath,
          scale: options.scale,
        });
      } catch (err) {
        onError(err);
      }
    });

  return program;
}
