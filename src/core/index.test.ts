/**
 * Tests for the caller-facing entry point
 * Julia is replaced by FakeProcessRunner
 */

import { jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { runCircuitscape } from './index';
import { FakeProcessRunner, exit, ok } from '../test-utils/fake-runner';
import { InvalidInputError, SolverError } from '../utils/errors';
import { resetLogger } from '../utils/logger';

const CUM_CURMAP = 'ncols 2\nnrows 2\nxllcorner 0\nyllcorner 0\ncellsize 1\n0 1\n2 3\n';

function healthyJulia(): FakeProcessRunner {
  return new FakeProcessRunner((command, args) => {
    if (args[0] === '--version') return ok('julia version 1.10.4');
    if (args[1]?.startsWith('exit(Base.find_package')) return ok();
    if (args[1]?.startsWith('using Circuitscape')) return ok('[ Info: 1 pair solved');
    return exit(1, `unexpected ${command} ${args.join(' ')}`);
  });
}

describe('runCircuitscape', () => {
  let tempDir: string;
  let original: string;
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;

  beforeEach(async () => {
    resetLogger();
    original = process.cwd();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'circuitscape-core-test-')));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    process.chdir(original);
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const baseOptions = () => ({
    costFile: 'cost.asc',
    focalPointsFile: 'pts.txt',
    outputName: 'run1',
    outputDir: tempDir,
  });

  it('should only write the .ini when the run is disabled', async () => {
    const runner = healthyJulia();

    const result = await runCircuitscape(baseOptions(), { runInJulia: false, runner });

    expect(result).toBeUndefined();
    expect(runner.calls).toHaveLength(0);
    expect(await fs.readdir(tempDir)).toEqual(['run1.ini']);
    expect(logSpy).toHaveBeenCalledWith(`[circuitscape] Wrote Circuitscape config to: ${path.join(tempDir, 'run1.ini')}`);
  });

  it('should write nothing when the focal inputs are invalid', async () => {
    const runner = healthyJulia();
    const options = { ...baseOptions(), focalPolygonsAscii: 'patches.asc' };

    await expect(runCircuitscape(options, { runner })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(runCircuitscape({ ...baseOptions(), focalPointsFile: undefined }, { runner })).rejects.toThrow(
      'No focal node input provided'
    );
    await expect(
      runCircuitscape({ ...baseOptions(), focalPointsFile: undefined, focalPolygonsAscii: 'p.shp' }, { runner })
    ).rejects.toThrow('not a vector file');

    expect(await fs.readdir(tempDir)).toEqual([]);
    expect(runner.calls).toHaveLength(0);
  });

  it('should print the .ini lines between markers', async () => {
    await runCircuitscape(baseOptions(), { runInJulia: false, printIniLines: true });

    const printed = logSpy.mock.calls.map((call) => call[0]);
    const start = printed.indexOf('=== Circuitscape .INI contents ===');

    expect(start).toBeGreaterThanOrEqual(0);
    expect(printed[start + 1]).toBe('[Circuitscape mode]');
    expect(printed[start + 2]).toBe('scenario = pairwise');
    expect(printed).toContain('=== End of .INI ===\n');
  });

  it('should check dependencies, then compute in the output directory', async () => {
    const runner = healthyJulia();

    const result = await runCircuitscape(baseOptions(), { runner, juliaBinary: 'julia' });

    expect(result).toEqual({
      iniPath: path.join(tempDir, 'run1.ini'),
      exitCode: 0,
      output: ['[ Info: 1 pair solved'],
    });
    expect(runner.calls.map((call) => call.args[0] === '-e' ? call.args[1].split(';')[0] : call.args[0])).toEqual([
      '--version',
      'exit(Base.find_package("Circuitscape") === nothing ? 1 : 0)',
      'using Circuitscape',
    ]);
    expect(runner.calls[2].cwd).toBe(tempDir);
    expect(process.cwd()).toBe(original);
    expect(logSpy).toHaveBeenCalledWith("[circuitscape] Running Circuitscape with scenario='pairwise' for point_file='pts.txt' ...");
  });

  it('should propagate solver failures and restore the working directory', async () => {
    const runner = new FakeProcessRunner((_command, args) =>
      args[1]?.startsWith('using Circuitscape') ? exit(1, 'ERROR: boom') : ok('julia version 1.10.4')
    );

    await expect(runCircuitscape(baseOptions(), { runner, juliaBinary: 'julia' })).rejects.toBeInstanceOf(SolverError);
    expect(process.cwd()).toBe(original);
  });

  it('should warn instead of failing when the map to plot is missing', async () => {
    const runner = healthyJulia();

    const result = await runCircuitscape(baseOptions(), { runner, juliaBinary: 'julia', plot: true });

    expect(result?.plotPath).toBeUndefined();
    expect(result?.exitCode).toBe(0);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should plot the cumulative current map written by the run', async () => {
    const runner = healthyJulia();
    // stands in for the map Circuitscape would write
    await fs.writeFile(path.join(tempDir, 'run1_cum_curmap.asc'), CUM_CURMAP);

    const result = await runCircuitscape(baseOptions(), {
      runner,
      juliaBinary: 'julia',
      plot: true,
      plotZlim: [0, 2],
    });

    expect(result?.plotPath).toBe(path.join(tempDir, 'run1_cum_curmap.png'));
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should keep the solver result when the plot extent misses the map', async () => {
    const runner = healthyJulia();
    await fs.writeFile(path.join(tempDir, 'run1_cum_curmap.asc'), CUM_CURMAP);

    const result = await runCircuitscape(baseOptions(), {
      runner,
      juliaBinary: 'julia',
      plot: true,
      plotExtent: [100, 200, 100, 200],
    });

    expect(result).toEqual({
      iniPath: path.join(tempDir, 'run1.ini'),
      exitCode: 0,
      output: ['[ Info: 1 pair solved'],
    });
    expect(runner.calls).toHaveLength(3);
    expect(warnSpy).toHaveBeenCalledWith(
      '[circuitscape] WARNING: Skipping plot: Plot extent [100, 200, 100, 200] does not overlap the raster'
    );
    expect(await fs.readdir(tempDir)).not.toContain('run1_cum_curmap.png');
  });
});
