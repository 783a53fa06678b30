/**
 * Julia runtime and Circuitscape package: presence checks, opt-in install,
 * and the compute call
 */

import { getLogger } from '../utils/logger.js';
import { DependencyError, SolverError } from '../utils/errors.js';
import { withWorkingDirectory } from '../utils/workdir.js';
import { SpawnProcessRunner } from './process.js';
import type { ProcessResult, ProcessRunner, RunProcessOptions } from './process.js';

export const CIRCUITSCAPE_PACKAGE = 'Circuitscape';
export const DEFAULT_JULIA_BINARY = 'julia';
export const JULIAUP_BINARY = 'juliaup';

const PACKAGE_PROBE = `exit(Base.find_package("${CIRCUITSCAPE_PACKAGE}") === nothing ? 1 : 0)`;
const PACKAGE_INSTALL = `import Pkg; Pkg.add("${CIRCUITSCAPE_PACKAGE}")`;
const COMPUTE_SCRIPT = `using ${CIRCUITSCAPE_PACKAGE}; compute(ARGS[1])`;

/** Lines of solver output kept on a SolverError */
const ERROR_TAIL_LINES = 20;

export type DependencyStatus =
  | { status: 'already-present'; detail: string }
  | { status: 'installed'; detail: string }
  | { status: 'failed'; reason: string };

export interface JuliaOptions {
  runner?: ProcessRunner;
  /** Julia executable; defaults to $JULIA_BINARY, then "julia" */
  juliaBinary?: string;
}

export interface EnsureOptions extends JuliaOptions {
  /** Attempt installation when missing */
  install?: boolean;
}

export interface ComputeOptions extends JuliaOptions {
  /** Directory Circuitscape runs in; relative paths in the .ini resolve against it */
  workingDir: string;
}

export interface ComputeResult {
  iniPath: string;
  exitCode: number;
  output: string[];
}

export function resolveJuliaBinary(options: JuliaOptions = {}): string {
  return options.juliaBinary ?? process.env.JULIA_BINARY ?? DEFAULT_JULIA_BINARY;
}

function resolveRunner(options: JuliaOptions): ProcessRunner {
  return options.runner ?? new SpawnProcessRunner();
}

/** Exit code reported for a command that could not be started */
const NOT_FOUND_EXIT_CODE = 127;

/**
 * Run a probe; a command that cannot be started counts as a failed probe
 */
async function probe(
  runner: ProcessRunner,
  command: string,
  args: string[],
  runOptions?: RunProcessOptions
): Promise<ProcessResult> {
  try {
    return await runner.run(command, args, runOptions);
  } catch (error) {
    if (error instanceof DependencyError) {
      return { exitCode: NOT_FOUND_EXIT_CODE, lines: [error.details ?? error.message] };
    }
    throw error;
  }
}

function describeFailure(result: ProcessResult): string {
  const tail = result.lines[result.lines.length - 1];
  return tail ? `exit code ${result.exitCode}: ${tail}` : `exit code ${result.exitCode}`;
}

function succeeded(result: ProcessResult): boolean {
  return result.exitCode === 0;
}

async function probeJulia(runner: ProcessRunner, julia: string): Promise<ProcessResult> {
  getLogger().debug(`Probing ${julia} --version`);
  return probe(runner, julia, ['--version']);
}

/**
 * Check that the Julia runtime can be started, installing it through
 * juliaup when asked to
 */
export async function ensureJulia(options: EnsureOptions = {}): Promise<DependencyStatus> {
  const logger = getLogger();
  const runner = resolveRunner(options);
  const julia = resolveJuliaBinary(options);

  const first = await probeJulia(runner, julia);
  if (succeeded(first)) {
    return { status: 'already-present', detail: first.lines[0] ?? julia };
  }

  if (!options.install) {
    return { status: 'failed', reason: describeFailure(first) };
  }

  logger.info('Julia not found. Installing now with juliaup...');
  const install = await probe(runner, JULIAUP_BINARY, ['add', 'release'], {
    onLine: (line) => logger.debug(line),
  });
  if (!succeeded(install)) {
    return { status: 'failed', reason: `juliaup add release failed (${describeFailure(install)})` };
  }

  const second = await probeJulia(runner, julia);
  if (!succeeded(second)) {
    return { status: 'failed', reason: `Julia still unavailable after install (${describeFailure(second)})` };
  }

  return { status: 'installed', detail: second.lines[0] ?? julia };
}

/**
 * Check that the Circuitscape package is in the active Julia environment,
 * adding it with Pkg when asked to
 */
export async function ensureCircuitscape(options: EnsureOptions = {}): Promise<DependencyStatus> {
  const logger = getLogger();
  const runner = resolveRunner(options);
  const julia = resolveJuliaBinary(options);

  logger.debug(`Probing for Julia package ${CIRCUITSCAPE_PACKAGE}`);
  const first = await probe(runner, julia, ['-e', PACKAGE_PROBE]);
  if (succeeded(first)) {
    return { status: 'already-present', detail: CIRCUITSCAPE_PACKAGE };
  }

  if (!options.install) {
    return { status: 'failed', reason: describeFailure(first) };
  }

  logger.info(`Installing Julia package ${CIRCUITSCAPE_PACKAGE}...`);
  const install = await probe(runner, julia, ['-e', PACKAGE_INSTALL], {
    onLine: (line) => logger.raw(line),
  });
  if (!succeeded(install)) {
    return { status: 'failed', reason: `Pkg.add failed (${describeFailure(install)})` };
  }

  return { status: 'installed', detail: CIRCUITSCAPE_PACKAGE };
}

/**
 * Ensure both dependencies; any failure becomes a DependencyError
 */
export async function requireCircuitscape(options: EnsureOptions = {}): Promise<void> {
  const logger = getLogger();
  const runner = resolveRunner(options);
  const shared: EnsureOptions = { ...options, runner };

  const julia = await ensureJulia(shared);
  if (julia.status === 'failed') {
    throw DependencyError.fromMissingJulia(julia.reason);
  }
  logger.debug(`Julia ${julia.status}: ${julia.detail}`);

  const pkg = await ensureCircuitscape(shared);
  if (pkg.status === 'failed') {
    throw DependencyError.fromMissingPackage(CIRCUITSCAPE_PACKAGE, pkg.reason);
  }
  logger.debug(`${CIRCUITSCAPE_PACKAGE} ${pkg.status}`);
}

/**
 * Call Circuitscape's compute entry point with the .ini path as its only
 * argument. Output lines are forwarded to the logger as they arrive.
 */
export async function computeCircuitscape(iniPath: string, options: ComputeOptions): Promise<ComputeResult> {
  const logger = getLogger();
  const runner = resolveRunner(options);
  const julia = resolveJuliaBinary(options);

  const result = await withWorkingDirectory(options.workingDir, () =>
    runner.run(julia, ['-e', COMPUTE_SCRIPT, iniPath], {
      onLine: (line) => logger.raw(line),
    })
  );

  if (result.exitCode !== 0) {
    throw SolverError.fromExit(iniPath, result.exitCode, result.lines.slice(-ERROR_TAIL_LINES));
  }

  return { iniPath, exitCode: result.exitCode, output: result.lines };
}
