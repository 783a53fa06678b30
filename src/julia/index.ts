export { SpawnProcessRunner } from './process.js';
export type { ProcessRunner, ProcessResult, RunProcessOptions } from './process.js';

export {
  ensureJulia,
  ensureCircuitscape,
  requireCircuitscape,
  computeCircuitscape,
  resolveJuliaBinary,
  CIRCUITSCAPE_PACKAGE,
  DEFAULT_JULIA_BINARY,
  JULIAUP_BINARY,
} from './runtime.js';
export type { DependencyStatus, EnsureOptions, ComputeOptions, ComputeResult, JuliaOptions } from './runtime.js';
