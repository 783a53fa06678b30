export {
  createRunConfig,
  isAdvancedScenario,
  DEFAULT_OPTIONS,
  DEFAULT_OUTPUT_NAME,
  OPTION_KEYS,
  SOLVERS,
  REMOVAL_POLICIES,
  LOG_LEVELS,
} from './types.js';
export type {
  CircuitscapeOptions,
  RunConfig,
  OptionKey,
  Solver,
  RemovalPolicy,
  LogLevel,
} from './types.js';

export { validateFocalInput } from './validate.js';
export type { FocalInput, FocalKind } from './validate.js';

export {
  buildIniSections,
  renderIniLines,
  serializeConfig,
  formatBoolean,
  formatFlag,
  SECTION_HEADERS,
} from './serialize.js';
export type { IniEntry, IniSection } from './serialize.js';

export { writeIniFile, loadOptionsFile, isOptionsObject } from './io.js';
export type { WrittenIni } from './io.js';
