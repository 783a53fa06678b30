/**
 * Config IO: writing the .ini file and reading JSON options files
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { getIniPath } from '../utils/paths.js';
import { InvalidInputError } from '../utils/errors.js';
import { OPTION_KEYS } from './types.js';
import type { CircuitscapeOptions, OptionKey, RunConfig } from './types.js';
import { serializeConfig } from './serialize.js';

export interface WrittenIni {
  path: string;
  lines: string[];
}

/**
 * Serialize config and write <outputDir>/<outputName>.ini, creating the
 * directory if needed. An existing file is overwritten.
 */
export async function writeIniFile(config: RunConfig): Promise<WrittenIni> {
  const path = getIniPath(config.outputDir, config.outputName);
  const lines = serializeConfig(config);

  await mkdir(config.outputDir, { recursive: true });
  await writeFile(path, `${lines.join('\n')}\n`, 'utf-8');

  return { path, lines };
}

function isOptionKey(key: string): key is OptionKey {
  return (OPTION_KEYS as readonly string[]).includes(key);
}

/**
 * Type guard for a parsed options file. Field values are checked later by
 * createRunConfig.
 */
export function isOptionsObject(value: unknown): value is Partial<CircuitscapeOptions> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.keys(value).every(isOptionKey);
}

/**
 * Read a JSON file of CircuitscapeOptions fields
 */
export async function loadOptionsFile(path: string): Promise<Partial<CircuitscapeOptions>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Could not read options file: ${path}`, message);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Options file is not valid JSON: ${path}`, message);
  }

  if (!isOptionsObject(parsed)) {
    const unknownKeys =
      typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
        ? Object.keys(parsed).filter((key) => !isOptionKey(key))
        : [];
    throw new InvalidInputError(
      unknownKeys.length > 0
        ? `Unknown option(s) in ${path}: ${unknownKeys.join(', ')}`
        : `Options file must contain a JSON object: ${path}`
    );
  }

  return parsed;
}
