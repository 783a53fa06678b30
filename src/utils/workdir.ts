/**
 * Scoped process working directory
 */

import { getLogger } from './logger.js';

/**
 * Run fn with process.cwd() set to dir. The previous directory is restored
 * whether fn returns, throws or rejects.
 */
export async function withWorkingDirectory<T>(dir: string, fn: () => Promise<T> | T): Promise<T> {
  const logger = getLogger();
  const previous = process.cwd();

  process.chdir(dir);
  logger.debug(`Working directory: ${dir}`);

  try {
    return await fn();
  } finally {
    process.chdir(previous);
    logger.debug(`Working directory restored: ${previous}`);
  }
}
