#!/usr/bin/env node
import { createProgram } from './program.js';
import { handleError } from '../utils/errors.js';

async function main(): Promise<void> {
  const program = createProgram();

  if (!process.argv.slice(2).length) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch(handleError);
