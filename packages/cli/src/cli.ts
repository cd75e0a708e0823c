#!/usr/bin/env node
/**
 * plugseal CLI entry point
 */

import { createProgram } from './program.js';

const program = createProgram();

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
