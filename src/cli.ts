#!/usr/bin/env node
/**
 * siteresolve CLI
 *
 * Resolves free-text site references from invoices to canonical locations.
 * See commands.ts for the command set.
 */

import { createProgram } from './commands.js';

const program = createProgram();

// Show help if no command
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(process.argv);
