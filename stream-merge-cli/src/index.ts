#!/usr/bin/env node

/**
 * merge-lines CLI - Main entry point
 */

import { createLinesCommand } from './commands/lines.js';

/**
 * Main CLI program
 */
function main() {
  const program = createLinesCommand();

  program.version('0.1.0');

  // Parse arguments
  program.parse(process.argv);
}

main();
