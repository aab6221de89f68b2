#!/usr/bin/env node
/**
 * BeReal Export Tool
 * CLI entry point
 */

import { createProgram, runExport, shouldRunInteractive } from './cli.js';
import { runInteractivePrompts } from './interactive.js';

async function main(): Promise<void> {
  if (shouldRunInteractive(process.argv)) {
    try {
      const options = await runInteractivePrompts();
      if (!options) {
        // User cancelled
        process.exitCode = 0;
        return;
      }
      process.exitCode = await runExport(options);
    } catch (error) {
      if (error instanceof Error && error.name === 'ExitPromptError') {
        // User pressed Ctrl+C during prompts
        console.log('\nExport cancelled.');
        process.exitCode = 0;
      } else {
        console.error('Error:', error instanceof Error ? error.message : 'Unknown error');
        process.exitCode = 1;
      }
    }
    return;
  }

  const program = createProgram();
  await program.parseAsync();
}

void main();
