#!/usr/bin/env node

// threadpack - CLI entry point

import { CommanderError } from 'commander';
import { createCLI } from './cli/index.js';
import { handleError } from './utils/error-handler.js';

async function main(): Promise<void> {
  try {
    const program = createCLI();
    program.exitOverride();
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help, version and usage errors have already been printed by commander
      process.exit(error.exitCode);
    }

    handleError(error, { exitProcess: true });
  }
}

process.on('unhandledRejection', (reason) => {
  handleError(reason, { context: 'unhandledRejection', exitProcess: true });
});

void main();
