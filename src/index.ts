#!/usr/bin/env node

// pinned-region - Entry Point

import { createCLI } from './cli/index.js';
import { handleError, isDebugEnabled } from './utils/error-handler.js';

async function main(): Promise<void> {
  try {
    const program = createCLI();
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, {
      context: 'main',
      includeStack: isDebugEnabled(),
    });
    process.exitCode = 1;
  }
}

// Handle unhandled promise rejections globally
process.on('unhandledRejection', (reason) => {
  handleError(reason, {
    context: 'unhandledRejection',
    includeStack: isDebugEnabled(),
  });
  process.exitCode = 1;
});

// Handle uncaught exceptions globally
process.on('uncaughtException', (error) => {
  handleError(error, {
    context: 'uncaughtException',
    includeStack: true, // Always show stack for uncaught exceptions
    exitProcess: true,
    exitCode: 1,
  });
});

void main();
