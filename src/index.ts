#!/usr/bin/env node

import { createCLI } from './cli/commands.js';
import { ErrorHandler } from './utils/errorHandler.js';

async function main(): Promise<void> {
  ErrorHandler.setupGlobalHandlers();

  try {
    await createCLI().parseAsync();
  } catch (error) {
    ErrorHandler.handle(error);
    process.exitCode = 1;
  }
}

void main();
