#!/usr/bin/env node
import chalk from 'chalk';
import { createProgram } from '../program.js';
import { isCommandRuntimeError, renderCommandRuntimeError } from '../lib/command-runtime.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (error) {
  if (isCommandRuntimeError(error)) {
    renderCommandRuntimeError(error);
  } else {
    console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exitCode = 1;
}
