import chalk from 'chalk';
import type { Command } from 'commander';
import { createSQLiteAdapter } from '@roster/sqlite';
import type { DatabaseAdapter } from '@roster/core/db';
import { people } from '@roster/core/repos';
import { loadConfig, resolveDatabaseUrl } from './config.js';
import { createLogger } from './logger.js';

interface ExitCommandErrorOptions {
  json?: boolean;
  message: string;
  humanMessage?: string;
  humanDetails?: string[];
}

export class CommandRuntimeError extends Error {
  readonly json: boolean;
  readonly humanMessage?: string;
  readonly humanDetails?: string[];

  constructor(options: ExitCommandErrorOptions) {
    super(options.message);
    this.name = 'CommandRuntimeError';
    this.json = options.json ?? false;
    this.humanMessage = options.humanMessage;
    this.humanDetails = options.humanDetails;
  }
}

export function isCommandRuntimeError(error: unknown): error is CommandRuntimeError {
  return error instanceof CommandRuntimeError;
}

/** Where commands write their output. Tests swap in collectors. */
export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function renderCommandRuntimeError(error: CommandRuntimeError, io: CommandIO = consoleIO): void {
  if (error.json) {
    io.out(JSON.stringify({ success: false, error: error.message }));
    return;
  }

  io.err(chalk.red(`✗ ${error.humanMessage ?? error.message}`));

  for (const detail of error.humanDetails ?? []) {
    io.err(detail);
  }
}

export function exitCommandError(options: ExitCommandErrorOptions): never {
  throw new CommandRuntimeError(options);
}

export type GlobalOptions = {
  db?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export interface CommandContext {
  cwd: string;
  io: CommandIO;
  program: Command;
}

/**
 * Open the configured database for one command and close it afterwards.
 */
export async function withCommandAdapter<T>(
  ctx: CommandContext,
  callback: (adapter: DatabaseAdapter) => Promise<T>,
): Promise<T> {
  const globals = ctx.program.opts<GlobalOptions>();
  const config = loadConfig(ctx.cwd);
  const logger = createLogger({
    verbose: globals.verbose,
    quiet: globals.quiet,
    output: ctx.io.err,
  });

  const adapter = createSQLiteAdapter({
    url: resolveDatabaseUrl(ctx.cwd, globals.db, config),
    walMode: config.database.walMode,
    logger,
  });
  adapter.configureLogging({
    ...config.logging,
    ...(globals.verbose ? { logAll: true } : {}),
  });
  logger.debug(`database: ${adapter.dbPath}`);

  try {
    return await callback(adapter);
  } finally {
    await adapter.close();
  }
}

export async function ensureTableOrExit(adapter: DatabaseAdapter, json?: boolean): Promise<void> {
  if (await people.tableExists(adapter)) {
    return;
  }
  exitCommandError({
    json,
    message: 'Table person does not exist',
    humanMessage: 'Table person does not exist. Run: roster create-table',
  });
}
