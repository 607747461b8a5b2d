import { Command } from 'commander';
import { registerDemoCommand } from './commands/demo.js';
import { registerPeopleCommands } from './commands/people.js';
import { consoleIO, type CommandContext, type CommandIO } from './lib/command-runtime.js';

export const VERSION = '0.1.0';

export interface ProgramOptions {
  cwd?: string;
  io?: CommandIO;
  /** Throw CommanderError instead of exiting the process (all subcommands) */
  exitOverride?: boolean;
}

/**
 * Build the roster command tree.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? consoleIO;
  const program = new Command();
  if (options.exitOverride) {
    program.exitOverride();
  }

  program
    .name('roster')
    .description('Store and search people in a local SQLite database')
    .version(VERSION)
    .option('--db <path>', 'Database file (or :memory:)')
    .option('-v, --verbose', 'Log every statement')
    .option('-q, --quiet', 'Only log warnings and errors')
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  const ctx: CommandContext = {
    cwd: options.cwd ?? process.cwd(),
    io,
    program,
  };

  registerPeopleCommands(ctx);
  registerDemoCommand(ctx);

  return program;
}
