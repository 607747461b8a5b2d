/**
 * Logger implementation for CLI
 */

import chalk from 'chalk';
import type { Logger } from '@roster/core/services';

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Custom output function — routes all log output through this instead of console.log. */
  output?: (msg: string) => void;
}

/**
 * Create a logger instance
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false, output } = opts;
  const write = output ?? ((msg: string) => console.log(msg));
  const writeErr = output ?? ((msg: string) => console.error(msg));
  const format = (data?: Record<string, unknown>) => (data ? ` ${JSON.stringify(data)}` : '');

  return {
    debug(msg, data) {
      if (verbose && !quiet) {
        write(chalk.gray(`[debug] ${msg}${format(data)}`));
      }
    },

    info(msg, data) {
      if (!quiet) {
        write(chalk.blue(`[info] ${msg}${verbose ? format(data) : ''}`));
      }
    },

    warn(msg, data) {
      write(chalk.yellow(`[warn] ${msg}${format(data)}`));
    },

    error(msg, data) {
      writeErr(chalk.red(`[error] ${msg}${format(data)}`));
    },
  };
}
