/**
 * Console logging with coloured level prefixes
 */

import chalk from "chalk";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export function createConsoleLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false } = options;
  return {
    debug(message) {
      if (verbose && !quiet) console.log(chalk.gray(message));
    },
    info(message) {
      if (!quiet) console.log(message);
    },
    warn(message) {
      console.warn(chalk.yellow(message));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
