import chalk from 'chalk';

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { silent = false } = options;
  const debugEnabled = !silent && !!options.debug;

  return {
    debug(msg) {
      if (debugEnabled) console.log(chalk.dim(`[DEBUG] ${msg}`));
    },
    info(msg) {
      if (!silent) console.log(chalk.blue(msg));
    },
    warn(msg) {
      if (!silent) console.warn(chalk.yellow(`Warning: ${msg}`));
    },
    error(msg) {
      // errors are printed even in silent mode
      console.error(chalk.red(`Error: ${msg}`));
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
