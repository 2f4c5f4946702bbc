import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  color?: boolean;
}

/**
 * Logger writing to the console. Debug lines only appear with `verbose`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const paint = options.color === false ? new chalk.Instance({ level: 0 }) : chalk;

  return {
    debug(message: string): void {
      if (options.verbose) {
        console.log(paint.gray(message));
      }
    },
    info(message: string): void {
      console.log(message);
    },
    warn(message: string): void {
      console.warn(paint.yellow(`WARN: ${message}`));
    },
    error(message: string): void {
      console.error(paint.red(`ERROR: ${message}`));
    }
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
