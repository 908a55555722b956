/**
 * Leveled stderr logger
 */

import chalk, { Chalk } from 'chalk';

export type LogLevel = 'quiet' | 'normal' | 'verbose';

export interface Logger {
  level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  /** Defaults to the color support chalk detected */
  color?: boolean;
  write?: (line: string) => void;
}

/**
 * Errors always print; warnings and info are hidden by `quiet`; debug
 * lines need `verbose`.
 */
export function createLogger(level: LogLevel, options: LoggerOptions = {}): Logger {
  const paint = new Chalk({ level: options.color === false ? 0 : chalk.level });
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return {
    level,
    error: (message) => write(paint.red(`error: ${message}`)),
    warn: (message) => {
      if (level !== 'quiet') write(paint.yellow(`warning: ${message}`));
    },
    info: (message) => {
      if (level !== 'quiet') write(message);
    },
    debug: (message) => {
      if (level === 'verbose') write(paint.gray(message));
    },
  };
}
