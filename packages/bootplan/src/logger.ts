/**
 * Console logger with level filtering
 */

import type { LogLevel } from './config/types';

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Disable ANSI colors */
  plain?: boolean;
}

/**
 * Create a logger. Everything goes to stderr; stdout carries command output.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const useColor = !options.plain && process.stderr.isTTY === true;

  const tag = (name: string, color: string): string =>
    useColor ? `${color}${name}${colors.reset}` : name;

  const write = (messageLevel: LogLevel, label: string, message: string): void => {
    if (LEVEL_ORDER[messageLevel] > LEVEL_ORDER[level]) return;
    if (messageLevel === 'warn') {
      console.warn(`${label} ${message}`);
    } else {
      console.error(`${label} ${message}`);
    }
  };

  return {
    level,
    debug: (message) => write('debug', tag('debug', colors.dim), message),
    info: (message) => write('info', tag('info', colors.cyan), message),
    warn: (message) => write('warn', tag('warn', colors.yellow), message),
    error: (message) => write('error', tag('error', colors.red), message),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
