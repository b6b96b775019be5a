import chalk from 'chalk';

import type { LogLevel, LogRouter } from '../platform/log-router.js';

export type CliLogger = {
  info: (msg: string) => void;
  success: (msg: string) => void;
  warning: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
};

const PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue('ℹ'),
  success: chalk.green('✓'),
  warning: chalk.yellow('⚠'),
  error: chalk.red('✗'),
  debug: chalk.gray('◉')
};

export function formatLogLine(level: LogLevel, msg: string): string {
  return `${PREFIXES[level]} ${msg}`;
}

/**
 * Logger whose lines go through the router, so the shell can move them to a new front-end.
 */
export function createCliLogger(router: LogRouter, options: { debug?: boolean } = {}): CliLogger {
  const emit = (level: LogLevel) => (msg: string) => {
    if (level === 'debug' && !options.debug) {
      return;
    }
    router.emit({ level, line: formatLogLine(level, msg) });
  };
  return {
    info: emit('info'),
    success: emit('success'),
    warning: emit('warning'),
    error: emit('error'),
    debug: emit('debug')
  };
}
