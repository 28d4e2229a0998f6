import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

const PREFIX: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: (s) => chalk.dim(s),
  info: (s) => chalk.blue(s),
  warn: (s) => chalk.yellow(s),
  error: (s) => chalk.red(s),
};

let current: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function setLogLevel(level: LogLevel): void {
  current = level;
}

export function getLogLevel(): LogLevel {
  return current;
}

function write(level: Exclude<LogLevel, 'silent'>, msg: string): void {
  if (RANK[level] < RANK[current]) return;
  console.error(`${PREFIX[level](level.toUpperCase() + ':')} ${msg}`);
}

export const log = {
  debug: (msg: string) => write('debug', msg),
  info: (msg: string) => write('info', msg),
  warn: (msg: string) => write('warn', msg),
  error: (msg: string) => write('error', msg),
};
