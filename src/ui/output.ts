import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

let threshold = LOG_LEVELS.indexOf('info');

export function setLogLevel(level: LogLevel): void {
  threshold = LOG_LEVELS.indexOf(level);
}

export function getLogLevel(): LogLevel {
  return LOG_LEVELS[threshold] ?? 'info';
}

export function parseLogLevel(s: string): LogLevel | null {
  return LOG_LEVELS.find((l) => l === s) ?? null;
}

const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;

export const debug = (msg: string) => {
  if (enabled('debug')) console.error(chalk.gray('·'), chalk.gray(msg));
};
export const ok = (msg: string) => {
  if (enabled('info')) console.log(chalk.green('✓'), msg);
};
export const info = (msg: string) => {
  if (enabled('info')) console.log(chalk.blue('ℹ'), msg);
};
export const warn = (msg: string) => {
  if (enabled('warn')) console.error(chalk.yellow('⚠'), msg);
};
export const fail = (msg: string) => console.error(chalk.red('✗'), msg);

