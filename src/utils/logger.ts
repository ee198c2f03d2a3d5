import chalk from 'chalk';
import { readFileSync } from 'node:fs';

const loggerPkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
const version =
  typeof loggerPkg === 'object' && loggerPkg !== null && 'version' in loggerPkg && typeof loggerPkg.version === 'string'
    ? loggerPkg.version
    : '0.0.0';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 19);
}

export const log = {
  debug(msg: string, ...args: unknown[]): void {
    if (shouldLog('debug')) {
      console.log(chalk.gray(`[${timestamp()}] DBG ${msg}`), ...args);
    }
  },
  info(msg: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.log(chalk.blue(`[${timestamp()}]`) + ` ${msg}`, ...args);
    }
  },
  warn(msg: string, ...args: unknown[]): void {
    if (shouldLog('warn')) {
      console.log(chalk.yellow(`[${timestamp()}] WARN ${msg}`), ...args);
    }
  },
  error(msg: string, ...args: unknown[]): void {
    if (shouldLog('error')) {
      console.error(chalk.red(`[${timestamp()}] ERR ${msg}`), ...args);
    }
  },
  /** One line per phase transition, coloured by outcome. */
  phase(name: string, status: string, detail: string): void {
    if (!shouldLog('info')) return;
    const colorFn =
      status === 'completed' ? chalk.green :
      status === 'failed' ? chalk.red :
      status === 'skipped' ? chalk.gray :
      chalk.yellow;
    console.log(colorFn(`  [${status.toUpperCase()}]`) + ` ${chalk.bold(name)} ${detail}`);
  },
  banner(): void {
    if (!shouldLog('info')) return;
    console.log(chalk.bold.cyan(`
  ╔═══════════════════════════════════════╗
  ║         urlscout v${version.padEnd(20)}║
  ║   Multi-phase URL discovery           ║
  ╚═══════════════════════════════════════╝
`));
  },
};
