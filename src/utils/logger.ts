import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let threshold: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

// Prefixes every line with [scope] like the rest of the scripts do
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(chalk.gray(`${prefix} ${message}`), ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${chalk.cyan(prefix)} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(chalk.yellow(`${prefix} ${message}`), ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(chalk.red(`${prefix} ${message}`), ...details);
    },
  };
}
