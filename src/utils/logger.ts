import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'dev';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
};

export type LoggerOptions = {
  level?: string;
  format?: string;
  write?: (line: string) => void;
  now?: () => Date;
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return 'info';
  const lowered = value.toLowerCase();
  return isLogLevel(lowered) ? lowered : 'info';
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'string') return value.includes(' ') ? JSON.stringify(value) : value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value);
}

function normalizeData(data: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    normalized[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return normalized;
}

export function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify(entry.data === undefined ? entry : { ...entry, data: normalizeData(entry.data) });
  }
  const level = LEVEL_COLOR[entry.level](entry.level.toUpperCase().padEnd(5, ' '));
  const pairs = entry.data ? Object.entries(entry.data).map(([key, value]) => `${key}=${formatValue(value)}`) : [];
  const suffix = pairs.length > 0 ? ` ${pairs.join(' ')}` : '';
  return `${entry.timestamp} [${level}] [${entry.module}] ${entry.message}${suffix}`;
}

export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  const threshold = parseLogLevel(options.level ?? process.env.DOTSYNC_LOG_LEVEL);
  const format: LogFormat = (options.format ?? process.env.DOTSYNC_LOG_FORMAT) === 'json' ? 'json' : 'dev';
  const write = options.write ?? ((line: string) => process.stderr.write(line));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold]) return;
    write(`${formatLogEntry({ timestamp: now().toISOString(), level, module, message, data }, format)}\n`);
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
