import { config } from '@/utils/config.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

const shouldLog = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[config.logLevel];

export const formatMessage = (
  level: LogLevel,
  message: string,
  meta?: LogMeta,
  scope?: string,
  now: Date = new Date(),
): string => {
  const color = LEVEL_COLORS[level];
  const tag = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? `[${scope}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  return `${color}[${now.toISOString()}] ${tag}${RESET} ${scopeStr}${message}${metaStr}`;
};

export type Logger = Record<LogLevel, (message: string, meta?: LogMeta) => void>;

const write = (level: LogLevel, message: string, meta?: LogMeta, scope?: string): void => {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, message, meta, scope);
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export const createLogger = (scope?: string): Logger => ({
  debug: (message, meta) => write('debug', message, meta, scope),
  info: (message, meta) => write('info', message, meta, scope),
  warn: (message, meta) => write('warn', message, meta, scope),
  error: (message, meta) => write('error', message, meta, scope),
});

export const logger = createLogger();

export default logger;
