/**
 * Component logger.
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let currentLevel: LogLevel = resolveLevel(process.env.LOG_LEVEL);

function resolveLevel(raw: string | undefined): LogLevel {
  if (raw && isLogLevel(raw)) return raw;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    console.error(`[${component}] ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details)
  };
}
