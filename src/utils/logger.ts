import type { LogLevel } from '../types.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger that prefixes every line with a timestamp, the level and
 * the component tag, e.g. `2026-01-01T00:00:00.000Z [INFO] [Monitor] ...`.
 */
export function createLogger(component: string): Logger {
  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    if (!shouldLog(level)) return;
    const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${component}] ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...details);
        break;
      case 'info':
        console.log(line, ...details);
        break;
      case 'warn':
        console.warn(line, ...details);
        break;
      case 'error':
        console.error(line, ...details);
        break;
    }
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
