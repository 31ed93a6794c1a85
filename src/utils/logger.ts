import type { Logger, LogLevel } from '../types/index.js';
import { config } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * One JSON object per line; warnings and errors go to stderr
 */
class StructuredLogger implements Logger {
  constructor(private readonly minLevel: LogLevel) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const line = JSON.stringify({
      severity: level.toUpperCase(),
      message,
      timestamp: new Date().toISOString(),
      ...meta,
    });

    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

const configuredLevel = config.app.logLevel.toLowerCase();

export const logger: Logger = new StructuredLogger(isLogLevel(configuredLevel) ? configuredLevel : 'info');
