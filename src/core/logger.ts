/**
 * Logger
 *
 * Small leveled logger shared by the adaptive-agents modules. Each module creates
 * its own instance with a prefix so log lines can be traced back to their source.
 *
 * @module core/logger
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

export type LogDestination = 'console' | 'none';

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  destination: LogDestination;
}

export interface LoggerContext {
  prefix?: string;
}

export type LogMeta = Record<string, unknown>;

/**
 * Minimal logging contract accepted by every component that logs
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
  format: 'text',
  destination: 'console',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class Logger implements ILogger {
  private config: LoggingConfig;
  private prefix?: string;

  constructor(config: Partial<LoggingConfig> = {}, context: LoggerContext = {}) {
    this.config = { ...DEFAULT_LOGGING_CONFIG, ...config };
    this.prefix = context.prefix;
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  /**
   * Create a logger sharing this configuration under a different prefix
   */
  child(prefix: string): Logger {
    const combined = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger(this.config, { prefix: combined });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.config.level];
  }

  /**
   * Render a log line without writing it
   */
  format(level: LogLevel, message: string, meta?: LogMeta, timestamp: Date = new Date()): string {
    if (this.config.format === 'json') {
      return JSON.stringify({
        timestamp: timestamp.toISOString(),
        level,
        ...(this.prefix ? { prefix: this.prefix } : {}),
        message,
        ...(meta ?? {}),
      });
    }

    const label = LEVEL_COLORS[level](level.toUpperCase().padEnd(5));
    const prefix = this.prefix ? chalk.dim(`[${this.prefix}] `) : '';
    const details = meta && Object.keys(meta).length > 0 ? ` ${chalk.dim(JSON.stringify(meta))}` : '';
    return `${chalk.dim(timestamp.toISOString())} ${label} ${prefix}${message}${details}`;
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (this.config.destination === 'none' || !this.isLevelEnabled(level)) {
      return;
    }

    const line = this.format(level, message, meta);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: ILogger = new Logger({ destination: 'none' });
