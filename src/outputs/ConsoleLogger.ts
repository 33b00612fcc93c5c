/**
 * ConsoleLogger - ILogger on top of console.*
 */

import type { ILogger, LogLevel } from '../interfaces/ILogger.js';
import { colorize, LEVEL_COLORS } from '../utils/colors.js';

export interface ConsoleLoggerOptions {
  /** Enable colored output (default: true) */
  colors?: boolean;
  /** Show debug messages (default: false) */
  debug?: boolean;
  /** Prefix for all messages (default: none) */
  prefix?: string;
}

export class ConsoleLogger implements ILogger {
  private readonly colors: boolean;
  private readonly showDebug: boolean;
  private readonly prefix?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.colors = options.colors ?? true;
    this.showDebug = options.debug ?? false;
    this.prefix = options.prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.showDebug) {
      return;
    }
    console.log(this.format('debug', message, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    console.log(this.format('info', message, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    console.warn(this.format('warn', message, context));
  }

  error(message: string, context?: Record<string, unknown>): void {
    console.error(this.format('error', message, context));
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    let result = this.prefix ? `${this.prefix} ${message}` : message;
    if (context && Object.keys(context).length > 0) {
      result += ` ${JSON.stringify(context)}`;
    }
    return this.colors ? colorize(result, LEVEL_COLORS[level]) : result;
  }
}
