/**
 * ILogger - logging abstraction for the generator and its collaborators
 *
 * Library code only talks to this interface; callers inject ConsoleLogger
 * or their own implementation. SilentLogger is the default.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogger {
  /** Verbose detail, hidden unless the caller enables it */
  debug(message: string, context?: Record<string, unknown>): void;

  /** Progress such as a written config file */
  info(message: string, context?: Record<string, unknown>): void;

  /** Something unexpected that did not stop generation */
  warn(message: string, context?: Record<string, unknown>): void;

  /** A failure that aborted generation */
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Discards all messages
 */
export class SilentLogger implements ILogger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
