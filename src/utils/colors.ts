/**
 * ANSI colors for terminal log output
 */
import type { LogLevel } from '../interfaces/ILogger.js';

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
} as const;

export type ColorName = keyof typeof colors;

export const LEVEL_COLORS: Record<LogLevel, ColorName> = {
  debug: 'dim',
  info: 'cyan',
  warn: 'yellow',
  error: 'red',
};

export function colorize(text: string, color: ColorName): string {
  return `${colors[color]}${text}${colors.reset}`;
}
