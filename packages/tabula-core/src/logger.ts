import { getConfig } from './config';
import { LogLevel } from './types';

/**
 * Console logging gated by `enableLogging` and `logLevel`
 */

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/**
 * Whether a message at `level` passes the current configuration
 */
export const shouldLog = (level: LogLevel): boolean => {
  const { enableLogging, logLevel = 'info' } = getConfig();
  return enableLogging === true && SEVERITY[level] >= SEVERITY[logLevel];
};

export const log = (level: LogLevel, message: string, ...data: unknown[]): void => {
  if (!shouldLog(level)) return;
  console[level](`[tabula] ${message}`, ...data);
};

export const logger = {
  debug: (message: string, ...data: unknown[]) => log('debug', message, ...data),
  info: (message: string, ...data: unknown[]) => log('info', message, ...data),
  warn: (message: string, ...data: unknown[]) => log('warn', message, ...data),
  error: (message: string, ...data: unknown[]) => log('error', message, ...data)
};
