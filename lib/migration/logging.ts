/**
 * Migration logging utilities
 * Structured logging for migration events, tagged with the run id
 */

import { writeLogLine, LogLevel, LogContext } from '../zendesk/logging';

/**
 * Log a migration event with structured data
 */
export function logMigrationEvent(
  runId: string,
  event: string,
  data?: LogContext,
  level: LogLevel = 'info'
): void {
  writeLogLine('migration', level, event, { runId, ...data });
}

/**
 * Format a duration in ms for summaries
 */
export function formatDuration(durationMs: number): string {
  if (durationMs < 1000) return `${durationMs}ms`;
  if (durationMs < 60000) return `${(durationMs / 1000).toFixed(1)}s`;
  if (durationMs < 3600000) return `${(durationMs / 60000).toFixed(1)}m`;
  return `${(durationMs / 3600000).toFixed(1)}h`;
}

/**
 * Simple logger object for consistent logging interface
 */
export const logger = {
  info: (message: string, context?: LogContext) => {
    writeLogLine('migration', 'info', message, context);
  },
  error: (message: string, context?: LogContext) => {
    writeLogLine('migration', 'error', message, context);
  },
  warn: (message: string, context?: LogContext) => {
    writeLogLine('migration', 'warn', message, context);
  },
  debug: (message: string, context?: LogContext) => {
    writeLogLine('migration', 'debug', message, context);
  },
};
