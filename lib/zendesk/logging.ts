/**
 * Structured logging utilities for Zendesk API operations
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogContext {
  [key: string]: unknown;
}

const SENSITIVE_KEYS = [
  'password',
  'token',
  'authorization',
];

/**
 * Whether debug output is enabled (LOG_LEVEL=debug)
 */
export function isDebugEnabled(): boolean {
  return (process.env.LOG_LEVEL || '').toLowerCase() === 'debug';
}

/**
 * Write one structured JSON log line for the given service
 */
export function writeLogLine(
  service: string,
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...context,
  };

  const line = JSON.stringify(redactSensitiveData(logEntry));

  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * Structured logger for Zendesk operations
 * Outputs JSON-formatted logs for easier parsing and monitoring
 */
export function zendeskLog(
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  writeLogLine('zendesk', level, message, context);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive data from log entries
 */
export function redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = { ...data };

  for (const key of Object.keys(redacted)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
      redacted[key] = '[REDACTED]';
      continue;
    }

    // Recursively redact nested objects
    const value = redacted[key];
    if (isRecord(value)) {
      redacted[key] = redactSensitiveData(value);
    }
  }

  return redacted;
}

/**
 * Generate correlation ID for request tracking
 */
export function generateCorrelationId(): string {
  return `zd_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Log API request
 */
export function logApiRequest(
  method: string,
  url: string,
  correlationId: string
): void {
  zendeskLog('debug', 'API request', {
    correlationId,
    method,
    url,
  });
}

/**
 * Log API response
 */
export function logApiResponse(
  method: string,
  url: string,
  statusCode: number,
  correlationId: string,
  durationMs: number
): void {
  zendeskLog('debug', 'API response', {
    correlationId,
    method,
    url,
    statusCode,
    durationMs,
  });
}

/**
 * Log API error
 */
export function logApiError(
  method: string,
  url: string,
  error: unknown,
  correlationId: string
): void {
  zendeskLog('warn', 'API error', {
    correlationId,
    method,
    url,
    error: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Simple logger object for consistent logging interface
 */
export const logger = {
  info: (message: string, context?: LogContext) => {
    zendeskLog('info', message, context);
  },
  error: (message: string, context?: LogContext) => {
    zendeskLog('error', message, context);
  },
  warn: (message: string, context?: LogContext) => {
    zendeskLog('warn', message, context);
  },
  debug: (message: string, context?: LogContext) => {
    zendeskLog('debug', message, context);
  },
};
