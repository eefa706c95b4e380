import { HelpCenterApiError, isTransientError, getRetryAfter } from '../errors';
import { zendeskLog } from '../logging';

/**
 * Retry policy configuration
 */
export interface RetryConfig {
  /** Maximum number of attempts, first one included (default: 4) */
  maxAttempts: number;
  /** Base delay in milliseconds (default: 500ms) */
  baseDelay: number;
  /** Maximum delay in milliseconds (default: 8000ms) */
  maxDelay: number;
  /** Whether to use full jitter (default: true) */
  useJitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  baseDelay: 500,
  maxDelay: 8000,
  useJitter: true,
};

/**
 * Calculate exponential backoff delay with optional jitter
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay)
 * With jitter: random value between 0 and calculated delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateBackoff(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const exponentialDelay = config.baseDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelay);

  if (config.useJitter) {
    return Math.random() * cappedDelay;
  }

  return cappedDelay;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry wrapper for async operations with exponential backoff.
 * By default only transient failures (429, 5xx, network) are retried;
 * a Retry-After header takes precedence over the computed delay.
 *
 * @param shouldRetry - Narrows which failures are retried
 * @throws Last error if all retries are exhausted
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  context?: { method?: string; url?: string },
  shouldRetry: (error: unknown) => boolean = isTransientError
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt === config.maxAttempts - 1) {
        break;
      }

      let delay = calculateBackoff(attempt, config);
      if (error instanceof HelpCenterApiError) {
        const retryAfter = getRetryAfter(error);
        if (retryAfter !== null) {
          delay = retryAfter * 1000;
        }
      }

      zendeskLog('warn', 'Retrying after error', {
        attempt: attempt + 1,
        maxAttempts: config.maxAttempts,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
        ...context,
      });

      await sleep(delay);
    }
  }

  zendeskLog('error', 'All retry attempts exhausted', {
    maxAttempts: config.maxAttempts,
    error: lastError instanceof Error ? lastError.message : String(lastError),
    ...context,
  });

  throw lastError;
}

/**
 * Create a custom retry config
 */
export function createRetryConfig(
  overrides: Partial<RetryConfig>
): RetryConfig {
  return {
    ...DEFAULT_RETRY_CONFIG,
    ...overrides,
  };
}
