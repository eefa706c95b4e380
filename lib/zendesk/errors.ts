/**
 * Custom error types for Zendesk Help Center API integration
 */

/**
 * Response details captured from a failed request
 */
export interface HelpCenterErrorResponse {
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Base error for Help Center API failures
 */
export class HelpCenterApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode?: string,
    public readonly errorDetail?: string,
    public readonly response?: HelpCenterErrorResponse,
    public readonly responseText?: string
  ) {
    super(message);
    this.name = 'HelpCenterApiError';
    Object.setPrototypeOf(this, HelpCenterApiError.prototype);
  }

  /**
   * Check if error is a client error (4xx)
   */
  isClientError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 400 && this.statusCode < 500;
  }

  /**
   * Check if error is a server error (5xx)
   */
  isServerError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 500;
  }

  /**
   * Check if error is unauthorized (401)
   */
  isUnauthorized(): boolean {
    return this.statusCode === 401;
  }

  /**
   * Check if error is rate limited (429)
   */
  isRateLimited(): boolean {
    return this.statusCode === 429;
  }

  /**
   * Get human-readable error message
   */
  toHumanReadable(): string {
    const parts = [this.message];

    if (this.errorCode) {
      parts.push(`Error code: ${this.errorCode}`);
    }

    if (this.errorDetail) {
      parts.push(`Details: ${this.errorDetail}`);
    }

    if (this.statusCode) {
      parts.push(`Status: ${this.statusCode}`);
    }

    return parts.join(' | ');
  }
}

/**
 * Error for failed reachability checks (bad subdomain, credentials or network)
 */
export class HelpCenterConnectionError extends Error {
  constructor(
    message: string,
    public readonly host: string
  ) {
    super(message);
    this.name = 'HelpCenterConnectionError';
    Object.setPrototypeOf(this, HelpCenterConnectionError.prototype);
  }
}

/**
 * Error for configuration issues
 */
export class HelpCenterConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HelpCenterConfigError';
    Object.setPrototypeOf(this, HelpCenterConfigError.prototype);
  }
}

/**
 * Check if an error is transient and should be retried
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HelpCenterApiError) {
    // Retry on:
    // - 429 (rate limit)
    // - 500+ (server errors)
    // - Network errors (no status code)
    return (
      error.isRateLimited() ||
      error.isServerError() ||
      error.statusCode === undefined
    );
  }

  // Network errors from fetch
  if (error instanceof TypeError && error.message.includes('fetch')) {
    return true;
  }

  return false;
}

/**
 * Extract retry-after value from error (in seconds)
 */
export function getRetryAfter(error: HelpCenterApiError): number | null {
  const retryAfter = error.response?.headers['retry-after'];

  if (retryAfter) {
    const seconds = parseInt(retryAfter, 10);
    return isNaN(seconds) ? null : seconds;
  }

  return null;
}

/**
 * Check whether an error reads as a client-side rejection (HTTP 4xx).
 * Errors without a status code are matched on a 4xx status in their text.
 */
export function isClientRejection(error: unknown): boolean {
  if (error instanceof HelpCenterApiError && error.statusCode !== undefined) {
    return error.isClientError();
  }

  const text = error instanceof Error ? error.message : String(error);
  return /\b4\d\d\b/.test(text);
}

/**
 * Get the raw response body of a failed request, if there was one
 */
export function getRawErrorBody(error: unknown): string | undefined {
  if (error instanceof HelpCenterApiError) {
    return error.responseText;
  }
  return undefined;
}

/**
 * Get a one-line description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof HelpCenterApiError) {
    return error.toHumanReadable();
  }
  return error instanceof Error ? error.message : String(error);
}
