import { TenantConfig, getApiBase } from '../config';
import { HelpCenterApiError, isTransientError } from '../errors';
import { ListPage } from '../types';
import {
  logApiRequest,
  logApiResponse,
  logApiError,
  generateCorrelationId,
} from '../logging';
import { withRetry, RetryConfig, DEFAULT_RETRY_CONFIG } from './retry';

/**
 * HTTP request options for the Help Center API client
 */
export interface HelpCenterRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  body?: unknown;
  headers?: Record<string, string>;
  retryConfig?: RetryConfig;
  /** Key under which a successful response must carry a record object */
  expectKey?: string;
}

export interface HelpCenterHttpClientOptions {
  /** Override the API base URL derived from the subdomain */
  apiBase?: string;
  retryConfig?: RetryConfig;
}

/**
 * Zendesk Help Center HTTP Client
 *
 * Features:
 * - Basic authentication with an API token (`{email}/token`)
 * - Error handling with HelpCenterApiError
 * - Retry logic with exponential backoff for transient failures
 * - `next_page` pagination
 * - Request/response logging
 */
export class HelpCenterHttpClient {
  readonly apiBase: string;
  private readonly authorization: string;
  private readonly retryConfig: RetryConfig;

  constructor(config: TenantConfig, options: HelpCenterHttpClientOptions = {}) {
    this.apiBase = options.apiBase || getApiBase(config.subdomain);
    this.authorization = `Basic ${Buffer.from(`${config.email}/token:${config.apiToken}`).toString('base64')}`;
    this.retryConfig = options.retryConfig || DEFAULT_RETRY_CONFIG;
  }

  /**
   * Resolve an endpoint against the API base. Absolute URLs, such as
   * `next_page` links, are used as-is.
   */
  resolveUrl(endpoint: string): string {
    if (/^https?:\/\//i.test(endpoint)) {
      return endpoint;
    }
    return `${this.apiBase}${endpoint}`;
  }

  /**
   * Make a request to the Help Center API
   *
   * @param endpoint - API endpoint (e.g., '/help_center/categories.json')
   * @returns Parsed JSON response
   * @throws {HelpCenterApiError} On API errors
   */
  async request<T = unknown>(
    endpoint: string,
    options: HelpCenterRequestOptions = {}
  ): Promise<T> {
    const {
      method = 'GET',
      body,
      headers = {},
      retryConfig = this.retryConfig,
      expectKey,
    } = options;

    const url = this.resolveUrl(endpoint);
    const correlationId = generateCorrelationId();

    return withRetry(
      async () => {
        const requestHeaders: Record<string, string> = {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          Authorization: this.authorization,
          ...headers,
        };

        logApiRequest(method, url, correlationId);

        const startTime = Date.now();

        let response: Response;
        try {
          response = await fetch(url, {
            method,
            headers: requestHeaders,
            body: body !== undefined ? JSON.stringify(body) : undefined,
          });
        } catch (error) {
          // Network failure: no status code; only reads are replayed
          const networkError = new HelpCenterApiError(
            `Network error: ${error instanceof Error ? error.message : String(error)}`
          );
          logApiError(method, url, networkError, correlationId);
          throw networkError;
        }

        const duration = Date.now() - startTime;

        return this.handleResponse<T>(response, method, url, correlationId, duration, expectKey);
      },
      retryConfig,
      { method, url },
      method === 'GET' ? isTransientError : isReplaySafe
    );
  }

  /**
   * Handle response, parsing JSON or throwing errors
   */
  private async handleResponse<T>(
    response: Response,
    method: string,
    url: string,
    correlationId: string,
    duration: number,
    expectKey?: string
  ): Promise<T> {
    if (response.ok) {
      logApiResponse(method, url, response.status, correlationId, duration);

      // 204 No Content (deletes)
      if (response.status === 204) {
        return undefined as T;
      }

      const text = await response.text();
      const parsed: unknown = text ? JSON.parse(text) : undefined;

      if (expectKey !== undefined && !hasRecord(parsed, expectKey)) {
        const error = new HelpCenterApiError(
          `Zendesk API response has no '${expectKey}' record`,
          response.status,
          undefined,
          undefined,
          { headers: Object.fromEntries(response.headers.entries()), body: parsed },
          text
        );
        logApiError(method, url, error, correlationId);
        throw error;
      }

      return parsed as T;
    }

    // Read body as text first (can only read once), then try to parse as JSON
    const errorText = await response.text();
    let errorBody: unknown;
    try {
      errorBody = JSON.parse(errorText);
    } catch {
      errorBody = errorText;
    }

    const { errorCode, description, detail } = readErrorFields(errorBody);

    const error = new HelpCenterApiError(
      description || errorCode || `Zendesk API error: ${response.status}`,
      response.status,
      errorCode,
      detail,
      { headers: Object.fromEntries(response.headers.entries()), body: errorBody },
      errorText
    );

    logApiError(method, url, error, correlationId);

    throw error;
  }

  /**
   * Fetch every page of a list endpoint, following `next_page`
   *
   * @param key - Name of the records array in each page (e.g. 'categories')
   */
  async paginate<K extends string, T>(endpoint: string, key: K): Promise<T[]> {
    const records: T[] = [];
    let next: string | null | undefined = endpoint;

    while (next) {
      const page: ListPage<K, T> = await this.get<ListPage<K, T>>(next);
      const pageRecords: T[] | undefined = page[key];
      if (pageRecords) {
        records.push(...pageRecords);
      }
      next = page.next_page;
    }

    return records;
  }

  /**
   * Convenience method for GET requests
   */
  async get<T = unknown>(
    endpoint: string,
    options?: Omit<HelpCenterRequestOptions, 'method' | 'body'>
  ): Promise<T> {
    return this.request<T>(endpoint, { ...options, method: 'GET' });
  }

  /**
   * Convenience method for POST requests
   */
  async post<T = unknown>(
    endpoint: string,
    body?: unknown,
    options?: Omit<HelpCenterRequestOptions, 'method' | 'body'>
  ): Promise<T> {
    return this.request<T>(endpoint, { ...options, method: 'POST', body });
  }

  /**
   * POST `{ [key]: record }` and return the record the API echoes back
   * under the same key
   *
   * @throws {HelpCenterApiError} When the response carries no such record
   */
  async createRecord<K extends string, T>(
    endpoint: string,
    key: K,
    record: unknown,
    options?: Omit<HelpCenterRequestOptions, 'method' | 'body' | 'expectKey'>
  ): Promise<T> {
    const response = await this.post<Record<K, T>>(endpoint, { [key]: record }, { ...options, expectKey: key });
    return response[key];
  }

  /**
   * Convenience method for DELETE requests
   */
  async delete<T = unknown>(
    endpoint: string,
    options?: Omit<HelpCenterRequestOptions, 'method' | 'body'>
  ): Promise<T> {
    return this.request<T>(endpoint, { ...options, method: 'DELETE' });
  }
}

/**
 * Writes are not replayed after a network failure: the first attempt may
 * already have reached the server.
 */
function isReplaySafe(error: unknown): boolean {
  return isTransientError(error) && !(error instanceof HelpCenterApiError && error.statusCode === undefined);
}

function hasRecord(body: unknown, key: string): boolean {
  if (typeof body !== 'object' || body === null) {
    return false;
  }
  const value: unknown = Object.getOwnPropertyDescriptor(body, key)?.value;
  return typeof value === 'object' && value !== null;
}

/**
 * Pull the error code and description out of a Zendesk error body.
 * Zendesk uses `{error, description}` or `{error: {title, message}}`.
 */
function readErrorFields(body: unknown): { errorCode?: string; description?: string; detail?: string } {
  if (typeof body !== 'object' || body === null) {
    return {};
  }

  const error: unknown = 'error' in body ? body.error : undefined;
  const description: unknown = 'description' in body ? body.description : undefined;
  const details: unknown = 'details' in body ? body.details : undefined;
  const detail = details !== undefined ? JSON.stringify(details) : undefined;

  if (typeof error === 'string') {
    return {
      errorCode: error,
      description: typeof description === 'string' ? description : undefined,
      detail,
    };
  }

  if (typeof error === 'object' && error !== null) {
    const title: unknown = 'title' in error ? error.title : undefined;
    const message: unknown = 'message' in error ? error.message : undefined;
    return {
      errorCode: typeof title === 'string' ? title : undefined,
      description: typeof message === 'string' ? message : undefined,
      detail,
    };
  }

  return { detail };
}
