/**
 * Tests for the Help Center HTTP client
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { HelpCenterHttpClient } from '../../lib/zendesk/http/client';
import { HelpCenterApiError } from '../../lib/zendesk/errors';
import type { RetryConfig } from '../../lib/zendesk/http/retry';

const config = { subdomain: 'acme', email: 'agent@example.com', apiToken: 'test-secret' };
const noDelay: RetryConfig = { maxAttempts: 2, baseDelay: 0, maxDelay: 0, useJitter: false };

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

describe('HelpCenterHttpClient', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(globalThis, 'fetch');
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('resolveUrl', () => {
    it('should prefix relative endpoints with the API base', () => {
      const client = new HelpCenterHttpClient(config);
      expect(client.resolveUrl('/help_center/categories.json')).toBe(
        'https://acme.zendesk.com/api/v2/help_center/categories.json'
      );
    });

    it('should keep absolute URLs', () => {
      const client = new HelpCenterHttpClient(config);
      expect(client.resolveUrl('https://acme.zendesk.com/api/v2/x.json?page=2')).toBe(
        'https://acme.zendesk.com/api/v2/x.json?page=2'
      );
    });
  });

  it('should send basic auth with the API token', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ categories: [] }));
    const client = new HelpCenterHttpClient(config);

    await client.get('/help_center/categories.json');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://acme.zendesk.com/api/v2/help_center/categories.json');
    const headers = new Headers(init?.headers);
    const expected = Buffer.from('agent@example.com/token:test-secret').toString('base64');
    expect(headers.get('authorization')).toBe(`Basic ${expected}`);
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeUndefined();
  });

  it('should serialize POST bodies as JSON', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ category: { id: 5, name: 'FAQ' } }, 201));
    const client = new HelpCenterHttpClient(config);

    const result = await client.post<{ category: { id: number } }>('/help_center/categories.json', {
      category: { name: 'FAQ' },
    });

    expect(result.category.id).toBe(5);
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"category":{"name":"FAQ"}}');
  });

  it('should return undefined for 204 responses', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));
    const client = new HelpCenterHttpClient(config);

    await expect(client.delete('/help_center/categories/1.json')).resolves.toBeUndefined();
  });

  it('should follow next_page until it is null', async () => {
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse({
          categories: [{ id: 1, name: 'A' }],
          next_page: 'https://acme.zendesk.com/api/v2/help_center/categories.json?page=2',
        })
      )
      .mockResolvedValueOnce(jsonResponse({ categories: [{ id: 2, name: 'B' }], next_page: null }));
    const client = new HelpCenterHttpClient(config);

    const records = await client.paginate<'categories', { id: number; name: string }>(
      '/help_center/categories.json',
      'categories'
    );

    expect(records).toEqual([
      { id: 1, name: 'A' },
      { id: 2, name: 'B' },
    ]);
    expect(fetchMock.mock.calls.map(call => call[0])).toEqual([
      'https://acme.zendesk.com/api/v2/help_center/categories.json',
      'https://acme.zendesk.com/api/v2/help_center/categories.json?page=2',
    ]);
  });

  it('should parse Zendesk error bodies', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { error: 'RecordInvalid', description: 'Record validation errors', details: { locale: ['is invalid'] } },
        422
      )
    );
    const client = new HelpCenterHttpClient(config, { retryConfig: noDelay });

    const error = await client.post('/help_center/articles/1/translations.json', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HelpCenterApiError);
    if (!(error instanceof HelpCenterApiError)) return;
    expect(error.statusCode).toBe(422);
    expect(error.errorCode).toBe('RecordInvalid');
    expect(error.message).toBe('Record validation errors');
    expect(error.errorDetail).toBe('{"locale":["is invalid"]}');
    expect(error.responseText).toBe(
      '{"error":"RecordInvalid","description":"Record validation errors","details":{"locale":["is invalid"]}}'
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should read nested error titles', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: { title: 'Forbidden', message: 'You do not have access' } }, 403)
    );
    const client = new HelpCenterHttpClient(config, { retryConfig: noDelay });

    await expect(client.get('/guide/permission_groups.json')).rejects.toMatchObject({
      statusCode: 403,
      errorCode: 'Forbidden',
      message: 'You do not have access',
    });
  });

  it('should fall back to the status when the body is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('Bad gateway', { status: 400 }));
    const client = new HelpCenterHttpClient(config, { retryConfig: noDelay });

    await expect(client.get('/help_center/categories.json')).rejects.toMatchObject({
      statusCode: 400,
      message: 'Zendesk API error: 400',
      responseText: 'Bad gateway',
    });
  });

  it('should retry transient failures', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ error: 'TooManyRequests' }, 429, { 'Retry-After': '0' }))
      .mockResolvedValueOnce(jsonResponse({ categories: [] }));
    const client = new HelpCenterHttpClient(config, { retryConfig: noDelay });

    await expect(client.get('/help_center/categories.json')).resolves.toEqual({ categories: [] });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should turn network failures into status-less errors', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const client = new HelpCenterHttpClient(config, { retryConfig: noDelay });

    await expect(client.get('/help_center/categories.json')).rejects.toMatchObject({
      statusCode: undefined,
      message: 'Network error: fetch failed',
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  describe('createRecord', () => {
    it('should unwrap the created record', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ category: { id: 5, name: 'FAQ' } }, 201));
      const client = new HelpCenterHttpClient(config);

      await expect(
        client.createRecord('/help_center/categories.json', 'category', { name: 'FAQ' })
      ).resolves.toEqual({ id: 5, name: 'FAQ' });
      expect(fetchMock.mock.calls[0][1]?.body).toBe('{"category":{"name":"FAQ"}}');
    });

    it('should reject a success response without the record', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 201));
      const client = new HelpCenterHttpClient(config, { retryConfig: noDelay });

      const result = client.createRecord('/help_center/categories.json', 'category', { name: 'FAQ' });

      await expect(result).rejects.toBeInstanceOf(HelpCenterApiError);
      await expect(result).rejects.toMatchObject({
        statusCode: 201,
        message: "Zendesk API response has no 'category' record",
        responseText: '{}',
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should not replay a write after a network failure', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const client = new HelpCenterHttpClient(config, { retryConfig: noDelay });

      await expect(
        client.createRecord('/help_center/categories.json', 'category', { name: 'FAQ' })
      ).rejects.toMatchObject({ statusCode: undefined, message: 'Network error: fetch failed' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should retry a write the server answered as unavailable', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ error: 'ServiceUnavailable' }, 503))
        .mockResolvedValueOnce(jsonResponse({ category: { id: 6, name: 'FAQ' } }, 201));
      const client = new HelpCenterHttpClient(config, { retryConfig: noDelay });

      await expect(
        client.createRecord('/help_center/categories.json', 'category', { name: 'FAQ' })
      ).resolves.toEqual({ id: 6, name: 'FAQ' });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  it('should use an explicit API base', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ locales: ['en-us'] }));
    const client = new HelpCenterHttpClient(config, { apiBase: 'http://localhost:4010/api/v2' });

    await client.get('/help_center/locales.json');

    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:4010/api/v2/help_center/locales.json');
  });
});
