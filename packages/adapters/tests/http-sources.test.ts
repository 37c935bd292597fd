import { describe, expect, it, vi } from 'vitest';
import { Headers, Response, type RequestInit } from 'node-fetch';
import { SourceError } from '@newsroute/core';
import { NewsApiSource, TavilySearchSource } from '../src/index';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

function headerValue(init: RequestInit | undefined, name: string): string | null {
  return new Headers(init?.headers).get(name);
}

describe('NewsApiSource', () => {
  it('requests top headlines for the category and maps articles', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({
      status: 'ok',
      totalResults: 3,
      articles: [
        { source: { id: null, name: 'Reuters' }, title: 'Markets rally', url: 'https://news.example/a' },
        { source: { id: null, name: null }, title: '[Removed]', url: 'https://removed.example' },
        { source: null, title: 'Late score', url: null }
      ]
    }));

    const source = new NewsApiSource({ apiKey: 'test-key', fetchImpl });
    const articles = await source.fetchHeadlines('sports', 5);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://newsapi.org/v2/top-headlines?category=sports&language=en&pageSize=5');
    expect(headerValue(fetchImpl.mock.calls[0]?.[1], 'X-Api-Key')).toBe('test-key');
    expect(articles).toEqual([
      { title: 'Markets rally', sourceName: 'Reuters', url: 'https://news.example/a' },
      { title: 'Late score', sourceName: 'Unknown source', url: '' }
    ]);
  });

  it('maps a rejected api key to an auth SourceError', async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ status: 'error', code: 'apiKeyInvalid', message: 'Your API key is invalid.' }, 401));
    const source = new NewsApiSource({ apiKey: 'test-key', fetchImpl });

    const error = await source.fetchHeadlines('health', 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceError);
    expect(error).toMatchObject({ kind: 'auth', status: 401, message: 'newsapi: HTTP 401: Your API key is invalid.' });
  });

  it('maps connection failures and aborts', async () => {
    const refused = new NewsApiSource({
      apiKey: 'test-key',
      fetchImpl: vi.fn(async () => { throw new Error('connect ECONNREFUSED'); })
    });
    const aborted = new NewsApiSource({
      apiKey: 'test-key',
      timeoutMs: 50,
      fetchImpl: vi.fn(async () => {
        const error = new Error('The operation was aborted.');
        error.name = 'AbortError';
        throw error;
      })
    });

    await expect(refused.fetchHeadlines('science', 5)).rejects.toMatchObject({ kind: 'network' });
    await expect(aborted.fetchHeadlines('science', 5)).rejects.toMatchObject({
      kind: 'timeout',
      message: 'newsapi: request timed out after 50ms'
    });
  });

  it('aborts the request when the caller cancels', async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn((_url: string, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        const error = new Error('The operation was aborted.');
        error.name = 'AbortError';
        reject(error);
      });
    }));
    const source = new NewsApiSource({ apiKey: 'test-key', timeoutMs: 5_000, fetchImpl });

    const pending = source.fetchHeadlines('science', 5, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'timeout', message: 'newsapi: request cancelled' });
  });
});

describe('TavilySearchSource', () => {
  it('posts the query and maps results', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({
      query: 'solar panels',
      results: [
        { title: 'Solar basics', url: 'https://web.example/solar', content: 'How panels work', score: 0.9 },
        { title: null, url: 'https://web.example/untitled', content: null }
      ]
    }));

    const source = new TavilySearchSource({ apiKey: 'test-key', fetchImpl });
    const results = await source.search('solar panels', 3);

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://api.tavily.com/search');
    expect(init?.method).toBe('POST');
    expect(headerValue(init, 'Authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(init?.body))).toEqual({
      query: 'solar panels',
      max_results: 3,
      search_depth: 'advanced',
      include_answer: false,
      include_raw_content: false
    });
    expect(results).toEqual([
      { title: 'Solar basics', content: 'How panels work', url: 'https://web.example/solar' },
      { title: 'https://web.example/untitled', content: '', url: 'https://web.example/untitled' }
    ]);
  });

  it('rejects bodies that do not match the expected shape', async () => {
    const source = new TavilySearchSource({
      apiKey: 'test-key',
      fetchImpl: vi.fn(async () => jsonResponse({ unexpected: true }))
    });

    await expect(source.search('x', 3)).rejects.toMatchObject({ kind: 'invalid_response' });
  });

  it('marks rate limiting as retryable', async () => {
    const source = new TavilySearchSource({
      apiKey: 'test-key',
      fetchImpl: vi.fn(async () => jsonResponse({ detail: 'slow down' }, 429))
    });

    const error = await source.search('x', 3).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SourceError);
    expect(error instanceof SourceError && error.retryable).toBe(true);
  });
});
