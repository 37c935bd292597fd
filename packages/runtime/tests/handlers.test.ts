import { describe, expect, it } from 'vitest';
import { SourceError, type CompletionSource } from '@newsroute/core';
import {
  FakeLogger,
  createFakeRuntimeConfig,
  createFakeRuntimeDeps,
  createUnconfiguredRuntimeDeps,
  type FakeRuntimeDeps
} from '@newsroute/testing';
import { handleNews, handleQuestion, handleSearch, type HandlerDeps } from '../src/index';

function liveDeps(): HandlerDeps & { sources: FakeRuntimeDeps; logger: FakeLogger } {
  const resources = createFakeRuntimeDeps();
  return { sources: resources, config: createFakeRuntimeConfig(), logger: resources.logger };
}

function unconfiguredDeps(): HandlerDeps {
  return { sources: createUnconfiguredRuntimeDeps(), config: createFakeRuntimeConfig() };
}

describe('handleNews', () => {
  it('formats live headlines as title and source lines', async () => {
    const deps = liveDeps();

    const outcome = await handleNews('technology', deps);

    expect(outcome).toEqual({
      response: 'Top Technology headlines:\n\n- Chipmaker unveils new processor — Tech Daily\n- Startup raises seed round — Venture Wire',
      source: 'live'
    });
    expect(deps.sources.news.calls).toEqual([{ category: 'technology', pageSize: 5 }]);
  });

  it('never lists more than five headlines', async () => {
    const deps = liveDeps();
    deps.sources.news.setArticles(Array.from({ length: 8 }, (_, index) => ({ title: `Story ${index}`, sourceName: 'Wire', url: '' })));

    const outcome = await handleNews('business', deps);

    expect(outcome.response.split('\n').filter((line) => line.startsWith('- '))).toHaveLength(5);
  });

  it('uses sample headlines when no news source is configured', async () => {
    const outcome = await handleNews('sports', unconfiguredDeps());

    expect(outcome.source).toBe('fallback');
    expect(outcome.fallbackReason).toBe('source not configured');
    expect(outcome.response).toBe([
      'Top Sports headlines:',
      '',
      '- Sample Sports Headline 1 — newsroute',
      '- Sample Sports Headline 2 — newsroute',
      '- Sample Sports Headline 3 — newsroute',
      '- Sample Sports Headline 4 — newsroute',
      '- Sample Sports Headline 5 — newsroute'
    ].join('\n'));
  });

  it('uses sample headlines and warns when the source fails', async () => {
    const deps = liveDeps();
    deps.sources.news.failWith(new SourceError({ source: 'newsapi', kind: 'auth', message: 'HTTP 401: bad key' }));

    const outcome = await handleNews('health', deps);

    expect(outcome.source).toBe('fallback');
    expect(outcome.fallbackReason).toBe('SourceError: newsapi: HTTP 401: bad key');
    expect(outcome.response.startsWith('Top Health headlines:\n\n- Sample Health Headline 1 — newsroute')).toBe(true);
    expect(deps.logger.messages('warn')).toEqual(['Source failed, using fallback']);
  });

  it('says so when the live source has no headlines', async () => {
    const deps = liveDeps();
    deps.sources.news.setArticles([]);

    const outcome = await handleNews('science', deps);

    expect(outcome).toEqual({ response: 'No Science headlines are available right now.', source: 'live' });
  });
});

describe('handleSearch', () => {
  it('formats live results with content snippets', async () => {
    const deps = liveDeps();

    const outcome = await handleSearch('solar', deps);

    expect(outcome).toEqual({
      response: 'Search results for "solar":\n\n- Home solar guide — Panels convert sunlight into electricity.',
      source: 'live'
    });
    expect(deps.sources.search.calls).toEqual([{ query: 'solar', maxResults: 5 }]);
  });

  it('truncates snippets to the configured length', async () => {
    const deps = liveDeps();
    deps.sources.search.setResults([{ title: 'Long read', content: 'x'.repeat(250), url: '' }]);

    const outcome = await handleSearch('long', deps);

    expect(outcome.response).toBe(`Search results for "long":\n\n- Long read — ${'x'.repeat(199)}…`);
  });

  it('uses mock results that name the query when the source fails', async () => {
    const deps = liveDeps();
    deps.sources.search.failWith(new Error('socket hang up'));

    const outcome = await handleSearch('solar', deps, 3);

    expect(outcome).toEqual({
      response: 'Search results for "solar":\n\n- Mock result for solar - 1\n- Mock result for solar - 2\n- Mock result for solar - 3',
      source: 'fallback',
      fallbackReason: 'Error: socket hang up'
    });
  });

  it('says so when the live source has no results', async () => {
    const deps = liveDeps();
    deps.sources.search.setResults([]);

    expect((await handleSearch('nothing here', deps)).response).toBe('No web results found for "nothing here".');
  });
});

describe('handleQuestion', () => {
  it('prefixes the category context and passes sampling limits', async () => {
    const deps = liveDeps();

    const outcome = await handleQuestion('what is a quark', 'science', deps);

    expect(outcome).toEqual({ response: 'Fake answer', source: 'live' });
    expect(deps.sources.completion.lastRequest).toEqual({
      prompt: 'In the context of science, what is a quark',
      maxTokens: 350,
      temperature: 0.2,
      systemPrompt: undefined
    });
  });

  it('echoes the prompt when no completion source is configured', async () => {
    const deps = unconfiguredDeps();

    expect((await handleQuestion('what is inflation', null, deps)).response).toBe('(Mock) Answer to: what is inflation');
    expect((await handleQuestion('what is a quark', 'science', deps)).response)
      .toBe('(Mock) Answer to: In the context of science, what is a quark');
  });

  it('returns fallback text naming the error when the source fails', async () => {
    const deps = liveDeps();
    deps.sources.completion.failWith(new SourceError({ source: 'openai', kind: 'auth', message: 'HTTP 401: bad key' }));

    const outcome = await handleQuestion('what is inflation', '', deps);

    expect(outcome.source).toBe('fallback');
    expect(outcome.response).toBe(
      '[fallback] Could not reach the answer service (SourceError: openai: HTTP 401: bad key). Your question was: "what is inflation"'
    );
  });

  it('truncates long error messages in the fallback text', async () => {
    const deps = liveDeps();
    deps.sources.completion.failWith(new Error('e'.repeat(130)));

    const outcome = await handleQuestion('why is the sky blue', null, deps);

    expect(outcome.response).toBe(
      `[fallback] Could not reach the answer service (Error: ${'e'.repeat(119)}…). Your question was: "why is the sky blue"`
    );
  });

  it('gives up on a completion source that exceeds the timeout', async () => {
    const stalled: CompletionSource = { complete: () => new Promise(() => undefined) };
    const deps: HandlerDeps = {
      sources: { news: null, search: null, completion: stalled },
      config: createFakeRuntimeConfig({ sourceTimeoutMs: 20 })
    };

    const outcome = await handleQuestion('what is inflation', null, deps);

    expect(outcome.response).toBe(
      '[fallback] Could not reach the answer service (TimeoutError: completion timed out after 20ms). Your question was: "what is inflation"'
    );
  });
});

describe('source timeouts', () => {
  it('cancels a slow completion and answers with the fallback text', async () => {
    const signals: AbortSignal[] = [];
    const completion: CompletionSource = {
      complete: (_request, options) => new Promise((_resolve, reject) => {
        const signal = options?.signal;
        if (signal) signals.push(signal);
        signal?.addEventListener('abort', () => {
          reject(new SourceError({ source: 'openai', kind: 'timeout', message: 'request cancelled' }));
        });
      })
    };
    const deps: HandlerDeps = {
      sources: { news: null, search: null, completion },
      config: createFakeRuntimeConfig({ sourceTimeoutMs: 20 })
    };

    const outcome = await handleQuestion('why is the sky blue', null, deps);

    expect(outcome.source).toBe('fallback');
    expect(outcome.response).toBe(
      '[fallback] Could not reach the answer service (TimeoutError: completion timed out after 20ms). Your question was: "why is the sky blue"'
    );
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
  });
});
