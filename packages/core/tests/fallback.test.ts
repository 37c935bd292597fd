import { describe, expect, it, vi } from 'vitest';
import { SourceError } from '../src/errors';
import { TimeoutError, UNCONFIGURED_REASON, resolveWithFallback, retryIdempotent, withTimeout } from '../src/utils';

const noDelay = { maxRetries: 1, baseDelayMs: 0, jitterMs: 0 };

function recordingLogger() {
  const logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn()
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

describe('withTimeout', () => {
  it('rejects with a TimeoutError once the budget is spent', async () => {
    const pending = withTimeout({ timeoutMs: 10, label: 'slow', run: () => new Promise<string>(() => undefined) });

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(withTimeout({ timeoutMs: 10, label: 'slow', run: () => new Promise<string>(() => undefined) }))
      .rejects.toThrow('slow timed out after 10ms');
  });

  it('passes through a result that arrives in time', async () => {
    await expect(withTimeout({ timeoutMs: 1_000, label: 'fast', run: async () => 42 })).resolves.toBe(42);
  });
});

describe('retryIdempotent', () => {
  it('retries transient failures', async () => {
    const run = vi.fn()
      .mockRejectedValueOnce(new SourceError({ source: 'newsapi', kind: 'network', message: 'reset' }))
      .mockResolvedValueOnce('ok');

    await expect(retryIdempotent({ ...noDelay, run })).resolves.toBe('ok');
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('gives up immediately on non-retryable failures', async () => {
    const run = vi.fn().mockRejectedValue(new SourceError({ source: 'newsapi', kind: 'auth', message: 'bad key' }));

    await expect(retryIdempotent({ ...noDelay, run })).rejects.toThrow('newsapi: bad key');
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stopped'));
    const run = vi.fn(async () => 'ok');

    await expect(retryIdempotent({ ...noDelay, run, signal: controller.signal })).rejects.toThrow('stopped');
    expect(run).not.toHaveBeenCalled();
  });

  it('stops backing off once aborted', async () => {
    const controller = new AbortController();
    const run = vi.fn().mockRejectedValue(new SourceError({ source: 'tavily', kind: 'network', message: 'reset' }));

    const pending = retryIdempotent({ maxRetries: 3, baseDelayMs: 1_000, jitterMs: 0, run, signal: controller.signal });
    await new Promise((resolve) => setTimeout(resolve, 10));
    controller.abort(new Error('stopped'));

    await expect(pending).rejects.toThrow('stopped');
    expect(run).toHaveBeenCalledTimes(1);
  });
});

describe('resolveWithFallback', () => {
  it('returns live data when the source answers', async () => {
    const result = await resolveWithFallback({
      label: 'news',
      run: async () => ['live'],
      fallback: () => ['mock'],
      timeoutMs: 1_000,
      retry: noDelay
    });

    expect(result).toEqual({ status: 'live', data: ['live'] });
  });

  it('uses the fallback without calling anything when the source is not configured', async () => {
    const logger = recordingLogger();
    const fallback = vi.fn((_error: unknown) => ['mock']);

    const result = await resolveWithFallback({ label: 'news', run: null, fallback, timeoutMs: 1_000, retry: noDelay, logger });

    expect(result).toEqual({ status: 'fallback', data: ['mock'], reason: UNCONFIGURED_REASON, error: null });
    expect(fallback).toHaveBeenCalledWith(null);
    expect(logger.debug).toHaveBeenCalledWith({ source: 'news' }, 'Source not configured, using fallback');
  });

  it('hands the failure to the fallback and logs a warning', async () => {
    const logger = recordingLogger();
    const failure = new SourceError({ source: 'newsapi', kind: 'auth', message: 'HTTP 401: bad key' });

    const result = await resolveWithFallback({
      label: 'news',
      run: async () => { throw failure; },
      fallback: (error) => [error === failure ? 'saw failure' : 'other'],
      timeoutMs: 1_000,
      retry: noDelay,
      logger
    });

    expect(result).toEqual({
      status: 'fallback',
      data: ['saw failure'],
      reason: 'SourceError: newsapi: HTTP 401: bad key',
      error: failure
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { source: 'news', reason: 'SourceError: newsapi: HTTP 401: bad key' },
      'Source failed, using fallback'
    );
  });

  it('falls back when the source exceeds its timeout', async () => {
    const result = await resolveWithFallback({
      label: 'search',
      run: () => new Promise<string[]>(() => undefined),
      fallback: () => ['mock'],
      timeoutMs: 15,
      retry: { ...noDelay, maxRetries: 0 }
    });

    expect(result.status).toBe('fallback');
    expect(result.status === 'fallback' && result.reason).toBe('TimeoutError: search timed out after 15ms');
  });

  it('cancels the source and its retries once the timeout fires', async () => {
    const signals: AbortSignal[] = [];
    const run = vi.fn((signal: AbortSignal) => {
      signals.push(signal);
      return new Promise<string[]>((_resolve, reject) => {
        setTimeout(() => reject(new SourceError({ source: 'newsapi', kind: 'network', message: 'reset' })), 10);
      });
    });

    const result = await resolveWithFallback({
      label: 'news',
      run,
      fallback: () => ['mock'],
      timeoutMs: 50,
      retry: { maxRetries: 2, baseDelayMs: 100, jitterMs: 0 }
    });
    expect(result.status).toBe('fallback');
    expect(run).toHaveBeenCalledTimes(1);

    await new Promise((resolve) => setTimeout(resolve, 200));

    expect(run).toHaveBeenCalledTimes(1);
    expect(signals[0]?.aborted).toBe(true);
    expect(signals[0]?.reason).toBeInstanceOf(TimeoutError);
  });
});
