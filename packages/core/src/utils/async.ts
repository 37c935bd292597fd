import { SourceError } from '../errors';

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

interface WithTimeoutInput<T> {
  timeoutMs: number;
  label: string;
  run: () => Promise<T>;
}

export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    return await Promise.race([
      input.run(),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          reject(new TimeoutError(input.label, input.timeoutMs));
        }, input.timeoutMs);
      })
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  jitterMs: number;
}

interface RetryIdempotentInput<T> extends RetryPolicy {
  run: () => Promise<T>;
  isRetryable?: (error: unknown) => boolean;
  /** Once aborted, no further attempt starts and a pending backoff rejects. */
  signal?: AbortSignal | undefined;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function defaultIsRetryable(error: unknown): boolean {
  if (error instanceof SourceError) {
    return error.retryable;
  }
  if (error instanceof TimeoutError) {
    return true;
  }

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return (
    message.includes('timeout')
    || message.includes('temporar')
    || message.includes('network')
    || message.includes('econnreset')
    || message.includes('econnrefused')
    || message.includes('429')
    || message.includes('503')
  );
}

function nextDelayMs(baseDelayMs: number, jitterMs: number, attempt: number): number {
  const expo = baseDelayMs * Math.pow(2, attempt);
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * (jitterMs + 1)) : 0;
  return expo + jitter;
}

export async function retryIdempotent<T>(input: RetryIdempotentInput<T>): Promise<T> {
  const isRetryable = input.isRetryable ?? defaultIsRetryable;

  for (let attempt = 0; attempt <= input.maxRetries; attempt += 1) {
    input.signal?.throwIfAborted();
    try {
      return await input.run();
    } catch (error) {
      const exhausted = attempt >= input.maxRetries;
      if (exhausted || !isRetryable(error) || input.signal?.aborted) {
        throw error;
      }

      await sleep(nextDelayMs(input.baseDelayMs, input.jitterMs, attempt), input.signal);
    }
  }

  throw new Error('retryIdempotent exhausted unexpectedly');
}
