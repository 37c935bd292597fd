import type { Logger } from '../ports/logger';
import { retryIdempotent, withTimeout, type RetryPolicy } from './async';
import { describeError } from './text';

/**
 * Outcome of calling an external source. A fallback still carries data
 * (mock entries or an error text) so callers never branch on exceptions.
 */
export type SourceResult<T> =
  | { status: 'live'; data: T }
  | { status: 'fallback'; data: T; reason: string; error: unknown | null };

export const UNCONFIGURED_REASON = 'source not configured';

interface ResolveWithFallbackInput<T> {
  label: string;
  /**
   * `null` when the source is not configured. The signal aborts once the
   * call has timed out, so the source can drop its in-flight request.
   */
  run: ((signal: AbortSignal) => Promise<T>) | null;
  /** Receives the failure, or `null` when the source is not configured. */
  fallback: (error: unknown | null) => T;
  timeoutMs: number;
  retry: RetryPolicy;
  logger?: Logger | undefined;
}

export async function resolveWithFallback<T>(input: ResolveWithFallbackInput<T>): Promise<SourceResult<T>> {
  const run = input.run;
  if (!run) {
    input.logger?.debug({ source: input.label }, 'Source not configured, using fallback');
    return { status: 'fallback', data: input.fallback(null), reason: UNCONFIGURED_REASON, error: null };
  }

  const controller = new AbortController();
  try {
    const data = await withTimeout({
      timeoutMs: input.timeoutMs,
      label: input.label,
      run: () => retryIdempotent({ ...input.retry, signal: controller.signal, run: () => run(controller.signal) })
    });
    return { status: 'live', data };
  } catch (error) {
    // stops pending retries and the in-flight request
    controller.abort(error);
    const reason = describeError(error, 200);
    input.logger?.warn({ source: input.label, reason }, 'Source failed, using fallback');
    return { status: 'fallback', data: input.fallback(error), reason, error };
  }
}
