import fetch, { type RequestInit, type Response } from 'node-fetch';
import type { z } from 'zod';
import { SourceError, sourceErrorKindForStatus, errorMessage, truncate } from '@newsroute/core';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

interface RequestJsonInput<TSchema extends z.ZodTypeAny> {
    source: string;
    url: string;
    init?: RequestInit;
    schema: TSchema;
    timeoutMs: number;
    /** Caller-side cancellation, on top of the request's own timeout. */
    signal?: AbortSignal | undefined;
    fetchImpl?: FetchLike | undefined;
}

function messageFromJson(text: string): string | null {
    try {
        const parsed: unknown = JSON.parse(text);
        if (parsed && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
            return parsed.message;
        }
        return null;
    } catch {
        return null;
    }
}

async function readErrorDetail(response: Response): Promise<string> {
    const text = await response.text().catch(() => '');
    return messageFromJson(text) ?? (truncate(text, 200) || response.statusText);
}

/**
 * Performs one HTTP request against a third-party JSON API and validates
 * the body. Every failure surfaces as a `SourceError`.
 */
export async function requestJson<TSchema extends z.ZodTypeAny>(input: RequestJsonInput<TSchema>): Promise<z.infer<TSchema>> {
    const fetchImpl = input.fetchImpl ?? fetch;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), input.timeoutMs);
    const cancel = () => controller.abort();
    if (input.signal?.aborted) {
        cancel();
    } else {
        input.signal?.addEventListener('abort', cancel, { once: true });
    }

    let response: Response;
    try {
        response = await fetchImpl(input.url, { ...input.init, signal: controller.signal });
    } catch (error) {
        const aborted = error instanceof Error && error.name === 'AbortError';
        const cancelled = aborted && input.signal?.aborted === true;
        throw new SourceError({
            source: input.source,
            kind: aborted ? 'timeout' : 'network',
            message: cancelled
                ? 'request cancelled'
                : aborted ? `request timed out after ${input.timeoutMs}ms` : errorMessage(error),
            cause: error
        });
    } finally {
        clearTimeout(timer);
        input.signal?.removeEventListener('abort', cancel);
    }

    if (!response.ok) {
        throw new SourceError({
            source: input.source,
            kind: sourceErrorKindForStatus(response.status),
            status: response.status,
            message: `HTTP ${response.status}: ${await readErrorDetail(response)}`
        });
    }

    let body: unknown;
    try {
        body = await response.json();
    } catch (error) {
        throw new SourceError({ source: input.source, kind: 'invalid_response', message: 'response is not JSON', cause: error });
    }

    const parsed = input.schema.safeParse(body);
    if (!parsed.success) {
        throw new SourceError({
            source: input.source,
            kind: 'invalid_response',
            message: `unexpected response shape (${parsed.error.issues[0]?.path.join('.') || 'root'})`,
            cause: parsed.error
        });
    }
    return parsed.data;
}
