import { z } from 'zod';
import type { SearchResult, SearchSource, SourceCallOptions } from '@newsroute/core';
import { requestJson, type FetchLike } from '../http/requestJson';

const SearchResponseSchema = z.object({
    results: z.array(z.object({
        title: z.string().nullable().optional(),
        url: z.string().nullable().optional(),
        content: z.string().nullable().optional()
    }))
});

export interface TavilySearchSourceOptions {
    apiKey: string;
    baseUrl?: string;
    searchDepth?: 'basic' | 'advanced';
    timeoutMs?: number;
    fetchImpl?: FetchLike;
}

export class TavilySearchSource implements SearchSource {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    public constructor(private readonly options: TavilySearchSourceOptions) {
        this.baseUrl = (options.baseUrl ?? 'https://api.tavily.com').replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? 15_000;
    }

    public async search(query: string, maxResults: number, options: SourceCallOptions = {}): Promise<SearchResult[]> {
        const body = await requestJson({
            source: 'tavily',
            url: `${this.baseUrl}/search`,
            init: {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.options.apiKey}`
                },
                body: JSON.stringify({
                    query,
                    max_results: maxResults,
                    search_depth: this.options.searchDepth ?? 'advanced',
                    include_answer: false,
                    include_raw_content: false
                })
            },
            schema: SearchResponseSchema,
            timeoutMs: this.timeoutMs,
            signal: options.signal,
            fetchImpl: this.options.fetchImpl
        });

        return body.results.slice(0, maxResults).map((result) => ({
            title: result.title || result.url || 'Untitled result',
            content: result.content ?? '',
            url: result.url ?? ''
        }));
    }
}
