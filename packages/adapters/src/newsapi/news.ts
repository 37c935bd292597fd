import { z } from 'zod';
import { SourceError, type NewsArticle, type NewsCategory, type NewsSource, type SourceCallOptions } from '@newsroute/core';
import { requestJson, type FetchLike } from '../http/requestJson';

const ArticleSchema = z.object({
    title: z.string().nullable(),
    url: z.string().nullable().optional(),
    source: z.object({ name: z.string().nullable().optional() }).nullable().optional()
});

const TopHeadlinesSchema = z.discriminatedUnion('status', [
    z.object({ status: z.literal('ok'), articles: z.array(ArticleSchema) }),
    z.object({ status: z.literal('error'), code: z.string().optional(), message: z.string().optional() })
]);

export interface NewsApiSourceOptions {
    apiKey: string;
    baseUrl?: string;
    language?: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
}

/**
 * NewsAPI.org `top-headlines` client.
 */
export class NewsApiSource implements NewsSource {
    private readonly baseUrl: string;
    private readonly language: string;
    private readonly timeoutMs: number;

    public constructor(private readonly options: NewsApiSourceOptions) {
        this.baseUrl = (options.baseUrl ?? 'https://newsapi.org/v2').replace(/\/+$/, '');
        this.language = options.language ?? 'en';
        this.timeoutMs = options.timeoutMs ?? 15_000;
    }

    public async fetchHeadlines(category: NewsCategory, pageSize: number, options: SourceCallOptions = {}): Promise<NewsArticle[]> {
        const params = new URLSearchParams({
            category,
            language: this.language,
            pageSize: String(pageSize)
        });

        const body = await requestJson({
            source: 'newsapi',
            url: `${this.baseUrl}/top-headlines?${params.toString()}`,
            init: { headers: { 'X-Api-Key': this.options.apiKey } },
            schema: TopHeadlinesSchema,
            timeoutMs: this.timeoutMs,
            signal: options.signal,
            fetchImpl: this.options.fetchImpl
        });

        if (body.status === 'error') {
            throw new SourceError({
                source: 'newsapi',
                kind: body.code === 'apiKeyInvalid' || body.code === 'apiKeyMissing' ? 'auth' : 'upstream',
                message: body.message ?? body.code ?? 'unknown error'
            });
        }

        return body.articles
            .filter((article) => Boolean(article.title) && article.title !== '[Removed]')
            .slice(0, pageSize)
            .map((article) => ({
                title: article.title ?? '',
                sourceName: article.source?.name ?? 'Unknown source',
                url: article.url ?? ''
            }));
    }
}
