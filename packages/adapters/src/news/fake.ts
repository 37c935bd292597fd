import type { NewsArticle, NewsCategory, NewsSource } from '@newsroute/core';

export class FakeNewsSource implements NewsSource {
    public readonly calls: Array<{ category: NewsCategory; pageSize: number }> = [];
    private failure: Error | null = null;

    public constructor(private articles: NewsArticle[] = [
        { title: 'Fake headline', sourceName: 'Fake Wire', url: 'https://news.example/fake' }
    ]) { }

    public setArticles(articles: NewsArticle[]): void {
        this.articles = articles;
        this.failure = null;
    }

    /** Every subsequent call rejects with `error`. */
    public failWith(error: Error): void {
        this.failure = error;
    }

    public async fetchHeadlines(category: NewsCategory, pageSize: number): Promise<NewsArticle[]> {
        this.calls.push({ category, pageSize });
        if (this.failure) throw this.failure;
        return this.articles.slice(0, pageSize);
    }
}
