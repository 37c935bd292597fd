import type { SearchResult, SearchSource } from '@newsroute/core';

export class FakeSearchSource implements SearchSource {
    public readonly calls: Array<{ query: string; maxResults: number }> = [];
    private failure: Error | null = null;

    public constructor(private results: SearchResult[] = [
        { title: 'Fake result', content: 'Fake content', url: 'https://search.example/fake' }
    ]) { }

    public setResults(results: SearchResult[]): void {
        this.results = results;
        this.failure = null;
    }

    public failWith(error: Error): void {
        this.failure = error;
    }

    public async search(query: string, maxResults: number): Promise<SearchResult[]> {
        this.calls.push({ query, maxResults });
        if (this.failure) throw this.failure;
        return this.results.slice(0, maxResults);
    }
}
