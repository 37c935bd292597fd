import { capitalize, truncate, type NewsArticle, type SearchResult } from '@newsroute/core';

export function formatHeadlines(category: string, articles: NewsArticle[]): string {
  const title = capitalize(category);
  if (articles.length === 0) {
    return `No ${title} headlines are available right now.`;
  }

  const lines = articles.map((article) => `- ${article.title} — ${article.sourceName}`);
  return `Top ${title} headlines:\n\n${lines.join('\n')}`;
}

export function formatSearchResults(query: string, results: SearchResult[], snippetLength: number): string {
  if (results.length === 0) {
    return `No web results found for "${query}".`;
  }

  const lines = results.map((result) => {
    const snippet = truncate(result.content.trim(), snippetLength);
    return snippet ? `- ${result.title} — ${snippet}` : `- ${result.title}`;
  });
  return `Search results for "${query}":\n\n${lines.join('\n')}`;
}
