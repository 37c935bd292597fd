import { capitalize, describeError, type NewsArticle, type SearchResult } from '@newsroute/core';

export const MOCK_SOURCE_NAME = 'newsroute';

export function mockHeadlines(category: string, count: number): NewsArticle[] {
  return Array.from({ length: count }, (_, index) => ({
    title: `Sample ${capitalize(category)} Headline ${index + 1}`,
    sourceName: MOCK_SOURCE_NAME,
    url: ''
  }));
}

export function mockSearchResults(query: string, count: number): SearchResult[] {
  return Array.from({ length: count }, (_, index) => ({
    title: `Mock result for ${query} - ${index + 1}`,
    content: '',
    url: ''
  }));
}

export function mockAnswer(prompt: string): string {
  return `(Mock) Answer to: ${prompt}`;
}

export function answerFallback(question: string, error: unknown, detailLength: number): string {
  return `[fallback] Could not reach the answer service (${describeError(error, detailLength)}). Your question was: "${question}"`;
}

export function errorResponse(error: unknown, detailLength: number): string {
  return `[error] Something went wrong while processing your request (${describeError(error, detailLength)}).`;
}
