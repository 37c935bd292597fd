import { resolveWithFallback } from '@newsroute/core';
import { answerFallback, mockAnswer } from './fallbacks';
import { retryPolicy, toOutcome } from './outcome';
import type { HandlerDeps, HandlerOutcome } from './types';

export function buildQuestionPrompt(question: string, category?: string | null): string {
  const context = category?.trim();
  return context ? `In the context of ${context}, ${question}` : question;
}

/**
 * Answers a free-form question through the completion source. Without a
 * configured source the answer is a mock echo; on failure the response is
 * a `[fallback]` text naming the error.
 */
export async function handleQuestion(
  question: string,
  category: string | null | undefined,
  deps: HandlerDeps
): Promise<HandlerOutcome> {
  const { sources, config, logger } = deps;
  const completion = sources.completion;
  const prompt = buildQuestionPrompt(question, category);

  const result = await resolveWithFallback({
    label: 'completion',
    run: completion
      ? async (signal) => {
        const response = await completion.complete({
          prompt,
          maxTokens: config.completionMaxTokens,
          temperature: config.completionTemperature,
          systemPrompt: config.completionSystemPrompt
        }, { signal });
        return response.content;
      }
      : null,
    fallback: (error) => (error === null ? mockAnswer(prompt) : answerFallback(question, error, config.errorDetailLength)),
    timeoutMs: config.sourceTimeoutMs,
    retry: retryPolicy(config),
    logger
  });

  return toOutcome(result, result.data);
}
