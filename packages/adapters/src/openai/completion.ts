import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import {
    SourceError,
    errorMessage,
    sourceErrorKindForStatus,
    type CompletionRequest,
    type CompletionResponse,
    type CompletionSource,
    type SourceCallOptions
} from '@newsroute/core';

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

function toOpenAIMessages(request: CompletionRequest): OpenAIMessage[] {
    const messages: OpenAIMessage[] = [];
    if (request.systemPrompt) {
        messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });
    return messages;
}

function toSourceError(error: unknown): SourceError {
    if (error instanceof APIUserAbortError) {
        return new SourceError({ source: 'openai', kind: 'timeout', message: 'request cancelled', cause: error });
    }
    if (error instanceof APIConnectionTimeoutError) {
        return new SourceError({ source: 'openai', kind: 'timeout', message: error.message, cause: error });
    }
    if (error instanceof APIConnectionError) {
        return new SourceError({ source: 'openai', kind: 'network', message: error.message, cause: error });
    }
    if (error instanceof APIError && error.status !== undefined) {
        return new SourceError({
            source: 'openai',
            kind: sourceErrorKindForStatus(error.status),
            status: error.status,
            message: error.message,
            cause: error
        });
    }
    return new SourceError({ source: 'openai', kind: 'upstream', message: errorMessage(error), cause: error });
}

export interface OpenAICompletionSourceOptions {
    apiKey: string;
    model: string;
    baseUrl?: string;
    timeoutMs?: number;
    client?: OpenAI;
}

export class OpenAICompletionSource implements CompletionSource {
    private readonly client: OpenAI;

    public constructor(private readonly opts: OpenAICompletionSourceOptions) {
        this.client = opts.client ?? new OpenAI({
            baseURL: opts.baseUrl,
            apiKey: opts.apiKey,
            timeout: opts.timeoutMs ?? 15_000,
            // retries are owned by the caller's retry policy
            maxRetries: 0
        });
    }

    public async complete(request: CompletionRequest, options: SourceCallOptions = {}): Promise<CompletionResponse> {
        const start = Date.now();

        let response: OpenAI.Chat.Completions.ChatCompletion;
        try {
            response = await this.client.chat.completions.create({
                model: this.opts.model,
                messages: toOpenAIMessages(request),
                max_tokens: request.maxTokens,
                temperature: request.temperature
            }, { signal: options.signal });
        } catch (error) {
            throw toSourceError(error);
        }

        const content = response.choices[0]?.message.content?.trim() ?? '';
        if (!content) {
            throw new SourceError({ source: 'openai', kind: 'invalid_response', message: 'completion returned no content' });
        }

        return {
            content,
            model: response.model,
            tokensUsed: {
                promptTokens: response.usage?.prompt_tokens ?? 0,
                completionTokens: response.usage?.completion_tokens ?? 0
            },
            latencyMs: Date.now() - start
        };
    }
}
