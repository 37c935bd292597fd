import type { CompletionRequest, CompletionResponse, CompletionSource } from '@newsroute/core';

export class FakeCompletionSource implements CompletionSource {
    public lastRequest?: CompletionRequest;
    private responses: CompletionResponse[];
    private failure: Error | null = null;
    private callCount = 0;

    public constructor(responses?: CompletionResponse[]) {
        this.responses = responses ?? [
            {
                content: 'Fake answer',
                model: 'fake-model',
                tokensUsed: { promptTokens: 0, completionTokens: 0 },
                latencyMs: 10
            }
        ];
    }

    public setResponses(responses: CompletionResponse[]): void {
        this.responses = responses;
        this.callCount = 0;
        this.failure = null;
    }

    public failWith(error: Error): void {
        this.failure = error;
    }

    public async complete(request: CompletionRequest): Promise<CompletionResponse> {
        this.lastRequest = request;
        if (this.failure) throw this.failure;

        const response = this.responses[this.callCount % this.responses.length];
        if (!response) {
            throw new Error('FakeCompletionSource: No response available');
        }
        this.callCount++;
        return response;
    }
}
