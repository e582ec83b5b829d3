/**
 * LocalAI's OpenAI-compatible chat endpoint.
 */

import { GenerateRequest, HttpBackend } from './httpBackend';
import { ChatCompletion, chatCompletionSchema } from './openaiBackend';

export class LocalAIBackend extends HttpBackend<ChatCompletion> {
    protected readonly responseSchema = chatCompletionSchema;

    protected buildRequest(prompt: string, temperature: number, maxTokens: number): GenerateRequest {
        return {
            path: '/v1/chat/completions',
            body: {
                model: this.settings.modelName,
                messages: [{ role: 'user', content: prompt }],
                temperature,
                max_tokens: maxTokens,
            },
        };
    }

    protected extractText(payload: ChatCompletion): string {
        return payload.choices[0]?.message.content ?? '';
    }

    isHealthy(): Promise<boolean> {
        return this.checkEndpoint('/v1/models');
    }
}
