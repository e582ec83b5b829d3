/**
 * Anthropic Messages API.
 */

import { z } from 'zod';
import { GenerateRequest, HttpBackend } from './httpBackend';

export const ANTHROPIC_API_VERSION = '2023-06-01';

const messagesResponseSchema = z.object({
    content: z.array(
        z.object({
            type: z.string(),
            text: z.string().optional(),
        })
    ),
});

type MessagesResponse = z.infer<typeof messagesResponseSchema>;

export class AnthropicBackend extends HttpBackend<MessagesResponse> {
    protected readonly responseSchema = messagesResponseSchema;

    protected headers(): Record<string, string> {
        return {
            ...super.headers(),
            'x-api-key': this.settings.apiKey ?? '',
            'anthropic-version': ANTHROPIC_API_VERSION,
        };
    }

    protected buildRequest(prompt: string, temperature: number, maxTokens: number): GenerateRequest {
        return {
            path: '/v1/messages',
            body: {
                model: this.settings.modelName,
                max_tokens: maxTokens,
                temperature,
                messages: [{ role: 'user', content: prompt }],
            },
        };
    }

    protected extractText(payload: MessagesResponse): string {
        return payload.content
            .filter((block) => block.type === 'text')
            .map((block) => block.text ?? '')
            .join('');
    }

    isHealthy(): Promise<boolean> {
        return this.checkByGeneration();
    }
}
