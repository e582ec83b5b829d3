/**
 * OpenAI chat completions.
 */

import { z } from 'zod';
import { GenerateRequest, HttpBackend } from './httpBackend';

export const chatCompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable(),
                }),
            })
        )
        .min(1),
});

export type ChatCompletion = z.infer<typeof chatCompletionSchema>;

export class OpenAIBackend extends HttpBackend<ChatCompletion> {
    protected readonly responseSchema = chatCompletionSchema;

    protected headers(): Record<string, string> {
        return {
            ...super.headers(),
            Authorization: `Bearer ${this.settings.apiKey ?? ''}`,
        };
    }

    protected buildRequest(prompt: string, temperature: number, maxTokens: number): GenerateRequest {
        return {
            path: '/chat/completions',
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

    /**
     * The API has no free status call; a five-token completion stands in.
     */
    isHealthy(): Promise<boolean> {
        return this.checkByGeneration();
    }
}
