/**
 * text-generation-webui style completion server.
 */

import { z } from 'zod';
import { GenerateRequest, HttpBackend } from './httpBackend';

const textGenResponseSchema = z.object({
    results: z.array(z.object({ text: z.string() })).min(1),
});

type TextGenResponse = z.infer<typeof textGenResponseSchema>;

export class TextGenBackend extends HttpBackend<TextGenResponse> {
    protected readonly responseSchema = textGenResponseSchema;

    protected buildRequest(prompt: string, temperature: number, maxTokens: number): GenerateRequest {
        return {
            path: '/api/v1/generate',
            body: {
                prompt,
                max_new_tokens: maxTokens,
                temperature,
                do_sample: true,
                top_p: 0.9,
                top_k: 20,
                repetition_penalty: 1.1,
            },
        };
    }

    protected extractText(payload: TextGenResponse): string {
        return payload.results[0]?.text ?? '';
    }

    isHealthy(): Promise<boolean> {
        return this.checkEndpoint('/api/v1/model');
    }
}
