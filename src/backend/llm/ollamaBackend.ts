/**
 * Locally served models through Ollama's generate endpoint.
 */

import { z } from 'zod';
import { GenerateRequest, HttpBackend } from './httpBackend';

const ollamaResponseSchema = z.object({
    response: z.string(),
});

type OllamaResponse = z.infer<typeof ollamaResponseSchema>;

export class OllamaBackend extends HttpBackend<OllamaResponse> {
    protected readonly responseSchema = ollamaResponseSchema;

    protected buildRequest(prompt: string, temperature: number, maxTokens: number): GenerateRequest {
        return {
            path: '/api/generate',
            body: {
                model: this.settings.modelName,
                prompt,
                stream: false,
                options: {
                    temperature,
                    num_predict: maxTokens,
                },
            },
        };
    }

    protected extractText(payload: OllamaResponse): string {
        return payload.response;
    }

    isHealthy(): Promise<boolean> {
        return this.checkEndpoint('/api/tags');
    }
}
