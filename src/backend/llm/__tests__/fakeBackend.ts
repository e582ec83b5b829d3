/**
 * Scriptable in-memory backend for tests.
 */

import { BackendProvider } from '../../../shared/types';
import { LLMBackend } from '../types';

export type FakeResponse = string | Error;

export class FakeBackend implements LLMBackend {
    readonly provider: BackendProvider = 'ollama';
    readonly prompts: string[] = [];

    constructor(
        readonly name: string,
        private readonly respond: (call: number, prompt: string) => FakeResponse,
        private readonly healthy: boolean | Error = true
    ) {}

    async generate(prompt: string): Promise<string> {
        const response = this.respond(this.prompts.length, prompt);
        this.prompts.push(prompt);
        if (response instanceof Error) {
            throw response;
        }
        return response;
    }

    async isHealthy(): Promise<boolean> {
        if (this.healthy instanceof Error) {
            throw this.healthy;
        }
        return this.healthy;
    }
}

export function answering(text: string): (call: number, prompt: string) => FakeResponse {
    return () => text;
}

export function failing(message: string): (call: number, prompt: string) => FakeResponse {
    return () => new Error(message);
}
