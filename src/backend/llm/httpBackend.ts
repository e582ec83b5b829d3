/**
 * Shared request handling for HTTP language-model backends.
 *
 * Subclasses describe their endpoint (path, headers, body, response schema);
 * this class owns the timeout, the retry budget and the mapping of every
 * failure onto the backend error types.
 */

import { z } from 'zod';
import { BackendConfig, BackendProvider, GenerationOptions } from '../../shared/types';
import { BackendMalformedResponseError, BackendUnavailableError, toError } from '../errors';
import {
    HttpStatusError,
    fetchText,
    isTransientHttpError,
    parseJson,
    readErrorReason,
} from '../utils/http';
import { createLogger, errorFields } from '../utils/logger';
import { retryWithBackoff } from '../utils/retry';
import { LLMBackend } from './types';

const log = createLogger('llm-backend');

export const HEALTH_CHECK_TIMEOUT_MS = 5000;

export interface HttpBackendSettings extends BackendConfig {
    endpoint: string;
    /** First retry delay; doubles on every further attempt */
    retryBaseDelayMs?: number;
}

export interface GenerateRequest {
    path: string;
    body: unknown;
}

export abstract class HttpBackend<TResponse> implements LLMBackend {
    protected readonly settings: HttpBackendSettings;

    constructor(settings: HttpBackendSettings) {
        this.settings = { ...settings, endpoint: settings.endpoint.replace(/\/+$/, '') };
    }

    get provider(): BackendProvider {
        return this.settings.provider;
    }

    get name(): string {
        return `${this.settings.provider}:${this.settings.modelName}`;
    }

    protected abstract readonly responseSchema: z.ZodType<TResponse>;

    protected abstract buildRequest(prompt: string, temperature: number, maxTokens: number): GenerateRequest;

    protected abstract extractText(payload: TResponse): string;

    abstract isHealthy(): Promise<boolean>;

    protected headers(): Record<string, string> {
        return { 'Content-Type': 'application/json' };
    }

    async generate(prompt: string, options: GenerationOptions = {}): Promise<string> {
        const temperature = options.temperature ?? this.settings.temperature;
        const maxTokens = options.maxTokens ?? this.settings.maxOutputTokens;
        const request = this.buildRequest(prompt, temperature, maxTokens);

        try {
            return await retryWithBackoff(() => this.send(request), {
                retries: this.settings.maxRetries,
                baseDelayMs: this.settings.retryBaseDelayMs ?? 1000,
                maxDelayMs: 10000,
                shouldRetry: isTransientHttpError,
                onRetry: (error, attempt, delayMs) =>
                    log.warn('generate_retry', { backend: this.name, attempt, delayMs, ...errorFields(error) }),
            });
        } catch (error) {
            if (error instanceof BackendUnavailableError) {
                throw error;
            }
            throw new BackendUnavailableError(
                `${this.name} request failed: ${toError(error).message}`,
                this.name,
                toError(error)
            );
        }
    }

    private async send(request: GenerateRequest): Promise<string> {
        const response = await fetchText(
            `${this.settings.endpoint}${request.path}`,
            {
                method: 'POST',
                headers: this.headers(),
                body: JSON.stringify(request.body),
            },
            this.settings.timeoutMs
        );

        if (!response.ok) {
            throw new HttpStatusError(response.status, readErrorReason(response));
        }

        const payload = parseJson(response.body);
        if (payload === undefined) {
            throw new BackendMalformedResponseError(`${this.name} returned a non-JSON response`, this.name);
        }

        const parsed = this.responseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new BackendMalformedResponseError(
                `${this.name} returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
                this.name
            );
        }

        const text = this.extractText(parsed.data).trim();
        if (!text) {
            throw new BackendMalformedResponseError(`${this.name} returned an empty completion`, this.name);
        }
        return text;
    }

    /**
     * True when GET <endpoint><path> answers with a 2xx status.
     */
    protected async checkEndpoint(path: string): Promise<boolean> {
        try {
            const response = await fetchText(
                `${this.settings.endpoint}${path}`,
                { method: 'GET', headers: this.headers() },
                HEALTH_CHECK_TIMEOUT_MS
            );
            return response.ok;
        } catch (error) {
            log.debug('health_check_failed', { backend: this.name, path, ...errorFields(error) });
            return false;
        }
    }

    /**
     * Health through a tiny real generation, for APIs without a free status endpoint.
     */
    protected async checkByGeneration(): Promise<boolean> {
        try {
            const text = await this.generate('Test', { maxTokens: 5 });
            return text.length > 0;
        } catch (error) {
            log.debug('health_generation_failed', { backend: this.name, ...errorFields(error) });
            return false;
        }
    }
}
