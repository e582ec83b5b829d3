/**
 * Ollama Client
 *
 * Wrapper for the Ollama embeddings endpoint (POST /api/embeddings), used for
 * indexing and queries. Generation goes through the backend abstraction in
 * ../llm instead.
 */

import { z } from 'zod';
import { toError } from '../errors';
import {
    HttpStatusError,
    RequestTimeoutError,
    TextResponse,
    fetchText,
    isConnectionError,
    isTransientHttpError,
    parseJson,
    readErrorReason,
} from '../utils/http';
import { createLogger, errorFields } from '../utils/logger';
import { retryWithBackoff } from '../utils/retry';

const log = createLogger('ollama-client');

/**
 * Configuration for the Ollama client.
 */
export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Request timeout in milliseconds */
    timeoutMs: number;
    /** Attempts after the first for transient failures */
    maxRetries: number;
    retryBaseDelayMs: number;
}

export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    embeddingModel: 'nomic-embed-text',
    timeoutMs: 30000,
    maxRetries: 2,
    retryBaseDelayMs: 500,
};

/**
 * Error codes for different failure scenarios.
 */
export enum OllamaErrorCode {
    /** Ollama service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** Ollama returned an error response */
    API_ERROR = 'API_ERROR',
    /** Response body did not have the expected shape */
    INVALID_RESPONSE = 'INVALID_RESPONSE',
    UNKNOWN = 'UNKNOWN',
}

export class OllamaError extends Error {
    constructor(
        message: string,
        public readonly code: OllamaErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'OllamaError';
    }
}

const embeddingResponseSchema = z.object({
    embedding: z.array(z.number()).min(1),
});

export interface IOllamaClient {
    generateEmbedding(text: string): Promise<number[]>;
}

export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    get embeddingModel(): string {
        return this.config.embeddingModel;
    }

    /**
     * Embedding vector for the given text.
     */
    async generateEmbedding(text: string): Promise<number[]> {
        const model = this.config.embeddingModel;

        try {
            return await retryWithBackoff(
                async () => {
                    const response = await fetchText(
                        `${this.config.baseUrl}/api/embeddings`,
                        {
                            method: 'POST',
                            headers: { 'Content-Type': 'application/json' },
                            body: JSON.stringify({ model, prompt: text }),
                        },
                        this.config.timeoutMs
                    );

                    if (!response.ok) {
                        this.handleErrorResponse(response, model);
                    }

                    const parsed = embeddingResponseSchema.safeParse(parseJson(response.body));
                    if (!parsed.success) {
                        throw new OllamaError(
                            `Embedding model "${model}" returned no embedding`,
                            OllamaErrorCode.INVALID_RESPONSE
                        );
                    }
                    return parsed.data.embedding;
                },
                {
                    retries: this.config.maxRetries,
                    baseDelayMs: this.config.retryBaseDelayMs,
                    maxDelayMs: 5000,
                    shouldRetry: isTransientHttpError,
                    onRetry: (error, attempt, delayMs) =>
                        log.warn('embedding_retry', { attempt, delayMs, ...errorFields(error) }),
                }
            );
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embedding');
        }
    }

    /**
     * 404 means the model is not pulled; 429 and 5xx stay retryable.
     */
    private handleErrorResponse(response: TextResponse, model: string): never {
        const reason = readErrorReason(response);

        if (response.status === 404 || reason.includes('not found')) {
            throw new OllamaError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND
            );
        }

        throw new HttpStatusError(response.status, reason);
    }

    private wrapError(error: unknown, context: string): OllamaError {
        if (error instanceof OllamaError) {
            return error;
        }

        if (error instanceof HttpStatusError) {
            return new OllamaError(`Ollama API error: ${error.message}`, OllamaErrorCode.API_ERROR, error);
        }

        if (error instanceof RequestTimeoutError) {
            return new OllamaError(`${context}: ${error.message}`, OllamaErrorCode.TIMEOUT, error);
        }

        // Nothing listens on the port
        if (isConnectionError(error)) {
            return new OllamaError(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)',
                OllamaErrorCode.CONNECTION_REFUSED,
                toError(error)
            );
        }

        return new OllamaError(`${context}: ${toError(error).message}`, OllamaErrorCode.UNKNOWN, toError(error));
    }
}

export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
