/**
 * Error taxonomy for the ingestion and query pipelines.
 *
 * Every failure the core raises on purpose is a RagError subclass, so callers
 * can tell a known condition (bad configuration, unreachable backend) from a bug.
 *
 * - ExtractionError: one page, file or URL could not be read (skip and continue)
 * - BackendUnavailableError: a language-model call failed (triggers failover)
 * - BackendMalformedResponseError: the backend answered with an unusable payload
 * - IndexUnavailableError: the vector index could not be read or written
 * - ConfigurationError: invalid settings, fatal at startup
 */

/**
 * Error codes for the failure categories.
 */
export enum RagErrorCode {
    EXTRACTION_FAILED = 'EXTRACTION_FAILED',
    BACKEND_UNAVAILABLE = 'BACKEND_UNAVAILABLE',
    BACKEND_MALFORMED_RESPONSE = 'BACKEND_MALFORMED_RESPONSE',
    INDEX_UNAVAILABLE = 'INDEX_UNAVAILABLE',
    CONFIGURATION = 'CONFIGURATION',
}

export class RagError extends Error {
    constructor(
        message: string,
        public readonly code: RagErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'RagError';
    }
}

export class ExtractionError extends RagError {
    constructor(
        message: string,
        public readonly input: string,
        cause?: Error
    ) {
        super(message, RagErrorCode.EXTRACTION_FAILED, cause);
        this.name = 'ExtractionError';
    }
}

export class BackendUnavailableError extends RagError {
    constructor(
        message: string,
        public readonly backend: string,
        cause?: Error,
        code: RagErrorCode = RagErrorCode.BACKEND_UNAVAILABLE
    ) {
        super(message, code, cause);
        this.name = 'BackendUnavailableError';
    }
}

/**
 * Treated exactly like an unavailable backend by the failover router.
 */
export class BackendMalformedResponseError extends BackendUnavailableError {
    constructor(message: string, backend: string, cause?: Error) {
        super(message, backend, cause, RagErrorCode.BACKEND_MALFORMED_RESPONSE);
        this.name = 'BackendMalformedResponseError';
    }
}

export class IndexUnavailableError extends RagError {
    constructor(message: string, cause?: Error) {
        super(message, RagErrorCode.INDEX_UNAVAILABLE, cause);
        this.name = 'IndexUnavailableError';
    }
}

export class ConfigurationError extends RagError {
    constructor(message: string, cause?: Error) {
        super(message, RagErrorCode.CONFIGURATION, cause);
        this.name = 'ConfigurationError';
    }
}

/**
 * Normalizes anything thrown into an Error instance. Errors raised by Node
 * internals fail `instanceof Error` under Jest's sandbox, so an object with a
 * string message is copied rather than stringified.
 */
export function toError(error: unknown): Error {
    if (error instanceof Error) {
        return error;
    }
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        const copy = new Error(error.message);
        if ('name' in error && typeof error.name === 'string') {
            copy.name = error.name;
        }
        return copy;
    }
    return new Error(String(error));
}

/**
 * User-facing description of a failure. Never includes a stack trace.
 */
export function describeError(error: unknown): string {
    if (error instanceof RagError) {
        return error.message;
    }
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string' && error.message) {
        return error.message;
    }
    return 'An unexpected error occurred';
}
