/**
 * HTTP helpers shared by the backend clients and the web extractor.
 *
 * Node.js fetch has no built-in timeout, so every request is bounded with an
 * AbortController. Callers combine this with retryWithBackoff and
 * isTransientHttpError to get a bounded retry policy.
 */

export class RequestTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
    }
}

/**
 * Raised for non-2xx responses.
 */
export class HttpStatusError extends Error {
    constructor(
        public readonly status: number,
        message: string
    ) {
        super(message);
        this.name = 'HttpStatusError';
    }
}

/**
 * Status and full body of a response.
 */
export interface TextResponse {
    status: number;
    statusText: string;
    ok: boolean;
    body: string;
}

/**
 * Sends a request and reads the whole body under one deadline, so a server
 * that sends headers and then stalls still times out.
 */
export async function fetchText(url: string, options: RequestInit, timeoutMs: number): Promise<TextResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetch(url, {
            ...options,
            signal: controller.signal,
        });
        const body = await response.text();
        return { status: response.status, statusText: response.statusText, ok: response.ok, body };
    } catch (error) {
        // Covers aborts during the body read as well as before the headers
        if (controller.signal.aborted) {
            throw new RequestTimeoutError(timeoutMs);
        }
        throw error;
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Short, human-readable reason for a non-2xx response.
 */
export function readErrorReason(response: TextResponse): string {
    const body = response.body.trim();
    const fallback = `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`;
    if (!body) {
        return fallback;
    }

    const parsed = parseJson(body);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
        const detail = parsed.error;
        if (typeof detail === 'string') {
            return `${fallback} (${detail})`;
        }
        if (typeof detail === 'object' && detail !== null && 'message' in detail && typeof detail.message === 'string') {
            return `${fallback} (${detail.message})`;
        }
    }

    return `${fallback} (${body.slice(0, 200)})`;
}

/**
 * JSON.parse that returns undefined instead of throwing.
 */
export function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Timeouts, connection failures, 429 and 5xx are worth another attempt.
 * Other 4xx responses and payload errors are not.
 */
export function isTransientHttpError(error: unknown): boolean {
    if (error instanceof RequestTimeoutError) {
        return true;
    }
    if (error instanceof HttpStatusError) {
        return error.status === 429 || error.status >= 500;
    }
    return isConnectionError(error);
}

/**
 * fetch rejects with a TypeError when the connection itself fails. The error
 * is created in Node's realm, so its name is checked rather than its class.
 */
export function isConnectionError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TypeError';
}
