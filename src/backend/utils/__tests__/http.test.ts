/**
 * Tests for the shared HTTP helpers
 *
 * A local server on an ephemeral port sends headers and part of a body, then
 * stalls; every client built on fetchText must still give up in time.
 */

import * as http from 'http';
import { OllamaClient, OllamaErrorCode } from '../../clients/ollamaClient';
import { ExtractionError } from '../../errors';
import { WebExtractor } from '../../extractors/webExtractor';
import { createBackend } from '../../llm/backendFactory';
import {
    HttpStatusError,
    RequestTimeoutError,
    fetchText,
    isConnectionError,
    isTransientHttpError,
    readErrorReason,
} from '../http';

function listen(server: http.Server): Promise<string> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('Expected a TCP address'));
                return;
            }
            resolve(`http://127.0.0.1:${address.port}`);
        });
    });
}

describe('fetchText', () => {
    let server: http.Server;
    let baseUrl: string;

    beforeEach(async () => {
        server = http.createServer((req, res) => {
            if (req.url === '/complete') {
                res.writeHead(404, 'Not Found', { 'Content-Type': 'application/json' });
                res.end(JSON.stringify({ error: 'no such page' }));
                return;
            }
            // Headers and a partial body, then nothing
            res.writeHead(200, { 'Content-Type': 'text/html' });
            res.write('<html><body>partial');
        });
        baseUrl = await listen(server);
    });

    afterEach(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('should return the status and the whole body', async () => {
        const response = await fetchText(`${baseUrl}/complete`, { method: 'GET' }, 1000);

        expect(response).toEqual({
            status: 404,
            statusText: 'Not Found',
            ok: false,
            body: '{"error":"no such page"}',
        });
        expect(readErrorReason(response)).toBe('HTTP 404: Not Found (no such page)');
    });

    it('should time out when the body stalls after the headers', async () => {
        await expect(fetchText(`${baseUrl}/stalled`, { method: 'GET' }, 200)).rejects.toBeInstanceOf(
            RequestTimeoutError
        );
    });

    it('should fail web extraction instead of waiting for the body', async () => {
        const extractor = new WebExtractor({ timeoutMs: 200, maxRetries: 0 });

        const error = await extractor.extract(`${baseUrl}/stalled`).catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(ExtractionError);
        expect(error).toHaveProperty('message', `Failed to fetch ${baseUrl}/stalled: Request timed out after 200ms`);
    });

    it('should fail a generation instead of waiting for the body', async () => {
        const backend = createBackend({
            provider: 'ollama',
            modelName: 'test-model',
            endpoint: baseUrl,
            temperature: 0.1,
            maxOutputTokens: 100,
            timeoutMs: 200,
            maxRetries: 0,
        });

        await expect(backend.generate('hi')).rejects.toThrow(
            'ollama:test-model request failed: Request timed out after 200ms'
        );
    });

    it('should fail an embedding instead of waiting for the body', async () => {
        const client = new OllamaClient({ baseUrl, timeoutMs: 200, maxRetries: 0 });

        await expect(client.generateEmbedding('dipole')).rejects.toMatchObject({ code: OllamaErrorCode.TIMEOUT });
    });
});

describe('isTransientHttpError', () => {
    it('should retry timeouts, rate limits, server errors and failed connections', () => {
        expect(isTransientHttpError(new RequestTimeoutError(10))).toBe(true);
        expect(isTransientHttpError(new HttpStatusError(429, 'slow down'))).toBe(true);
        expect(isTransientHttpError(new HttpStatusError(503, 'unavailable'))).toBe(true);
        expect(isTransientHttpError(new TypeError('fetch failed'))).toBe(true);
    });

    it('should not retry client errors', () => {
        expect(isTransientHttpError(new HttpStatusError(400, 'bad request'))).toBe(false);
        expect(isTransientHttpError(new Error('boom'))).toBe(false);
    });
});

describe('isConnectionError', () => {
    it('should recognise a TypeError by name', () => {
        expect(isConnectionError({ name: 'TypeError', message: 'fetch failed' })).toBe(true);
        expect(isConnectionError(new RangeError('out of range'))).toBe(false);
        expect(isConnectionError(null)).toBe(false);
    });
});
