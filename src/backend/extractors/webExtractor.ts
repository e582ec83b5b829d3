/**
 * Web page extraction.
 *
 * Fetches a page with a bounded timeout and retry budget, strips non-content
 * markup and collapses the visible text into a single normalized string.
 */

import { parse } from 'node-html-parser';
import { ExtractionError, toError } from '../errors';
import {
    HttpStatusError,
    fetchText,
    isTransientHttpError,
    readErrorReason,
} from '../utils/http';
import { createLogger, errorFields } from '../utils/logger';
import { retryWithBackoff } from '../utils/retry';
import { ExtractedDocument, Extractor } from './types';

const log = createLogger('web-extractor');

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

const NON_CONTENT_SELECTOR = 'script, style, noscript, nav, header, footer';

export const UNKNOWN_TITLE = 'Unknown';

export interface WebExtractorOptions {
    timeoutMs: number;
    /** Attempts after the first one */
    maxRetries: number;
    baseDelayMs?: number;
}

/**
 * Trims every line, splits lines into phrases on runs of two or more
 * whitespace characters, drops empty phrases and joins the rest with single
 * spaces.
 */
export function collapseWhitespace(text: string): string {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .flatMap((line) => line.split(/\s{2,}/))
        .map((phrase) => phrase.trim())
        .filter(Boolean)
        .join(' ');
}

/**
 * Visible text and title of an HTML document.
 */
export function extractPageContent(html: string): { title: string; text: string } {
    const root = parse(html);
    const title = root.querySelector('title')?.text.trim() || UNKNOWN_TITLE;

    for (const element of root.querySelectorAll(NON_CONTENT_SELECTOR)) {
        element.remove();
    }

    const body = root.querySelector('body') ?? root;
    return { title, text: collapseWhitespace(body.text) };
}

export class WebExtractor implements Extractor<string> {
    constructor(private readonly options: WebExtractorOptions) {}

    async extract(url: string): Promise<ExtractedDocument> {
        let html: string;
        try {
            html = await retryWithBackoff(() => this.fetchPage(url), {
                retries: this.options.maxRetries,
                baseDelayMs: this.options.baseDelayMs ?? 1000,
                maxDelayMs: 10000,
                shouldRetry: isTransientHttpError,
                onRetry: (error, attempt, delayMs) =>
                    log.warn('web_fetch_retry', { url, attempt, delayMs, ...errorFields(error) }),
            });
        } catch (error) {
            throw new ExtractionError(
                `Failed to fetch ${url}: ${toError(error).message}`,
                url,
                toError(error)
            );
        }

        const { title, text } = extractPageContent(html);
        log.info('web_extracted', { url, characters: text.length });

        return {
            source: url,
            sourceType: 'web',
            title,
            sections: text ? [{ label: title, text }] : [],
        };
    }

    private async fetchPage(url: string): Promise<string> {
        const response = await fetchText(
            url,
            { method: 'GET', headers: { 'User-Agent': USER_AGENT } },
            this.options.timeoutMs
        );
        if (!response.ok) {
            throw new HttpStatusError(response.status, readErrorReason(response));
        }
        return response.body;
    }
}

export function createWebExtractor(options: WebExtractorOptions): WebExtractor {
    return new WebExtractor(options);
}
