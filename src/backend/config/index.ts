/**
 * Application configuration
 *
 * All settings come from environment variables (optionally loaded from a
 * .env file) and are parsed once at startup into a typed AppConfig.
 * Invalid values fail fast with a ConfigurationError instead of surfacing
 * later as a confusing runtime failure.
 */

import * as path from 'path';
import dotenv from 'dotenv';
import defaultVocabulary from './domainVocabulary.json';
import { BackendConfig, BackendProvider, BACKEND_PROVIDERS } from '../../shared/types';
import { ConfigurationError } from '../errors';
import { LogLevel, isLogLevel } from '../utils/logger';

dotenv.config();

export type Env = Record<string, string | undefined>;

export interface DomainVocabulary {
    topics: string[];
    keywords: string[];
}

export interface EmbeddingSettings {
    baseUrl: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
}

export interface ChunkingSettings {
    chunkSize: number;
    chunkOverlap: number;
}

export interface OcrSettings {
    /** Render resolution for image-only PDF pages */
    dpi: number;
    /** Pages with less embedded text than this are OCR'd */
    minTextLength: number;
    tesseractPath: string;
    pdftoppmPath: string;
    /** Adaptive threshold neighborhood (odd, >= 3) */
    blockSize: number;
    /** Constant subtracted from the neighborhood mean */
    thresholdC: number;
    /** Square structuring element for close/open; 1 disables it */
    morphKernelSize: number;
    /** Timeout for each external OCR/raster process */
    timeoutMs: number;
}

export interface WebSettings {
    timeoutMs: number;
    maxRetries: number;
}

export interface RetrievalSettings {
    k: number;
    fetchK: number;
    /** MMR trade-off: 1 = pure relevance, 0 = pure diversity */
    lambda: number;
    previewLength: number;
}

export interface ServerSettings {
    port: number;
    host: string;
    corsOrigin: string;
}

export interface AppConfig {
    dataDir: string;
    vectorIndexPath: string;
    uploadDir: string;
    embedding: EmbeddingSettings;
    chunking: ChunkingSettings;
    ocr: OcrSettings;
    web: WebSettings;
    retrieval: RetrievalSettings;
    vocabulary: DomainVocabulary;
    backend: BackendConfig;
    fallbackBackend: BackendConfig | null;
    server: ServerSettings;
    logLevel: LogLevel;
}

interface ProviderDefaults {
    prefix: string;
    model: string;
    endpoint: string;
}

const PROVIDER_DEFAULTS: Record<BackendProvider, ProviderDefaults> = {
    ollama: { prefix: 'OLLAMA', model: 'mistral:7b', endpoint: 'http://localhost:11434' },
    openai: { prefix: 'OPENAI', model: 'gpt-3.5-turbo', endpoint: 'https://api.openai.com/v1' },
    anthropic: { prefix: 'ANTHROPIC', model: 'claude-3-haiku-20240307', endpoint: 'https://api.anthropic.com' },
    textgen: { prefix: 'TEXTGEN', model: 'default', endpoint: 'http://localhost:5000' },
    localai: { prefix: 'LOCALAI', model: 'gpt-3.5-turbo', endpoint: 'http://localhost:8080' },
};

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_OUTPUT_TOKENS = 2000;

function parseNumber(value: string | undefined, fallback: number, label: string): number {
    if (value === undefined || value.trim() === '') {
        return fallback;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new ConfigurationError(`Invalid ${label}: ${value}. Must be a number.`);
    }
    return parsed;
}

function parsePositiveInt(value: string | undefined, fallback: number, label: string): number {
    const parsed = parseNumber(value, fallback, label);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigurationError(`Invalid ${label}: ${value ?? ''}. Must be a positive integer.`);
    }
    return parsed;
}

function parseNonNegativeInt(value: string | undefined, fallback: number, label: string): number {
    const parsed = parseNumber(value, fallback, label);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigurationError(`Invalid ${label}: ${value ?? ''}. Must be zero or a positive integer.`);
    }
    return parsed;
}

function parseClampedNumber(
    value: string | undefined,
    fallback: number,
    min: number,
    max: number,
    label: string
): number {
    const parsed = parseNumber(value, fallback, label);
    if (parsed < min || parsed > max) {
        throw new ConfigurationError(`Invalid ${label}: ${value ?? ''}. Must be between ${min} and ${max}.`);
    }
    return parsed;
}

function parseCsv(value: string | undefined, fallback: string[]): string[] {
    if (value === undefined) {
        return fallback;
    }

    const parts = value
        .split(',')
        .map((part) => part.trim())
        .filter(Boolean);
    return parts.length > 0 ? parts : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function isBackendProvider(value: string): value is BackendProvider {
    return BACKEND_PROVIDERS.some((provider) => provider === value);
}

/**
 * Maps a provider name to the enum, rejecting unknown names.
 */
export function parseBackendProvider(name: string): BackendProvider {
    const normalized = name.trim().toLowerCase();
    if (!isBackendProvider(normalized)) {
        throw new ConfigurationError(
            `Unknown backend type: ${name}. Available: ${BACKEND_PROVIDERS.join(', ')}`
        );
    }
    return normalized;
}

/**
 * Builds the connection settings for one provider from its prefixed
 * variables (OLLAMA_MODEL, OPENAI_API_KEY, ...).
 */
export function loadBackendConfig(providerName: string, env: Env = process.env): BackendConfig {
    const provider = parseBackendProvider(providerName);
    const defaults = PROVIDER_DEFAULTS[provider];
    const prefix = defaults.prefix;

    return {
        provider,
        modelName: nonEmpty(env[`${prefix}_MODEL`]) ?? defaults.model,
        endpoint: nonEmpty(env[`${prefix}_BASE_URL`]) ?? defaults.endpoint,
        apiKey: nonEmpty(env[`${prefix}_API_KEY`]),
        temperature: parseClampedNumber(
            env[`${prefix}_TEMPERATURE`],
            DEFAULT_TEMPERATURE,
            0,
            1,
            `${prefix}_TEMPERATURE`
        ),
        maxOutputTokens: parsePositiveInt(
            env[`${prefix}_MAX_TOKENS`],
            DEFAULT_MAX_OUTPUT_TOKENS,
            `${prefix}_MAX_TOKENS`
        ),
        timeoutMs: parsePositiveInt(env.LLM_TIMEOUT_MS, 60000, 'LLM_TIMEOUT_MS'),
        maxRetries: parseNonNegativeInt(env.LLM_MAX_RETRIES, 2, 'LLM_MAX_RETRIES'),
    };
}

/**
 * Chooses the fallback provider. Unless told otherwise, a local Ollama model
 * backs up any other primary; "none" disables failover.
 */
export function resolveFallbackProvider(
    primary: BackendProvider,
    setting: string | undefined
): BackendProvider | null {
    const value = nonEmpty(setting)?.toLowerCase();
    if (value === undefined) {
        return primary === 'ollama' ? null : 'ollama';
    }
    if (value === 'none') {
        return null;
    }
    return parseBackendProvider(value);
}

export function loadConfig(env: Env = process.env): AppConfig {
    const dataDir = path.resolve(nonEmpty(env.DATA_DIR) ?? path.join(process.cwd(), 'data'));

    const backend = loadBackendConfig(nonEmpty(env.LLM_BACKEND) ?? 'ollama', env);
    const fallbackProvider = resolveFallbackProvider(backend.provider, env.LLM_FALLBACK_BACKEND);

    const chunkSize = parsePositiveInt(env.CHUNK_SIZE, 1000, 'CHUNK_SIZE');
    const chunkOverlap = parsePositiveInt(env.CHUNK_OVERLAP, 200, 'CHUNK_OVERLAP');
    if (chunkOverlap >= chunkSize) {
        throw new ConfigurationError(
            `Invalid CHUNK_OVERLAP: ${chunkOverlap}. Must be smaller than CHUNK_SIZE (${chunkSize}).`
        );
    }

    const k = parsePositiveInt(env.RETRIEVAL_K, 5, 'RETRIEVAL_K');
    const fetchK = parsePositiveInt(env.RETRIEVAL_FETCH_K, 10, 'RETRIEVAL_FETCH_K');
    if (fetchK < k) {
        throw new ConfigurationError(`Invalid RETRIEVAL_FETCH_K: ${fetchK}. Must be at least RETRIEVAL_K (${k}).`);
    }

    const blockSize = parsePositiveInt(env.OCR_BLOCK_SIZE, 11, 'OCR_BLOCK_SIZE');
    if (blockSize < 3 || blockSize % 2 === 0) {
        throw new ConfigurationError(`Invalid OCR_BLOCK_SIZE: ${blockSize}. Must be an odd number >= 3.`);
    }

    const logLevel = nonEmpty(env.LOG_LEVEL)?.toLowerCase() ?? 'info';
    if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(`Invalid LOG_LEVEL: ${logLevel}.`);
    }

    return {
        dataDir,
        vectorIndexPath: path.join(dataDir, 'vector_db', 'index.json'),
        uploadDir: path.join(dataDir, 'uploads'),
        embedding: {
            baseUrl: nonEmpty(env.EMBEDDING_BASE_URL) ?? PROVIDER_DEFAULTS.ollama.endpoint,
            model: nonEmpty(env.EMBEDDING_MODEL) ?? 'nomic-embed-text',
            timeoutMs: parsePositiveInt(env.EMBEDDING_TIMEOUT_MS, 30000, 'EMBEDDING_TIMEOUT_MS'),
            maxRetries: parseNonNegativeInt(env.EMBEDDING_MAX_RETRIES, 2, 'EMBEDDING_MAX_RETRIES'),
        },
        chunking: { chunkSize, chunkOverlap },
        ocr: {
            dpi: parsePositiveInt(env.OCR_DPI, 300, 'OCR_DPI'),
            minTextLength: parseNonNegativeInt(env.OCR_MIN_TEXT_LENGTH, 100, 'OCR_MIN_TEXT_LENGTH'),
            tesseractPath: nonEmpty(env.TESSERACT_PATH) ?? 'tesseract',
            pdftoppmPath: nonEmpty(env.PDFTOPPM_PATH) ?? 'pdftoppm',
            blockSize,
            thresholdC: parseNumber(env.OCR_THRESHOLD_C, 2, 'OCR_THRESHOLD_C'),
            morphKernelSize: parsePositiveInt(env.OCR_MORPH_KERNEL, 1, 'OCR_MORPH_KERNEL'),
            timeoutMs: parsePositiveInt(env.OCR_TIMEOUT_MS, 120000, 'OCR_TIMEOUT_MS'),
        },
        web: {
            timeoutMs: parsePositiveInt(env.REQUEST_TIMEOUT_MS, 30000, 'REQUEST_TIMEOUT_MS'),
            maxRetries: parseNonNegativeInt(env.MAX_RETRIES, 3, 'MAX_RETRIES'),
        },
        retrieval: {
            k,
            fetchK,
            lambda: parseClampedNumber(env.RETRIEVAL_MMR_LAMBDA, 0.5, 0, 1, 'RETRIEVAL_MMR_LAMBDA'),
            previewLength: parsePositiveInt(env.SOURCE_PREVIEW_LENGTH, 200, 'SOURCE_PREVIEW_LENGTH'),
        },
        vocabulary: {
            topics: parseCsv(env.DOMAIN_TOPICS, defaultVocabulary.topics),
            keywords: parseCsv(env.DOMAIN_KEYWORDS, defaultVocabulary.keywords),
        },
        backend,
        fallbackBackend: fallbackProvider ? loadBackendConfig(fallbackProvider, env) : null,
        server: {
            port: parsePositiveInt(env.PORT, 3001, 'PORT'),
            host: nonEmpty(env.HOST) ?? '127.0.0.1',
            corsOrigin: nonEmpty(env.CORS_ORIGIN) ?? '*',
        },
        logLevel,
    };
}
