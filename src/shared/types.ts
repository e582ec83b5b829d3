/**
 * Shared type definitions for the documentation assistant
 *
 * These types define the contract between the ingestion pipeline,
 * the query pipeline and the front ends (HTTP server, CLI).
 * They're organized by domain:
 * - Records: Chunked, citable units of extracted text
 * - Backends: Language-model provider configuration
 * - Query: Answers and cited sources
 * - Index: Statistics and health
 * - API: Request/response shapes
 */

// ============================================================================
// Record Types
// ============================================================================

/**
 * Kind of input a record was extracted from.
 */
export type SourceType = 'pdf' | 'image' | 'web';

/**
 * A chunk of extracted text plus its citation metadata.
 * Records are the unit of storage and retrieval; they are frozen once created.
 */
export interface DocumentRecord {
    content: string;
    /** File path or URL the text came from */
    source: string;
    sourceType: SourceType;
    /** Position of the chunk within its source, unique per (source, sourceType) */
    chunkIndex: number;
    /** Filename for files, page title for web pages */
    title: string;
    domainRelevant: boolean;
}

/**
 * Record metadata without the content, as returned with citations.
 */
export type RecordMetadata = Omit<DocumentRecord, 'content'>;

// ============================================================================
// Backend Types
// ============================================================================

/**
 * Supported language-model providers.
 * - ollama: locally served model
 * - openai / anthropic: cloud providers
 * - textgen / localai: generic HTTP completion servers
 */
export type BackendProvider = 'ollama' | 'openai' | 'anthropic' | 'textgen' | 'localai';

export const BACKEND_PROVIDERS: readonly BackendProvider[] = [
    'ollama',
    'openai',
    'anthropic',
    'textgen',
    'localai',
];

/**
 * Connection settings for one backend instance.
 * Immutable for the life of the backend built from it.
 */
export interface BackendConfig {
    provider: BackendProvider;
    modelName: string;
    endpoint?: string;
    apiKey?: string;
    /** Sampling temperature in [0, 1] */
    temperature: number;
    maxOutputTokens: number;
    /** Per-request timeout in milliseconds */
    timeoutMs: number;
    /** Retries after the first attempt for transient failures */
    maxRetries: number;
}

/**
 * Per-call overrides for text generation.
 */
export interface GenerationOptions {
    temperature?: number;
    maxTokens?: number;
}

// ============================================================================
// Query Types
// ============================================================================

/**
 * A cited source: a content preview plus the record's metadata, unmodified.
 */
export interface SourceExcerpt {
    content: string;
    metadata: RecordMetadata;
}

/**
 * Answer to a single question.
 * When generation fails, `answer` carries the reason and `sources` is empty.
 */
export interface QueryResult {
    answer: string;
    question: string;
    sources: SourceExcerpt[];
}

/**
 * A stored record returned by similarity search, with its full content.
 */
export interface SimilarDocument {
    content: string;
    metadata: RecordMetadata;
    /** Cosine similarity to the query */
    score: number;
}

export interface SimilarResult {
    query: string;
    documents: SimilarDocument[];
}

/**
 * Result of query validation.
 * Invalid queries are rejected before processing.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

// ============================================================================
// Index Types
// ============================================================================

/**
 * Aggregate view over the stored records, computed on demand.
 */
export interface CollectionStats {
    totalRecords: number;
    recordTypes: Partial<Record<SourceType, number>>;
    uniqueSources: number;
    sampleSources: string[];
}

export interface BackendHealth {
    primary: boolean;
    fallback: boolean | null;
    degraded: boolean;
}

/**
 * Health of the query pipeline's dependencies.
 * pipelineReady is true only when all three checks pass.
 */
export interface HealthReport {
    embeddings: boolean;
    index: boolean;
    backend: boolean;
    pipelineReady: boolean;
    backendDetail: BackendHealth;
}

// ============================================================================
// Ingestion Types
// ============================================================================

export interface IngestionFailure {
    input: string;
    error: string;
}

/**
 * Outcome of an ingestion batch. Failures are counted, never thrown.
 */
export interface IngestionReport {
    processed: number;
    failed: number;
    recordsAdded: number;
    failures: IngestionFailure[];
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Request body for POST /api/query
 */
export interface QueryRequest {
    question: string;
}

/**
 * Request body for POST /api/documents/url
 */
export interface UrlIngestRequest {
    url: string;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse extends HealthReport {
    status: 'ok' | 'error';
}
