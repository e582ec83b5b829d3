/**
 * Backend services
 *
 * Core business logic components:
 * - RelevanceFilter / DocumentChunker: split extracted text into tagged records
 * - Embeddings / VectorStore: embed records and keep the persistent index
 * - IngestionPipeline: extract, chunk, embed and index inputs
 * - QueryProcessor: validates questions and builds the prompt
 * - RAGEngine: answers questions, reports health and statistics
 */

export {
    validateQuery,
    formatContext,
    buildPrompt,
    previewContent,
    toSourceExcerpt,
    getPromptHeader,
} from './queryProcessor';

export { RelevanceFilter, createRelevanceFilter, RELEVANCE_THRESHOLD } from './relevanceFilter';

export {
    DocumentChunker,
    createDocumentChunker,
    splitIntoChunks,
    validateChunkingConfig,
    DEFAULT_CHUNKING_CONFIG,
} from './documentChunker';

export type { ChunkingConfig, TextChunk } from './documentChunker';

export { OllamaEmbeddingProvider, embedAll } from './embeddings';

export type { EmbeddingProvider } from './embeddings';

export {
    PersistentVectorStore,
    createVectorStore,
    cosineSimilarity,
    selectByMmr,
} from './vectorStore';

export type {
    IVectorStore,
    MmrOptions,
    PersistentVectorStoreConfig,
    SearchResult,
    VectorEntry,
} from './vectorStore';

export {
    IngestionPipeline,
    createIngestionPipeline,
    emptyReport,
    mergeReports,
    listFiles,
} from './ingestionPipeline';

export type { IngestionExtractors } from './ingestionPipeline';

export {
    RAGEngine,
    createRAGEngine,
    DEFAULT_RAG_CONFIG,
} from './ragEngine';

export type { RAGEngineConfig, IRAGEngine } from './ragEngine';
