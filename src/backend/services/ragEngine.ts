/**
 * RAG Engine Service
 *
 * Retrieval-Augmented Generation answers a question in three steps:
 * 1. RETRIEVE: embed the question and pick diverse, relevant records (MMR)
 * 2. AUGMENT: put the records into the domain-expert prompt
 * 3. GENERATE: send the prompt through the failover router
 *
 * The engine also reports health and collection statistics, both computed on
 * demand from the live index.
 */

import {
  CollectionStats,
  HealthReport,
  QueryResult,
  SimilarResult,
  SourceType,
} from '../../shared/types';
import { describeError } from '../errors';
import { FailoverRouter } from '../llm';
import { createLogger, errorFields } from '../utils/logger';
import { EmbeddingProvider } from './embeddings';
import { buildPrompt, toSourceExcerpt } from './queryProcessor';
import { IVectorStore } from './vectorStore';

const log = createLogger('rag-engine');

/** Number of sources listed in collection statistics */
const SAMPLE_SOURCE_COUNT = 10;

/**
 * Configuration for the RAG engine.
 */
export interface RAGEngineConfig {
  /** Number of records passed to the model */
  k: number;
  /** Nearest candidates considered by MMR */
  fetchK: number;
  /** MMR relevance/diversity trade-off */
  lambda: number;
  /** Characters of content shown per cited source */
  previewLength: number;
}

export const DEFAULT_RAG_CONFIG: RAGEngineConfig = {
  k: 5,
  fetchK: 10,
  lambda: 0.5,
  previewLength: 200,
};

/**
 * Interface for the RAG engine.
 */
export interface IRAGEngine {
  query(question: string): Promise<QueryResult>;
  health(): Promise<HealthReport>;
  stats(): Promise<CollectionStats>;
  clear(): Promise<number>;
  findSimilar(text: string, k?: number): Promise<SimilarResult>;
  resetBackend(): void;
}

export class RAGEngine implements IRAGEngine {
  private readonly config: RAGEngineConfig;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly vectorStore: IVectorStore,
    private readonly router: FailoverRouter,
    config: Partial<RAGEngineConfig> = {}
  ) {
    this.config = { ...DEFAULT_RAG_CONFIG, ...config };
  }

  /**
   * Answers a question. Never throws: any failure becomes an answer of the
   * form "Error processing query: <reason>" with no sources.
   */
  async query(question: string): Promise<QueryResult> {
    const startTime = Date.now();

    try {
      const queryEmbedding = await this.embeddings.embed(question);
      const records = await this.vectorStore.maxMarginalRelevanceSearch(queryEmbedding, {
        k: this.config.k,
        fetchK: this.config.fetchK,
        lambda: this.config.lambda,
      });

      const answer = await this.router.generate(buildPrompt(question, records));

      log.info('query_answered', {
        sources: records.length,
        degraded: this.router.degraded,
        durationMs: Date.now() - startTime,
      });

      return {
        answer,
        question,
        sources: records.map((record) => toSourceExcerpt(record, this.config.previewLength)),
      };
    } catch (error) {
      log.error('query_failed', { durationMs: Date.now() - startTime, ...errorFields(error) });
      return {
        answer: `Error processing query: ${describeError(error)}`,
        question,
        sources: [],
      };
    }
  }

  /**
   * Checks embeddings, index and backend. The pipeline is ready only when
   * all three pass.
   */
  async health(): Promise<HealthReport> {
    const [embeddings, index, backendDetail] = await Promise.all([
      this.checkEmbeddings(),
      this.checkIndex(),
      this.router.healthCheck(),
    ]);
    const backend = backendDetail.primary || backendDetail.fallback === true;

    return {
      embeddings,
      index,
      backend,
      pipelineReady: embeddings && index && backend,
      backendDetail,
    };
  }

  async stats(): Promise<CollectionStats> {
    const records = await this.vectorStore.records();

    const recordTypes: Partial<Record<SourceType, number>> = {};
    const sources = new Set<string>();
    for (const record of records) {
      recordTypes[record.sourceType] = (recordTypes[record.sourceType] ?? 0) + 1;
      sources.add(record.source);
    }

    return {
      totalRecords: records.length,
      recordTypes,
      uniqueSources: sources.size,
      sampleSources: Array.from(sources).slice(0, SAMPLE_SOURCE_COUNT),
    };
  }

  /**
   * Deletes every record.
   * @returns Number of records removed
   */
  async clear(): Promise<number> {
    const removed = await this.vectorStore.deleteAll();
    log.info('collection_cleared', { removed });
    return removed;
  }

  /**
   * Nearest records without generation, most similar first.
   */
  async findSimilar(text: string, k: number = this.config.k): Promise<SimilarResult> {
    const embedding = await this.embeddings.embed(text);
    const results = await this.vectorStore.similaritySearch(embedding, k);

    return {
      query: text,
      documents: results.map(({ record, score }) => {
        const { content, ...metadata } = record;
        return { content, metadata, score };
      }),
    };
  }

  /**
   * Sends calls to the primary backend again after a failover.
   */
  resetBackend(): void {
    this.router.reset();
  }

  private async checkEmbeddings(): Promise<boolean> {
    try {
      const embedding = await this.embeddings.embed('test');
      return embedding.length > 0;
    } catch (error) {
      log.warn('embeddings_unhealthy', errorFields(error));
      return false;
    }
  }

  private async checkIndex(): Promise<boolean> {
    try {
      await this.vectorStore.count();
      return true;
    } catch (error) {
      log.warn('index_unhealthy', errorFields(error));
      return false;
    }
  }
}

export function createRAGEngine(
  embeddings: EmbeddingProvider,
  vectorStore: IVectorStore,
  router: FailoverRouter,
  config?: Partial<RAGEngineConfig>
): RAGEngine {
  return new RAGEngine(embeddings, vectorStore, router, config);
}
