/**
 * Application context
 *
 * Builds every component once from the configuration. The HTTP server and
 * the CLI both receive the same context and call dispose() at shutdown.
 */

import { AppConfig } from './config';
import { createOllamaClient } from './clients';
import {
  createImageEnhancer,
  createImageExtractor,
  createOcrEngine,
  createPageRasterizer,
  createPdfExtractor,
  createPdfTextReader,
  createWebExtractor,
} from './extractors';
import { FailoverRouter, LLMBackend, createBackend, createFailoverRouter } from './llm';
import { createDocumentChunker } from './services/documentChunker';
import { EmbeddingProvider, OllamaEmbeddingProvider } from './services/embeddings';
import { IngestionPipeline, createIngestionPipeline } from './services/ingestionPipeline';
import { RAGEngine, createRAGEngine } from './services/ragEngine';
import { createRelevanceFilter } from './services/relevanceFilter';
import { IVectorStore, createVectorStore } from './services/vectorStore';
import { createLogger, errorFields, setDefaultLogLevel } from './utils/logger';

const log = createLogger('app-context');

export interface AppContext {
  readonly config: AppConfig;
  readonly embeddings: EmbeddingProvider;
  readonly vectorStore: IVectorStore;
  readonly router: FailoverRouter;
  readonly ragEngine: RAGEngine;
  readonly ingestion: IngestionPipeline;
  /** Registers work to run on dispose(), latest first */
  onDispose(cleanup: () => Promise<void> | void): void;
  dispose(): Promise<void>;
}

/**
 * The configured fallback, or null when none is configured or it cannot be built.
 */
function createFallback(config: AppConfig): LLMBackend | null {
  if (!config.fallbackBackend) {
    return null;
  }
  try {
    return createBackend(config.fallbackBackend);
  } catch (error) {
    log.warn('fallback_backend_skipped', {
      provider: config.fallbackBackend.provider,
      ...errorFields(error),
    });
    return null;
  }
}

/**
 * @throws ConfigurationError when the primary backend cannot be built
 */
export function createAppContext(config: AppConfig): AppContext {
  setDefaultLogLevel(config.logLevel);

  const ollamaClient = createOllamaClient({
    baseUrl: config.embedding.baseUrl,
    embeddingModel: config.embedding.model,
    timeoutMs: config.embedding.timeoutMs,
    maxRetries: config.embedding.maxRetries,
  });
  const embeddings = new OllamaEmbeddingProvider(ollamaClient, config.embedding.model);
  const vectorStore = createVectorStore({
    indexPath: config.vectorIndexPath,
    embeddingModel: config.embedding.model,
  });

  const primary = createBackend(config.backend);
  const fallback = createFallback(config);
  const router = createFailoverRouter(primary, fallback);
  log.info('backends_configured', { primary: primary.name, fallback: fallback?.name ?? null });

  const ragEngine = createRAGEngine(embeddings, vectorStore, router, config.retrieval);

  const enhancer = createImageEnhancer({
    blockSize: config.ocr.blockSize,
    thresholdC: config.ocr.thresholdC,
    morphKernelSize: config.ocr.morphKernelSize,
  });
  const ocr = createOcrEngine({ binaryPath: config.ocr.tesseractPath, timeoutMs: config.ocr.timeoutMs });
  const rasterizer = createPageRasterizer({
    binaryPath: config.ocr.pdftoppmPath,
    timeoutMs: config.ocr.timeoutMs,
  });

  const ingestion = createIngestionPipeline(
    {
      pdf: createPdfExtractor(
        { textReader: createPdfTextReader(), rasterizer, enhancer, ocr },
        { minTextLength: config.ocr.minTextLength, dpi: config.ocr.dpi }
      ),
      image: createImageExtractor(enhancer, ocr),
      web: createWebExtractor({ timeoutMs: config.web.timeoutMs, maxRetries: config.web.maxRetries }),
    },
    createDocumentChunker(createRelevanceFilter(config.vocabulary), config.chunking),
    embeddings,
    vectorStore
  );

  const cleanups: Array<() => Promise<void> | void> = [];

  return {
    config,
    embeddings,
    vectorStore,
    router,
    ragEngine,
    ingestion,
    onDispose(cleanup) {
      cleanups.push(cleanup);
    },
    async dispose() {
      while (cleanups.length > 0) {
        const cleanup = cleanups.pop();
        try {
          await cleanup?.();
        } catch (error) {
          log.error('dispose_failed', errorFields(error));
        }
      }
      log.debug('context_disposed');
    },
  };
}
