/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - extractors/: PDF, image and web text extraction
 * - services/: Chunking, embeddings, vector index, ingestion and the RAG engine
 * - llm/: Language-model backends and the failover router
 * - clients/: External service clients (OllamaClient)
 * - server/: Express app configuration and route handlers
 *
 * When run directly, this file starts the server.
 * When imported, it exports the factory functions.
 */

import { loadConfig } from './config';
import { createAppContext } from './context';
import { startServer } from './server';
import { createLogger, errorFields } from './utils/logger';

// Re-export server components
export { createApp, startServer, MAX_SIMILAR_LIMIT } from './server';

export type { ServerContext } from './server';

export { createAppContext } from './context';

export type { AppContext } from './context';

export { loadConfig } from './config';

export type { AppConfig } from './config';

// Re-export services
export * from './services';

export * from './llm';

export * from './extractors';

export * from './errors';

// Re-export clients
export {
    OllamaClient,
    createOllamaClient,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
} from './clients/ollamaClient';

export type { OllamaClientConfig, IOllamaClient } from './clients/ollamaClient';

const log = createLogger('server');

async function main(): Promise<void> {
    const context = createAppContext(loadConfig());
    await startServer(context);

    const shutdown = (signal: string): void => {
        log.info('shutdown', { signal });
        context.dispose().catch((error: unknown) => {
            log.error('shutdown_failed', errorFields(error));
            process.exitCode = 1;
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

// Start the server when run directly
if (require.main === module) {
    main().catch((error: unknown) => {
        log.error('startup_failed', errorFields(error));
        process.exit(1);
    });
}
