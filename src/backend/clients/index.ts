/**
 * External service clients
 *
 * - OllamaClient: embeddings and model listing from a local Ollama instance
 */

export {
    OllamaClient,
    createOllamaClient,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
    type IOllamaClient,
    type OllamaClientConfig,
} from './ollamaClient';
