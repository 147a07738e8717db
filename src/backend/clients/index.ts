/**
 * External service clients
 *
 * Wrappers for external service communication:
 * - OllamaClient: Interface to a local Ollama instance for embeddings
 */

export {
    OllamaClient,
    createOllamaClient,
    sameModel,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
    type IOllamaClient,
    type OllamaClientConfig,
} from './ollamaClient';
