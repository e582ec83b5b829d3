/**
 * Language-model backends
 *
 * - HttpBackend subclasses: one per provider
 * - createBackend: validating factory keyed on the provider
 * - FailoverRouter: primary/fallback routing with a sticky degraded mode
 */

export type { LLMBackend } from './types';
export { HttpBackend, type HttpBackendSettings, type GenerateRequest } from './httpBackend';
export { OllamaBackend } from './ollamaBackend';
export { OpenAIBackend } from './openaiBackend';
export { AnthropicBackend, ANTHROPIC_API_VERSION } from './anthropicBackend';
export { TextGenBackend } from './textGenBackend';
export { LocalAIBackend } from './localAiBackend';
export {
    createBackend,
    createBackendFor,
    describeProviders,
    listProviders,
    type BackendFactoryOptions,
    type ProviderDescription,
} from './backendFactory';
export { FailoverRouter, createFailoverRouter } from './failoverRouter';
