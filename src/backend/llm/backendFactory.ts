/**
 * Backend factory keyed on the provider name.
 *
 * All validation happens here, before any request is made: a backend that
 * was constructed has a usable configuration.
 */

import { BACKEND_PROVIDERS, BackendConfig, BackendProvider } from '../../shared/types';
import { Env, isBackendProvider, loadBackendConfig } from '../config';
import { ConfigurationError, describeError } from '../errors';
import { AnthropicBackend } from './anthropicBackend';
import { HttpBackendSettings } from './httpBackend';
import { LocalAIBackend } from './localAiBackend';
import { OllamaBackend } from './ollamaBackend';
import { OpenAIBackend } from './openaiBackend';
import { TextGenBackend } from './textGenBackend';
import { LLMBackend } from './types';

const PROVIDERS_REQUIRING_KEY: ReadonlySet<BackendProvider> = new Set(['openai', 'anthropic']);

export interface BackendFactoryOptions {
    retryBaseDelayMs?: number;
}

function validateEndpoint(config: BackendConfig): string {
    const endpoint = config.endpoint;
    if (!endpoint) {
        throw new ConfigurationError(`No endpoint configured for ${config.provider}`);
    }

    let url: URL;
    try {
        url = new URL(endpoint);
    } catch {
        throw new ConfigurationError(`Invalid endpoint for ${config.provider}: ${endpoint}`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigurationError(`Endpoint for ${config.provider} must use http or https: ${endpoint}`);
    }
    return endpoint;
}

function validateSettings(config: BackendConfig): void {
    if (!isBackendProvider(config.provider)) {
        throw new ConfigurationError(
            `Unknown backend type: ${String(config.provider)}. Available: ${BACKEND_PROVIDERS.join(', ')}`
        );
    }
    if (typeof fetch !== 'function') {
        throw new ConfigurationError('This runtime has no fetch implementation; Node.js 18 or newer is required');
    }
    if (PROVIDERS_REQUIRING_KEY.has(config.provider) && !config.apiKey) {
        throw new ConfigurationError(
            `${config.provider} requires an API key (set ${config.provider.toUpperCase()}_API_KEY)`
        );
    }
    if (!(config.temperature >= 0 && config.temperature <= 1)) {
        throw new ConfigurationError(`Temperature must be between 0 and 1, got ${config.temperature}`);
    }
    if (!Number.isInteger(config.maxOutputTokens) || config.maxOutputTokens <= 0) {
        throw new ConfigurationError(`Max output tokens must be a positive integer, got ${config.maxOutputTokens}`);
    }
    if (!(config.timeoutMs > 0)) {
        throw new ConfigurationError(`Timeout must be positive, got ${config.timeoutMs}`);
    }
}

/**
 * Builds the backend for a configuration.
 * @throws ConfigurationError when the configuration cannot work
 */
export function createBackend(config: BackendConfig, options: BackendFactoryOptions = {}): LLMBackend {
    validateSettings(config);
    const settings: HttpBackendSettings = {
        ...config,
        endpoint: validateEndpoint(config),
        retryBaseDelayMs: options.retryBaseDelayMs,
    };

    switch (settings.provider) {
        case 'ollama':
            return new OllamaBackend(settings);
        case 'openai':
            return new OpenAIBackend(settings);
        case 'anthropic':
            return new AnthropicBackend(settings);
        case 'textgen':
            return new TextGenBackend(settings);
        case 'localai':
            return new LocalAIBackend(settings);
    }
}

/**
 * Builds a backend for a provider name using the environment's settings.
 */
export function createBackendFor(providerName: string, env: Env = process.env): LLMBackend {
    return createBackend(loadBackendConfig(providerName, env));
}

export interface ProviderDescription {
    provider: BackendProvider;
    model: string;
    endpoint: string;
    /** Whether a backend can be built from the current environment */
    available: boolean;
    reason?: string;
}

/**
 * Reports, for every provider, whether the environment is enough to build it.
 */
export function describeProviders(env: Env = process.env): ProviderDescription[] {
    return BACKEND_PROVIDERS.map((provider) => {
        try {
            const config = loadBackendConfig(provider, env);
            const description = {
                provider,
                model: config.modelName,
                endpoint: config.endpoint ?? '',
            };
            try {
                createBackend(config);
                return { ...description, available: true };
            } catch (error) {
                return { ...description, available: false, reason: describeError(error) };
            }
        } catch (error) {
            return { provider, model: '', endpoint: '', available: false, reason: describeError(error) };
        }
    });
}

/**
 * Providers that can be built from the environment.
 */
export function listProviders(env: Env = process.env): BackendProvider[] {
    return describeProviders(env)
        .filter((description) => description.available)
        .map((description) => description.provider);
}
