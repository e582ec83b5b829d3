/**
 * Failover Router
 *
 * Sends generation requests to the primary backend and escalates to the
 * fallback at most once per call. The router turns degraded only after the
 * fallback has actually served a request; from then on every call goes
 * straight to the fallback until reset() is called.
 */

import { BackendHealth, GenerationOptions } from '../../shared/types';
import { BackendUnavailableError, toError } from '../errors';
import { createLogger, errorFields } from '../utils/logger';
import { LLMBackend } from './types';

const log = createLogger('failover-router');

function asUnavailable(error: unknown, backend: string): BackendUnavailableError {
    if (error instanceof BackendUnavailableError) {
        return error;
    }
    return new BackendUnavailableError(
        `Backend ${backend} failed: ${toError(error).message}`,
        backend,
        toError(error)
    );
}

export class FailoverRouter {
    private degradedMode = false;

    constructor(
        private readonly primary: LLMBackend,
        private readonly fallback: LLMBackend | null = null
    ) {}

    /** True once the fallback has served a call and until reset() */
    get degraded(): boolean {
        return this.degradedMode;
    }

    get primaryName(): string {
        return this.primary.name;
    }

    get fallbackName(): string | null {
        return this.fallback?.name ?? null;
    }

    async generate(prompt: string, options?: GenerationOptions): Promise<string> {
        if (this.degradedMode && this.fallback) {
            try {
                return await this.fallback.generate(prompt, options);
            } catch (error) {
                throw asUnavailable(error, this.fallback.name);
            }
        }

        try {
            return await this.primary.generate(prompt, options);
        } catch (primaryError) {
            if (!this.fallback) {
                throw asUnavailable(primaryError, this.primary.name);
            }

            log.warn('primary_backend_failed', {
                primary: this.primary.name,
                fallback: this.fallback.name,
                ...errorFields(primaryError),
            });

            let answer: string;
            try {
                answer = await this.fallback.generate(prompt, options);
            } catch (fallbackError) {
                throw new BackendUnavailableError(
                    `Primary backend ${this.primary.name} failed (${toError(primaryError).message}) ` +
                        `and fallback ${this.fallback.name} failed (${toError(fallbackError).message})`,
                    this.fallback.name,
                    toError(fallbackError)
                );
            }

            this.degradedMode = true;
            log.info('switched_to_fallback', { fallback: this.fallback.name });
            return answer;
        }
    }

    /**
     * Routes calls back to the primary.
     */
    reset(): void {
        if (this.degradedMode) {
            log.info('failover_reset', { primary: this.primary.name });
        }
        this.degradedMode = false;
    }

    async healthCheck(): Promise<BackendHealth> {
        const [primary, fallback] = await Promise.all([
            this.checkBackend(this.primary),
            this.fallback ? this.checkBackend(this.fallback) : Promise.resolve(null),
        ]);
        return { primary, fallback, degraded: this.degradedMode };
    }

    async isHealthy(): Promise<boolean> {
        const health = await this.healthCheck();
        return health.primary || health.fallback === true;
    }

    private async checkBackend(backend: LLMBackend): Promise<boolean> {
        try {
            return await backend.isHealthy();
        } catch (error) {
            log.warn('health_check_failed', { backend: backend.name, ...errorFields(error) });
            return false;
        }
    }
}

export function createFailoverRouter(primary: LLMBackend, fallback?: LLMBackend | null): FailoverRouter {
    return new FailoverRouter(primary, fallback ?? null);
}
