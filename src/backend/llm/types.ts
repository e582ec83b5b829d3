/**
 * Language-model backend contract.
 *
 * Every provider exposes the same two calls. Failures surface as
 * BackendUnavailableError (or its BackendMalformedResponseError subclass)
 * so the failover router can treat all providers alike.
 */

import { BackendProvider, GenerationOptions } from '../../shared/types';

export interface LLMBackend {
    readonly provider: BackendProvider;
    /** "<provider>:<model>", used in logs and error messages */
    readonly name: string;
    generate(prompt: string, options?: GenerationOptions): Promise<string>;
    /** Never throws; an unreachable backend is simply unhealthy */
    isHealthy(): Promise<boolean>;
}
