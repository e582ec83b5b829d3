/**
 * Embedding provider used for both indexing and queries.
 *
 * The same provider must embed records and questions; the model identifier is
 * recorded in the index so a later model change can be detected.
 */

import { IOllamaClient } from '../clients';

export interface EmbeddingProvider {
    readonly modelId: string;
    embed(text: string): Promise<number[]>;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
    constructor(
        private readonly client: IOllamaClient,
        readonly modelId: string
    ) {}

    embed(text: string): Promise<number[]> {
        return this.client.generateEmbedding(text);
    }
}

/**
 * Embeds texts one at a time, in order.
 */
export async function embedAll(provider: EmbeddingProvider, texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (const text of texts) {
        embeddings.push(await provider.embed(text));
    }
    return embeddings;
}
