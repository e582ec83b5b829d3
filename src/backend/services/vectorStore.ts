/**
 * Vector Store Service
 *
 * Persistent vector index for semantic similarity search.
 *
 * Entries live in memory and the whole index is written to a single JSON file
 * after every change (temp file + rename, so a crash never leaves a torn
 * file). The embedding model that produced the vectors is stored in the file
 * header; vectors from different models are not comparable.
 *
 * Search is exact: every entry is compared to the query with cosine
 * similarity. Maximal marginal relevance re-ranks the nearest candidates to
 * trade relevance against redundancy.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { DocumentRecord, SourceType } from '../../shared/types';
import { IndexUnavailableError, toError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('vector-store');

const INDEX_FORMAT_VERSION = 1;

/**
 * A record together with its embedding.
 */
export interface VectorEntry {
  id: string;
  embedding: number[];
  record: DocumentRecord;
}

/**
 * Result of a similarity search.
 */
export interface SearchResult {
  record: DocumentRecord;
  score: number; // Cosine similarity, higher = more similar
}

export interface MmrOptions {
  /** Number of results */
  k: number;
  /** Nearest candidates considered before re-ranking */
  fetchK: number;
  /** 1 = pure relevance, 0 = pure diversity */
  lambda: number;
}

/**
 * Interface for vector index operations.
 */
export interface IVectorStore {
  add(records: DocumentRecord[], embeddings: number[][]): Promise<void>;
  similaritySearch(queryEmbedding: number[], k: number): Promise<SearchResult[]>;
  maxMarginalRelevanceSearch(queryEmbedding: number[], options: MmrOptions): Promise<DocumentRecord[]>;
  count(): Promise<number>;
  records(): Promise<DocumentRecord[]>;
  deleteBySource(source: string, sourceType?: SourceType): Promise<number>;
  deleteAll(): Promise<number>;
}

const recordSchema = z.object({
  content: z.string(),
  source: z.string(),
  sourceType: z.enum(['pdf', 'image', 'web']),
  chunkIndex: z.number().int().nonnegative(),
  title: z.string(),
  domainRelevant: z.boolean(),
});

const indexFileSchema = z.object({
  version: z.literal(INDEX_FORMAT_VERSION),
  embeddingModel: z.string(),
  entries: z.array(
    z.object({
      id: z.string(),
      embedding: z.array(z.number()),
      record: recordSchema,
    })
  ),
});

type IndexFile = z.infer<typeof indexFileSchema>;

/**
 * Calculate cosine similarity between two vectors.
 *
 * 1.0 = same direction, 0.0 = unrelated. Zero vectors score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  if (a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Greedy MMR selection over candidates already sorted by relevance.
 * Each step picks the candidate with the best
 * `lambda * sim(query) - (1 - lambda) * max sim(selected)`; ties keep the
 * more relevant candidate.
 */
export function selectByMmr(
  queryEmbedding: number[],
  candidates: VectorEntry[],
  k: number,
  lambda: number
): VectorEntry[] {
  const relevance = candidates.map((entry) => cosineSimilarity(queryEmbedding, entry.embedding));
  const remaining = candidates.map((_, index) => index);
  const selected: number[] = [];

  while (selected.length < k && remaining.length > 0) {
    let bestPosition = 0;
    let bestScore = -Infinity;

    for (const [position, candidate] of remaining.entries()) {
      const candidateEntry = candidates[candidate];
      if (!candidateEntry) {
        continue;
      }

      let redundancy = 0;
      for (const chosen of selected) {
        const chosenEntry = candidates[chosen];
        if (chosenEntry) {
          redundancy = Math.max(redundancy, cosineSimilarity(candidateEntry.embedding, chosenEntry.embedding));
        }
      }

      const score = lambda * (relevance[candidate] ?? 0) - (1 - lambda) * redundancy;
      if (score > bestScore) {
        bestScore = score;
        bestPosition = position;
      }
    }

    const [picked] = remaining.splice(bestPosition, 1);
    if (picked !== undefined) {
      selected.push(picked);
    }
  }

  return selected.flatMap((index) => {
    const entry = candidates[index];
    return entry ? [entry] : [];
  });
}

export interface PersistentVectorStoreConfig {
  /** JSON file holding the index */
  indexPath: string;
  /** Identifier of the embedding model writing to this index */
  embeddingModel: string;
}

/**
 * File-backed vector store. The file is read lazily on first use.
 */
export class PersistentVectorStore implements IVectorStore {
  private entries: VectorEntry[] = [];
  private loading: Promise<void> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly config: PersistentVectorStoreConfig) {}

  async add(records: DocumentRecord[], embeddings: number[][]): Promise<void> {
    if (records.length !== embeddings.length) {
      throw new Error(`Got ${records.length} records but ${embeddings.length} embeddings`);
    }
    await this.ensureLoaded();

    const added = records.map((record, index) => ({ id: uuidv4(), embedding: embeddings[index] ?? [], record }));
    await this.update((current) => [...current, ...added]);
  }

  /**
   * Entries most similar to the query, highest score first.
   */
  async similaritySearch(queryEmbedding: number[], k: number): Promise<SearchResult[]> {
    return (await this.nearest(queryEmbedding, k)).map(({ entry, score }) => ({
      record: entry.record,
      score,
    }));
  }

  async maxMarginalRelevanceSearch(
    queryEmbedding: number[],
    options: MmrOptions
  ): Promise<DocumentRecord[]> {
    const candidates = (await this.nearest(queryEmbedding, Math.max(options.fetchK, options.k))).map(
      ({ entry }) => entry
    );
    return selectByMmr(queryEmbedding, candidates, options.k, options.lambda).map((entry) => entry.record);
  }

  async count(): Promise<number> {
    await this.ensureLoaded();
    return this.entries.length;
  }

  async records(): Promise<DocumentRecord[]> {
    await this.ensureLoaded();
    return this.entries.map((entry) => entry.record);
  }

  /**
   * Removes every record of a source (optionally only of one source type).
   * @returns Number of records removed
   */
  async deleteBySource(source: string, sourceType?: SourceType): Promise<number> {
    await this.ensureLoaded();

    const { before, after } = await this.update((current) => {
      const kept = current.filter(
        (entry) =>
          !(entry.record.source === source && (sourceType === undefined || entry.record.sourceType === sourceType))
      );
      return kept.length === current.length ? null : kept;
    });
    return before - after;
  }

  async deleteAll(): Promise<number> {
    await this.ensureLoaded();

    const { before } = await this.update(() => []);
    return before;
  }

  private async nearest(
    queryEmbedding: number[],
    limit: number
  ): Promise<Array<{ entry: VectorEntry; score: number }>> {
    await this.ensureLoaded();

    const scored = this.entries.map((entry) => ({
      entry,
      score: cosineSimilarity(queryEmbedding, entry.embedding),
    }));
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, limit);
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        // Allow a later call to try again
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.config.indexPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.entries = [];
        return;
      }
      throw new IndexUnavailableError(
        `Cannot read vector index at ${this.config.indexPath}: ${toError(error).message}`,
        toError(error)
      );
    }

    let stored: IndexFile;
    try {
      stored = indexFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new IndexUnavailableError(
        `Vector index at ${this.config.indexPath} is corrupt: ${toError(error).message}`,
        toError(error)
      );
    }

    if (stored.embeddingModel !== this.config.embeddingModel) {
      log.warn('embedding_model_mismatch', {
        indexPath: this.config.indexPath,
        indexModel: stored.embeddingModel,
        configuredModel: this.config.embeddingModel,
      });
    }

    this.entries = stored.entries;
    log.debug('index_loaded', { indexPath: this.config.indexPath, entries: this.entries.length });
  }

  /**
   * Applies a change to the entries. Changes run one at a time, and the new
   * entries replace the in-memory ones only once they are on disk. A change
   * that returns null leaves the index untouched.
   */
  private update(
    change: (current: readonly VectorEntry[]) => VectorEntry[] | null
  ): Promise<{ before: number; after: number }> {
    const run = this.writeQueue.then(async () => {
      const before = this.entries.length;
      const next = change(this.entries);
      if (next === null) {
        return { before, after: before };
      }
      await this.writeIndex(next);
      this.entries = next;
      return { before, after: next.length };
    });
    // The caller sees the failure through `run`; the queue keeps going
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async writeIndex(entries: VectorEntry[]): Promise<void> {
    const payload: IndexFile = {
      version: INDEX_FORMAT_VERSION,
      embeddingModel: this.config.embeddingModel,
      entries,
    };
    const filePath = this.config.indexPath;
    const tempPath = `${filePath}.tmp`;

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(payload), 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      throw new IndexUnavailableError(
        `Cannot write vector index at ${filePath}: ${toError(error).message}`,
        toError(error)
      );
    }
  }
}

/**
 * fs errors may come from another realm (Jest's sandbox), so the code is read
 * off the object instead of relying on instanceof.
 */
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Factory function to create a vector store.
 */
export function createVectorStore(config: PersistentVectorStoreConfig): IVectorStore {
  return new PersistentVectorStore(config);
}
