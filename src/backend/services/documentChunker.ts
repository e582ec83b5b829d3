/**
 * Document Chunker Service
 *
 * Splits extracted text into overlapping windows and turns them into records.
 *
 * Chunks are exact substrings of the input with known offsets. Consecutive
 * chunks overlap by at most `chunkOverlap` characters and never leave a gap,
 * so the input can always be rebuilt from its chunks.
 *
 * Inside each window the split prefers the largest boundary available:
 * paragraph break, then line break, then space, then a hard cut.
 */

import { DocumentRecord } from '../../shared/types';
import { ConfigurationError } from '../errors';
import { ExtractedDocument, documentText } from '../extractors/types';
import { RelevanceFilter } from './relevanceFilter';

/**
 * Configuration for the chunking process.
 */
export interface ChunkingConfig {
  /** Maximum size of each chunk in characters */
  chunkSize: number;
  /** Maximum number of characters shared by consecutive chunks */
  chunkOverlap: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

/** Break candidates, largest granularity first */
const SEPARATORS = ['\n\n', '\n', ' '];

/**
 * A chunk of text with its position in the source text.
 * `content === text.slice(start, end)`.
 */
export interface TextChunk {
  content: string;
  chunkIndex: number;
  start: number;
  end: number;
}

export function validateChunkingConfig(config: ChunkingConfig): void {
  const { chunkSize, chunkOverlap } = config;
  if (!Number.isInteger(chunkSize) || !Number.isInteger(chunkOverlap)) {
    throw new ConfigurationError('Chunk size and overlap must be integers');
  }
  if (!(chunkSize > chunkOverlap && chunkOverlap > 0)) {
    throw new ConfigurationError(
      `Chunk size (${chunkSize}) must be greater than overlap (${chunkOverlap}), and overlap must be positive`
    );
  }
}

/**
 * Splits text into overlapping chunks with a sliding window.
 */
export function splitIntoChunks(
  text: string,
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): TextChunk[] {
  validateChunkingConfig(config);
  const { chunkSize, chunkOverlap } = config;

  if (text.trim().length === 0) {
    return [];
  }

  const chunks: TextChunk[] = [];
  let start = 0;

  while (start < text.length) {
    const windowEnd = Math.min(start + chunkSize, text.length);
    const end =
      windowEnd === text.length ? windowEnd : findBreak(text, start, windowEnd, chunkOverlap);

    chunks.push({
      content: text.slice(start, end),
      chunkIndex: chunks.length,
      start,
      end,
    });

    if (end >= text.length) {
      break;
    }
    start = nextWindowStart(text, end, chunkOverlap);
  }

  return chunks;
}

/**
 * Finds where the window starting at `start` should end.
 *
 * A break must leave more than `overlap` characters in the chunk, otherwise
 * the next window could not move forward.
 */
function findBreak(text: string, start: number, windowEnd: number, overlap: number): number {
  for (const separator of SEPARATORS) {
    const index = text.lastIndexOf(separator, windowEnd - separator.length);
    if (index === -1) {
      continue;
    }
    const end = index + separator.length;
    if (end > start + overlap) {
      return end;
    }
  }
  return windowEnd;
}

/**
 * Start of the next window: `overlap` characters before the break, moved
 * forward to the first word start in the overlap region (or the break
 * itself) so the next chunk does not open mid-word.
 */
function nextWindowStart(text: string, end: number, overlap: number): number {
  const earliest = end - overlap;

  for (let i = earliest; i <= end; i++) {
    if (isWordStart(text, i)) {
      return i;
    }
  }

  return earliest;
}

function isWordStart(text: string, index: number): boolean {
  const current = text[index];
  if (current === undefined || /\s/.test(current)) {
    return false;
  }
  const previous = text[index - 1];
  return previous === undefined || /\s/.test(previous);
}

/**
 * Document Chunker: splits an extracted document and produces records.
 *
 * Every record is tagged with the relevance filter's verdict on its own
 * content and frozen, so the tag cannot be recomputed in place later.
 */
export class DocumentChunker {
  private readonly relevanceFilter: RelevanceFilter;
  private readonly config: ChunkingConfig;

  constructor(relevanceFilter: RelevanceFilter, config: Partial<ChunkingConfig> = {}) {
    this.relevanceFilter = relevanceFilter;
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
    validateChunkingConfig(this.config);
  }

  /**
   * Chunk a document into records with indexes 0..n-1.
   * A document without text yields no records.
   */
  toRecords(document: ExtractedDocument): DocumentRecord[] {
    const chunks = splitIntoChunks(documentText(document), this.config);

    return chunks.map((chunk) =>
      Object.freeze({
        content: chunk.content,
        source: document.source,
        sourceType: document.sourceType,
        chunkIndex: chunk.chunkIndex,
        title: document.title,
        domainRelevant: this.relevanceFilter.isDomainRelevant(chunk.content),
      })
    );
  }

  /**
   * Split raw text without building records.
   */
  split(text: string): TextChunk[] {
    return splitIntoChunks(text, this.config);
  }
}

/**
 * Factory function to create a DocumentChunker.
 */
export function createDocumentChunker(
  relevanceFilter: RelevanceFilter,
  config?: Partial<ChunkingConfig>
): DocumentChunker {
  return new DocumentChunker(relevanceFilter, config);
}
