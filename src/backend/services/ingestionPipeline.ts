/**
 * Ingestion Pipeline
 *
 * extract -> chunk and tag -> embed -> replace the source's records.
 *
 * Inputs are processed one at a time and independently: a file or URL that
 * fails is recorded in the report and the batch carries on.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { IngestionFailure, IngestionReport } from '../../shared/types';
import { ExtractionError, describeError } from '../errors';
import {
  ExtractedDocument,
  Extractor,
  FileSourceType,
  SUPPORTED_EXTENSIONS,
  detectSourceType,
} from '../extractors';
import { createLogger, errorFields } from '../utils/logger';
import { DocumentChunker } from './documentChunker';
import { EmbeddingProvider, embedAll } from './embeddings';
import { IVectorStore } from './vectorStore';

const log = createLogger('ingestion');

export interface IngestionExtractors {
  pdf: Extractor<string>;
  image: Extractor<string>;
  web: Extractor<string>;
}

export function emptyReport(): IngestionReport {
  return { processed: 0, failed: 0, recordsAdded: 0, failures: [] };
}

export function mergeReports(a: IngestionReport, b: IngestionReport): IngestionReport {
  return {
    processed: a.processed + b.processed,
    failed: a.failed + b.failed,
    recordsAdded: a.recordsAdded + b.recordsAdded,
    failures: [...a.failures, ...b.failures],
  };
}

/**
 * Files under a directory (recursively) with one of the given extensions,
 * in sorted order.
 */
export async function listFiles(dir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map((extension) => extension.toLowerCase()));
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath, extensions)));
    } else if (entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase())) {
      files.push(fullPath);
    }
  }
  return files;
}

export class IngestionPipeline {
  constructor(
    private readonly extractors: IngestionExtractors,
    private readonly chunker: DocumentChunker,
    private readonly embeddings: EmbeddingProvider,
    private readonly vectorStore: IVectorStore
  ) {}

  async ingestFile(filePath: string): Promise<IngestionReport> {
    return this.run([filePath], (input) => this.processFile(input));
  }

  async ingestUrl(url: string): Promise<IngestionReport> {
    return this.run([url], (input) => this.processUrl(input));
  }

  /**
   * Ingests every supported file below a directory.
   */
  async ingestDirectory(
    dir: string,
    extensions: readonly string[] = SUPPORTED_EXTENSIONS
  ): Promise<IngestionReport> {
    let files: string[];
    try {
      files = await listFiles(dir, extensions);
    } catch (error) {
      return this.failure(dir, error);
    }

    log.info('directory_scan', { dir, files: files.length });
    return this.run(files, (input) => this.processFile(input));
  }

  /**
   * A file or a whole directory.
   */
  async ingestPath(target: string): Promise<IngestionReport> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(target)).isDirectory();
    } catch (error) {
      return this.failure(target, error);
    }
    return isDirectory ? this.ingestDirectory(target) : this.ingestFile(target);
  }

  private async run(
    inputs: string[],
    handle: (input: string) => Promise<number>
  ): Promise<IngestionReport> {
    let report = emptyReport();

    for (const input of inputs) {
      try {
        const added = await handle(input);
        report = mergeReports(report, { processed: 1, failed: 0, recordsAdded: added, failures: [] });
      } catch (error) {
        report = mergeReports(report, this.failure(input, error));
      }
    }

    log.info('ingestion_finished', {
      processed: report.processed,
      failed: report.failed,
      recordsAdded: report.recordsAdded,
    });
    return report;
  }

  private failure(input: string, error: unknown): IngestionReport {
    log.warn('ingestion_failed', { input, ...errorFields(error) });
    const failure: IngestionFailure = { input, error: describeError(error) };
    return { processed: 0, failed: 1, recordsAdded: 0, failures: [failure] };
  }

  private async processFile(filePath: string): Promise<number> {
    const sourceType = detectSourceType(filePath);
    if (!sourceType) {
      throw new ExtractionError(`Unsupported file type: ${path.extname(filePath) || filePath}`, filePath);
    }
    return this.index(await this.extractorFor(sourceType).extract(filePath));
  }

  private async processUrl(url: string): Promise<number> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ExtractionError(`Invalid URL: ${url}`, url);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ExtractionError(`Unsupported URL scheme: ${parsed.protocol}`, url);
    }
    return this.index(await this.extractors.web.extract(url));
  }

  private extractorFor(sourceType: FileSourceType): Extractor<string> {
    return sourceType === 'pdf' ? this.extractors.pdf : this.extractors.image;
  }

  /**
   * Replaces the source's records with the document's chunks.
   * Embeddings are computed first so a failure leaves the old records in place.
   */
  private async index(document: ExtractedDocument): Promise<number> {
    const records = this.chunker.toRecords(document);

    if (records.length === 0) {
      log.warn('no_text_extracted', { source: document.source });
    } else if (!records.some((record) => record.domainRelevant)) {
      // Indexed anyway; the tag travels with each record
      log.warn('no_domain_relevant_chunks', { source: document.source, records: records.length });
    }

    const embeddings = await embedAll(
      this.embeddings,
      records.map((record) => record.content)
    );

    await this.vectorStore.deleteBySource(document.source, document.sourceType);
    if (records.length > 0) {
      await this.vectorStore.add(records, embeddings);
    }

    log.info('document_indexed', {
      source: document.source,
      sourceType: document.sourceType,
      records: records.length,
    });
    return records.length;
  }
}

export function createIngestionPipeline(
  extractors: IngestionExtractors,
  chunker: DocumentChunker,
  embeddings: EmbeddingProvider,
  vectorStore: IVectorStore
): IngestionPipeline {
  return new IngestionPipeline(extractors, chunker, embeddings, vectorStore);
}
