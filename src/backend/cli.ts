#!/usr/bin/env node
/**
 * Command-line front end.
 *
 *   query <question...>     answer a question from the index
 *   similar <text...>       nearest records without generation (--limit N)
 *   interactive             question loop on stdin
 *   add <path>              ingest a file or a directory
 *   add --url <url>         ingest a web page
 *   stats                   collection statistics
 *   health                  component health
 *   clear                   delete every record
 *   backends                providers usable with the current environment
 *   serve                   start the HTTP server
 *
 * `--json` prints machine-readable output instead of text.
 */

import * as readline from 'readline';
import {
  CollectionStats,
  HealthReport,
  IngestionReport,
  QueryResult,
  SimilarResult,
} from '../shared/types';
import { loadConfig } from './config';
import { AppContext, createAppContext } from './context';
import { ConfigurationError, describeError } from './errors';
import { ProviderDescription, describeProviders } from './llm';
import { MAX_SIMILAR_LIMIT, startServer } from './server';
import { previewContent, validateQuery } from './services/queryProcessor';
import { IRAGEngine } from './services/ragEngine';

const SIMILAR_PREVIEW_LENGTH = 200;

export type OutputFormat = 'text' | 'json';

export type CliCommand =
  | { readonly name: 'query'; readonly question: string }
  | { readonly name: 'similar'; readonly text: string; readonly limit?: number }
  | { readonly name: 'add'; readonly target: string; readonly isUrl: boolean }
  | { readonly name: 'stats' | 'health' | 'clear' | 'backends' | 'serve' | 'interactive' };

export interface CliOptions {
  readonly command: CliCommand;
  readonly format: OutputFormat;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const SIMPLE_COMMANDS = ['stats', 'health', 'clear', 'backends', 'serve', 'interactive'] as const;

function isSimpleCommand(name: string): name is (typeof SIMPLE_COMMANDS)[number] {
  return SIMPLE_COMMANDS.some((command) => command === name);
}

function parseLimit(value: string | undefined): number {
  const limit = Number(value);
  if (value === undefined || !Number.isInteger(limit) || limit < 1 || limit > MAX_SIMILAR_LIMIT) {
    throw new CliUsageError(`--limit must be an integer between 1 and ${MAX_SIMILAR_LIMIT}`);
  }
  return limit;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  let format: OutputFormat = 'text';
  let isUrl = false;
  let limit: number | undefined;
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    if (arg === '--json') {
      format = 'json';
    } else if (arg === '--url') {
      isUrl = true;
    } else if (arg === '--limit') {
      index++;
      limit = parseLimit(argv[index]);
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option '${arg}'`);
    } else {
      positional.push(arg);
    }
  }

  const [name, ...rest] = positional;
  if (!name) {
    throw new CliUsageError('No command given');
  }

  if (limit !== undefined && name !== 'similar') {
    throw new CliUsageError('--limit is only valid with similar');
  }

  if (name === 'query' || name === 'similar') {
    const text = rest.join(' ');
    const validation = validateQuery(text);
    if (!validation.valid) {
      throw new CliUsageError(validation.error ?? 'A question is required');
    }
    return name === 'query'
      ? { command: { name, question: text }, format }
      : { command: limit === undefined ? { name, text } : { name, text, limit }, format };
  }

  if (name === 'add') {
    const [target] = rest;
    if (!target || rest.length > 1) {
      throw new CliUsageError(isUrl ? 'add --url requires exactly one <url>' : 'add requires exactly one <path>');
    }
    return { command: { name, target, isUrl }, format };
  }

  if (isUrl) {
    throw new CliUsageError('--url is only valid with add');
  }

  if (isSimpleCommand(name)) {
    if (rest.length > 0) {
      throw new CliUsageError(`${name} takes no arguments`);
    }
    return { command: { name }, format };
  }

  throw new CliUsageError(`Unknown command '${name}'`);
}

export function formatQueryResult(result: QueryResult): string {
  const lines = [result.answer];
  if (result.sources.length > 0) {
    lines.push('', 'Sources:');
    result.sources.forEach((source, index) => {
      const { metadata } = source;
      lines.push(`  [${index + 1}] ${metadata.title} (${metadata.sourceType}, chunk ${metadata.chunkIndex}) ${metadata.source}`);
    });
  }
  return lines.join('\n');
}

export function formatSimilarResult(result: SimilarResult): string {
  if (result.documents.length === 0) {
    return 'No similar documents found';
  }
  return result.documents
    .map((document, index) => {
      const { metadata } = document;
      return [
        `[${index + 1}] ${document.score.toFixed(3)} ${metadata.title} (${metadata.sourceType}, chunk ${metadata.chunkIndex}) ${metadata.source}`,
        `    ${previewContent(document.content, SIMILAR_PREVIEW_LENGTH)}`,
      ].join('\n');
    })
    .join('\n');
}

export function formatStats(stats: CollectionStats): string {
  const lines = [`Total records: ${stats.totalRecords}`, `Unique sources: ${stats.uniqueSources}`];
  for (const [type, count] of Object.entries(stats.recordTypes)) {
    lines.push(`  ${type}: ${count}`);
  }
  if (stats.sampleSources.length > 0) {
    lines.push('Sample sources:', ...stats.sampleSources.map((source) => `  - ${source}`));
  }
  return lines.join('\n');
}

function mark(ok: boolean): string {
  return ok ? 'ok' : 'FAILED';
}

export function formatHealth(report: HealthReport): string {
  const { backendDetail } = report;
  const fallback = backendDetail.fallback === null ? 'not configured' : mark(backendDetail.fallback);
  return [
    `Embeddings: ${mark(report.embeddings)}`,
    `Index: ${mark(report.index)}`,
    `Backend: ${mark(report.backend)} (primary ${mark(backendDetail.primary)}, fallback ${fallback}${
      backendDetail.degraded ? ', degraded' : ''
    })`,
    `Pipeline ready: ${report.pipelineReady ? 'yes' : 'no'}`,
  ].join('\n');
}

export function formatIngestionReport(report: IngestionReport): string {
  const lines = [
    `Processed: ${report.processed}, failed: ${report.failed}, records added: ${report.recordsAdded}`,
  ];
  for (const failure of report.failures) {
    lines.push(`  ${failure.input}: ${failure.error}`);
  }
  return lines.join('\n');
}

export function formatProviders(providers: ProviderDescription[]): string {
  return providers
    .map((provider) => {
      const status = provider.available ? 'available' : `unavailable (${provider.reason ?? 'unknown'})`;
      return `${provider.provider.padEnd(10)} ${provider.model} @ ${provider.endpoint}: ${status}`;
    })
    .join('\n');
}

function print(format: OutputFormat, value: unknown, text: string): void {
  console.log(format === 'json' ? JSON.stringify(value, null, 2) : text);
}

function printUsage(): void {
  console.error(`Usage: rag-assistant <command> [--json]

Commands:
  query <question...>   Answer a question from the indexed documents
  similar <text...>     List the closest records (--limit N, default 5)
  interactive           Ask questions one line at a time
  add <path>            Ingest a PDF, an image or a directory of them
  add --url <url>       Ingest a web page
  stats                 Show collection statistics
  health                Check embeddings, index and backends
  clear                 Delete every indexed record
  backends              List language-model providers
  serve                 Start the HTTP server`);
}

const EXIT_WORDS = new Set(['exit', 'quit', 'bye']);

export const INTERACTIVE_BANNER = "Interactive mode. Type a question, 'help' for commands or 'exit' to quit.";

export const INTERACTIVE_HELP = `Commands:
  <question>   Ask a technical question
  stats        Show collection statistics
  health       Check embeddings, index and backends
  exit, quit   Leave interactive mode`;

const PROMPT = '> ';

/**
 * Reads questions line by line until end of input or an exit word.
 */
export async function runInteractive(
  engine: IRAGEngine,
  input: NodeJS.ReadableStream,
  write: (text: string) => void
): Promise<void> {
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  write(`${INTERACTIVE_BANNER}\n${PROMPT}`);

  try {
    for await (const line of lines) {
      const entry = line.trim();
      const keyword = entry.toLowerCase();

      if (EXIT_WORDS.has(keyword)) {
        break;
      }
      if (keyword === 'help') {
        write(`${INTERACTIVE_HELP}\n`);
      } else if (keyword === 'stats') {
        write(`${formatStats(await engine.stats())}\n`);
      } else if (keyword === 'health') {
        write(`${formatHealth(await engine.health())}\n`);
      } else if (entry) {
        write(`${formatQueryResult(await engine.query(entry))}\n`);
      }
      write(PROMPT);
    }
  } finally {
    lines.close();
  }
}

/**
 * Runs a command against a context.
 * @returns Process exit code
 */
export async function runCommand(context: AppContext, options: CliOptions): Promise<number> {
  const { command, format } = options;

  switch (command.name) {
    case 'query': {
      const result = await context.ragEngine.query(command.question);
      print(format, result, formatQueryResult(result));
      return 0;
    }
    case 'similar': {
      const result = await context.ragEngine.findSimilar(command.text, command.limit);
      print(format, result, formatSimilarResult(result));
      return 0;
    }
    case 'interactive': {
      await runInteractive(context.ragEngine, process.stdin, (text) => process.stdout.write(text));
      return 0;
    }
    case 'add': {
      const report = command.isUrl
        ? await context.ingestion.ingestUrl(command.target)
        : await context.ingestion.ingestPath(command.target);
      print(format, report, formatIngestionReport(report));
      return report.failed === 0 ? 0 : 1;
    }
    case 'stats': {
      const stats = await context.ragEngine.stats();
      print(format, stats, formatStats(stats));
      return 0;
    }
    case 'health': {
      const report = await context.ragEngine.health();
      print(format, report, formatHealth(report));
      return report.pipelineReady ? 0 : 1;
    }
    case 'clear': {
      const removed = await context.ragEngine.clear();
      print(format, { removed }, `Removed ${removed} records`);
      return 0;
    }
    case 'backends': {
      const providers = describeProviders();
      print(format, providers, formatProviders(providers));
      return 0;
    }
    case 'serve': {
      await startServer(context);
      await new Promise<void>((resolve) => {
        process.once('SIGINT', () => resolve());
        process.once('SIGTERM', () => resolve());
      });
      return 0;
    }
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(describeError(error));
    printUsage();
    return 2;
  }

  // Listing providers must work even when the configured one cannot be built
  if (options.command.name === 'backends') {
    const providers = describeProviders();
    print(options.format, providers, formatProviders(providers));
    return 0;
  }

  let context: AppContext;
  try {
    context = createAppContext(loadConfig());
  } catch (error) {
    console.error(`${error instanceof ConfigurationError ? 'Configuration error' : 'Startup failed'}: ${describeError(error)}`);
    return 1;
  }

  try {
    return await runCommand(context, options);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    return 1;
  } finally {
    await context.dispose();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
