import { setImmediate } from 'node:timers/promises';
import { resolveConfig, type IndexingConfig } from '../config/config.js';
import { IndexingAbortedError, MalformedContextError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { accumulateAll, mergeShardResults, partitionTokens } from './accumulator.js';
import { CorpusIndexer, YIELD_INTERVAL, type IndexReport, type SkippedContext } from './corpusIndexer.js';
import { EmbeddingTable, type UpdateResult } from './embeddingTable.js';
import { RandomVectorCache } from './randomVector.js';
import { whitespaceTokenizer, type Tokenizer } from './tokenize.js';

export type CorpusSource = Iterable<unknown> | AsyncIterable<unknown>;

export type PipelineStage = 'index' | 'accumulate';

export interface BuildOptions {
  config?: Partial<IndexingConfig>;
  tokenizer?: Tokenizer;
  signal?: AbortSignal;
  /** Number of disjoint token groups to accumulate separately. */
  shards?: number;
  onProgress?: (stage: PipelineStage, done: number) => void;
}

export interface BuildResult {
  table: EmbeddingTable;
  report: IndexReport;
}

/**
 * corpus -> CorpusIndexer -> accumulation -> EmbeddingTable. Sums are built
 * for every observed token so the threshold can move later; the table only
 * exposes the ones above `minCount`. An empty corpus gives an empty table.
 */
export async function buildEmbeddingTable(contexts: CorpusSource, opts: BuildOptions = {}): Promise<BuildResult> {
  const config = resolveConfig(opts.config);
  const tokenizer = opts.tokenizer ?? whitespaceTokenizer;
  const started = Date.now();

  const indexer = new CorpusIndexer({ strict: config.strict });
  const report = await indexer.indexCorpus(contexts, tokenizer, {
    signal: opts.signal,
    onProgress: (n) => opts.onProgress?.('index', n),
  });

  // One cache for every token, so each context vector is generated once.
  const vectors = new RandomVectorCache(config);
  const groups = partitionTokens(indexer.tokensSeen(), opts.shards ?? 1);
  const incidenceOf = (token: string) => indexer.incidence(token);
  const results: Map<string, Int32Array>[] = [];
  let done = 0;
  for (const group of groups) {
    const sums = new Map<string, Int32Array>();
    for (let start = 0; start < group.length; start += YIELD_INTERVAL) {
      let chunk: Map<string, Int32Array>;
      try {
        chunk = accumulateAll(group.slice(start, start + YIELD_INTERVAL), incidenceOf, vectors, { signal: opts.signal });
      } catch (err) {
        if (err instanceof IndexingAbortedError) throw new IndexingAbortedError('accumulate', done + err.completed);
        throw err;
      }
      for (const [token, sum] of chunk) sums.set(token, sum);
      done += chunk.size;
      await setImmediate();
    }
    results.push(sums);
    opts.onProgress?.('accumulate', done);
  }

  const table = EmbeddingTable.fromAccumulated(
    { space: config, minCount: config.minCount, nextContextId: indexer.nextContextId },
    mergeShardResults(results),
    indexer.frequencies()
  );
  logger.info(
    `build.done contexts=${indexer.contextCount} observed=${table.observedSize} retained=${table.size} cachedVectors=${vectors.size} ms=${Date.now() - started}`
  );
  return { table, report };
}

export interface ExtendOptions {
  tokenizer?: Tokenizer;
  /** Defaults to false: malformed contexts are skipped and reported. */
  strict?: boolean;
  signal?: AbortSignal;
  onUpdate?: (result: UpdateResult) => void;
}

export interface ExtendReport {
  updated: number;
  skipped: SkippedContext[];
  promoted: string[];
}

/**
 * Feeds further contexts into an existing table one at a time. When the
 * signal fires, every context already applied stays applied and the table is
 * ready for the next `extendEmbeddingTable` call.
 */
export async function extendEmbeddingTable(
  table: EmbeddingTable,
  contexts: CorpusSource,
  opts: ExtendOptions = {}
): Promise<ExtendReport> {
  const tokenizer = opts.tokenizer ?? whitespaceTokenizer;
  const report: ExtendReport = { updated: 0, skipped: [], promoted: [] };
  let processed = 0;
  for await (const text of contexts) {
    if (opts.signal?.aborted) throw new IndexingAbortedError('update', processed);
    try {
      const result = table.updateText(text, tokenizer);
      report.updated += 1;
      for (const token of result.promoted) report.promoted.push(token);
      opts.onUpdate?.(result);
    } catch (err) {
      if (opts.strict || !(err instanceof MalformedContextError)) throw err;
      const contextId = table.skipContext();
      report.skipped.push({ contextId, reason: err.reason });
      logger.warn(`update.context_skipped contextId=${contextId} reason=${err.reason}`);
    }
    processed += 1;
    if (processed % YIELD_INTERVAL === 0) await setImmediate();
  }
  logger.info(`update.done updated=${report.updated} skipped=${report.skipped.length} promoted=${report.promoted.length}`);
  return report;
}
