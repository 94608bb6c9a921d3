import { setImmediate } from 'node:timers/promises';
import { ConfigurationError, IndexingAbortedError, MalformedContextError, errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { countTokens, type Tokenizer } from './tokenize.js';

/** One row of a token's incidence list: the context and how often the token occurs in it. */
export type IncidenceEntry = readonly [contextId: number, count: number];

export interface ContextCounts {
  contextId: number;
  counts: Map<string, number>;
}

export interface SkippedContext {
  contextId: number;
  reason: string;
}

export interface IndexReport {
  indexed: number;
  skipped: SkippedContext[];
}

export interface CorpusIndexerOptions {
  /** Id given to the first context this indexer sees. Shards use disjoint ranges. */
  firstContextId?: number;
  strict?: boolean;
}

/** Contexts (or tokens) processed between yields to the event loop, so timers and abort signals can fire. */
export const YIELD_INTERVAL = 1024;

export interface IndexCorpusOptions {
  signal?: AbortSignal;
  onProgress?: (processed: number) => void;
  progressInterval?: number;
}

/**
 * Single pass over a corpus, building the sparse token -> [(context, count)]
 * incidence structure and global token frequencies. Nothing proportional to
 * contexts x vocabulary is ever allocated.
 */
export class CorpusIndexer {
  readonly strict: boolean;
  private firstId: number;
  private nextId: number;
  private lists = new Map<string, IncidenceEntry[]>();
  private freqs = new Map<string, number>();
  private indexed = 0;
  private skipped: SkippedContext[] = [];

  constructor(opts: CorpusIndexerOptions = {}) {
    const first = opts.firstContextId ?? 0;
    if (!Number.isInteger(first) || first < 0) {
      throw new ConfigurationError(`firstContextId must be a non-negative integer, got: ${first}`);
    }
    this.strict = opts.strict ?? false;
    this.firstId = first;
    this.nextId = first;
  }

  /** Records one already tokenized context under the next id. */
  addContext(tokens: readonly string[]): ContextCounts {
    const contextId = this.nextId;
    const counts = countTokens(tokens);
    for (const [token, count] of counts) {
      let list = this.lists.get(token);
      if (!list) {
        list = [];
        this.lists.set(token, list);
      }
      list.push([contextId, count]);
      this.freqs.set(token, (this.freqs.get(token) ?? 0) + count);
    }
    this.nextId += 1;
    this.indexed += 1;
    return { contextId, counts };
  }

  /**
   * Tokenizes and records one context. A malformed context is skipped and
   * reported (its id is still consumed, so ids keep following corpus order),
   * or thrown as MalformedContextError in strict mode.
   */
  indexText(text: unknown, tokenizer: Tokenizer): ContextCounts | null {
    const contextId = this.nextId;
    let tokens: string[];
    try {
      tokens = tokenizeContext(contextId, text, tokenizer);
    } catch (err) {
      if (this.strict || !(err instanceof MalformedContextError)) throw err;
      const reason = err.reason;
      this.skipped.push({ contextId, reason });
      this.nextId += 1;
      logger.warn(`index.context_skipped contextId=${contextId} reason=${reason}`);
      return null;
    }
    return this.addContext(tokens);
  }

  async indexCorpus(
    contexts: Iterable<unknown> | AsyncIterable<unknown>,
    tokenizer: Tokenizer,
    opts: IndexCorpusOptions = {}
  ): Promise<IndexReport> {
    const interval = opts.progressInterval ?? 10_000;
    let processed = 0;
    for await (const text of contexts) {
      if (opts.signal?.aborted) throw new IndexingAbortedError('index', processed);
      this.indexText(text, tokenizer);
      processed += 1;
      if (processed % YIELD_INTERVAL === 0) await setImmediate();
      if (processed % interval === 0) {
        opts.onProgress?.(processed);
        logger.debug(`index.progress processed=${processed} vocabulary=${this.lists.size}`);
      }
    }
    if (processed % interval !== 0) opts.onProgress?.(processed);
    logger.info(
      `index.done processed=${processed} indexed=${this.indexed} skipped=${this.skipped.length} vocabulary=${this.lists.size}`
    );
    return this.report();
  }

  incidence(token: string): readonly IncidenceEntry[] {
    return this.lists.get(token) ?? [];
  }

  frequency(token: string): number {
    return this.freqs.get(token) ?? 0;
  }

  frequencies(): ReadonlyMap<string, number> {
    return this.freqs;
  }

  tokensSeen(): string[] {
    return Array.from(this.lists.keys());
  }

  get vocabularySize() {
    return this.lists.size;
  }

  get firstContextId() {
    return this.firstId;
  }

  /** Id the next context will receive. */
  get nextContextId() {
    return this.nextId;
  }

  /** Contexts consumed so far, skipped ones included. */
  get contextCount() {
    return this.indexed + this.skipped.length;
  }

  report(): IndexReport {
    return { indexed: this.indexed, skipped: [...this.skipped] };
  }

  /**
   * Folds in a shard indexed over a disjoint id range. Frequencies are summed;
   * incidence lists stay ordered by context id whichever side comes first.
   */
  merge(other: CorpusIndexer): this {
    if (other.contextCount === 0) return this;
    const empty = this.contextCount === 0;
    let otherAfter = true;
    if (!empty && other.firstId < this.nextId) {
      if (other.nextId > this.firstId) {
        throw new ConfigurationError(
          `Cannot merge overlapping shards [${this.firstId}, ${this.nextId}) and [${other.firstId}, ${other.nextId})`
        );
      }
      otherAfter = false;
    }

    for (const [token, entries] of other.lists) {
      const mine = this.lists.get(token);
      if (!mine) {
        this.lists.set(token, [...entries]);
      } else if (otherAfter) {
        for (const entry of entries) mine.push(entry);
      } else {
        this.lists.set(token, [...entries, ...mine]);
      }
      this.freqs.set(token, (this.freqs.get(token) ?? 0) + (other.freqs.get(token) ?? 0));
    }

    this.firstId = empty ? other.firstId : Math.min(this.firstId, other.firstId);
    this.nextId = empty ? other.nextId : Math.max(this.nextId, other.nextId);
    this.indexed += other.indexed;
    this.skipped = [...this.skipped, ...other.skipped].sort((a, b) => a.contextId - b.contextId);
    return this;
  }
}

export function tokenizeContext(contextId: number, text: unknown, tokenizer: Tokenizer): string[] {
  if (typeof text !== 'string') {
    throw new MalformedContextError(contextId, `expected a string, got ${text === null ? 'null' : typeof text}`);
  }
  let produced: unknown;
  try {
    produced = tokenizer(text);
  } catch (err) {
    throw new MalformedContextError(contextId, `tokenizer failed: ${errorMessage(err)}`);
  }
  if (!Array.isArray(produced)) {
    throw new MalformedContextError(contextId, 'tokenizer did not return an array');
  }
  const tokens: string[] = [];
  for (const token of produced) {
    if (typeof token !== 'string') {
      throw new MalformedContextError(contextId, `tokenizer returned a ${typeof token} token`);
    }
    tokens.push(token);
  }
  return tokens;
}
