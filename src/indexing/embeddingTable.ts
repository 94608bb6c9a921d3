import type { IndexingConfig } from '../config/config.js';
import { ConfigurationError } from '../lib/errors.js';
import { addContribution } from './accumulator.js';
import { RandomVectorCache, assertVectorShape, type RandomVectorSource } from './randomVector.js';
import { tokenizeContext } from './corpusIndexer.js';
import { countTokens, type Tokenizer } from './tokenize.js';
import { assertMinCount, isRetained } from './vocabulary.js';

export type VectorSpace = Pick<IndexingConfig, 'dimension' | 'nonzero' | 'seed'>;

export type TokenLookup =
  | { found: true; token: string; frequency: number; vector: number[] }
  | { found: false; token: string; reason: 'unknown' | 'below-threshold' };

export interface UpdateResult {
  contextId: number;
  /** Tokens that crossed the threshold with this context. */
  promoted: string[];
}

export interface ThresholdChange {
  added: string[];
  removed: string[];
}

export interface TokenState {
  token: string;
  frequency: number;
  sum: Int32Array;
}

/** Plain-data form of a table, used by the checkpoint store. */
export interface TableState extends VectorSpace {
  minCount: number;
  nextContextId: number;
  tokens: TokenState[];
}

export interface EmbeddingTableOptions {
  space: VectorSpace;
  minCount: number;
  nextContextId?: number;
  /** Vector source for incremental updates; must describe the same space. */
  vectors?: RandomVectorSource;
}

const UPDATE_CACHE_ENTRIES = 4096;

function byCodeUnit(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

function assertSameSpace(source: RandomVectorSource, space: VectorSpace) {
  const mismatches: string[] = [];
  if (source.dimension !== space.dimension) mismatches.push(`dimension ${source.dimension} != ${space.dimension}`);
  if (source.nonzero !== undefined && source.nonzero !== space.nonzero) {
    mismatches.push(`nonzero ${source.nonzero} != ${space.nonzero}`);
  }
  if (source.seed !== undefined && source.seed !== space.seed) mismatches.push(`seed ${source.seed} != ${space.seed}`);
  if (mismatches.length) {
    throw new ConfigurationError('Vector source does not match the table\'s vector space', mismatches);
  }
}

/**
 * Token -> embedding mapping. Running sums and frequencies are kept for every
 * token ever observed; only tokens above `minCount` are visible through
 * `get`, `tokens` and `entries`. Lowering or raising the threshold later
 * costs no recomputation.
 */
export class EmbeddingTable {
  readonly space: VectorSpace;
  private threshold: number;
  private nextId: number;
  private vectors: RandomVectorSource;
  private sums = new Map<string, Int32Array>();
  private freqs = new Map<string, number>();
  private visible = new Set<string>();

  constructor(opts: EmbeddingTableOptions) {
    assertVectorShape(opts.space.dimension, opts.space.nonzero);
    assertMinCount(opts.minCount);
    const nextId = opts.nextContextId ?? 0;
    if (!Number.isInteger(nextId) || nextId < 0) {
      throw new ConfigurationError(`nextContextId must be a non-negative integer, got: ${nextId}`);
    }
    if (opts.vectors) assertSameSpace(opts.vectors, opts.space);
    this.space = { dimension: opts.space.dimension, nonzero: opts.space.nonzero, seed: opts.space.seed };
    this.threshold = opts.minCount;
    this.nextId = nextId;
    this.vectors =
      opts.vectors ?? new RandomVectorCache({ ...this.space, maxEntries: UPDATE_CACHE_ENTRIES });
  }

  static fromConfig(config: IndexingConfig, vectors?: RandomVectorSource) {
    return new EmbeddingTable({ space: config, minCount: config.minCount, vectors });
  }

  /** Takes ownership of batch-accumulated sums. */
  static fromAccumulated(
    opts: EmbeddingTableOptions,
    sums: ReadonlyMap<string, Int32Array>,
    frequencies: ReadonlyMap<string, number>
  ) {
    const table = new EmbeddingTable(opts);
    for (const [token, sum] of sums) {
      table.putToken(token, frequencies.get(token) ?? 0, sum);
    }
    return table;
  }

  /** Takes ownership of the sums in `state`. */
  static restore(state: TableState, vectors?: RandomVectorSource) {
    const table = new EmbeddingTable({
      space: state,
      minCount: state.minCount,
      nextContextId: state.nextContextId,
      vectors,
    });
    for (const { token, frequency, sum } of state.tokens) table.putToken(token, frequency, sum);
    return table;
  }

  private putToken(token: string, frequency: number, sum: Int32Array) {
    if (sum.length !== this.space.dimension) {
      throw new ConfigurationError(`Sum for "${token}" has length ${sum.length}, expected ${this.space.dimension}`);
    }
    this.sums.set(token, sum);
    this.freqs.set(token, frequency);
    if (isRetained(frequency, this.threshold)) this.visible.add(token);
  }

  get(token: string): TokenLookup {
    const sum = this.sums.get(token);
    if (!sum) return { found: false, token, reason: 'unknown' };
    if (!this.visible.has(token)) return { found: false, token, reason: 'below-threshold' };
    return { found: true, token, frequency: this.freqs.get(token) ?? 0, vector: Array.from(sum) };
  }

  has(token: string) {
    return this.visible.has(token);
  }

  /** Retained tokens in code-unit order. */
  tokens(): string[] {
    return Array.from(this.visible).sort(byCodeUnit);
  }

  dimension() {
    return this.space.dimension;
  }

  frequency(token: string) {
    return this.freqs.get(token) ?? 0;
  }

  get size() {
    return this.visible.size;
  }

  /** Tokens with a running sum, retained or not. */
  get observedSize() {
    return this.sums.size;
  }

  get minCount() {
    return this.threshold;
  }

  get nextContextId() {
    return this.nextId;
  }

  *entries(): IterableIterator<[string, number[]]> {
    for (const token of this.tokens()) {
      const sum = this.sums.get(token);
      if (sum) yield [token, Array.from(sum)];
    }
  }

  /**
   * Adds one tokenized context under the next id. Touches only the running
   * sums of the tokens in that context.
   */
  update(tokens: readonly string[]): UpdateResult {
    const contextId = this.nextId;
    const vector = this.vectors.get(contextId);
    const promoted: string[] = [];
    for (const [token, count] of countTokens(tokens)) {
      let sum = this.sums.get(token);
      if (!sum) {
        sum = new Int32Array(this.space.dimension);
        this.sums.set(token, sum);
      }
      addContribution(sum, vector, count);
      const before = this.freqs.get(token) ?? 0;
      const after = before + count;
      this.freqs.set(token, after);
      if (!isRetained(before, this.threshold) && isRetained(after, this.threshold)) {
        this.visible.add(token);
        promoted.push(token);
      }
    }
    this.nextId += 1;
    return { contextId, promoted: promoted.sort(byCodeUnit) };
  }

  /** Tokenizes then `update`s; a malformed context throws MalformedContextError and consumes no id. */
  updateText(text: unknown, tokenizer: Tokenizer): UpdateResult {
    return this.update(tokenizeContext(this.nextId, text, tokenizer));
  }

  /** Consumes a context id without contributing, for contexts that were skipped. */
  skipContext(): number {
    const contextId = this.nextId;
    this.nextId += 1;
    return contextId;
  }

  setMinCount(minCount: number): ThresholdChange {
    assertMinCount(minCount);
    const added: string[] = [];
    const removed: string[] = [];
    for (const [token, frequency] of this.freqs) {
      const was = this.visible.has(token);
      const now = isRetained(frequency, minCount);
      if (now && !was) {
        this.visible.add(token);
        added.push(token);
      } else if (!now && was) {
        this.visible.delete(token);
        removed.push(token);
      }
    }
    this.threshold = minCount;
    return { added: added.sort(byCodeUnit), removed: removed.sort(byCodeUnit) };
  }

  snapshot(): TableState {
    const tokens: TokenState[] = [];
    for (const [token, sum] of this.sums) {
      tokens.push({ token, frequency: this.freqs.get(token) ?? 0, sum: Int32Array.from(sum) });
    }
    return { ...this.space, minCount: this.threshold, nextContextId: this.nextId, tokens };
  }
}
