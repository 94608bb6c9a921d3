import { ConfigurationError, IndexingAbortedError, SumOverflowError } from '../lib/errors.js';
import type { IncidenceEntry } from './corpusIndexer.js';
import type { RandomVectorSource, SparseVector } from './randomVector.js';

const INT32_MAX = 2 ** 31 - 1;
const INT32_MIN = -(2 ** 31);

function checked(value: number, index: number) {
  if (value > INT32_MAX || value < INT32_MIN) throw new SumOverflowError(index, value);
  return value;
}

/**
 * Scatter-adds `count * vector` into `target`. Throws SumOverflowError rather
 * than letting a coordinate wrap past the Int32 range; coordinates written
 * before the failing one keep their new values.
 */
export function addContribution(target: Int32Array, vector: SparseVector, count: number) {
  for (const idx of vector.plus) target[idx] = checked(target[idx] + count, idx);
  for (const idx of vector.minus) target[idx] = checked(target[idx] - count, idx);
}

/**
 * r_t = sum over (contextId, count) of count * v_contextId, into a fresh
 * accumulator or onto an existing running sum.
 */
export function accumulate(
  incidence: Iterable<IncidenceEntry>,
  source: RandomVectorSource,
  target: Int32Array = new Int32Array(source.dimension)
): Int32Array {
  if (target.length !== source.dimension) {
    throw new ConfigurationError(`Accumulator has length ${target.length}, vector source has dimension ${source.dimension}`);
  }
  for (const [contextId, count] of incidence) {
    addContribution(target, source.get(contextId), count);
  }
  return target;
}

export interface AccumulateAllOptions {
  signal?: AbortSignal;
}

export function accumulateAll(
  tokens: Iterable<string>,
  incidenceOf: (token: string) => Iterable<IncidenceEntry>,
  source: RandomVectorSource,
  opts: AccumulateAllOptions = {}
): Map<string, Int32Array> {
  const sums = new Map<string, Int32Array>();
  for (const token of tokens) {
    if (opts.signal?.aborted) throw new IndexingAbortedError('accumulate', sums.size);
    sums.set(token, accumulate(incidenceOf(token), source));
  }
  return sums;
}

/**
 * Splits tokens into `shards` disjoint groups, round-robin over the sorted
 * list. Each group reads only its own incidence lists and the shared vectors,
 * so groups can be accumulated independently.
 */
export function partitionTokens(tokens: Iterable<string>, shards: number): string[][] {
  if (!Number.isInteger(shards) || shards <= 0) {
    throw new ConfigurationError(`shards must be a positive integer, got: ${shards}`);
  }
  const groups: string[][] = Array.from({ length: shards }, () => []);
  const sorted = Array.from(tokens).sort();
  sorted.forEach((token, i) => {
    groups[i % shards].push(token);
  });
  return groups;
}

export function mergeShardResults(results: Iterable<Map<string, Int32Array>>): Map<string, Int32Array> {
  const merged = new Map<string, Int32Array>();
  for (const shard of results) {
    for (const [token, sum] of shard) {
      if (merged.has(token)) throw new ConfigurationError(`Token "${token}" was accumulated by more than one shard`);
      merged.set(token, sum);
    }
  }
  return merged;
}
