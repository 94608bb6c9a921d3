import { sha256 } from '../lib/hashing.js';
import { ConfigurationError } from '../lib/errors.js';

/**
 * A ternary vector with exactly `plus.length + minus.length` nonzero entries.
 * Index lists are zero-based, sorted ascending and disjoint.
 */
export interface SparseVector {
  dimension: number;
  plus: readonly number[];
  minus: readonly number[];
}

export interface RandomVectorSource {
  readonly dimension: number;
  /** Checked against the table's space when present. */
  readonly nonzero?: number;
  readonly seed?: number;
  get(contextId: number): SparseVector;
}

function assertPositiveInt(name: string, value: number) {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got: ${value}`);
  }
}

export function assertVectorShape(dimension: number, nonzero: number) {
  assertPositiveInt('dimension', dimension);
  assertPositiveInt('nonzero', nonzero);
  if (nonzero > dimension) {
    throw new ConfigurationError(`nonzero (${nonzero}) must not exceed dimension (${dimension})`);
  }
}

/** xorshift128 seeded from the first 16 bytes of sha256("<seed>:<contextId>"). */
function contextStream(seed: number, contextId: number) {
  const digest = sha256(`${seed}:${contextId}`);
  let x = digest.readUInt32BE(0);
  let y = digest.readUInt32BE(4);
  let z = digest.readUInt32BE(8);
  let w = digest.readUInt32BE(12);
  if ((x | y | z | w) === 0) w = 0x9e3779b9;
  return () => {
    const t = (x ^ (x << 11)) >>> 0;
    x = y;
    y = z;
    z = w;
    w = (w ^ (w >>> 19) ^ (t ^ (t >>> 8))) >>> 0;
    return w;
  };
}

/** Uniform integer in [0, bound) by rejection, so small bounds carry no modulo bias. */
function uniformBelow(next: () => number, bound: number) {
  const limit = 0x1_0000_0000 - (0x1_0000_0000 % bound);
  let r = next();
  while (r >= limit) r = next();
  return r % bound;
}

/**
 * Random vector for one context. A pure function of its arguments: the same
 * (contextId, seed, dimension, nonzero) always gives the same vector, in any
 * call order and from any worker.
 */
export function generateRandomVector(contextId: number, seed: number, dimension: number, nonzero: number): SparseVector {
  assertVectorShape(dimension, nonzero);
  if (!Number.isInteger(contextId) || contextId < 0) {
    throw new ConfigurationError(`contextId must be a non-negative integer, got: ${contextId}`);
  }
  if (!Number.isInteger(seed)) {
    throw new ConfigurationError(`seed must be an integer, got: ${seed}`);
  }

  const next = contextStream(seed, contextId);
  // Partial Fisher-Yates: only the swapped slots are tracked, so memory is O(nonzero).
  const swapped = new Map<number, number>();
  const drawn: number[] = [];
  for (let i = 0; i < nonzero; i += 1) {
    const j = i + uniformBelow(next, dimension - i);
    const atJ = swapped.get(j) ?? j;
    const atI = swapped.get(i) ?? i;
    swapped.set(j, atI);
    drawn.push(atJ);
  }

  const plusCount = Math.ceil(nonzero / 2);
  const plus = drawn.slice(0, plusCount).sort((a, b) => a - b);
  const minus = drawn.slice(plusCount).sort((a, b) => a - b);
  return { dimension, plus, minus };
}

export function densify(vector: SparseVector): number[] {
  const dense = new Array<number>(vector.dimension).fill(0);
  for (const idx of vector.plus) dense[idx] = 1;
  for (const idx of vector.minus) dense[idx] = -1;
  return dense;
}

export interface RandomVectorCacheOptions {
  seed: number;
  dimension: number;
  nonzero: number;
  /** Upper bound on memoized vectors; oldest insertions are evicted first. Unbounded when omitted. */
  maxEntries?: number;
}

/**
 * Lazily memoized vector source. Entries never change once computed, so the
 * cache can be read from many places; computing the same id twice is harmless.
 */
export class RandomVectorCache implements RandomVectorSource {
  readonly seed: number;
  readonly dimension: number;
  readonly nonzero: number;
  private readonly maxEntries: number;
  private vectors = new Map<number, SparseVector>();

  constructor(opts: RandomVectorCacheOptions) {
    assertVectorShape(opts.dimension, opts.nonzero);
    if (opts.maxEntries !== undefined) assertPositiveInt('maxEntries', opts.maxEntries);
    this.seed = opts.seed;
    this.dimension = opts.dimension;
    this.nonzero = opts.nonzero;
    this.maxEntries = opts.maxEntries ?? Number.POSITIVE_INFINITY;
  }

  get(contextId: number): SparseVector {
    const cached = this.vectors.get(contextId);
    if (cached) return cached;
    const vector = generateRandomVector(contextId, this.seed, this.dimension, this.nonzero);
    if (this.vectors.size >= this.maxEntries) {
      const oldest = this.vectors.keys().next();
      if (!oldest.done) this.vectors.delete(oldest.value);
    }
    this.vectors.set(contextId, vector);
    return vector;
  }

  get size() {
    return this.vectors.size;
  }

  clear() {
    this.vectors.clear();
  }
}
