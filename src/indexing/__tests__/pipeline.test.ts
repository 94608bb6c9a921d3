import test from 'node:test';
import assert from 'node:assert/strict';
import { YIELD_INTERVAL } from '../corpusIndexer.js';
import { buildEmbeddingTable, extendEmbeddingTable } from '../pipeline.js';
import { EmbeddingTable } from '../embeddingTable.js';
import { densify, generateRandomVector } from '../randomVector.js';
import { ConfigurationError, IndexingAbortedError, MalformedContextError } from '../../lib/errors.js';

const WORDS = ['alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta'];

/** Twenty deterministic sentences with repeated words. */
function syntheticCorpus(size = 20): string[] {
  const lines: string[] = [];
  for (let i = 0; i < size; i += 1) {
    const words: string[] = [];
    for (let j = 0; j < 3 + (i % 4); j += 1) words.push(WORDS[(i * 7 + j * 3) % WORDS.length]);
    lines.push(words.join(' '));
  }
  return lines;
}

function sumOf(ids: number[], seed: number, n: number, m: number) {
  const total = new Array<number>(n).fill(0);
  for (const id of ids) {
    densify(generateRandomVector(id, seed, n, m)).forEach((x, i) => {
      total[i] += x;
    });
  }
  return total;
}

function assertSameTable(actual: EmbeddingTable, expected: EmbeddingTable) {
  assert.deepEqual(actual.tokens(), expected.tokens());
  assert.equal(actual.observedSize, expected.observedSize);
  assert.equal(actual.nextContextId, expected.nextContextId);
  for (const token of expected.tokens()) assert.deepEqual(actual.get(token), expected.get(token));
}

const small = { dimension: 10, nonzero: 4, seed: 42, minCount: 0 };

test('three-sentence corpus gives exact sums of context vectors', async () => {
  const { table, report } = await buildEmbeddingTable(['the cat sat', 'the dog sat', 'the cat ran'], { config: small });
  assert.deepEqual(report, { indexed: 3, skipped: [] });
  assert.deepEqual(table.tokens(), ['cat', 'dog', 'ran', 'sat', 'the']);
  assert.equal(table.dimension(), 10);

  const the = table.get('the');
  assert.ok(the.found);
  assert.equal(the.frequency, 3);
  assert.deepEqual(the.vector, sumOf([0, 1, 2], 42, 10, 4));

  const cat = table.get('cat');
  assert.ok(cat.found);
  assert.deepEqual(cat.vector, sumOf([0, 2], 42, 10, 4));

  const dog = table.get('dog');
  assert.ok(dog.found);
  assert.deepEqual(dog.vector, densify(generateRandomVector(1, 42, 10, 4)));
});

test('an empty corpus yields an empty table', async () => {
  const { table, report } = await buildEmbeddingTable([], { config: small });
  assert.equal(table.size, 0);
  assert.deepEqual(table.tokens(), []);
  assert.deepEqual(report, { indexed: 0, skipped: [] });
  assert.deepEqual(table.get('the'), { found: false, token: 'the', reason: 'unknown' });
});

test('invalid configuration fails before the corpus is read', async () => {
  let read = false;
  function* corpus() {
    read = true;
    yield 'a';
  }
  await assert.rejects(() => buildEmbeddingTable(corpus(), { config: { dimension: 10, nonzero: 20 } }), ConfigurationError);
  assert.equal(read, false);
});

test('default threshold hides tokens seen nine times or fewer', async () => {
  const corpus = [...Array.from({ length: 10 }, () => 'common'), ...Array.from({ length: 9 }, () => 'rare')];
  const { table } = await buildEmbeddingTable(corpus, { config: { dimension: 20, nonzero: 2 } });
  assert.deepEqual(table.tokens(), ['common']);
  assert.deepEqual(table.get('rare'), { found: false, token: 'rare', reason: 'below-threshold' });
  assert.equal(table.setMinCount(8).added[0], 'rare');
});

test('batch build equals a partial build extended incrementally', async () => {
  const corpus = syntheticCorpus();
  const config = { dimension: 32, nonzero: 6, seed: 9, minCount: 2 };
  const { table: full } = await buildEmbeddingTable(corpus, { config });

  for (const split of [0, 1, 7, 19, 20]) {
    const { table: partial } = await buildEmbeddingTable(corpus.slice(0, split), { config });
    await extendEmbeddingTable(partial, corpus.slice(split));
    assertSameTable(partial, full);
  }
});

test('sharded accumulation matches a single group', async () => {
  const corpus = syntheticCorpus();
  const config = { dimension: 32, nonzero: 6, seed: 3, minCount: 0 };
  const { table: single } = await buildEmbeddingTable(corpus, { config });
  const { table: sharded } = await buildEmbeddingTable(corpus, { config, shards: 4 });
  assertSameTable(sharded, single);
});

test('malformed contexts are skipped in the batch and in extensions alike', async () => {
  const corpus = ['a b', 3, 'b c', undefined, 'c a'];
  const { table: full, report } = await buildEmbeddingTable(corpus, { config: small });
  assert.deepEqual(
    report.skipped.map((s) => s.contextId),
    [1, 3]
  );

  const { table: partial } = await buildEmbeddingTable(corpus.slice(0, 2), { config: small });
  const extension = await extendEmbeddingTable(partial, corpus.slice(2));
  assert.equal(extension.updated, 2);
  assert.deepEqual(extension.skipped, [{ contextId: 3, reason: 'expected a string, got undefined' }]);
  assertSameTable(partial, full);
});

test('strict configuration turns a malformed context into an error', async () => {
  await assert.rejects(
    () => buildEmbeddingTable(['a', 5], { config: { ...small, strict: true } }),
    (err: unknown) => err instanceof MalformedContextError && err.contextId === 1
  );
  const { table } = await buildEmbeddingTable(['a'], { config: small });
  await assert.rejects(() => extendEmbeddingTable(table, [5], { strict: true }), MalformedContextError);
  assert.equal(table.nextContextId, 1);
});

test('an aborted extension can be resumed to the same result', async () => {
  const corpus = syntheticCorpus();
  const config = { dimension: 32, nonzero: 6, seed: 11, minCount: 1 };
  const { table: full } = await buildEmbeddingTable(corpus, { config });

  const { table } = await buildEmbeddingTable(corpus.slice(0, 5), { config });
  const controller = new AbortController();
  await assert.rejects(
    () =>
      extendEmbeddingTable(table, corpus.slice(5), {
        signal: controller.signal,
        onUpdate: ({ contextId }) => {
          if (contextId === 8) controller.abort();
        },
      }),
    (err: unknown) => err instanceof IndexingAbortedError && err.stage === 'update' && err.completed === 4
  );
  assert.equal(table.nextContextId, 9);
  await extendEmbeddingTable(table, corpus.slice(table.nextContextId));
  assertSameTable(table, full);
});

test('an already aborted signal stops the batch build during indexing', async () => {
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(
    () => buildEmbeddingTable(['a'], { config: small, signal: controller.signal }),
    (err: unknown) => err instanceof IndexingAbortedError && err.stage === 'index' && err.completed === 0
  );
});

test('a timeout signal stops a build over an endless corpus', async () => {
  function* endless() {
    for (let i = 0; ; i += 1) yield `w${i % 50} w${(i * 7) % 50}`;
  }
  await assert.rejects(
    () => buildEmbeddingTable(endless(), { config: small, signal: AbortSignal.timeout(10) }),
    (err: unknown) =>
      err instanceof IndexingAbortedError &&
      err.stage === 'index' &&
      err.completed >= YIELD_INTERVAL &&
      err.completed % YIELD_INTERVAL === 0
  );
});

test('an extension aborted from outside keeps every applied context', async () => {
  const { table } = await buildEmbeddingTable([], { config: small });
  const corpus = Array.from({ length: 3 * YIELD_INTERVAL }, (_, i) => `t${i % 5}`);
  const controller = new AbortController();
  setImmediate(() => controller.abort());
  await assert.rejects(
    () => extendEmbeddingTable(table, corpus, { signal: controller.signal }),
    (err: unknown) => err instanceof IndexingAbortedError && err.stage === 'update' && err.completed === YIELD_INTERVAL
  );
  assert.equal(table.nextContextId, YIELD_INTERVAL);
  assert.equal(table.frequency('t0'), Math.ceil(YIELD_INTERVAL / 5));
});

test('an abort inside a later token group counts tokens from earlier groups', async () => {
  const corpus = Array.from({ length: 3000 }, (_, i) => `w${i}`);
  const controller = new AbortController();
  await assert.rejects(
    () =>
      buildEmbeddingTable(corpus, {
        config: { dimension: 8, nonzero: 2, minCount: 0 },
        shards: 2,
        signal: controller.signal,
        onProgress: (stage, done) => {
          if (stage === 'accumulate' && done === 1500) setImmediate(() => controller.abort());
        },
      }),
    (err: unknown) =>
      err instanceof IndexingAbortedError && err.stage === 'accumulate' && err.completed === 1500 + YIELD_INTERVAL
  );
});

test('progress is reported for both stages', async () => {
  const seen: string[] = [];
  await buildEmbeddingTable(['a b', 'b c'], {
    config: small,
    shards: 2,
    onProgress: (stage, done) => seen.push(`${stage}:${done}`),
  });
  assert.deepEqual(seen, ['index:2', 'accumulate:2', 'accumulate:3']);
});
