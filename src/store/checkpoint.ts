import fs from 'fs-extra';
import { Ajv } from 'ajv';
import type { IndexingConfig } from '../config/config.js';
import { checkpointPath } from '../config/paths.js';
import { CheckpointMismatchError, ConfigurationError } from '../lib/errors.js';
import { vectorSpaceFingerprint } from '../lib/hashing.js';
import { logger } from '../lib/logger.js';
import { EmbeddingTable, type TokenState } from '../indexing/embeddingTable.js';

export const CHECKPOINT_VERSION = 1;

interface StoredToken {
  token: string;
  frequency: number;
  /** Little-endian Int32 coordinates, base64 encoded. */
  sum: string;
}

interface CheckpointFile {
  version: number;
  fingerprint: string;
  dimension: number;
  nonzero: number;
  seed: number;
  minCount: number;
  nextContextId: number;
  savedAt: string;
  tokens: StoredToken[];
}

const checkpointSchema = {
  type: 'object',
  properties: {
    version: { const: CHECKPOINT_VERSION },
    fingerprint: { type: 'string' },
    dimension: { type: 'integer', minimum: 1 },
    nonzero: { type: 'integer', minimum: 1 },
    seed: { type: 'integer' },
    minCount: { type: 'integer', minimum: 0 },
    nextContextId: { type: 'integer', minimum: 0 },
    savedAt: { type: 'string' },
    tokens: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          token: { type: 'string' },
          frequency: { type: 'integer', minimum: 0 },
          sum: { type: 'string' },
        },
        required: ['token', 'frequency', 'sum'],
        additionalProperties: false,
      },
    },
  },
  required: ['version', 'fingerprint', 'dimension', 'nonzero', 'seed', 'minCount', 'nextContextId', 'savedAt', 'tokens'],
  additionalProperties: false,
} as const;

const ajv = new Ajv({ allErrors: true });
const validateCheckpoint = ajv.compile<CheckpointFile>(checkpointSchema);

function encodeSum(sum: Int32Array): string {
  const buf = Buffer.alloc(sum.length * 4);
  for (let i = 0; i < sum.length; i += 1) buf.writeInt32LE(sum[i], i * 4);
  return buf.toString('base64');
}

function decodeSum(encoded: string, dimension: number, token: string): Int32Array {
  const buf = Buffer.from(encoded, 'base64');
  if (buf.length !== dimension * 4) {
    throw new ConfigurationError(`Stored vector for "${token}" has ${buf.length} bytes, expected ${dimension * 4}`);
  }
  const sum = new Int32Array(dimension);
  for (let i = 0; i < dimension; i += 1) sum[i] = buf.readInt32LE(i * 4);
  return sum;
}

/**
 * Writes the table's full running state, hidden tokens included. The file is
 * written beside the target and then moved over it, so a reader never sees a
 * half-written checkpoint.
 */
export async function saveCheckpoint(table: EmbeddingTable, file: string = checkpointPath) {
  const state = table.snapshot();
  const stored: CheckpointFile = {
    version: CHECKPOINT_VERSION,
    fingerprint: vectorSpaceFingerprint(state),
    dimension: state.dimension,
    nonzero: state.nonzero,
    seed: state.seed,
    minCount: state.minCount,
    nextContextId: state.nextContextId,
    savedAt: new Date().toISOString(),
    tokens: state.tokens.map((t) => ({ token: t.token, frequency: t.frequency, sum: encodeSum(t.sum) })),
  };
  const tmp = `${file}.tmp`;
  await fs.outputJSON(tmp, stored);
  await fs.move(tmp, file, { overwrite: true });
  logger.info(`checkpoint.saved path=${file} tokens=${stored.tokens.length} nextContextId=${stored.nextContextId}`);
}

/**
 * Restores the table saved at `file`, or null when there is none. With
 * `expected`, the stored vector space must match it; `expected.minCount`
 * then replaces the stored threshold.
 */
export async function loadCheckpoint(
  file: string = checkpointPath,
  expected?: IndexingConfig
): Promise<EmbeddingTable | null> {
  if (!(await fs.pathExists(file))) return null;
  const raw: unknown = await fs.readJSON(file);
  if (!validateCheckpoint(raw)) {
    const issues = (validateCheckpoint.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
    throw new ConfigurationError(`Checkpoint ${file} is not a valid checkpoint`, issues);
  }

  const space = { dimension: raw.dimension, nonzero: raw.nonzero, seed: raw.seed };
  if (raw.fingerprint !== vectorSpaceFingerprint(space)) {
    throw new ConfigurationError(`Checkpoint ${file} fingerprint does not match its stored vector space`);
  }
  if (expected) {
    const want = vectorSpaceFingerprint(expected);
    if (want !== raw.fingerprint) throw new CheckpointMismatchError(want, raw.fingerprint);
  }

  const tokens: TokenState[] = raw.tokens.map((t) => ({
    token: t.token,
    frequency: t.frequency,
    sum: decodeSum(t.sum, space.dimension, t.token),
  }));
  const table = EmbeddingTable.restore({
    ...space,
    minCount: expected?.minCount ?? raw.minCount,
    nextContextId: raw.nextContextId,
    tokens,
  });
  logger.info(`checkpoint.loaded path=${file} tokens=${tokens.length} nextContextId=${table.nextContextId}`);
  return table;
}
