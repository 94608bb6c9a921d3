import crypto from 'node:crypto';

export function sha256(input: string | Buffer): Buffer {
  return crypto.createHash('sha256').update(input).digest();
}

export function sha256Hex(input: string | Buffer) {
  return sha256(input).toString('hex');
}

export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return `[${value.map((v) => stableStringify(v)).join(',')}]`;
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const body = entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',');
  return `{${body}}`;
}

/**
 * Identifies the random vector space. Two tables can only be combined or
 * resumed from each other when their fingerprints match.
 */
export function vectorSpaceFingerprint(space: { dimension: number; nonzero: number; seed: number }) {
  return sha256Hex(stableStringify({ dimension: space.dimension, nonzero: space.nonzero, seed: space.seed }));
}
