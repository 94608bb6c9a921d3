import { ConfigurationError } from '../lib/errors.js';

export function assertMinCount(minCount: number) {
  if (!Number.isInteger(minCount) || minCount < 0) {
    throw new ConfigurationError(`minCount must be a non-negative integer, got: ${minCount}`);
  }
}

export function isRetained(frequency: number, minCount: number) {
  return frequency > minCount;
}

/** Tokens whose total frequency is strictly greater than `minCount`. */
export function selectVocabulary(frequencies: ReadonlyMap<string, number>, minCount: number): Set<string> {
  assertMinCount(minCount);
  const retained = new Set<string>();
  for (const [token, frequency] of frequencies) {
    if (isRetained(frequency, minCount)) retained.add(token);
  }
  return retained;
}
