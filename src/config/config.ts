import fs from 'fs-extra';
import { Ajv } from 'ajv';
import { configPath } from './paths.js';
import { configSchema } from './schema.js';
import { ConfigurationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface IndexingConfig {
  /** Length of every random and embedding vector (n). */
  dimension: number;
  /** Nonzero entries per context vector (m). */
  nonzero: number;
  /** Tokens are retained when their frequency is strictly greater than this. */
  minCount: number;
  seed: number;
  /** Throw on a malformed context instead of skipping it. */
  strict: boolean;
}

export const defaultConfig: IndexingConfig = {
  dimension: 300,
  nonzero: 30,
  minCount: 9,
  seed: 0,
  strict: false,
};

const ajv = new Ajv({ allErrors: true });
const validateShape = ajv.compile<IndexingConfig>(configSchema);

export function validateConfig(candidate: unknown): IndexingConfig {
  if (!validateShape(candidate)) {
    const issues = (validateShape.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
    throw new ConfigurationError('Invalid indexing configuration', issues);
  }
  if (candidate.nonzero > candidate.dimension) {
    throw new ConfigurationError('Invalid indexing configuration', [
      `/nonzero (${candidate.nonzero}) must not exceed /dimension (${candidate.dimension})`,
    ]);
  }
  return candidate;
}

/** Keys explicitly set to undefined fall back to their defaults. */
export function resolveConfig(overrides: Partial<IndexingConfig> = {}): IndexingConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  return validateConfig({ ...defaultConfig, ...defined });
}

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const num = Number(raw);
  if (!Number.isFinite(num)) {
    throw new ConfigurationError(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return num;
}

function booleanFromEnv(name: string): boolean | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  return raw === '1' || raw.toLowerCase() === 'true';
}

export function envOverrides(): Partial<IndexingConfig> {
  const overrides: Partial<IndexingConfig> = {};
  const dimension = numberFromEnv('RANDINDEX_DIMENSION');
  const nonzero = numberFromEnv('RANDINDEX_NONZERO');
  const minCount = numberFromEnv('RANDINDEX_MIN_COUNT');
  const seed = numberFromEnv('RANDINDEX_SEED');
  const strict = booleanFromEnv('RANDINDEX_STRICT');
  if (dimension !== undefined) overrides.dimension = dimension;
  if (nonzero !== undefined) overrides.nonzero = nonzero;
  if (minCount !== undefined) overrides.minCount = minCount;
  if (seed !== undefined) overrides.seed = seed;
  if (strict !== undefined) overrides.strict = strict;
  return overrides;
}

/**
 * Reads the JSON config file (creating it with defaults when missing), then
 * applies RANDINDEX_* environment overrides and validates the result.
 */
export function loadConfig(file: string = configPath): IndexingConfig {
  if (!fs.existsSync(file)) {
    fs.outputJSONSync(file, defaultConfig, { spaces: 2 });
    logger.info(`config.created path=${file}`);
    return resolveConfig(envOverrides());
  }
  const existing: unknown = fs.readJSONSync(file);
  if (!existing || typeof existing !== 'object' || Array.isArray(existing)) {
    throw new ConfigurationError(`Config file ${file} must contain a JSON object`);
  }
  return validateConfig({ ...defaultConfig, ...existing, ...envOverrides() });
}

export function saveConfig(cfg: IndexingConfig, file: string = configPath) {
  fs.outputJSONSync(file, validateConfig(cfg), { spaces: 2 });
}
