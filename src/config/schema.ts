export const configSchema = {
  type: 'object',
  properties: {
    dimension: { type: 'integer', minimum: 1 },
    nonzero: { type: 'integer', minimum: 1 },
    minCount: { type: 'integer', minimum: 0 },
    seed: { type: 'integer' },
    strict: { type: 'boolean' },
  },
  required: ['dimension', 'nonzero', 'minCount', 'seed', 'strict'],
  additionalProperties: false,
} as const;
