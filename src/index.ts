export { defaultConfig, loadConfig, resolveConfig, saveConfig, validateConfig, type IndexingConfig } from './config/config.js';
export {
  CheckpointMismatchError,
  ConfigurationError,
  IndexingAbortedError,
  MalformedContextError,
  RandomIndexError,
  SumOverflowError,
} from './lib/errors.js';
export { logger } from './lib/logger.js';
export {
  RandomVectorCache,
  densify,
  generateRandomVector,
  type RandomVectorSource,
  type SparseVector,
} from './indexing/randomVector.js';
export { countTokens, createSimpleTokenizer, whitespaceTokenizer, type Tokenizer } from './indexing/tokenize.js';
export {
  CorpusIndexer,
  type ContextCounts,
  type IncidenceEntry,
  type IndexReport,
  type SkippedContext,
} from './indexing/corpusIndexer.js';
export { isRetained, selectVocabulary } from './indexing/vocabulary.js';
export { accumulate, accumulateAll, addContribution, mergeShardResults, partitionTokens } from './indexing/accumulator.js';
export {
  EmbeddingTable,
  type TableState,
  type ThresholdChange,
  type TokenLookup,
  type UpdateResult,
  type VectorSpace,
} from './indexing/embeddingTable.js';
export { buildEmbeddingTable, extendEmbeddingTable, type BuildOptions, type BuildResult, type ExtendReport } from './indexing/pipeline.js';
export { CHECKPOINT_VERSION, loadCheckpoint, saveCheckpoint } from './store/checkpoint.js';
