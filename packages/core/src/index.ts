/**
 * @cvmatch/core - Skill extraction and semantic CV/JD matching
 */

// Version
export const VERSION = '0.1.0'

// Engine
export {
  MatchingEngine,
  createEngine,
  type EngineDependencies,
  type CandidateText,
  type RankTextsOptions,
  type RankTextsResult,
} from './engine/index.js'

// Dictionary
export {
  SkillDictionary,
  SkillDictionarySchema,
  DEFAULT_DICTIONARY_PATH,
  loadDefaultDictionary,
  type SkillDictionaryMapping,
} from './dictionary/index.js'

// Extraction
export {
  SkillExtractor,
  JD_INDICATOR_PHRASES,
  type SkillExtractorOptions,
  type TextSource,
} from './extraction/index.js'

// Matching
export {
  SimilarityMatcher,
  Ranker,
  assertThreshold,
  formatEvidence,
  type SimilarityMatcherOptions,
  type RankerOptions,
  type MatchResult,
  type SimilarityOutcome,
  type MatchOptions,
  type RankCandidate,
} from './matching/index.js'

// Analysis backend
export {
  NaturalTextAnalyzer,
  createTextAnalyzer,
  extractNounChunks,
  isNounTag,
  type NaturalTextAnalyzerOptions,
  type TaggedToken,
  type TextAnalysisBackend,
  type AnalyzedDocument,
  type AnalyzedSentence,
} from './analysis/index.js'

// Embeddings
export {
  HashedNgramEmbedder,
  DEFAULT_MODEL_ID,
  listModelIds,
  resolveModel,
  cosineSimilarity,
  type EmbedderCacheStats,
  type EmbeddingModelSpec,
  type EmbedderOptions,
  type TokenEmbedder,
} from './embeddings/index.js'

// Configuration
export {
  EngineConfigSchema,
  loadConfig,
  createConfig,
  type EngineConfig,
  type EngineConfigInput,
  type LoadConfigOptions,
} from './config/index.js'

// Errors
export {
  CvMatchError,
  DictionaryLoadError,
  AnalysisBackendLoadError,
  ValidationError,
  ConfigurationError,
  getErrorMessage,
  isCvMatchError,
  toError,
} from './errors/index.js'

// Logging
export {
  logger,
  createLogger,
  silentLogger,
  setLogAggregator,
  getLogAggregator,
  MemoryLogAggregator,
  FileLogAggregator,
  LogLevel,
  type Logger,
  type LogEntry,
  type LogAggregator,
} from './utils/index.js'
