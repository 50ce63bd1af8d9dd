/**
 * Embeddings: hashed character n-gram vectors behind the analysis backend
 */

export { HashedNgramEmbedder, type EmbedderCacheStats } from './HashedNgramEmbedder.js'
export { DEFAULT_MODEL_ID, listModelIds, resolveModel } from './models.js'
export {
  hashText,
  charNgrams,
  normalize,
  embedToken,
  meanVector,
  cosineSimilarity,
} from './embedding-utils.js'
export type { EmbeddingModelSpec, EmbedderOptions, TokenEmbedder } from './embedding-types.js'
