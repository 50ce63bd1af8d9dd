/**
 * Type definitions for the embedding model
 * @module @cvmatch/core/embeddings/embedding-types
 */

/**
 * Parameters of a hashed character n-gram model
 */
export interface EmbeddingModelSpec {
  /** Identifier accepted in configuration (`modelIdentifier`) */
  id: string
  /** Vector dimension (number of hash buckets) */
  dimension: number
  /** Character n-gram length */
  ngramSize: number
}

/**
 * Options for HashedNgramEmbedder
 */
export interface EmbedderOptions {
  /** Maximum number of memoized token vectors (default 5000) */
  cacheSize?: number
}

/**
 * Something that turns token sequences into comparable vectors
 */
export interface TokenEmbedder {
  readonly modelId: string
  readonly dimension: number
  /** Mean of the token vectors; all zeros for an empty sequence */
  embedTokens(tokens: readonly string[]): Float32Array
  /** Cosine similarity in [-1, 1]; 0 when either vector is all zeros */
  cosineSimilarity(a: Float32Array, b: Float32Array): number
}
