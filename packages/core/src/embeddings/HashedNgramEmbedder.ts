/**
 * Local hashed character n-gram embeddings
 *
 * Token vectors are feature-hashed n-gram counts; a document vector is the
 * mean of its token vectors. Identical strings embed identically, strings
 * sharing n-grams land close together, unrelated strings are near orthogonal.
 *
 * @example
 * const embedder = new HashedNgramEmbedder('hashed-ngram-512')
 * const a = embedder.embedTokens(['python'])
 * const b = embedder.embedTokens(['python', 'scripting'])
 * embedder.cosineSimilarity(a, b)
 */

import { LRUCache } from 'lru-cache'
import type { EmbedderOptions, EmbeddingModelSpec, TokenEmbedder } from './embedding-types.js'
import { cosineSimilarity, embedToken, meanVector } from './embedding-utils.js'
import { resolveModel } from './models.js'

export interface EmbedderCacheStats {
  hits: number
  misses: number
  size: number
  maxSize: number
}

export class HashedNgramEmbedder implements TokenEmbedder {
  readonly modelId: string
  readonly dimension: number
  private readonly spec: EmbeddingModelSpec
  private readonly tokenCache: LRUCache<string, Float32Array>
  private hits = 0
  private misses = 0

  /**
   * @throws AnalysisBackendLoadError for an unknown model identifier
   */
  constructor(modelId: string, options: EmbedderOptions = {}) {
    this.spec = resolveModel(modelId)
    this.modelId = this.spec.id
    this.dimension = this.spec.dimension
    this.tokenCache = new LRUCache<string, Float32Array>({
      max: options.cacheSize ?? 5000,
    })
  }

  /**
   * Unit vector for a single token (memoized)
   */
  embedToken(token: string): Float32Array {
    const cached = this.tokenCache.get(token)
    if (cached) {
      this.hits++
      return cached
    }

    this.misses++
    const vector = embedToken(token, this.spec.dimension, this.spec.ngramSize)
    this.tokenCache.set(token, vector)
    return vector
  }

  embedTokens(tokens: readonly string[]): Float32Array {
    return meanVector(
      tokens.map((token) => this.embedToken(token)),
      this.dimension
    )
  }

  cosineSimilarity(a: Float32Array, b: Float32Array): number {
    return cosineSimilarity(a, b)
  }

  getCacheStats(): EmbedderCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.tokenCache.size,
      maxSize: this.tokenCache.max,
    }
  }
}
