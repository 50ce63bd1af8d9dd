/**
 * Embedding model registry
 */

import { AnalysisBackendLoadError } from '../errors/index.js'
import type { EmbeddingModelSpec } from './embedding-types.js'

export const DEFAULT_MODEL_ID = 'hashed-ngram-512'

const MODELS = new Map<string, EmbeddingModelSpec>(
  [256, 512, 1024].map((dimension): [string, EmbeddingModelSpec] => {
    const id = `hashed-ngram-${dimension}`
    return [id, { id, dimension, ngramSize: 3 }]
  })
)

/**
 * Identifiers accepted as `modelIdentifier`
 */
export function listModelIds(): string[] {
  return [...MODELS.keys()]
}

/**
 * Look up a model by identifier
 *
 * @throws AnalysisBackendLoadError for an unknown identifier
 */
export function resolveModel(modelId: string): EmbeddingModelSpec {
  const spec = MODELS.get(modelId)
  if (!spec) {
    throw new AnalysisBackendLoadError(
      `Unknown model identifier "${modelId}". Available: ${listModelIds().join(', ')}`,
      { modelId }
    )
  }
  return spec
}
