/**
 * Utility functions for the hashed n-gram embedder
 * @module @cvmatch/core/embeddings/embedding-utils
 */

/**
 * Deterministic 32-bit string hash
 */
export function hashText(text: string): number {
  let hash = 0
  for (let i = 0; i < text.length; i++) {
    const char = text.charCodeAt(i)
    hash = (hash << 5) - hash + char
    hash = hash & hash // Convert to 32-bit integer
  }
  return hash
}

/**
 * Boundary-marked character n-grams of a token.
 * `charNgrams('py', 3)` is `['<py', 'py>']`; tokens shorter than `n` yield
 * the whole marked token.
 */
export function charNgrams(token: string, n: number): string[] {
  const marked = `<${token}>`
  if (marked.length <= n) {
    return [marked]
  }

  const grams: string[] = []
  for (let i = 0; i + n <= marked.length; i++) {
    grams.push(marked.slice(i, i + n))
  }
  return grams
}

/**
 * Scale a vector to unit length in place. Zero vectors are left as they are.
 */
export function normalize(vector: Float32Array): Float32Array {
  let norm = 0
  for (let i = 0; i < vector.length; i++) {
    norm += vector[i] * vector[i]
  }
  norm = Math.sqrt(norm)
  if (norm > 0) {
    for (let i = 0; i < vector.length; i++) {
      vector[i] /= norm
    }
  }
  return vector
}

/**
 * Feature-hash the n-grams of one token into a unit vector.
 * Each n-gram lands in one bucket with a sign taken from a second hash, so
 * unrelated n-grams tend to cancel rather than accumulate.
 */
export function embedToken(token: string, dimension: number, ngramSize: number): Float32Array {
  const vector = new Float32Array(dimension)

  for (const gram of charNgrams(token, ngramSize)) {
    const bucket = Math.abs(hashText(gram)) % dimension
    const sign = hashText(`#${gram}`) & 1 ? -1 : 1
    vector[bucket] += sign
  }

  return normalize(vector)
}

/**
 * Element-wise mean of equally sized vectors
 */
export function meanVector(vectors: readonly Float32Array[], dimension: number): Float32Array {
  const mean = new Float32Array(dimension)
  if (vectors.length === 0) {
    return mean
  }

  for (const vector of vectors) {
    for (let i = 0; i < dimension; i++) {
      mean[i] += vector[i]
    }
  }
  for (let i = 0; i < dimension; i++) {
    mean[i] /= vectors.length
  }
  return mean
}

/**
 * Compute cosine similarity between two embeddings
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error('Embeddings must have same dimension')
  }

  let dotProduct = 0
  let normA = 0
  let normB = 0

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }

  if (normA === 0 || normB === 0) return 0

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB))
}
