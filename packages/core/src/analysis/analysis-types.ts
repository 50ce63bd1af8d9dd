/**
 * Text analysis backend contract
 * @module @cvmatch/core/analysis/analysis-types
 */

/**
 * One sentence of an analysed document
 */
export interface AnalyzedSentence {
  text: string
  /** Lowercased tokens */
  tokens: string[]
}

/**
 * Everything the skill extractor needs from a text, computed once
 */
export interface AnalyzedDocument {
  /** Input as given */
  text: string
  /** Lowercased input */
  lowered: string
  /** Lowercased tokens of the whole text */
  tokens: string[]
  sentences: AnalyzedSentence[]
  /** Lowercased noun phrases, tokens joined by single spaces */
  nounChunks: string[]
}

/**
 * Tokenization, segmentation, noun chunks and vector similarity.
 *
 * Implementations are loaded once per process and must not carry
 * per-request state: one instance is shared by every extractor and matcher.
 */
export interface TextAnalysisBackend {
  /** Identifier of the embedding model in use */
  readonly modelId: string
  /** Lowercased word tokens */
  tokenize(text: string): string[]
  /** Sentence segmentation, trimmed, no empty entries */
  sentences(text: string): string[]
  /** Lowercased noun phrases */
  nounChunks(text: string): string[]
  analyze(text: string): AnalyzedDocument
  /**
   * Analyse several texts in one call. Element `i` must equal `analyze(texts[i])`.
   */
  analyzeBatch(texts: readonly string[]): AnalyzedDocument[]
  /** Vector similarity of two texts, each treated as one document */
  similarity(a: string, b: string): number
}
