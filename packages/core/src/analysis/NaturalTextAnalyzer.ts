/**
 * Default text analysis backend
 *
 * Tokenization, sentence segmentation and POS tagging come from `natural`
 * (Treebank tokenizer, regexp sentence splitter, Brill tagger); similarity
 * comes from the local hashed n-gram embedder.
 */

import natural from 'natural'
import { AnalysisBackendLoadError, isCvMatchError } from '../errors/index.js'
import { HashedNgramEmbedder } from '../embeddings/index.js'
import { DEFAULT_MODEL_ID } from '../embeddings/models.js'
import type { EmbedderOptions } from '../embeddings/embedding-types.js'
import type { AnalyzedDocument, AnalyzedSentence, TextAnalysisBackend } from './analysis-types.js'
import { extractNounChunks, type TaggedToken } from './noun-chunks.js'

/** Split after terminal punctuation, and on line breaks */
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+|\n+/

interface WordTokenizer {
  tokenize(text: string): string[]
}

interface PosTagger {
  tag(tokens: string[]): { taggedWords: TaggedToken[] }
}

interface NlpComponents {
  wordTokenizer: WordTokenizer
  sentenceTokenizer: WordTokenizer
  tagger: PosTagger
}

function loadNlpComponents(modelId: string): NlpComponents {
  try {
    const lexicon = new natural.Lexicon('EN', 'N', 'NNP')
    const ruleSet = new natural.RuleSet('EN')
    return {
      wordTokenizer: new natural.TreebankWordTokenizer(),
      sentenceTokenizer: new natural.RegexpTokenizer({ pattern: SENTENCE_BOUNDARY }),
      tagger: new natural.BrillPOSTagger(lexicon, ruleSet),
    }
  } catch (error) {
    throw new AnalysisBackendLoadError('Failed to load POS tagger data', {
      cause: error,
      modelId,
    })
  }
}

export interface NaturalTextAnalyzerOptions extends EmbedderOptions {
  /** Embedding model identifier (default hashed-ngram-512) */
  modelId?: string
}

export class NaturalTextAnalyzer implements TextAnalysisBackend {
  readonly modelId: string
  private readonly embedder: HashedNgramEmbedder
  private readonly wordTokenizer: WordTokenizer
  private readonly sentenceTokenizer: WordTokenizer
  private readonly tagger: PosTagger

  /**
   * @throws AnalysisBackendLoadError when the model is unknown or the tagger data cannot be loaded
   */
  constructor(options: NaturalTextAnalyzerOptions = {}) {
    const modelId = options.modelId ?? DEFAULT_MODEL_ID
    this.embedder = new HashedNgramEmbedder(modelId, { cacheSize: options.cacheSize })
    this.modelId = this.embedder.modelId

    const components = loadNlpComponents(modelId)
    this.wordTokenizer = components.wordTokenizer
    this.sentenceTokenizer = components.sentenceTokenizer
    this.tagger = components.tagger
  }

  tokenize(text: string): string[] {
    return this.words(text.toLowerCase())
  }

  sentences(text: string): string[] {
    return this.sentenceTokenizer
      .tokenize(text)
      .map((sentence) => sentence.trim())
      .filter((sentence) => sentence.length > 0)
  }

  nounChunks(text: string): string[] {
    return this.sentences(text).flatMap((sentence) => this.chunkSentence(sentence))
  }

  analyze(text: string): AnalyzedDocument {
    const sentenceTexts = this.sentences(text)
    const sentences: AnalyzedSentence[] = sentenceTexts.map((sentence) => ({
      text: sentence,
      tokens: this.tokenize(sentence),
    }))

    return {
      text,
      lowered: text.toLowerCase(),
      tokens: this.tokenize(text),
      sentences,
      nounChunks: sentenceTexts.flatMap((sentence) => this.chunkSentence(sentence)),
    }
  }

  /**
   * Identical texts in one batch are analysed once
   */
  analyzeBatch(texts: readonly string[]): AnalyzedDocument[] {
    const seen = new Map<string, AnalyzedDocument>()
    return texts.map((text) => {
      const existing = seen.get(text)
      if (existing) {
        return existing
      }
      const doc = this.analyze(text)
      seen.set(text, doc)
      return doc
    })
  }

  similarity(a: string, b: string): number {
    return this.embedder.cosineSimilarity(
      this.embedder.embedTokens(this.tokenize(a)),
      this.embedder.embedTokens(this.tokenize(b))
    )
  }

  private words(text: string): string[] {
    return this.wordTokenizer.tokenize(text).filter((token) => token.trim().length > 0)
  }

  private chunkSentence(sentence: string): string[] {
    const tokens = this.words(sentence)
    if (tokens.length === 0) {
      return []
    }
    return extractNounChunks(this.tagger.tag(tokens).taggedWords)
  }
}

/**
 * Create the default backend for a model identifier. Call once per process.
 *
 * @throws AnalysisBackendLoadError
 */
export function createTextAnalyzer(
  modelId: string = DEFAULT_MODEL_ID,
  options: EmbedderOptions = {}
): NaturalTextAnalyzer {
  try {
    return new NaturalTextAnalyzer({ ...options, modelId })
  } catch (error) {
    if (isCvMatchError(error)) {
      throw error
    }
    throw new AnalysisBackendLoadError('Failed to create text analysis backend', {
      cause: error,
      modelId,
    })
  }
}
