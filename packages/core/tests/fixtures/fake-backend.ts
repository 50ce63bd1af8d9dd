/**
 * In-process analysis backend for tests: whitespace tokens, punctuation
 * sentences, scripted similarities.
 */
import type {
  AnalyzedDocument,
  TextAnalysisBackend,
} from '../../src/analysis/analysis-types.js'

export interface FakeBackendOptions {
  /** `'a|b'` -> similarity; looked up in both orders */
  similarities?: Record<string, number>
  /** Noun chunks returned for every text */
  nounChunks?: string[]
  /** Texts whose analysis throws */
  failOn?: string[]
  /** Make analyzeBatch throw */
  failBatch?: boolean
  /** Make similarity throw */
  failSimilarity?: boolean
}

export class FakeBackend implements TextAnalysisBackend {
  readonly modelId = 'fake'
  analyzeCalls = 0
  batchCalls = 0

  constructor(private readonly options: FakeBackendOptions = {}) {}

  tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .split(/[^a-z0-9+#.]+/)
      .map((token) => token.replace(/\.+$/, ''))
      .filter((token) => token.length > 0)
  }

  sentences(text: string): string[] {
    return text
      .split(/(?<=[.!?])\s+|\n+/)
      .map((sentence) => sentence.trim())
      .filter((sentence) => sentence.length > 0)
  }

  nounChunks(): string[] {
    return [...(this.options.nounChunks ?? [])]
  }

  analyze(text: string): AnalyzedDocument {
    this.analyzeCalls++
    if (this.options.failOn?.includes(text)) {
      throw new Error(`cannot analyse "${text}"`)
    }
    return {
      text,
      lowered: text.toLowerCase(),
      tokens: this.tokenize(text),
      sentences: this.sentences(text).map((sentence) => ({
        text: sentence,
        tokens: this.tokenize(sentence),
      })),
      nounChunks: this.nounChunks(),
    }
  }

  analyzeBatch(texts: readonly string[]): AnalyzedDocument[] {
    this.batchCalls++
    if (this.options.failBatch) {
      throw new Error('batch unavailable')
    }
    return texts.map((text) => this.analyze(text))
  }

  similarity(a: string, b: string): number {
    if (this.options.failSimilarity) {
      throw new Error('similarity unavailable')
    }
    if (a === b) {
      return 1
    }
    const table = this.options.similarities ?? {}
    return table[`${a}|${b}`] ?? table[`${b}|${a}`] ?? 0
  }
}
