export {
  NaturalTextAnalyzer,
  createTextAnalyzer,
  type NaturalTextAnalyzerOptions,
} from './NaturalTextAnalyzer.js'
export { extractNounChunks, isNounTag, type TaggedToken } from './noun-chunks.js'
export type {
  TextAnalysisBackend,
  AnalyzedDocument,
  AnalyzedSentence,
} from './analysis-types.js'
