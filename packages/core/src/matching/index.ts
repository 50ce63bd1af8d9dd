/**
 * Matching module: pairwise similarity and ranking
 */

export {
  SimilarityMatcher,
  assertThreshold,
  formatEvidence,
  type SimilarityMatcherOptions,
} from './SimilarityMatcher.js'
export { Ranker, type RankerOptions } from './Ranker.js'
export type { MatchResult, SimilarityOutcome, MatchOptions, RankCandidate } from './types.js'
