/**
 * Matching result types
 * @module @cvmatch/core/matching/types
 */

/**
 * A candidate that cleared the similarity threshold. Frozen on creation.
 */
export interface MatchResult {
  /** Identifier of the matched candidate document */
  readonly cvId: string
  /** Aggregate similarity in [0, 1] */
  readonly similarityScore: number
  /** Evidence lines, `"<cv_skill> -> <jd_skill> (sim: 0.87)"` */
  readonly matchedSkills: readonly string[]
  readonly totalCvSkills: number
  readonly totalJdSkills: number
}

/**
 * Score and evidence for one candidate/target pair
 */
export interface SimilarityOutcome {
  score: number
  matchedSkills: string[]
}

/**
 * Per-call settings. Anything omitted falls back to the matcher's own
 * configuration; nothing here is stored.
 */
export interface MatchOptions {
  threshold?: number
}

/**
 * A candidate document's id and canonical skills
 */
export interface RankCandidate {
  id: string
  skills: readonly string[]
}
