/**
 * Ranks candidate skill sets against one target skill set
 */

import { ValidationError } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { assertThreshold, type SimilarityMatcher } from './SimilarityMatcher.js'
import type { MatchResult, RankCandidate } from './types.js'

export interface RankerOptions {
  logger?: Logger
}

export class Ranker {
  private readonly log: Logger

  constructor(
    private readonly matcher: Pick<SimilarityMatcher, 'matchCvToJd'>,
    options: RankerOptions = {}
  ) {
    this.log = options.logger ?? createLogger('Ranker')
  }

  /**
   * Matches at or above `threshold`, best first, at most `topN`.
   * Equal scores keep their input order. An empty list is a valid outcome.
   *
   * @throws ValidationError for a threshold outside [0, 1] or a non-positive topN
   */
  rank(
    candidates: readonly RankCandidate[],
    jdSkills: readonly string[],
    threshold: number,
    topN: number
  ): MatchResult[] {
    assertThreshold(threshold)
    if (!Number.isInteger(topN) || topN < 1) {
      throw new ValidationError(`topN must be a positive integer, got ${topN}`, { field: 'topN' })
    }

    const results: MatchResult[] = []
    for (const candidate of candidates) {
      const result = this.matcher.matchCvToJd(candidate.skills, jdSkills, candidate.id, {
        threshold,
      })
      if (result) {
        results.push(result)
      }
    }

    // Array.prototype.sort is stable
    results.sort((a, b) => b.similarityScore - a.similarityScore)

    this.log.info(
      `Ranked ${results.length} CVs against JD, returning top ${Math.min(topN, results.length)}`,
      { candidates: candidates.length, threshold }
    )
    return results.slice(0, topN)
  }
}
