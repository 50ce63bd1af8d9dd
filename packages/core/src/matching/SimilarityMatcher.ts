/**
 * @fileoverview Semantic similarity between two canonical skill lists
 * @module @cvmatch/core/matching/SimilarityMatcher
 *
 * The aggregate score averages two signals:
 * - overall: similarity of the two lists, each joined into one document
 * - pairwise: mean of each CV skill's best JD-skill similarity, counting only
 *   pairs at or above the threshold (0 when none qualify)
 *
 * @example
 * const matcher = new SimilarityMatcher(backend, { similarityThreshold: 0.5 })
 * const { score, matchedSkills } = matcher.computeSimilarity(['python'], ['python'])
 * // matchedSkills: ['python -> python (sim: 1.00)']
 */

import type { TextAnalysisBackend } from '../analysis/analysis-types.js'
import { toError, ValidationError } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type { MatchOptions, MatchResult, SimilarityOutcome } from './types.js'

export interface SimilarityMatcherOptions {
  /** Default threshold (0-1, default 0.5) */
  similarityThreshold?: number
  logger?: Logger
}

const EMPTY_OUTCOME = (): SimilarityOutcome => ({ score: 0, matchedSkills: [] })

/**
 * @throws ValidationError when the threshold is outside [0, 1]
 */
export function assertThreshold(threshold: number): number {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ValidationError(`Similarity threshold must be within [0, 1], got ${threshold}`, {
      field: 'threshold',
    })
  }
  return threshold
}

/**
 * `"<cv_skill> -> <jd_skill> (sim: <value>)"` with two decimals
 */
export function formatEvidence(cvSkill: string, jdSkill: string, similarity: number): string {
  return `${cvSkill} -> ${jdSkill} (sim: ${similarity.toFixed(2)})`
}

export class SimilarityMatcher {
  private readonly log: Logger
  readonly similarityThreshold: number

  constructor(
    private readonly backend: TextAnalysisBackend,
    options: SimilarityMatcherOptions = {}
  ) {
    this.similarityThreshold = assertThreshold(options.similarityThreshold ?? 0.5)
    this.log = options.logger ?? createLogger('SimilarityMatcher')
  }

  /**
   * Aggregate score in [0, 1] plus evidence for every CV skill whose best JD
   * match clears the threshold. Never throws; failures score 0.
   */
  computeSimilarity(
    cvSkills: readonly string[],
    jdSkills: readonly string[],
    options: MatchOptions = {}
  ): SimilarityOutcome {
    if (cvSkills.length === 0 || jdSkills.length === 0) {
      this.log.warn('Empty skill lists provided for similarity computation', {
        cvSkills: cvSkills.length,
        jdSkills: jdSkills.length,
      })
      return EMPTY_OUTCOME()
    }

    try {
      const threshold = assertThreshold(options.threshold ?? this.similarityThreshold)
      const overall = this.backend.similarity(cvSkills.join(' '), jdSkills.join(' '))

      const kept: number[] = []
      const matchedSkills: string[] = []

      for (const cvSkill of cvSkills) {
        let maxSim = 0
        let bestMatch: string | null = null

        for (const jdSkill of jdSkills) {
          const sim = this.backend.similarity(cvSkill, jdSkill)
          if (sim > maxSim) {
            maxSim = sim
            bestMatch = jdSkill
          }
        }

        if (bestMatch !== null && maxSim >= threshold) {
          kept.push(maxSim)
          matchedSkills.push(formatEvidence(cvSkill, bestMatch, maxSim))
        }
      }

      const pairwise = kept.length > 0 ? kept.reduce((sum, sim) => sum + sim, 0) / kept.length : 0
      const raw = (overall + pairwise) / 2
      if (!Number.isFinite(raw)) {
        throw new Error(`Similarity is not a finite number (overall=${overall})`)
      }
      const score = Math.min(1, Math.max(0, raw))

      this.log.info('Computed similarity', {
        score: Number(score.toFixed(4)),
        cvSkills: cvSkills.length,
        jdSkills: jdSkills.length,
        matched: matchedSkills.length,
      })
      return { score, matchedSkills }
    } catch (error) {
      this.log.error('Error computing similarity', toError(error), {
        cvSkills: cvSkills.length,
        jdSkills: jdSkills.length,
      })
      return EMPTY_OUTCOME()
    }
  }

  /**
   * A frozen MatchResult when the aggregate score is at or above the
   * threshold, otherwise null.
   */
  matchCvToJd(
    cvSkills: readonly string[],
    jdSkills: readonly string[],
    cvId = 'CV_1',
    options: MatchOptions = {}
  ): MatchResult | null {
    const threshold = assertThreshold(options.threshold ?? this.similarityThreshold)
    const { score, matchedSkills } = this.computeSimilarity(cvSkills, jdSkills, { threshold })

    if (score >= threshold) {
      return Object.freeze({
        cvId,
        similarityScore: score,
        matchedSkills: Object.freeze(matchedSkills),
        totalCvSkills: cvSkills.length,
        totalJdSkills: jdSkills.length,
      })
    }

    this.log.info(`CV ${cvId} similarity score ${score.toFixed(2)} below threshold ${threshold}`)
    return null
  }
}
