/**
 * Process-level wiring: load the dictionary and analysis backend once, then
 * hand the same instances to the extractor and matcher.
 */

import { createTextAnalyzer } from '../analysis/NaturalTextAnalyzer.js'
import type { TextAnalysisBackend } from '../analysis/analysis-types.js'
import { createConfig } from '../config/loader.js'
import type { EngineConfig } from '../config/schema.js'
import { SkillDictionary, loadDefaultDictionary } from '../dictionary/SkillDictionary.js'
import { SkillExtractor, type TextSource } from '../extraction/SkillExtractor.js'
import { Ranker } from '../matching/Ranker.js'
import { SimilarityMatcher } from '../matching/SimilarityMatcher.js'
import type { MatchResult, RankCandidate } from '../matching/types.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('Engine')

/**
 * Pre-built collaborators; anything omitted is loaded from the config
 */
export interface EngineDependencies {
  dictionary?: SkillDictionary
  backend?: TextAnalysisBackend
}

export interface CandidateText {
  id: string
  text: string | null
}

export interface RankTextsOptions {
  threshold?: number
  topN?: number
}

export interface RankTextsResult {
  jdSkills: string[]
  candidates: RankCandidate[]
  results: MatchResult[]
}

export class MatchingEngine {
  readonly extractor: SkillExtractor
  readonly matcher: SimilarityMatcher
  readonly ranker: Ranker

  constructor(
    readonly config: EngineConfig,
    readonly dictionary: SkillDictionary,
    readonly backend: TextAnalysisBackend
  ) {
    this.extractor = new SkillExtractor(dictionary, backend)
    this.matcher = new SimilarityMatcher(backend, {
      similarityThreshold: config.similarityThreshold,
    })
    this.ranker = new Ranker(this.matcher)
  }

  /**
   * Extract skills from a job description and each CV in one batch, then
   * rank the CVs. CVs without any extracted skill are not ranked.
   */
  rankTexts(
    jdText: string | null,
    cvs: readonly CandidateText[],
    options: RankTextsOptions = {}
  ): RankTextsResult {
    const skillSets = this.extractor.batchExtractSkills(
      [jdText, ...cvs.map((cv) => cv.text)],
      [true, ...cvs.map(() => false)]
    )
    const [jdSkills = [], ...cvSkillSets] = skillSets

    const candidates: RankCandidate[] = cvs
      .map((cv, index) => ({ id: cv.id, skills: cvSkillSets[index] ?? [] }))
      .filter((candidate) => candidate.skills.length > 0)

    if (jdSkills.length === 0) {
      log.warn('No skills extracted from job description; nothing to rank')
      return { jdSkills, candidates, results: [] }
    }

    const results = this.ranker.rank(
      candidates,
      jdSkills,
      options.threshold ?? this.config.similarityThreshold,
      options.topN ?? this.config.topNMatches
    )
    return { jdSkills, candidates, results }
  }

  processDocument(source: TextSource, handle: string, isJd = false): string[] {
    return this.extractor.processDocument(source, handle, isJd)
  }
}

/**
 * Build an engine. Dictionary and backend failures are fatal and propagate
 * (DictionaryLoadError, AnalysisBackendLoadError).
 */
export function createEngine(
  config: EngineConfig = createConfig(),
  dependencies: EngineDependencies = {}
): MatchingEngine {
  const dictionary =
    dependencies.dictionary ??
    (config.dictionaryPath ? SkillDictionary.fromFile(config.dictionaryPath) : loadDefaultDictionary())
  const backend = dependencies.backend ?? createTextAnalyzer(config.modelIdentifier)

  log.info('Engine ready', {
    model: backend.modelId,
    skills: dictionary.size,
    threshold: config.similarityThreshold,
    topN: config.topNMatches,
  })
  return new MatchingEngine(config, dictionary, backend)
}
