export {
  MatchingEngine,
  createEngine,
  type EngineDependencies,
  type CandidateText,
  type RankTextsOptions,
  type RankTextsResult,
} from './MatchingEngine.js'
