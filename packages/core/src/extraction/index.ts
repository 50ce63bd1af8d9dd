export {
  SkillExtractor,
  JD_INDICATOR_PHRASES,
  type SkillExtractorOptions,
  type TextSource,
} from './SkillExtractor.js'
