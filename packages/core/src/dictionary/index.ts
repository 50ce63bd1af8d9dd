export {
  SkillDictionary,
  SkillDictionarySchema,
  DEFAULT_DICTIONARY_PATH,
  loadDefaultDictionary,
  type SkillDictionaryMapping,
} from './SkillDictionary.js'
