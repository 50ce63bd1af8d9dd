/**
 * Error Classes Module
 *
 * @example
 * ```typescript
 * import { SkillDictionary, isCvMatchError } from '@cvmatch/core'
 *
 * try {
 *   dictionary = SkillDictionary.fromFile(path)
 * } catch (error) {
 *   // DictionaryLoadError is fatal: do not serve requests
 *   if (isCvMatchError(error)) {
 *     console.error(error.code, error.getErrorChain())
 *   }
 *   throw error
 * }
 * ```
 *
 * @module errors
 */

export {
  CvMatchError,
  DictionaryLoadError,
  AnalysisBackendLoadError,
  ValidationError,
  ConfigurationError,
  getErrorMessage,
  isCvMatchError,
  toError,
} from './CvMatchError.js'
