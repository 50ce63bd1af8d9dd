/**
 * @fileoverview Canonical skill extraction from free text
 * @module @cvmatch/core/extraction/SkillExtractor
 *
 * Three passes, unioned into one deduplicated set of canonical names:
 *
 * 1. Substring scan: every known token (canonical or synonym) contained
 *    anywhere in the lowercased text. A short token inside a longer unrelated
 *    word also matches (`java` in `javascript`). The bundled dictionary leaves
 *    out synonyms that mostly hit ordinary words (`py`, `ts`, `spark`), but
 *    short canonical names still do: `git` in `digital`, `rust` in `trust`,
 *    `vue` in `revenue`, `aws` in `laws`, `agile` in `fragile`.
 * 2. Noun-chunk scan: every known token contained in a noun chunk.
 * 3. JD-context scan (job descriptions only): in sentences mentioning
 *    `required`, `qualifications`, `skills` or `must have`, every token that
 *    is exactly a known token.
 *
 * @example
 * const extractor = new SkillExtractor(dictionary, backend)
 * extractor.extractSkills('I use Py daily') // ['python']
 */

import type { AnalyzedDocument, TextAnalysisBackend } from '../analysis/analysis-types.js'
import type { SkillDictionary } from '../dictionary/SkillDictionary.js'
import { toError } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'

/**
 * Sentences containing one of these phrases get the exact-token JD pass
 */
export const JD_INDICATOR_PHRASES: readonly string[] = Object.freeze([
  'required',
  'qualifications',
  'skills',
  'must have',
])

/**
 * Supplies raw text for a document handle (a path, an upload id).
 * Returns null when the document cannot be read.
 */
export type TextSource = (handle: string) => string | null

export interface SkillExtractorOptions {
  logger?: Logger
}

export class SkillExtractor {
  private readonly log: Logger

  constructor(
    private readonly dictionary: SkillDictionary,
    private readonly backend: TextAnalysisBackend,
    options: SkillExtractorOptions = {}
  ) {
    this.log = options.logger ?? createLogger('SkillExtractor')
  }

  /**
   * Canonical skills mentioned in `text`. Never throws: missing text and
   * analysis failures yield an empty list.
   */
  extractSkills(text: string | null | undefined, isJd = false): string[] {
    if (!text || text.trim().length === 0) {
      this.log.warn('No text provided for skill extraction')
      return []
    }

    try {
      return this.extractFromDocument(this.backend.analyze(text), isJd)
    } catch (error) {
      this.log.error('Error during skill extraction', toError(error), {
        textLength: text.length,
        isJd,
      })
      return []
    }
  }

  /**
   * Same result as calling `extractSkills(texts[i], isJdFlags[i])` for each
   * index, with the backend analysing all texts in one call. A failing text
   * yields `[]` without affecting the others.
   */
  batchExtractSkills(
    texts: readonly (string | null | undefined)[],
    isJdFlags: readonly boolean[] = []
  ): string[][] {
    if (isJdFlags.length !== texts.length) {
      this.log.warn('Flag count does not match text count; missing flags default to false', {
        texts: texts.length,
        flags: isJdFlags.length,
      })
    }

    const results: string[][] = texts.map(() => [])
    const indices: number[] = []
    const present: string[] = []

    texts.forEach((text, index) => {
      if (!text || text.trim().length === 0) {
        this.log.warn('No text provided for skill extraction', { index })
        return
      }
      indices.push(index)
      present.push(text)
    })

    if (present.length === 0) {
      return results
    }

    const docs = this.analyzeAll(present)

    indices.forEach((textIndex, position) => {
      const doc = docs[position]
      if (!doc) {
        return
      }
      const isJd = isJdFlags[textIndex] ?? false
      try {
        results[textIndex] = this.extractFromDocument(doc, isJd)
      } catch (error) {
        this.log.error('Error during skill extraction', toError(error), {
          index: textIndex,
          isJd,
        })
      }
    })

    this.log.info('Batch extraction complete', {
      texts: texts.length,
      withSkills: results.filter((skills) => skills.length > 0).length,
    })
    return results
  }

  /**
   * Read a document through `source` and extract its skills
   */
  processDocument(source: TextSource, handle: string, isJd = false): string[] {
    let text: string | null
    try {
      text = source(handle)
    } catch (error) {
      this.log.error('Failed to read document text', toError(error), { handle })
      return []
    }

    if (!text) {
      this.log.warn('Document yielded no text', { handle })
      return []
    }
    return this.extractSkills(text, isJd)
  }

  /**
   * Batched analysis; if the batch call fails, each text is analysed on its
   * own so that one bad text only costs its own result.
   */
  private analyzeAll(texts: string[]): (AnalyzedDocument | null)[] {
    try {
      const docs = this.backend.analyzeBatch(texts)
      if (docs.length !== texts.length) {
        throw new Error(`Backend returned ${docs.length} documents for ${texts.length} texts`)
      }
      return docs
    } catch (error) {
      this.log.warn('Batched analysis failed; analysing texts individually', {
        cause: toError(error).message,
      })
    }

    return texts.map((text, position) => {
      try {
        return this.backend.analyze(text)
      } catch (error) {
        this.log.error('Error during skill extraction', toError(error), { position })
        return null
      }
    })
  }

  private extractFromDocument(doc: AnalyzedDocument, isJd: boolean): string[] {
    const skills = new Set<string>()
    const known = this.dictionary.knownTokens()

    const add = (token: string): void => {
      const canonical = this.dictionary.canonicalize(token)
      if (canonical !== null) {
        skills.add(canonical)
      }
    }

    for (const token of known) {
      if (doc.lowered.includes(token)) {
        add(token)
      }
    }

    for (const chunk of doc.nounChunks) {
      const lowered = chunk.toLowerCase()
      for (const token of known) {
        if (lowered.includes(token)) {
          add(token)
        }
      }
    }

    if (isJd) {
      for (const sentence of doc.sentences) {
        const lowered = sentence.text.toLowerCase()
        if (!JD_INDICATOR_PHRASES.some((phrase) => lowered.includes(phrase))) {
          continue
        }
        for (const token of sentence.tokens) {
          if (this.dictionary.isKnownToken(token.toLowerCase())) {
            add(token)
          }
        }
      }
    }

    const extracted = [...skills]
    this.log.debug('Extracted skills', { skills: extracted, isJd })
    return extracted
  }
}
