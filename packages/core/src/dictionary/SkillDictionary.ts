/**
 * Skill dictionary: category -> canonical skill -> synonyms
 *
 * The nested mapping is flattened once into an inverted index
 * (lowercased token -> canonical name) so canonicalization is a single map
 * lookup. Instances are immutable and safe to share between requests.
 */

import { readFileSync } from 'fs'
import { extname } from 'path'
import { fileURLToPath } from 'url'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { DictionaryLoadError, getErrorMessage } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('SkillDictionary')

/**
 * Raw dictionary layout
 */
export const SkillDictionarySchema = z.record(
  z.string().trim().min(1),
  z.record(z.string().trim().min(1), z.array(z.string().trim().min(1)))
)

export type SkillDictionaryMapping = z.infer<typeof SkillDictionarySchema>

/**
 * Bundled dictionary shipped with the package
 */
export const DEFAULT_DICTIONARY_PATH = fileURLToPath(
  new URL('../../data/skills.json', import.meta.url)
)

export class SkillDictionary {
  private readonly index: ReadonlyMap<string, string>
  private readonly categoryByCanonical: ReadonlyMap<string, string>
  private readonly tokens: readonly string[]

  private constructor(mapping: SkillDictionaryMapping) {
    const index = new Map<string, string>()
    const categoryByCanonical = new Map<string, string>()

    const register = (token: string, canonical: string): void => {
      const key = token.toLowerCase()
      const existing = index.get(key)
      if (existing === undefined) {
        index.set(key, canonical)
      } else if (existing !== canonical) {
        // Ambiguous synonyms are a data bug; the first mapping stays
        log.warn('Token maps to more than one canonical skill', {
          token: key,
          kept: existing,
          ignored: canonical,
        })
      }
    }

    for (const [category, skills] of Object.entries(mapping)) {
      for (const [canonical, synonyms] of Object.entries(skills)) {
        if (!categoryByCanonical.has(canonical)) {
          categoryByCanonical.set(canonical, category)
        }
        register(canonical, canonical)
        for (const synonym of synonyms) {
          register(synonym, canonical)
        }
      }
    }

    this.index = index
    this.categoryByCanonical = categoryByCanonical
    this.tokens = Object.freeze([...index.keys()])
    Object.freeze(this)
  }

  /**
   * Build from an in-memory mapping
   *
   * @throws DictionaryLoadError when the mapping is malformed or holds no skills
   */
  static fromMapping(mapping: unknown, source?: string): SkillDictionary {
    if (mapping === null || mapping === undefined) {
      throw new DictionaryLoadError('Skill dictionary is missing', { source })
    }

    const result = SkillDictionarySchema.safeParse(mapping)
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
      throw new DictionaryLoadError(`Malformed skill dictionary: ${detail}`, {
        source,
        context: { issues: result.error.issues },
      })
    }

    const dictionary = new SkillDictionary(result.data)
    if (dictionary.size === 0) {
      throw new DictionaryLoadError('Skill dictionary contains no skills', { source })
    }

    log.info('Loaded skill dictionary', {
      source,
      skills: dictionary.size,
      tokens: dictionary.tokens.length,
    })
    return dictionary
  }

  /**
   * Read a JSON (`.json`) or YAML (`.yaml`, `.yml`) dictionary file
   *
   * @throws DictionaryLoadError when the file is unreadable or malformed
   */
  static fromFile(filePath: string): SkillDictionary {
    let content: string
    try {
      content = readFileSync(filePath, 'utf-8')
    } catch (error) {
      throw new DictionaryLoadError(`Cannot read skill dictionary: ${getErrorMessage(error)}`, {
        cause: error,
        source: filePath,
      })
    }

    const ext = extname(filePath).toLowerCase()
    let parsed: unknown
    try {
      parsed = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content)
    } catch (error) {
      throw new DictionaryLoadError(`Cannot parse skill dictionary: ${getErrorMessage(error)}`, {
        cause: error,
        source: filePath,
      })
    }

    return SkillDictionary.fromMapping(parsed, filePath)
  }

  /**
   * Canonical name for a skill mention, or null when the token is unknown.
   * Case-insensitive; surrounding whitespace is ignored.
   */
  canonicalize(token: string): string | null {
    return this.index.get(token.trim().toLowerCase()) ?? null
  }

  /**
   * Every lowercased canonical name and synonym
   */
  knownTokens(): readonly string[] {
    return this.tokens
  }

  /**
   * Whether `token` is exactly a known (lowercased) token
   */
  isKnownToken(token: string): boolean {
    return this.index.has(token)
  }

  categoryOf(canonical: string): string | null {
    return this.categoryByCanonical.get(canonical) ?? null
  }

  categories(): string[] {
    return [...new Set(this.categoryByCanonical.values())]
  }

  /** Number of canonical skills */
  get size(): number {
    return this.categoryByCanonical.size
  }
}

/**
 * Load the dictionary bundled with the package
 */
export function loadDefaultDictionary(): SkillDictionary {
  return SkillDictionary.fromFile(DEFAULT_DICTIONARY_PATH)
}
