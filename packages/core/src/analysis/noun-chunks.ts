/**
 * Noun phrase chunking over Penn Treebank POS tags
 */

export interface TaggedToken {
  token: string
  tag: string
}

const DETERMINER_TAGS = new Set(['DT', 'PDT', 'PRP$', 'WP$'])
const MODIFIER_TAGS = new Set(['JJ', 'JJR', 'JJS', 'CD', 'VBG'])

/**
 * NN, NNS, NNP, NNPS, and the tagger's bare `N` fallback for unknown words
 */
export function isNounTag(tag: string): boolean {
  return tag.startsWith('N')
}

/**
 * Group tagged tokens into noun chunks.
 *
 * A chunk is a maximal run of an optional determiner followed by modifiers
 * and nouns, cut after its last noun. Runs without a noun are dropped.
 * A determiner always opens a new chunk.
 *
 * @example
 * extractNounChunks([
 *   { token: 'Strong', tag: 'JJ' },
 *   { token: 'Python', tag: 'NNP' },
 *   { token: 'skills', tag: 'NNS' },
 * ]) // ['strong python skills']
 */
export function extractNounChunks(tagged: readonly TaggedToken[]): string[] {
  const chunks: string[] = []
  let run: TaggedToken[] = []

  const flush = (): void => {
    let lastNoun = -1
    run.forEach((word, index) => {
      if (isNounTag(word.tag)) lastNoun = index
    })
    if (lastNoun >= 0) {
      chunks.push(
        run
          .slice(0, lastNoun + 1)
          .map((word) => word.token.toLowerCase())
          .join(' ')
      )
    }
    run = []
  }

  for (const word of tagged) {
    if (DETERMINER_TAGS.has(word.tag)) {
      flush()
      run.push(word)
    } else if (isNounTag(word.tag) || MODIFIER_TAGS.has(word.tag)) {
      run.push(word)
    } else {
      flush()
    }
  }
  flush()

  return chunks
}
