import { describe, it, expect, vi } from 'vitest'
import { ValidationError } from '../src/errors/index.js'
import { Ranker, SimilarityMatcher, type MatchResult } from '../src/matching/index.js'
import { silentLogger } from '../src/utils/logger.js'
import { FakeBackend } from './fixtures/fake-backend.js'

const backend = new FakeBackend({
  similarities: {
    'alpha|target': 0.9,
    'beta|target': 0.4,
    'gamma|target': 0.9,
    'delta|target': 0.7,
  },
})
const matcher = new SimilarityMatcher(backend, { logger: silentLogger })
const ranker = new Ranker(matcher, { logger: silentLogger })

const candidates = [
  { id: 'A', skills: ['alpha'] },
  { id: 'B', skills: ['beta'] },
  { id: 'C', skills: ['gamma'] },
]

describe('Ranker', () => {
  it('returns matches above the threshold, best first', () => {
    const results = ranker.rank(candidates, ['target'], 0.5, 2)

    expect(results.map((r) => r.cvId)).toEqual(['A', 'C'])
    expect(results.map((r) => r.similarityScore)).toEqual([0.9, 0.9])
  })

  it('orders by descending score', () => {
    const results = ranker.rank(
      [{ id: 'D', skills: ['delta'] }, ...candidates],
      ['target'],
      0.5,
      5
    )
    expect(results.map((r) => r.cvId)).toEqual(['A', 'C', 'D'])
    expect(results[2]?.similarityScore).toBeCloseTo(0.7, 10)
  })

  it('keeps input order for equal scores', () => {
    const results = ranker.rank([...candidates].reverse(), ['target'], 0.5, 5)
    expect(results.map((r) => r.cvId)).toEqual(['C', 'A'])
  })

  it('truncates to topN', () => {
    expect(ranker.rank(candidates, ['target'], 0.5, 1).map((r) => r.cvId)).toEqual(['A'])
  })

  it('includes every candidate at threshold 0', () => {
    expect(ranker.rank(candidates, ['target'], 0, 10).map((r) => r.cvId)).toEqual([
      'A',
      'C',
      'B',
    ])
  })

  it('returns an empty list when nothing qualifies', () => {
    expect(ranker.rank(candidates, ['target'], 0.95, 3)).toEqual([])
    expect(ranker.rank([], ['target'], 0.5, 3)).toEqual([])
    expect(ranker.rank(candidates, [], 0.5, 3)).toEqual([])
  })

  it('passes the threshold through to the matcher', () => {
    const matchCvToJd = vi.fn((): MatchResult | null => null)
    const spyRanker = new Ranker({ matchCvToJd }, { logger: silentLogger })

    spyRanker.rank([{ id: 'X', skills: ['x'] }], ['y'], 0.3, 1)
    expect(matchCvToJd).toHaveBeenCalledWith(['x'], ['y'], 'X', { threshold: 0.3 })
  })

  it('rejects invalid arguments', () => {
    expect(() => ranker.rank(candidates, ['target'], 1.2, 2)).toThrow(ValidationError)
    expect(() => ranker.rank(candidates, ['target'], 0.5, 0)).toThrow(ValidationError)
    expect(() => ranker.rank(candidates, ['target'], 0.5, 1.5)).toThrow(
      'topN must be a positive integer, got 1.5'
    )
  })
})
