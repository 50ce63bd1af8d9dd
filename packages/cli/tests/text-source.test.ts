import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { silentLogger } from '@cvmatch/core'
import { createFileTextSource, SUPPORTED_EXTENSIONS } from '../src/text-source.js'

describe('createFileTextSource', () => {
  let dir: string
  const source = () => createFileTextSource({ maxFileSizeMb: 0.001, logger: silentLogger })

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'cvmatch-source-'))
    writeFileSync(join(dir, 'cv.txt'), 'Python developer')
    writeFileSync(join(dir, 'notes.MD'), '# SQL')
    writeFileSync(join(dir, 'cv.pdf'), '%PDF-1.4')
    writeFileSync(join(dir, 'large.txt'), 'x'.repeat(2000))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('supports plain-text extensions', () => {
    expect(SUPPORTED_EXTENSIONS).toEqual(['.txt', '.md', '.text'])
  })

  it('reads supported files', () => {
    expect(source()(join(dir, 'cv.txt'))).toBe('Python developer')
    expect(source()(join(dir, 'notes.MD'))).toBe('# SQL')
  })

  it('returns null for unsupported formats', () => {
    expect(source()(join(dir, 'cv.pdf'))).toBeNull()
  })

  it('returns null for files over the size limit', () => {
    // limit is 0.001 MB, about 1 KB
    expect(source()(join(dir, 'large.txt'))).toBeNull()
  })

  it('returns null for missing files', () => {
    expect(source()(join(dir, 'missing.txt'))).toBeNull()
  })
})
