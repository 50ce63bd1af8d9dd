import { describe, it, expect } from 'vitest'
import {
  AnalysisBackendLoadError,
  ConfigurationError,
  CvMatchError,
  DictionaryLoadError,
  ValidationError,
  getErrorMessage,
  isCvMatchError,
  toError,
} from '../src/errors/index.js'

describe('CvMatchError', () => {
  it('should default the code', () => {
    const error = new CvMatchError('Something failed')
    expect(error.code).toBe('CVMATCH_ERROR')
    expect(error.name).toBe('CvMatchError')
    expect(error).toBeInstanceOf(Error)
  })

  it('should walk the cause chain', () => {
    const root = new Error('ENOENT')
    const middle = new Error('read failed', { cause: root })
    const error = new CvMatchError('load failed', { cause: middle })

    expect(error.getErrorChain().map((e) => e.message)).toEqual([
      'load failed',
      'read failed',
      'ENOENT',
    ])
  })

  it('should serialise to JSON', () => {
    const error = new CvMatchError('bad', {
      code: 'X',
      cause: new Error('inner'),
      context: { a: 1 },
    })
    expect(error.toJSON()).toMatchObject({
      name: 'CvMatchError',
      code: 'X',
      message: 'bad',
      context: { a: 1 },
      cause: 'inner',
    })
  })
})

describe('error subclasses', () => {
  it('DictionaryLoadError carries its source', () => {
    const error = new DictionaryLoadError('missing', { source: 'skills.json' })
    expect(error.code).toBe('DICTIONARY_LOAD_ERROR')
    expect(error.source).toBe('skills.json')
    expect(error.context).toEqual({ source: 'skills.json' })
    expect(error).toBeInstanceOf(CvMatchError)
  })

  it('AnalysisBackendLoadError carries its model', () => {
    const error = new AnalysisBackendLoadError('unknown', { modelId: 'm' })
    expect(error.code).toBe('BACKEND_LOAD_ERROR')
    expect(error.modelId).toBe('m')
    expect(error.name).toBe('AnalysisBackendLoadError')
  })

  it('ValidationError carries its field', () => {
    const error = new ValidationError('bad threshold', { field: 'threshold' })
    expect(error.code).toBe('VALIDATION_ERROR')
    expect(error.field).toBe('threshold')
  })

  it('ConfigurationError has its code', () => {
    expect(new ConfigurationError('bad').code).toBe('CONFIGURATION_ERROR')
  })
})

describe('helpers', () => {
  it('getErrorMessage handles any thrown value', () => {
    expect(getErrorMessage(new Error('e'))).toBe('e')
    expect(getErrorMessage('s')).toBe('s')
    expect(getErrorMessage(42)).toBe('Unknown error')
  })

  it('toError normalises thrown values', () => {
    const error = new Error('e')
    expect(toError(error)).toBe(error)
    expect(toError('s').message).toBe('s')
  })

  it('isCvMatchError narrows', () => {
    expect(isCvMatchError(new DictionaryLoadError('x'))).toBe(true)
    expect(isCvMatchError(new Error('x'))).toBe(false)
  })
})
