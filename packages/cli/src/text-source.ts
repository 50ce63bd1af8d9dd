/**
 * File-backed text source
 *
 * Plain-text documents only; anything else is logged and yields null, which
 * the extractor treats as "no skills".
 */

import { readFileSync, statSync } from 'fs'
import { extname } from 'path'
import { createLogger, toError, type Logger, type TextSource } from '@cvmatch/core'

export const SUPPORTED_EXTENSIONS: readonly string[] = ['.txt', '.md', '.text']

export interface FileTextSourceOptions {
  /** Files larger than this are rejected */
  maxFileSizeMb: number
  logger?: Logger
}

export function createFileTextSource(options: FileTextSourceOptions): TextSource {
  const log = options.logger ?? createLogger('FileTextSource')
  const maxBytes = options.maxFileSizeMb * 1024 * 1024

  return (filePath: string): string | null => {
    const ext = extname(filePath).toLowerCase()
    if (!SUPPORTED_EXTENSIONS.includes(ext)) {
      log.warn('Unsupported file format', { file: filePath, ext })
      return null
    }

    try {
      const { size } = statSync(filePath)
      if (size > maxBytes) {
        log.warn('File exceeds size limit', {
          file: filePath,
          sizeMb: Number((size / (1024 * 1024)).toFixed(2)),
          maxFileSizeMb: options.maxFileSizeMb,
        })
        return null
      }
      return readFileSync(filePath, 'utf-8')
    } catch (error) {
      log.error('Cannot read file', toError(error), { file: filePath })
      return null
    }
  }
}
