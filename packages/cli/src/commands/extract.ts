/**
 * Extract command: canonical skills of one text file
 */

import { basename } from 'path'
import { Command } from 'commander'
import chalk from 'chalk'
import { createEngine } from '@cvmatch/core'
import { configureLogging, resolveConfig, type CommonOptions } from '../config.js'
import { createFileTextSource } from '../text-source.js'
import { sanitizeError } from '../utils/sanitize.js'
import { addCommonOptions } from './common.js'
import { extractAsJson, formatSkillList } from './formatters.js'

export interface ExtractCommandOptions extends CommonOptions {
  jd?: boolean
  json?: boolean
}

/**
 * @returns process exit code
 */
export function runExtract(file: string, options: ExtractCommandOptions): number {
  const isJd = options.jd === true

  try {
    const config = resolveConfig(options)
    configureLogging(config)

    const engine = createEngine(config)
    const source = createFileTextSource({ maxFileSizeMb: config.maxFileSizeMb })
    const skills = engine.processDocument(source, file, isJd)

    if (options.json) {
      console.log(extractAsJson(basename(file), isJd, skills))
    } else {
      console.log(formatSkillList(basename(file), skills, engine.dictionary))
    }
    return 0
  } catch (error) {
    if (options.json) {
      console.error(JSON.stringify({ error: sanitizeError(error) }))
    } else {
      console.error(chalk.red('Extraction error:'), sanitizeError(error))
    }
    return 1
  }
}

export function createExtractCommand(): Command {
  const cmd = new Command('extract')
    .description('Extract canonical skills from a text file')
    .argument('<file>', 'CV or job description (.txt, .md)')
    .option('--jd', 'Treat the file as a job description')
    .option('-j, --json', 'Output results as JSON')

  return addCommonOptions(cmd).action((file: string, opts: ExtractCommandOptions) => {
    const code = runExtract(file, opts)
    if (code !== 0) {
      process.exit(code)
    }
  })
}
