/**
 * Match command: rank CV files against a job description file
 */

import { basename } from 'path'
import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import { createEngine, type EngineConfigInput } from '@cvmatch/core'
import { configureLogging, resolveConfig, type CommonOptions } from '../config.js'
import { createFileTextSource } from '../text-source.js'
import { sanitizeError } from '../utils/sanitize.js'
import { addCommonOptions } from './common.js'
import { formatMatchTable, matchAsJson } from './formatters.js'

export interface MatchCommandOptions extends CommonOptions {
  threshold?: string
  top?: string
  json?: boolean
}

function overridesFrom(options: MatchCommandOptions): EngineConfigInput {
  const overrides: EngineConfigInput = {}
  if (options.threshold !== undefined) {
    overrides.similarityThreshold = Number(options.threshold)
  }
  if (options.top !== undefined) {
    overrides.topNMatches = Number(options.top)
  }
  return overrides
}

/**
 * @returns process exit code
 */
export function runMatch(
  jdFile: string,
  cvFiles: readonly string[],
  options: MatchCommandOptions
): number {
  const spinner = options.json ? null : ora('Loading skill dictionary and text analyzer...').start()

  try {
    const config = resolveConfig(options, overridesFrom(options))
    configureLogging(config)

    const engine = createEngine(config)
    const source = createFileTextSource({ maxFileSizeMb: config.maxFileSizeMb })

    if (spinner) spinner.text = `Matching ${cvFiles.length} CVs...`
    const { jdSkills, candidates, results } = engine.rankTexts(
      source(jdFile),
      cvFiles.map((file) => ({ id: basename(file), text: source(file) }))
    )
    spinner?.stop()

    if (jdSkills.length === 0) {
      const message = `Failed to extract skills from ${basename(jdFile)}. Check file format.`
      if (options.json) {
        console.error(JSON.stringify({ error: message }))
      } else {
        console.error(chalk.red(message))
      }
      return 1
    }

    if (options.json) {
      console.log(matchAsJson(jdSkills, results))
      return 0
    }

    console.log(chalk.bold('\nJD skills: ') + jdSkills.join(', '))
    console.log(chalk.dim(`${candidates.length} of ${cvFiles.length} CVs had extractable skills\n`))

    if (results.length === 0) {
      console.log(chalk.yellow('No CVs matched above the similarity threshold.\n'))
      return 0
    }

    console.log(formatMatchTable(results))
    console.log(
      chalk.dim(
        `\nTop ${results.length} at threshold ${config.similarityThreshold} (max ${config.topNMatches})\n`
      )
    )
    return 0
  } catch (error) {
    if (spinner) {
      spinner.fail(`Matching failed: ${sanitizeError(error)}`)
    } else {
      console.error(JSON.stringify({ error: sanitizeError(error) }))
    }
    return 1
  }
}

export function createMatchCommand(): Command {
  const cmd = new Command('match')
    .description('Rank CVs against a job description')
    .argument('<jd-file>', 'Job description (.txt, .md)')
    .argument('<cv-files...>', 'CV files (.txt, .md)')
    .option('-t, --threshold <number>', 'Similarity threshold between 0 and 1')
    .option('-n, --top <number>', 'Maximum number of ranked CVs')
    .option('-j, --json', 'Output results as JSON')

  return addCommonOptions(cmd).action(
    (jdFile: string, cvFiles: string[], opts: MatchCommandOptions) => {
      const code = runMatch(jdFile, cvFiles, opts)
      if (code !== 0) {
        process.exit(code)
      }
    }
  )
}
