/**
 * Display and JSON formatting for extract and match results
 *
 * @module @cvmatch/cli/commands/formatters
 */

import chalk from 'chalk'
import Table from 'cli-table3'
import type { MatchResult, SkillDictionary } from '@cvmatch/core'

const BAR_WIDTH = 20

/**
 * Fixed-width bar for a score in [0, 1]
 */
export function formatScoreBar(score: number, width: number = BAR_WIDTH): string {
  const filled = Math.round(Math.min(1, Math.max(0, score)) * width)
  return '█'.repeat(filled) + '░'.repeat(width - filled)
}

/**
 * Green at or above 0.75, yellow at or above 0.5, otherwise gray
 */
export function scoreColor(score: number): (text: string) => string {
  return score >= 0.75 ? chalk.green : score >= 0.5 ? chalk.yellow : chalk.gray
}

export function formatSkillList(
  label: string,
  skills: readonly string[],
  dictionary?: SkillDictionary
): string {
  const lines: string[] = ['']

  if (skills.length === 0) {
    lines.push(chalk.yellow(`No skills found in ${label}.`))
    lines.push('')
    return lines.join('\n')
  }

  lines.push(chalk.bold(`Skills in ${label}`) + chalk.dim(` (${skills.length})`))
  for (const skill of skills) {
    const category = dictionary?.categoryOf(skill)
    lines.push(`  ${chalk.cyan('•')} ${skill}${category ? chalk.dim(`  ${category}`) : ''}`)
  }
  lines.push('')
  return lines.join('\n')
}

export function formatMatchTable(results: readonly MatchResult[]): string {
  const table = new Table({
    head: [
      chalk.bold('CV Name'),
      chalk.bold('Score'),
      chalk.bold('Matched Skills'),
      chalk.bold('CV Skills'),
      chalk.bold('JD Skills'),
    ],
    colWidths: [22, 30, 48, 11, 11],
    wordWrap: true,
  })

  for (const result of results) {
    const color = scoreColor(result.similarityScore)
    table.push([
      result.cvId,
      color(`${result.similarityScore.toFixed(2)} ${formatScoreBar(result.similarityScore)}`),
      result.matchedSkills.length > 0 ? result.matchedSkills.join(', ') : chalk.dim('none'),
      String(result.totalCvSkills),
      String(result.totalJdSkills),
    ])
  }

  return table.toString()
}

export function extractAsJson(file: string, isJd: boolean, skills: readonly string[]): string {
  return JSON.stringify({ file, is_jd: isJd, skills }, null, 2)
}

export function matchAsJson(jdSkills: readonly string[], results: readonly MatchResult[]): string {
  return JSON.stringify(
    {
      jd_skills: jdSkills,
      results: results.map((result) => ({
        cv_id: result.cvId,
        similarity_score: Number(result.similarityScore.toFixed(4)),
        matched_skills: result.matchedSkills,
        total_cv_skills: result.totalCvSkills,
        total_jd_skills: result.totalJdSkills,
      })),
    },
    null,
    2
  )
}
