/**
 * @cvmatch/cli
 *
 * Command-line interface for skill extraction and CV ranking.
 */

import { Command } from 'commander'
import { VERSION } from '@cvmatch/core'
import { createExtractCommand, createMatchCommand } from './commands/index.js'

export function createProgram(): Command {
  return new Command()
    .name('cvmatch')
    .description('Extract skills from CVs and job descriptions and rank CVs by semantic fit')
    .version(VERSION)
    .addCommand(createExtractCommand())
    .addCommand(createMatchCommand())
}
