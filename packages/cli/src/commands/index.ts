/**
 * CLI Commands
 *
 * Export all CLI commands for registration.
 */

export { createExtractCommand, runExtract, type ExtractCommandOptions } from './extract.js'
export { createMatchCommand, runMatch, type MatchCommandOptions } from './match.js'
