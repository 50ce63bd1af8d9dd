#!/usr/bin/env node
/**
 * cvmatch CLI entry point
 *
 * `natural` loads dotenv when it is imported, and dotenv prints a banner to
 * stdout unless quiet. The flag has to be set before the command modules are
 * evaluated, so they are imported dynamically.
 */

process.env.DOTENV_CONFIG_QUIET ??= 'true'

const { createProgram } = await import('./cli.js')

createProgram().parse()
