/**
 * CLI Configuration
 *
 * Resolves the engine configuration for a command: config file (explicit
 * --config, else ./cvmatch.yaml when present), CVMATCH_* environment, then
 * command-line overrides.
 */

import { existsSync } from 'fs'
import { join } from 'path'
import {
  FileLogAggregator,
  loadConfig,
  setLogAggregator,
  type EngineConfig,
  type EngineConfigInput,
} from '@cvmatch/core'

/**
 * Config file picked up from the working directory when --config is absent
 */
export const DEFAULT_CONFIG_FILE = 'cvmatch.yaml'

/**
 * Options shared by every command
 */
export interface CommonOptions {
  config?: string
  dictionary?: string
  logDir?: string
}

export function findConfigPath(explicit?: string, cwd: string = process.cwd()): string | undefined {
  if (explicit) {
    return explicit
  }
  const candidate = join(cwd, DEFAULT_CONFIG_FILE)
  return existsSync(candidate) ? candidate : undefined
}

/**
 * @throws ConfigurationError for unreadable files or out-of-range values
 */
export function resolveConfig(
  options: CommonOptions,
  overrides: EngineConfigInput = {}
): EngineConfig {
  return loadConfig({
    configPath: findConfigPath(options.config),
    overrides: {
      ...overrides,
      dictionaryPath: options.dictionary,
      logDir: options.logDir,
    },
  })
}

/**
 * Route log entries to `<logDir>/cvmatch.log` when a log directory is set
 */
export function configureLogging(config: EngineConfig): void {
  if (config.logDir) {
    setLogAggregator(new FileLogAggregator(config.logDir))
  }
}
