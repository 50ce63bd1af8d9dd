/**
 * Configuration loading
 *
 * Layers, later wins: schema defaults, config file, environment, overrides.
 */

import { readFileSync } from 'fs'
import { dirname, resolve } from 'path'
import { parse as parseYaml } from 'yaml'
import type { ZodIssue } from 'zod'
import { ConfigurationError } from '../errors/index.js'
import {
  ConfigEnvSchema,
  ConfigFileSchema,
  EngineConfigSchema,
  type ConfigEnv,
  type ConfigFile,
  type EngineConfig,
  type EngineConfigInput,
} from './schema.js'

export interface LoadConfigOptions {
  /** YAML or JSON config file */
  configPath?: string
  /** Environment to read CVMATCH_* variables from (default: process.env) */
  env?: Record<string, string | undefined>
  /** Explicit values, applied last */
  overrides?: EngineConfigInput
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Drop undefined values so they do not shadow lower layers when spread
 */
function defined(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined))
}

function readConfigFile(configPath: string): ConfigFile {
  let raw: unknown
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'))
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file: ${configPath}`, {
      cause: error,
      context: { configPath },
    })
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}: ${formatIssues(result.error.issues)}`,
      { context: { configPath, issues: result.error.issues } }
    )
  }
  return result.data
}

function fromConfigFile(file: ConfigFile, baseDir: string): Record<string, unknown> {
  return defined({
    similarityThreshold: file.matcher?.similarity_threshold,
    topNMatches: file.matcher?.top_n_matches,
    modelIdentifier: file.extractor?.model,
    dictionaryPath: file.extractor?.dictionary
      ? resolve(baseDir, file.extractor.dictionary)
      : undefined,
    maxFileSizeMb: file.extractor?.max_file_size_mb,
    logDir: file.paths?.logs ? resolve(baseDir, file.paths.logs) : undefined,
  })
}

function fromEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('CVMATCH_') && value !== undefined && value.trim() !== ''
    )
  )

  const result = ConfigEnvSchema.safeParse(present)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid CVMATCH_* environment: ${formatIssues(result.error.issues)}`,
      { context: { issues: result.error.issues } }
    )
  }

  const parsed: ConfigEnv = result.data
  return defined({
    similarityThreshold: parsed.CVMATCH_SIMILARITY_THRESHOLD,
    topNMatches: parsed.CVMATCH_TOP_N_MATCHES,
    modelIdentifier: parsed.CVMATCH_MODEL,
    dictionaryPath: parsed.CVMATCH_DICTIONARY_PATH,
    maxFileSizeMb: parsed.CVMATCH_MAX_FILE_SIZE_MB,
    logDir: parsed.CVMATCH_LOG_DIR,
  })
}

function parseConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid engine configuration: ${formatIssues(result.error.issues)}`,
      { context: { issues: result.error.issues } }
    )
  }
  return Object.freeze(result.data)
}

/**
 * Validate and freeze a configuration value
 *
 * @throws ConfigurationError when a value is out of range
 */
export function createConfig(input: EngineConfigInput = {}): EngineConfig {
  return parseConfig(input)
}

/**
 * Resolve the engine configuration from file, environment and overrides
 *
 * @example
 * ```typescript
 * const config = loadConfig({ configPath: 'config.yaml', overrides: { topNMatches: 3 } })
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const fileLayer = options.configPath
    ? fromConfigFile(readConfigFile(options.configPath), dirname(resolve(options.configPath)))
    : {}
  const envLayer = fromEnv(options.env ?? process.env)
  const overrideLayer = defined({ ...options.overrides })

  return parseConfig({ ...fileLayer, ...envLayer, ...overrideLayer })
}
