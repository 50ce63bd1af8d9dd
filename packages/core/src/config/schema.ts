/**
 * Zod schemas for engine configuration
 * @module config/schema
 */

import { z } from 'zod'
import { DEFAULT_MODEL_ID } from '../embeddings/models.js'

/**
 * Validated engine configuration. Values are passed explicitly into each
 * operation; the resolved object is frozen.
 */
export const EngineConfigSchema = z.object({
  /** Minimum pairwise similarity for evidence, and minimum aggregate score for a match */
  similarityThreshold: z.number().min(0).max(1).default(0.5),
  /** Maximum number of ranked results */
  topNMatches: z.number().int().positive().default(5),
  /** Selects the analysis backend's embedding model */
  modelIdentifier: z.string().min(1).default(DEFAULT_MODEL_ID),
  /** Skill dictionary file (JSON or YAML); the bundled dictionary when absent */
  dictionaryPath: z.string().min(1).optional(),
  /** Upper bound for text files read by file-backed text sources */
  maxFileSizeMb: z.number().positive().default(5),
  /** Directory for the JSON-lines log file */
  logDir: z.string().min(1).optional(),
})

export type EngineConfig = Readonly<z.infer<typeof EngineConfigSchema>>

export type EngineConfigInput = z.input<typeof EngineConfigSchema>

/**
 * On-disk config file layout (YAML or JSON)
 *
 * @example
 * ```yaml
 * extractor:
 *   model: hashed-ngram-512
 *   max_file_size_mb: 5
 *   dictionary: ./skills.yaml
 * matcher:
 *   similarity_threshold: 0.5
 *   top_n_matches: 5
 * paths:
 *   logs: ./logs
 * ```
 */
export const ConfigFileSchema = z.object({
  extractor: z
    .object({
      model: z.string().optional(),
      max_file_size_mb: z.number().optional(),
      dictionary: z.string().optional(),
    })
    .optional(),
  matcher: z
    .object({
      similarity_threshold: z.number().optional(),
      top_n_matches: z.number().optional(),
    })
    .optional(),
  paths: z
    .object({
      logs: z.string().optional(),
    })
    .optional(),
})

export type ConfigFile = z.infer<typeof ConfigFileSchema>

/**
 * Environment variable overrides. Values arrive as strings.
 */
export const ConfigEnvSchema = z.object({
  CVMATCH_SIMILARITY_THRESHOLD: z.coerce.number().optional(),
  CVMATCH_TOP_N_MATCHES: z.coerce.number().optional(),
  CVMATCH_MODEL: z.string().optional(),
  CVMATCH_DICTIONARY_PATH: z.string().optional(),
  CVMATCH_MAX_FILE_SIZE_MB: z.coerce.number().optional(),
  CVMATCH_LOG_DIR: z.string().optional(),
})

export type ConfigEnv = z.infer<typeof ConfigEnvSchema>
