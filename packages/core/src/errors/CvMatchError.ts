/**
 * cvmatch error classes
 *
 * Custom error classes with cause chaining. Init-time failures (dictionary,
 * analysis backend, configuration) are fatal; per-request failures are caught
 * at the component boundary and never reach the caller.
 */

/**
 * Base error class for all cvmatch errors.
 * Preserves cause chain and provides structured error information.
 */
export class CvMatchError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    options?: {
      code?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'CvMatchError'
    this.code = options?.code ?? 'CVMATCH_ERROR'
    this.context = options?.context

    Error.captureStackTrace?.(this, this.constructor)
  }

  /**
   * Get the full error chain as an array
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this]
    let current: unknown = this.cause

    while (current instanceof Error) {
      chain.push(current)
      current = current.cause
    }

    return chain
  }

  /**
   * Format error with full context for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }
}

/**
 * Skill dictionary could not be read or is malformed. Fatal: extraction has
 * no meaning without it.
 */
export class DictionaryLoadError extends CvMatchError {
  /** Where the dictionary was loaded from, if it came from a file */
  readonly source?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      source?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'DICTIONARY_LOAD_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        source: options?.source,
      },
    })
    this.name = 'DictionaryLoadError'
    this.source = options?.source
  }
}

/**
 * Text analysis backend could not be created (unknown model, bad tagger data)
 */
export class AnalysisBackendLoadError extends CvMatchError {
  readonly modelId?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      modelId?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'BACKEND_LOAD_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        modelId: options?.modelId,
      },
    })
    this.name = 'AnalysisBackendLoadError'
    this.modelId = options?.modelId
  }
}

/**
 * Validation errors (invalid arguments)
 */
export class ValidationError extends CvMatchError {
  /** Field that failed validation */
  readonly field?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      field?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        field: options?.field,
      },
    })
    this.name = 'ValidationError'
    this.field = options?.field
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends CvMatchError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      cause: options?.cause,
      context: options?.context,
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

/**
 * Check if error is a specific type
 */
export function isCvMatchError(error: unknown): error is CvMatchError {
  return error instanceof CvMatchError
}

/**
 * Normalize an unknown thrown value into an Error for logging
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error))
}
