/**
 * SetupVault Error Hierarchy
 *
 * Every failure the engine reports is classifiable into exactly one of these
 * classes and carries the identity, path or reason needed to render it.
 *
 * Hierarchy:
 *   SetupVaultError (base)
 *   ├── ScanError (one source failed; absorbed as a warning)
 *   ├── ConfigError
 *   │   └── InvalidConfigError
 *   ├── ValidationError (user input)
 *   │   └── MissingRationaleError
 *   ├── LifecycleError (queue transitions)
 *   │   ├── NotFoundError
 *   │   └── DuplicateIdentityError
 *   └── StorageError (durable storage)
 *       ├── CorruptRecordError
 *       ├── VaultIOError
 *       └── VaultNotInitializedError
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all SetupVault errors
 */
export class SetupVaultError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'SetupVaultError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context
    }
  }
}

// =============================================================================
// Scan Errors
// =============================================================================

/**
 * A single scanner failed, timed out or produced unusable output
 */
export class ScanError extends SetupVaultError {
  readonly source: string

  constructor(source: string, reason: string, cause?: unknown) {
    super(
      `Scanner "${source}" failed: ${reason}`,
      'SCAN_FAILED',
      {
        suggestion: 'Other sources were still scanned; fix the tool and run the scan again',
        context: { source, reason },
        cause
      }
    )
    this.name = 'ScanError'
    this.source = source
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends SetupVaultError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath: string, cause?: unknown) {
    super(
      `Invalid config in ${configPath}: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your config.yaml syntax',
        context: { configPath },
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends SetupVaultError {
  constructor(message: string, code: string = 'INVALID_INPUT', options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when a rationale is empty or whitespace-only
 */
export class MissingRationaleError extends ValidationError {
  constructor(id?: string) {
    super(
      'Rationale cannot be empty',
      'MISSING_RATIONALE',
      {
        suggestion: 'Explain why this change exists, e.g. --rationale "needed for json parsing"',
        context: id ? { id } : undefined
      }
    )
    this.name = 'MissingRationaleError'
  }
}

// =============================================================================
// Lifecycle Errors
// =============================================================================

export class LifecycleError extends SetupVaultError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'LifecycleError'
  }
}

/**
 * Thrown when an operation references an id that is not where it should be
 */
export class NotFoundError extends LifecycleError {
  readonly id: string

  constructor(id: string, location: 'inbox' | 'snoozed' | 'library') {
    super(
      `No ${location} item with id "${id}"`,
      'NOT_FOUND',
      {
        suggestion: `Use "setupvault ${location === 'library' ? 'list' : location}" to see available ids`,
        context: { id, location }
      }
    )
    this.name = 'NotFoundError'
    this.id = id
  }
}

/**
 * Thrown when an identity that is already tracked is ingested again
 */
export class DuplicateIdentityError extends LifecycleError {
  readonly identityKey: string

  constructor(identityKey: string) {
    super(
      `Identity "${identityKey}" is already tracked`,
      'DUPLICATE_IDENTITY',
      {
        context: { identityKey }
      }
    )
    this.name = 'DuplicateIdentityError'
    this.identityKey = identityKey
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

export class StorageError extends SetupVaultError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'StorageError'
  }
}

/**
 * Thrown when a persisted file cannot be parsed or fails schema validation
 */
export class CorruptRecordError extends StorageError {
  readonly path: string
  readonly reason: string

  constructor(path: string, reason: string, cause?: unknown) {
    super(
      `Corrupt file ${path}: ${reason}`,
      'CORRUPT_RECORD',
      {
        suggestion: 'Fix or remove the file by hand, then retry',
        context: { path, reason },
        cause
      }
    )
    this.name = 'CorruptRecordError'
    this.path = path
    this.reason = reason
  }
}

/**
 * Thrown when durable storage cannot be read or written
 */
export class VaultIOError extends StorageError {
  readonly path: string
  readonly operation: string

  constructor(operation: string, path: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(
      `Failed to ${operation} ${path}${detail}`,
      'IO_ERROR',
      {
        suggestion: 'Check that the path exists and is writable',
        context: { operation, path },
        cause
      }
    )
    this.name = 'VaultIOError'
    this.path = path
    this.operation = operation
  }
}

/**
 * Thrown when the vault directory structure does not exist yet
 */
export class VaultNotInitializedError extends StorageError {
  constructor(root: string) {
    super(
      `No vault found at ${root}`,
      'VAULT_NOT_INITIALIZED',
      {
        suggestion: 'Run "setupvault init" to get started',
        context: { root }
      }
    )
    this.name = 'VaultNotInitializedError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSetupVaultError(error: unknown): error is SetupVaultError {
  return error instanceof SetupVaultError
}

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isLifecycleError(error: unknown): error is LifecycleError {
  return error instanceof LifecycleError
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isSetupVaultError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a SetupVaultError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): SetupVaultError {
  if (isSetupVaultError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new SetupVaultError(error.message, defaultCode, { cause: error })
  }
  return new SetupVaultError(String(error), defaultCode)
}
