/**
 * Deckhand Error Hierarchy
 *
 * Typed error classes shared by the stores, the job runner and the client.
 *
 * Hierarchy:
 *   DeckhandError (base)
 *   ├── ConfigError (engine configuration)
 *   │   └── InvalidConfigError
 *   ├── SchemaDeclarationError (fatal, startup only)
 *   ├── InventoryError (inventory model)
 *   │   ├── MalformedInventoryError
 *   │   ├── DuplicateHostError
 *   │   ├── HostNotFoundError
 *   │   └── InvalidHostEntryError
 *   ├── ValidationError (option values)
 *   │   ├── UnknownOptionError
 *   │   ├── TypeMismatchError
 *   │   ├── ConstraintViolationError
 *   │   └── UnknownRoleError
 *   ├── PersistFailureError
 *   └── JobError
 *       ├── TargetBusyError
 *       └── JobNotFoundError
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all Deckhand errors
 */
export class DeckhandError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'DeckhandError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
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
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends DeckhandError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when config.yaml has invalid content or inheritance
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .deckhand/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Schema Declaration Errors
// =============================================================================

/**
 * Thrown while loading the schema declaration. The process cannot continue
 * with a broken declaration, so callers should let this propagate.
 */
export class SchemaDeclarationError extends DeckhandError {
  readonly problems: string[]

  constructor(problems: string[], source?: string) {
    const where = source ? ` in ${source}` : ''
    super(
      `Invalid schema declaration${where}:\n${problems.map(p => `  - ${p}`).join('\n')}`,
      'SCHEMA_DECLARATION',
      {
        suggestion: 'Fix the schema declaration file and restart',
        context: { source, problems }
      }
    )
    this.name = 'SchemaDeclarationError'
    this.problems = problems
  }
}

// =============================================================================
// Inventory Errors
// =============================================================================

export class InventoryError extends DeckhandError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'InventoryError'
  }
}

/**
 * Thrown when an inventory line cannot be classified
 */
export class MalformedInventoryError extends InventoryError {
  readonly line: number

  constructor(line: number, reason: string, text?: string) {
    super(
      `Malformed inventory at line ${line}: ${reason}`,
      'MALFORMED_INVENTORY',
      {
        suggestion: 'Host lines must look like "host key=value ..." under a [group] header',
        context: { line, text }
      }
    )
    this.name = 'MalformedInventoryError'
    this.line = line
  }
}

export class DuplicateHostError extends InventoryError {
  constructor(group: string, host: string) {
    super(
      `Host "${host}" already exists in group "${group}"`,
      'DUPLICATE_HOST',
      {
        suggestion: 'Use updateHost to change the variables of an existing host',
        context: { group, host }
      }
    )
    this.name = 'DuplicateHostError'
  }
}

export class HostNotFoundError extends InventoryError {
  constructor(group: string, host: string) {
    super(
      `Host "${host}" not found in group "${group}"`,
      'HOST_NOT_FOUND',
      {
        context: { group, host }
      }
    )
    this.name = 'HostNotFoundError'
  }
}

/**
 * Thrown when a host name or inline variable would not survive a re-parse
 */
export class InvalidHostEntryError extends InventoryError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(
      `Invalid host entry: ${reason}`,
      'INVALID_HOST_ENTRY',
      {
        suggestion: 'Names and values must be non-empty and contain no whitespace',
        context
      }
    )
    this.name = 'InvalidHostEntryError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends DeckhandError {
  /** Offending option key */
  readonly key: string

  constructor(message: string, code: string, key: string, options?: ErrorOptions) {
    super(message, code, { ...options, context: { key, ...options?.context } })
    this.name = 'ValidationError'
    this.key = key
  }
}

export class UnknownOptionError extends ValidationError {
  constructor(key: string) {
    super(
      `Unknown option "${key}"`,
      'UNKNOWN_OPTION',
      key,
      { suggestion: 'Only options declared in the schema can be read or set' }
    )
    this.name = 'UnknownOptionError'
  }
}

export class TypeMismatchError extends ValidationError {
  constructor(key: string, expected: string, received: string) {
    super(
      `Option "${key}" expects ${expected}, got "${received}"`,
      'TYPE_MISMATCH',
      key,
      { context: { expected, received } }
    )
    this.name = 'TypeMismatchError'
  }
}

export class ConstraintViolationError extends ValidationError {
  constructor(key: string, constraint: string) {
    super(
      `Option "${key}" ${constraint}`,
      'CONSTRAINT_VIOLATION',
      key,
      { context: { constraint } }
    )
    this.name = 'ConstraintViolationError'
  }
}

export class UnknownRoleError extends ValidationError {
  constructor(roles: string[], knownRoles: string[]) {
    super(
      `Unknown role(s): ${roles.join(', ')}`,
      'UNKNOWN_ROLE',
      'roles',
      {
        suggestion: `Known roles: ${knownRoles.join(', ')}`,
        context: { roles, knownRoles }
      }
    )
    this.name = 'UnknownRoleError'
  }
}

// =============================================================================
// Persistence Errors
// =============================================================================

/**
 * Thrown when a document cannot be written. The previous file is left in
 * place and the caller may retry.
 */
export class PersistFailureError extends DeckhandError {
  constructor(filePath: string, cause?: Error) {
    super(
      `Failed to persist ${filePath}${cause ? `: ${cause.message}` : ''}`,
      'PERSIST_FAILURE',
      {
        suggestion: 'Check permissions and free space, then retry',
        context: { filePath },
        cause
      }
    )
    this.name = 'PersistFailureError'
  }
}

// =============================================================================
// Job Errors
// =============================================================================

export class JobError extends DeckhandError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'JobError'
  }
}

/**
 * Thrown when another job already holds the target's lock
 */
export class TargetBusyError extends JobError {
  readonly target: string
  readonly runningJobId: string

  constructor(target: string, runningJobId: string) {
    super(
      `Target "${target}" is busy with job ${runningJobId}`,
      'TARGET_BUSY',
      {
        suggestion: 'Wait for the running job to finish or cancel it, then retry',
        context: { target, runningJobId }
      }
    )
    this.name = 'TargetBusyError'
    this.target = target
    this.runningJobId = runningJobId
  }
}

export class JobNotFoundError extends JobError {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`, 'JOB_NOT_FOUND', { context: { jobId } })
    this.name = 'JobNotFoundError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDeckhandError(error: unknown): error is DeckhandError {
  return error instanceof DeckhandError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isInventoryError(error: unknown): error is InventoryError {
  return error instanceof InventoryError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isJobError(error: unknown): error is JobError {
  return error instanceof JobError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isDeckhandError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a DeckhandError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): DeckhandError {
  if (isDeckhandError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new DeckhandError(error.message, defaultCode, { cause: error })
  }
  return new DeckhandError(String(error), defaultCode)
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
