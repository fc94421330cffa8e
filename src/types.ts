/**
 * Deckhand - Type Definitions
 */

// ============================================================================
// Schema Types
// ============================================================================

/** Declared type of a configuration option */
export type OptionType = 'string' | 'bool' | 'int' | 'enum' | 'secret' | 'list'

export const OPTION_TYPES: readonly OptionType[] = ['string', 'bool', 'int', 'enum', 'secret', 'list']

/** Typed value produced by schema validation */
export type ConfigValue = string | number | boolean | string[]

/** Value as supplied by a caller, before coercion */
export type RawValue = string | number | boolean | string[]

export interface OptionValidation {
  /** Allowed values (enum options, or any option restricted to a set) */
  values?: string[]
  /** Inclusive lower bound for int options */
  min?: number
  /** Inclusive upper bound for int options */
  max?: number
  /** Regular expression string values must match */
  pattern?: string
}

export interface SchemaOption {
  /** Dotted path, e.g. `manager.ssh_user` */
  key: string
  type: OptionType
  default?: ConfigValue
  description: string
  category: string
  required: boolean
  validation: OptionValidation
}

/** Shape of one entry in a schema declaration file */
export interface SchemaOptionInput {
  key: string
  type: string
  default?: unknown
  description?: string
  category?: string
  required?: boolean
  /** Shorthand for `validation.values` */
  values?: string[]
  validation?: OptionValidation
}

export interface SchemaDeclaration {
  options: SchemaOptionInput[]
}

// ============================================================================
// Job Types
// ============================================================================

/** Host name, group name, or `all` */
export type Target = string

export const ALL_TARGETS: Target = 'all'

export type JobState = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled'

export const TERMINAL_STATES: readonly JobState[] = ['succeeded', 'failed', 'cancelled']

export interface CommandSpec {
  /** Executable to invoke (resolved through PATH when not absolute) */
  command: string
  args: string[]
  cwd?: string
  /** Extra environment merged over the runner's environment */
  env?: Record<string, string>
  /** Human label shown in logs, e.g. `playbook` or `terraform apply` */
  label?: string
}

export type OutputStream = 'stdout' | 'stderr'

export interface JobLine {
  /** Monotonic per job, starting at 1 */
  seq: number
  stream: OutputStream
  text: string
  at: Date
}

export type JobResult =
  | { status: 'succeeded'; jobId: string; target: Target; exitCode: 0; lines: number }
  | {
      status: 'failed'
      jobId: string
      target: Target
      exitCode: number | null
      signal: NodeJS.Signals | null
      /** Last lines of output, for display next to the failure */
      tail: string[]
      error?: string
      lines: number
    }
  | { status: 'cancelled'; jobId: string; target: Target; signal: NodeJS.Signals | null; lines: number }

export type JobEvent =
  | { type: 'line'; jobId: string; line: JobLine }
  | { type: 'state'; jobId: string; state: JobState }

export type JobListener = (event: JobEvent) => void

export interface JobSnapshot {
  id: string
  target: Target
  command: CommandSpec
  state: JobState
  exitCode: number | null
  signal: NodeJS.Signals | null
  createdAt: Date
  startedAt?: Date
  finishedAt?: Date
  lineCount: number
}

// ============================================================================
// Engine Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Base directory for the other relative paths */
  root?: string
  inventory?: string
  variables?: string
  schema?: string
  playbook?: string
  ansible_config?: string
  roles?: string
  terraform?: string
}

export interface JobsConfig {
  grace_period_ms?: number
  tail_lines?: number
  /** How long job output may stay open after the process exits */
  drain_timeout_ms?: number
  merge_stderr?: boolean
  /** dotenv-format file merged into every job's environment */
  env_file?: string
  env?: Record<string, string>
}

export interface LoggingConfig {
  level?: LogLevel
}

export interface DeckhandConfig {
  version: string
  /** Path to a parent config file (relative to this file) */
  extends?: string
  paths?: PathsConfig
  jobs?: JobsConfig
  /** Canonical role execution order */
  roles?: string[]
  logging?: LoggingConfig
}

/** File locations after resolution against the project root */
export interface ResolvedPaths {
  root: string
  inventory: string
  variables: string
  schema: string
  playbook: string
  ansibleConfig: string
  roles: string
  terraform: string
}

// ============================================================================
// Logging Types
// ============================================================================

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'
