/**
 * Deckhand - inventory & variable editing plus deployment job orchestration
 *
 * Main library exports for programmatic usage
 */

// Client
export { DeckhandClient, createClient, PROVISION_TARGET } from './client.js'
export type {
  DeckhandClientOptions,
  DeployRequest,
  InventoryOutcome,
  OpenOptions,
  ProvisionRequest,
  SubmitOutcome
} from './client.js'

// Types
export type {
  CommandSpec,
  ConfigValue,
  DeckhandConfig,
  JobEvent,
  JobLine,
  JobListener,
  JobResult,
  JobSnapshot,
  JobState,
  LogLevel,
  OptionType,
  RawValue,
  ResolvedPaths,
  SchemaDeclaration,
  SchemaOption,
  Target
} from './types.js'

export { ALL_TARGETS, OPTION_TYPES, TERMINAL_STATES } from './types.js'

// Inventory
export {
  parseInventory,
  renderInventory,
  addHost,
  removeHost,
  updateHost,
  listHosts,
  listGroups,
  findHost,
  getGroup,
  getGroupVars,
  getChildren
} from './domain/inventory.js'
export type { Inventory, InventorySection, HostEntry, HostRecord, HostVarsPatch } from './domain/inventory.js'

// Schema & config
export { SchemaRegistry, validateValue } from './domain/schema.js'
export { ConfigDocument } from './domain/config-document.js'
export { ConfigStore } from './lib/config-store.js'
export type { ConfigPatch, ConfigStoreOptions } from './lib/config-store.js'
export { InventoryStore } from './lib/inventory-store.js'
export type { InventoryMutation, InventoryStoreOptions } from './lib/inventory-store.js'

// Jobs
export { JobRunner, describeCommand } from './lib/job-runner.js'
export type { JobCommand, JobHandle, JobRunnerOptions, SubmitOptions } from './lib/job-runner.js'
export {
  ansibleEnv,
  buildCleanupCommand,
  buildPlaybookCommand,
  buildProvisionCommands,
  orderRoles,
  PLAN_FILE
} from './lib/commands.js'
export { summarizePlaybook } from './domain/playbook-summary.js'
export type { PlaybookSummary, TaskResult, TaskStatus, HostRecap } from './domain/playbook-summary.js'

// Config utilities
export {
  loadConfig,
  findConfigDir,
  resolvePaths,
  loadJobEnvironment,
  DEFAULT_CONFIG
} from './lib/config-loader.js'

// Logging & masking
export { createLogger, silentLogger } from './lib/logger.js'
export type { Logger, LoggerOptions } from './lib/logger.js'
export { maskValue, displayValue } from './lib/masking.js'

// Errors
export * from './lib/errors.js'
