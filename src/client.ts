/**
 * Deckhand Client - the one entry point a UI or CLI talks to
 *
 * Turns requests like "deploy host X with these settings" into an ordered
 * sequence: validate and persist the settings, then start the job. Every
 * failure a caller can act on comes back as a tagged outcome instead of a
 * thrown error; nothing is retried here.
 */

import { SchemaRegistry } from './domain/schema.js'
import { summarizePlaybook, type PlaybookSummary } from './domain/playbook-summary.js'
import type { HostRecord, HostVarsPatch } from './domain/inventory.js'
import { buildCleanupCommand, buildPlaybookCommand, buildProvisionCommands, orderRoles } from './lib/commands.js'
import { loadConfig, loadJobEnvironment, resolvePaths } from './lib/config-loader.js'
import { ConfigStore, type ConfigPatch } from './lib/config-store.js'
import {
  isInventoryError,
  isValidationError,
  PersistFailureError,
  TargetBusyError,
  JobNotFoundError
} from './lib/errors.js'
import { InventoryStore, type InventoryMutation } from './lib/inventory-store.js'
import { JobRunner, type JobCommand, type JobHandle } from './lib/job-runner.js'
import { createLogger, silentLogger, type Logger } from './lib/logger.js'
import {
  ALL_TARGETS,
  type ConfigValue,
  type LogLevel,
  type ResolvedPaths,
  type Target
} from './types.js'

/** Lock name for infrastructure provisioning runs */
export const PROVISION_TARGET: Target = 'provisioner'

/** Config key the selected roles are saved under, when the schema declares it */
const ENABLED_ROLES_KEY = 'enabled_roles'

export type SubmitOutcome =
  | { status: 'submitted'; job: JobHandle }
  | { status: 'config-rejected'; reason: string; key?: string; code: string }
  | { status: 'target-busy'; target: Target; runningJobId: string }

export type InventoryOutcome =
  | { status: 'updated'; hosts: HostRecord[] }
  | { status: 'inventory-rejected'; reason: string; code: string }

export interface DeployRequest {
  /** Host, group or `all` (default) */
  target?: Target
  /** Settings validated and persisted before the job starts */
  settings?: ConfigPatch
  /** Roles to run, in any order */
  roles?: string[]
  extraVars?: Record<string, unknown>
  /** Dry run with `--check`; settings are still persisted first */
  check?: boolean
}

export interface ProvisionRequest {
  settings?: ConfigPatch
}

export interface DeckhandClientOptions {
  config: ConfigStore
  inventory: InventoryStore
  runner: JobRunner
  paths: ResolvedPaths
  /** Canonical role order */
  roles?: string[]
  logger?: Logger
}

export interface OpenOptions {
  /** Where to start looking for .deckhand/config.yaml (default: cwd) */
  cwd?: string
  logLevel?: LogLevel
  verbose?: boolean
  /** Log line sink (default: stderr) */
  sink?: (line: string) => void
}

export class DeckhandClient {
  readonly paths: ResolvedPaths
  private readonly config: ConfigStore
  private readonly inventory: InventoryStore
  private readonly runner: JobRunner
  private readonly roles: string[]
  private readonly logger: Logger

  constructor(options: DeckhandClientOptions) {
    this.config = options.config
    this.inventory = options.inventory
    this.runner = options.runner
    this.paths = options.paths
    this.roles = options.roles ?? []
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Build a client from the nearest .deckhand/config.yaml (or defaults)
   *
   * @throws SchemaDeclarationError | InvalidConfigError | MalformedInventoryError
   */
  static async open(options: OpenOptions = {}): Promise<DeckhandClient> {
    const { config, configDir } = loadConfig(options.cwd)
    const explicitLevel = options.verbose || process.env.DECKHAND_VERBOSE || process.env.DECKHAND_LOG_LEVEL
    const logger = createLogger('client', {
      level: options.logLevel ?? (explicitLevel ? undefined : config.logging?.level),
      verbose: options.verbose,
      sink: options.sink
    })

    const paths = resolvePaths(config, configDir, options.cwd)
    const schema = await SchemaRegistry.load(paths.schema)
    const [configStore, inventory] = await Promise.all([
      ConfigStore.open({ path: paths.variables, schema, logger: logger.child('config') }),
      InventoryStore.open({ path: paths.inventory, logger: logger.child('inventory') })
    ])
    const runner = new JobRunner({
      gracePeriodMs: config.jobs?.grace_period_ms,
      tailLines: config.jobs?.tail_lines,
      drainTimeoutMs: config.jobs?.drain_timeout_ms,
      mergeStderr: config.jobs?.merge_stderr,
      env: loadJobEnvironment(config, paths),
      logger: logger.child('jobs')
    })

    logger.debug(`project root ${paths.root}`)
    return new DeckhandClient({
      config: configStore,
      inventory,
      runner,
      paths,
      roles: config.roles,
      logger
    })
  }

  // ==========================================================================
  // Jobs
  // ==========================================================================

  /**
   * Persist settings, then run the playbook against a target
   */
  async deploy(request: DeployRequest = {}): Promise<SubmitOutcome> {
    const target = request.target ?? ALL_TARGETS
    const patch: ConfigPatch = { ...request.settings }

    let roles: string[] | undefined
    try {
      roles = request.roles && this.roles.length > 0 ? orderRoles(request.roles, this.roles) : request.roles
    } catch (err) {
      return rejectConfig(err)
    }
    const command = buildPlaybookCommand(this.paths, {
      target,
      roles,
      extraVars: request.extraVars,
      check: request.check
    })

    if (roles && this.config.hasOption(ENABLED_ROLES_KEY)) {
      patch[ENABLED_ROLES_KEY] = roles
    }

    return this.persistThenSubmit(target, patch, command)
  }

  /**
   * Persist settings, then init, plan and apply the infrastructure
   * definitions as one job
   */
  provision(request: ProvisionRequest = {}): Promise<SubmitOutcome> {
    const { init, plan, apply } = buildProvisionCommands(this.paths)
    return this.persistThenSubmit(PROVISION_TARGET, { ...request.settings }, [init, plan, apply])
  }

  /**
   * Run only the cleanup role on every host
   */
  cleanup(): Promise<SubmitOutcome> {
    return this.submit(ALL_TARGETS, buildCleanupCommand(this.paths))
  }

  /**
   * Ask a job to stop. Returns false for unknown ids.
   */
  cancel(jobId: string): boolean {
    if (!this.runner.get(jobId)) {
      return false
    }
    this.runner.cancel(jobId)
    return true
  }

  /** Cancel every job still pending or running */
  shutdown(): void {
    this.runner.cancelAll()
  }

  job(jobId: string): JobHandle | undefined {
    return this.runner.get(jobId)
  }

  jobs(): JobHandle[] {
    return this.runner.list()
  }

  /**
   * Task results parsed from a playbook job's output so far
   *
   * @throws JobNotFoundError
   */
  summarize(jobId: string): PlaybookSummary {
    const job = this.runner.get(jobId)
    if (!job) {
      throw new JobNotFoundError(jobId)
    }
    return summarizePlaybook(job.lines().map(line => line.text))
  }

  // ==========================================================================
  // Settings & inventory
  // ==========================================================================

  /** Effective value of every declared option */
  settings(): Record<string, ConfigValue | undefined> {
    return this.config.snapshot()
  }

  hosts(group?: string): HostRecord[] {
    return this.inventory.listHosts(group)
  }

  addHost(group: string, host: string, vars: Record<string, string> = {}): Promise<InventoryOutcome> {
    return this.editInventory(() => this.inventory.addHost(group, host, vars))
  }

  removeHost(group: string, host: string): Promise<InventoryOutcome> {
    return this.editInventory(() => this.inventory.removeHost(group, host))
  }

  updateHost(group: string, host: string, patch: HostVarsPatch): Promise<InventoryOutcome> {
    return this.editInventory(() => this.inventory.updateHost(group, host, patch))
  }

  /**
   * Several inventory edits applied and written as one
   */
  editHosts(...mutations: InventoryMutation[]): Promise<InventoryOutcome> {
    return this.editInventory(() => this.inventory.update(...mutations))
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async persistThenSubmit(target: Target, patch: ConfigPatch, command: JobCommand): Promise<SubmitOutcome> {
    if (Object.keys(patch).length > 0) {
      try {
        await this.config.merge(patch)
        await this.config.flush()
      } catch (err) {
        return rejectConfig(err)
      }
    }
    return this.submit(target, command)
  }

  private async submit(target: Target, command: JobCommand): Promise<SubmitOutcome> {
    try {
      const job = await this.runner.submit(target, command)
      return { status: 'submitted', job }
    } catch (err) {
      if (err instanceof TargetBusyError) {
        this.logger.warn(err.message)
        return { status: 'target-busy', target: err.target, runningJobId: err.runningJobId }
      }
      throw err
    }
  }

  private async editInventory(edit: () => Promise<unknown>): Promise<InventoryOutcome> {
    try {
      await edit()
      return { status: 'updated', hosts: this.inventory.listHosts() }
    } catch (err) {
      if (isInventoryError(err) || err instanceof PersistFailureError) {
        this.logger.warn(err.message)
        return { status: 'inventory-rejected', reason: err.message, code: err.code }
      }
      throw err
    }
  }
}

function rejectConfig(err: unknown): SubmitOutcome {
  if (isValidationError(err)) {
    return { status: 'config-rejected', reason: err.message, key: err.key, code: err.code }
  }
  if (err instanceof PersistFailureError) {
    return { status: 'config-rejected', reason: err.message, code: err.code }
  }
  throw err
}

/**
 * Create a new client from the nearest config
 */
export function createClient(options?: OpenOptions): Promise<DeckhandClient> {
  return DeckhandClient.open(options)
}

export default DeckhandClient
