/**
 * Deckhand Config Loader
 *
 * Loads and merges configuration from .deckhand/config.yaml files
 * with support for inheritance via "extends" field.
 */

import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'
import { parse as parseYaml } from 'yaml'
import type { DeckhandConfig, ResolvedPaths } from '../types.js'
import { InvalidConfigError, toError } from './errors.js'

export const CONFIG_DIR = '.deckhand'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5
const MAX_EXTENDS_DEPTH = 10

type PlainObject = Record<string, unknown>

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str
    .replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, name: string, fallback: string) => env[name] || fallback)
    .replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] || '')
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, name: string) => env[name] || '')
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsIn(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsIn(item))
  }
  if (isPlainObject(value)) {
    const result: PlainObject = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsIn(item)
    }
    return result
  }
  return value
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: DeckhandConfig = {
  version: '1',
  paths: {
    root: '.',
    inventory: 'ansible/inventory/hosts.ini',
    variables: 'ansible/inventory/group_vars/all.yml',
    schema: 'config.schema.yml',
    playbook: 'ansible/playbooks/site.yml',
    ansible_config: 'ansible.cfg',
    roles: 'ansible/roles',
    terraform: 'terraform'
  },
  jobs: {
    grace_period_ms: 10_000,
    tail_lines: 20,
    drain_timeout_ms: 2_000,
    merge_stderr: false,
    env: {}
  },
  roles: ['cleanup', 'common', 'wazuh-indexer', 'wazuh-server', 'wazuh-dashboard', 'ufw', 'fail2ban'],
  logging: {
    level: 'info'
  }
}

/**
 * Find the .deckhand directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    if (fs.existsSync(path.join(configDir, CONFIG_FILE))) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }
    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, required: boolean = true): PlainObject {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new InvalidConfigError('file not found', configPath)
    }
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError(toError(err).message, configPath, toError(err))
  }
  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const expanded = expandEnvVarsIn(parsed)
  return isPlainObject(expanded) ? expanded : {}
}

/**
 * Deep merge two plain objects; arrays and scalars from source replace
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Load config with inheritance support
 */
function loadConfigWithExtends(
  configPath: string,
  visited: Set<string> = new Set(),
  depth: number = 0
): PlainObject {
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new InvalidConfigError(`inheritance depth exceeded (max ${MAX_EXTENDS_DEPTH})`, configPath)
  }

  const absolutePath = path.resolve(configPath)
  if (visited.has(absolutePath)) {
    throw new InvalidConfigError('circular config inheritance', absolutePath)
  }
  visited.add(absolutePath)

  const { extends: parent, ...config } = loadConfigFile(absolutePath)

  if (typeof parent === 'string') {
    const parentPath = path.resolve(path.dirname(absolutePath), parent)
    // Merge: parent <- current
    return deepMerge(loadConfigWithExtends(parentPath, visited, depth + 1), config)
  }

  return config
}

export interface LoadedConfig {
  config: DeckhandConfig
  /** The .deckhand directory, or null when running on defaults */
  configDir: string | null
}

/**
 * Load configuration from the nearest .deckhand/config.yaml
 * Also merges config.local.yaml if it exists (for machine-specific overrides)
 */
export function loadConfig(startDir?: string): LoadedConfig {
  const configDir = findConfigDir(startDir)
  if (!configDir) {
    return { config: structuredClone(DEFAULT_CONFIG), configDir: null }
  }

  const configPath = path.join(configDir, CONFIG_FILE)
  const local = loadConfigFile(path.join(configDir, CONFIG_LOCAL_FILE), false)
  const merged = deepMerge(
    deepMerge(toPlainObject(DEFAULT_CONFIG), loadConfigWithExtends(configPath)),
    local
  )

  return { config: toDeckhandConfig(merged, configPath), configDir }
}

/**
 * Resolve configured paths. `paths.root` is relative to the directory
 * holding .deckhand/ (or to `baseDir` when there is none).
 */
export function resolvePaths(config: DeckhandConfig, configDir: string | null, baseDir: string = process.cwd()): ResolvedPaths {
  const paths = { ...DEFAULT_CONFIG.paths, ...config.paths }
  const projectDir = configDir ? path.dirname(configDir) : path.resolve(baseDir)
  const root = path.resolve(projectDir, paths.root ?? '.')
  const at = (value: string | undefined, fallback: string): string => path.resolve(root, value ?? fallback)

  return {
    root,
    inventory: at(paths.inventory, 'ansible/inventory/hosts.ini'),
    variables: at(paths.variables, 'ansible/inventory/group_vars/all.yml'),
    schema: at(paths.schema, 'config.schema.yml'),
    playbook: at(paths.playbook, 'ansible/playbooks/site.yml'),
    ansibleConfig: at(paths.ansible_config, 'ansible.cfg'),
    roles: at(paths.roles, 'ansible/roles'),
    terraform: at(paths.terraform, 'terraform')
  }
}

/**
 * Environment added to every job: variables from `jobs.env_file` (dotenv
 * format, relative to the project root), then `jobs.env` on top
 */
export function loadJobEnvironment(config: DeckhandConfig, paths: ResolvedPaths): Record<string, string> {
  const env: Record<string, string> = {}
  const envFile = config.jobs?.env_file

  if (envFile) {
    const filePath = path.resolve(paths.root, envFile)
    if (fs.existsSync(filePath)) {
      Object.assign(env, dotenv.parse(fs.readFileSync(filePath, 'utf-8')))
    }
  }

  return { ...env, ...config.jobs?.env }
}

// ============================================================================
// Shape checks
// ============================================================================

function toDeckhandConfig(value: PlainObject, source: string): DeckhandConfig {
  const problems: string[] = []
  const jobs = isPlainObject(value.jobs) ? value.jobs : {}

  checkNumber(jobs.grace_period_ms, 'jobs.grace_period_ms', problems)
  checkNumber(jobs.tail_lines, 'jobs.tail_lines', problems)
  checkNumber(jobs.drain_timeout_ms, 'jobs.drain_timeout_ms', problems)
  if (jobs.merge_stderr !== undefined && typeof jobs.merge_stderr !== 'boolean') {
    problems.push('jobs.merge_stderr must be a boolean')
  }
  if (value.roles !== undefined && !isStringList(value.roles)) {
    problems.push('roles must be a list of role names')
  }
  if (problems.length > 0) {
    throw new InvalidConfigError(problems.join('; '), source)
  }

  const paths = isPlainObject(value.paths) ? value.paths : {}
  const logging = isPlainObject(value.logging) ? value.logging : {}
  const level = logging.level

  return {
    version: String(value.version ?? DEFAULT_CONFIG.version),
    paths: {
      root: optionalString(paths.root),
      inventory: optionalString(paths.inventory),
      variables: optionalString(paths.variables),
      schema: optionalString(paths.schema),
      playbook: optionalString(paths.playbook),
      ansible_config: optionalString(paths.ansible_config),
      roles: optionalString(paths.roles),
      terraform: optionalString(paths.terraform)
    },
    jobs: {
      grace_period_ms: typeof jobs.grace_period_ms === 'number' ? jobs.grace_period_ms : undefined,
      tail_lines: typeof jobs.tail_lines === 'number' ? jobs.tail_lines : undefined,
      drain_timeout_ms: typeof jobs.drain_timeout_ms === 'number' ? jobs.drain_timeout_ms : undefined,
      merge_stderr: typeof jobs.merge_stderr === 'boolean' ? jobs.merge_stderr : undefined,
      env_file: optionalString(jobs.env_file),
      env: toStringRecord(jobs.env)
    },
    roles: isStringList(value.roles) ? value.roles : undefined,
    logging: {
      level: level === 'silent' || level === 'error' || level === 'warn' || level === 'info' || level === 'debug'
        ? level
        : undefined
    }
  }
}

function toPlainObject(config: DeckhandConfig): PlainObject {
  const copy: unknown = structuredClone(config)
  return isPlainObject(copy) ? copy : {}
}

function checkNumber(value: unknown, key: string, problems: string[]): void {
  if (value !== undefined && (typeof value !== 'number' || !Number.isFinite(value) || value < 0)) {
    problems.push(`${key} must be a non-negative number`)
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined
}

function toStringRecord(value: unknown): Record<string, string> {
  const result: Record<string, string> = {}
  if (isPlainObject(value)) {
    for (const [key, item] of Object.entries(value)) {
      if (item !== null && item !== undefined) {
        result[key] = String(item)
      }
    }
  }
  return result
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
