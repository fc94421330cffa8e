/**
 * Command builders for the external tools deckhand drives
 *
 * Every builder returns an argv-style CommandSpec; nothing here goes
 * through a shell.
 */

import { ALL_TARGETS, type CommandSpec, type ResolvedPaths, type Target } from '../types.js'
import { UnknownRoleError } from './errors.js'

export interface PlaybookOptions {
  target: Target
  /** Roles to enable; omitted means the playbook's own selection */
  roles?: string[]
  /** Canonical role order; selected roles run in this order */
  knownRoles?: string[]
  /** Extra variables passed with -e alongside enabled_roles */
  extraVars?: Record<string, unknown>
  /** Dry run: report what would change without changing it */
  check?: boolean
}

/**
 * Environment every ansible invocation needs
 */
export function ansibleEnv(paths: ResolvedPaths): Record<string, string> {
  return {
    ANSIBLE_CONFIG: paths.ansibleConfig,
    ANSIBLE_ROLES_PATH: paths.roles
  }
}

/**
 * Re-order a role selection to the canonical order, dropping duplicates
 *
 * @throws UnknownRoleError when a selected role is not in the canonical list
 */
export function orderRoles(selected: readonly string[], knownRoles: readonly string[]): string[] {
  const unknown = [...new Set(selected.filter(role => !knownRoles.includes(role)))]
  if (unknown.length > 0) {
    throw new UnknownRoleError(unknown, [...knownRoles])
  }
  return knownRoles.filter(role => selected.includes(role))
}

/** Saved plan that `terraform apply` executes */
export const PLAN_FILE = 'tfplan'

/**
 * `ansible-playbook <playbook> -i <inventory> [-l <target>] [--check] [-e <json>]`
 */
export function buildPlaybookCommand(paths: ResolvedPaths, options: PlaybookOptions): CommandSpec {
  const args = [paths.playbook, '-i', paths.inventory]

  if (options.target !== ALL_TARGETS) {
    args.push('-l', options.target)
  }
  if (options.check) {
    args.push('--check')
  }

  const extraVars: Record<string, unknown> = { ...options.extraVars }
  if (options.roles) {
    extraVars.enabled_roles = options.knownRoles
      ? orderRoles(options.roles, options.knownRoles)
      : [...options.roles]
  }
  if (Object.keys(extraVars).length > 0) {
    args.push('-e', JSON.stringify(extraVars))
  }

  const label = options.target === ALL_TARGETS ? 'playbook' : `playbook -l ${options.target}`
  return {
    command: 'ansible-playbook',
    args,
    cwd: paths.root,
    env: ansibleEnv(paths),
    label: options.check ? `${label} --check` : label
  }
}

/**
 * Playbook run with only the cleanup role, against every host
 */
export function buildCleanupCommand(paths: ResolvedPaths): CommandSpec {
  return {
    ...buildPlaybookCommand(paths, { target: ALL_TARGETS, roles: ['cleanup'] }),
    label: 'cleanup'
  }
}

export interface ProvisionCommands {
  init: CommandSpec
  plan: CommandSpec
  apply: CommandSpec
}

/**
 * The provisioning sequence, to run in order: init, plan to PLAN_FILE,
 * then apply that plan
 */
export function buildProvisionCommands(paths: ResolvedPaths): ProvisionCommands {
  const chdir = `-chdir=${paths.terraform}`
  return {
    init: {
      command: 'terraform',
      args: [chdir, 'init', '-input=false'],
      cwd: paths.root,
      label: 'terraform init'
    },
    plan: {
      command: 'terraform',
      args: [chdir, 'plan', '-input=false', `-out=${PLAN_FILE}`],
      cwd: paths.root,
      label: 'terraform plan'
    },
    apply: {
      command: 'terraform',
      args: [chdir, 'apply', '-auto-approve', '-input=false', PLAN_FILE],
      cwd: paths.root,
      label: 'terraform apply'
    }
  }
}
