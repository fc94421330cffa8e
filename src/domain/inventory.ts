/**
 * Deckhand Inventory Model
 *
 * Parses and renders the INI-style host inventory consumed by ansible:
 *
 *   # comment
 *   [web]
 *   web1 ansible_host=10.0.0.11 ansible_user=deploy
 *
 *   [web:vars]
 *   http_port=8080
 *
 *   [site:children]
 *   web
 *
 * Every line keeps its original text until an operation touches it, so
 * `renderInventory(parseInventory(text)) === text`. Mutations are pure: they
 * return a new Inventory and reuse untouched sections and lines as-is.
 *
 * Host lines are a whitespace-delimited `host key=value ...` list. Quoted
 * values and line continuations are not supported.
 */

import {
  DuplicateHostError,
  HostNotFoundError,
  InvalidHostEntryError,
  MalformedInventoryError
} from '../lib/errors.js'

// ============================================================================
// Types
// ============================================================================

export type SectionKind = 'hosts' | 'children' | 'vars'

export interface HostVar {
  readonly key: string
  readonly value: string
}

export interface HostEntry {
  readonly kind: 'host'
  readonly host: string
  readonly vars: readonly HostVar[]
  /** Leading whitespace of the original line */
  readonly indent: string
  /** Carriage return of a CRLF line in a file with mixed line endings */
  readonly trailer?: string
  /** Original text; absent once the entry has been modified */
  readonly raw?: string
}

export interface CommentLine {
  readonly kind: 'comment'
  readonly raw: string
}

export interface BlankLine {
  readonly kind: 'blank'
  readonly raw: string
}

export interface ChildLine {
  readonly kind: 'child'
  readonly name: string
  readonly raw: string
}

export interface GroupVarLine {
  readonly kind: 'var'
  readonly key: string
  readonly value: string
  readonly raw: string
}

export type InventoryLine = HostEntry | CommentLine | BlankLine | ChildLine | GroupVarLine

export interface InventorySection {
  readonly name: string
  readonly kind: SectionKind
  /** Raw header line, or null for the lines before the first header */
  readonly header: string | null
  readonly lines: readonly InventoryLine[]
}

export interface Inventory {
  /** First section is always the header-less leading section */
  readonly sections: readonly InventorySection[]
  /**
   * Line separator: CRLF only when every line break is CRLF. Otherwise LF,
   * and lines that ended in CRLF keep their `\r` in `raw`.
   */
  readonly eol: '\n' | '\r\n'
  readonly trailingNewline: boolean
}

/** Flattened view of a host, for listings */
export interface HostRecord {
  group: string
  host: string
  vars: Record<string, string>
}

export type HostVarsPatch = Record<string, string | null>

interface SectionDraft {
  name: string
  kind: SectionKind
  header: string | null
  lines: InventoryLine[]
}

/** Name of the group holding hosts listed before any header */
export const UNGROUPED = 'ungrouped'

const HEADER_RE = /^\[([^\]\s:]+)(?::(children|vars))?\]$/
const VAR_TOKEN_RE = /^([^=\s]+)=(\S*)$/
const GROUP_VAR_RE = /^([^=\s]+)\s*=\s*(.*)$/
const GROUP_RE = /^[^\s#;[\]:=]+$/
const NAME_RE = /^[^\s#;[=][^\s=]*$/
const KEY_RE = /^[^\s=]+$/
const VALUE_RE = /^\S*$/

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse inventory text
 *
 * @throws MalformedInventoryError with the 1-based line number of the first bad line
 */
export function parseInventory(text: string): Inventory {
  const eol = detectEol(text)
  const trailingNewline = text.endsWith(eol)

  const rawLines = text === '' ? [] : text.split(eol)
  if (trailingNewline) {
    rawLines.pop()
  }

  const sections: InventorySection[] = []
  const seenSections = new Set<string>()
  let current: SectionDraft = { name: UNGROUPED, kind: 'hosts', header: null, lines: [] }
  let seenHosts = new Set<string>()

  rawLines.forEach((raw, index) => {
    const lineNo = index + 1
    const trimmed = raw.trim()

    if (trimmed === '') {
      current.lines.push({ kind: 'blank', raw })
      return
    }

    if (trimmed.startsWith('#') || trimmed.startsWith(';')) {
      current.lines.push({ kind: 'comment', raw })
      return
    }

    if (trimmed.startsWith('[')) {
      const match = trimmed.match(HEADER_RE)
      if (!match) {
        throw new MalformedInventoryError(lineNo, 'invalid group header', raw)
      }
      const name = match[1]
      const kind: SectionKind = match[2] === 'children' || match[2] === 'vars' ? match[2] : 'hosts'
      const id = sectionId(name, kind)
      if (seenSections.has(id)) {
        throw new MalformedInventoryError(lineNo, `duplicate section "${trimmed}"`, raw)
      }
      seenSections.add(id)
      sections.push(current)
      current = { name, kind, header: raw, lines: [] }
      seenHosts = new Set<string>()
      return
    }

    switch (current.kind) {
      case 'hosts': {
        const entry = parseHostLine(raw, lineNo)
        if (seenHosts.has(entry.host)) {
          throw new MalformedInventoryError(lineNo, `duplicate host "${entry.host}" in group "${current.name}"`, raw)
        }
        seenHosts.add(entry.host)
        current.lines.push(entry)
        return
      }
      case 'children': {
        if (/\s/.test(trimmed)) {
          throw new MalformedInventoryError(lineNo, 'expected a single child group name', raw)
        }
        current.lines.push({ kind: 'child', name: trimmed, raw })
        return
      }
      case 'vars': {
        const match = trimmed.match(GROUP_VAR_RE)
        if (!match) {
          throw new MalformedInventoryError(lineNo, 'expected key=value', raw)
        }
        current.lines.push({ kind: 'var', key: match[1], value: match[2], raw })
        return
      }
    }
  })

  sections.push(current)

  return { sections, eol, trailingNewline }
}

function detectEol(text: string): '\n' | '\r\n' {
  const breaks = text.split('\n').length - 1
  const crlf = text.split('\r\n').length - 1
  return crlf > 0 && crlf === breaks ? '\r\n' : '\n'
}

function parseHostLine(raw: string, lineNo: number): HostEntry {
  const indent = raw.match(/^\s*/)?.[0] ?? ''
  const [host, ...tokens] = raw.trim().split(/\s+/)

  if (host.includes('=')) {
    throw new MalformedInventoryError(lineNo, `expected a host name, got "${host}"`, raw)
  }

  const vars: HostVar[] = []
  const seenKeys = new Set<string>()
  for (const token of tokens) {
    const match = token.match(VAR_TOKEN_RE)
    if (!match) {
      throw new MalformedInventoryError(lineNo, `expected key=value, got "${token}"`, raw)
    }
    if (seenKeys.has(match[1])) {
      throw new MalformedInventoryError(lineNo, `variable "${match[1]}" set twice`, raw)
    }
    seenKeys.add(match[1])
    vars.push({ key: match[1], value: match[2] })
  }

  return raw.endsWith('\r')
    ? { kind: 'host', host, vars, indent, trailer: '\r', raw }
    : { kind: 'host', host, vars, indent, raw }
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render an inventory back to text
 */
export function renderInventory(inventory: Inventory): string {
  const out: string[] = []

  for (const section of inventory.sections) {
    if (section.header !== null) {
      out.push(section.header)
    }
    for (const line of section.lines) {
      out.push(line.kind === 'host' ? renderHostLine(line) : line.raw)
    }
  }

  if (out.length === 0) {
    return ''
  }
  return out.join(inventory.eol) + (inventory.trailingNewline ? inventory.eol : '')
}

export function renderHostLine(entry: HostEntry): string {
  if (entry.raw !== undefined) {
    return entry.raw
  }
  const parts = [entry.host, ...entry.vars.map(v => `${v.key}=${v.value}`)]
  return entry.indent + parts.join(' ') + (entry.trailer ?? '')
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Find a section by name and kind. An explicit `[ungrouped]` header wins
 * over the implicit leading section.
 */
export function getGroup(
  inventory: Inventory,
  name: string,
  kind: SectionKind = 'hosts'
): InventorySection | undefined {
  return inventory.sections[findSectionIndex(inventory, name, kind)]
}

/**
 * Names of all host groups, in file order
 */
export function listGroups(inventory: Inventory): string[] {
  const names: string[] = []
  for (const [index, section] of inventory.sections.entries()) {
    if (section.kind !== 'hosts') continue
    if (index === 0 && !section.lines.some(line => line.kind === 'host')) continue
    if (!names.includes(section.name)) names.push(section.name)
  }
  return names
}

export function findHost(inventory: Inventory, group: string, host: string): HostEntry | undefined {
  return getGroup(inventory, group)?.lines.find(
    (line): line is HostEntry => line.kind === 'host' && line.host === host
  )
}

/**
 * All hosts, optionally restricted to one group, in file order
 */
export function listHosts(inventory: Inventory, group?: string): HostRecord[] {
  const records: HostRecord[] = []
  const sections = group === undefined
    ? inventory.sections.filter(section => section.kind === 'hosts')
    : [getGroup(inventory, group)].filter((s): s is InventorySection => s !== undefined)

  for (const section of sections) {
    for (const line of section.lines) {
      if (line.kind === 'host') {
        records.push({ group: section.name, host: line.host, vars: hostVars(line) })
      }
    }
  }
  return records
}

export function hostVars(entry: HostEntry): Record<string, string> {
  const vars: Record<string, string> = {}
  for (const v of entry.vars) {
    vars[v.key] = v.value
  }
  return vars
}

/**
 * Variables declared in a `[group:vars]` section
 */
export function getGroupVars(inventory: Inventory, group: string): Record<string, string> {
  const vars: Record<string, string> = {}
  for (const line of getGroup(inventory, group, 'vars')?.lines ?? []) {
    if (line.kind === 'var') vars[line.key] = line.value
  }
  return vars
}

/**
 * Child group names declared in a `[group:children]` section
 */
export function getChildren(inventory: Inventory, group: string): string[] {
  return (getGroup(inventory, group, 'children')?.lines ?? [])
    .filter((line): line is ChildLine => line.kind === 'child')
    .map(line => line.name)
}

// ============================================================================
// Mutations
// ============================================================================

/**
 * Add a host to a group, creating the group at the end when missing
 *
 * @throws DuplicateHostError when the host already exists in that group
 */
export function addHost(
  inventory: Inventory,
  group: string,
  host: string,
  vars: Record<string, string> = {}
): Inventory {
  if (!GROUP_RE.test(group)) {
    throw new InvalidHostEntryError(`group name "${group}" is not valid`, { group })
  }
  if (!NAME_RE.test(host)) {
    throw new InvalidHostEntryError(`host name "${host}" is not valid`, { host })
  }
  const entryVars = toHostVars(vars)

  const entry: HostEntry = { kind: 'host', host, vars: entryVars, indent: '' }
  const index = findSectionIndex(inventory, group, 'hosts')

  if (index === -1) {
    return appendSection(inventory, {
      name: group,
      kind: 'hosts',
      header: `[${group}]`,
      lines: [entry]
    })
  }

  const section = inventory.sections[index]
  if (section.lines.some(line => line.kind === 'host' && line.host === host)) {
    throw new DuplicateHostError(group, host)
  }

  const lines = [...section.lines]
  lines.splice(insertionPoint(section.lines), 0, entry)
  return replaceSection(inventory, index, { ...section, lines })
}

/**
 * Remove a host from a group. The group header stays even when it empties.
 *
 * @throws HostNotFoundError when the host is not in that group
 */
export function removeHost(inventory: Inventory, group: string, host: string): Inventory {
  const { index, section, position } = locateHost(inventory, group, host)
  const lines = section.lines.filter((_, i) => i !== position)
  return replaceSection(inventory, index, { ...section, lines })
}

/**
 * Change inline variables of a host: existing keys keep their position,
 * new keys are appended, keys set to null are removed
 *
 * @throws HostNotFoundError when the host is not in that group
 */
export function updateHost(
  inventory: Inventory,
  group: string,
  host: string,
  patch: HostVarsPatch
): Inventory {
  const { index, section, position, entry } = locateHost(inventory, group, host)

  const vars: HostVar[] = []
  for (const current of entry.vars) {
    if (!Object.hasOwn(patch, current.key)) {
      vars.push(current)
      continue
    }
    const next = patch[current.key]
    if (next !== null) {
      vars.push({ key: current.key, value: assertValue(current.key, next) })
    }
  }
  for (const [key, value] of Object.entries(patch)) {
    if (value === null || entry.vars.some(v => v.key === key)) continue
    assertKey(key)
    vars.push({ key, value: assertValue(key, value) })
  }

  const unchanged = vars.length === entry.vars.length &&
    vars.every((v, i) => v.key === entry.vars[i].key && v.value === entry.vars[i].value)
  if (unchanged) {
    return inventory
  }

  const lines = [...section.lines]
  lines[position] = { kind: 'host', host: entry.host, vars, indent: entry.indent, trailer: entry.trailer }
  return replaceSection(inventory, index, { ...section, lines })
}

// ============================================================================
// Helpers
// ============================================================================

function sectionId(name: string, kind: SectionKind): string {
  return `${name}:${kind}`
}

function findSectionIndex(inventory: Inventory, name: string, kind: SectionKind): number {
  const explicit = inventory.sections.findIndex(
    section => section.header !== null && section.name === name && section.kind === kind
  )
  if (explicit !== -1) return explicit
  return name === UNGROUPED && kind === 'hosts' && inventory.sections.length > 0 ? 0 : -1
}

function locateHost(inventory: Inventory, group: string, host: string) {
  const index = findSectionIndex(inventory, group, 'hosts')
  const section = inventory.sections[index]
  const position = section
    ? section.lines.findIndex(line => line.kind === 'host' && line.host === host)
    : -1
  const entry = section?.lines[position]
  if (!section || entry === undefined || entry.kind !== 'host') {
    throw new HostNotFoundError(group, host)
  }
  return { index, section, position, entry }
}

/**
 * New hosts go after the last host of the group; in a group without hosts,
 * after the comments that open it. Trailing blank lines stay last.
 */
function insertionPoint(lines: readonly InventoryLine[]): number {
  let lastHost = -1
  lines.forEach((line, i) => {
    if (line.kind === 'host') lastHost = i
  })
  if (lastHost !== -1) return lastHost + 1

  let point = 0
  while (point < lines.length && lines[point].kind === 'comment') {
    point++
  }
  return point
}

function appendSection(inventory: Inventory, section: InventorySection): Inventory {
  const sections = [...inventory.sections]
  const lastIndex = sections.length - 1
  const last = sections[lastIndex]
  const isEmpty = sections.every(s => s.header === null && s.lines.length === 0)
  const lastLine = last.lines[last.lines.length - 1]
  const endsWithBlank = lastLine?.kind === 'blank' || (last.lines.length === 0 && last.header === null)

  if (!isEmpty && !endsWithBlank) {
    sections[lastIndex] = { ...last, lines: [...last.lines, { kind: 'blank', raw: '' }] }
  }
  sections.push(section)
  return { ...inventory, sections, trailingNewline: isEmpty || inventory.trailingNewline }
}

function replaceSection(inventory: Inventory, index: number, section: InventorySection): Inventory {
  const sections = [...inventory.sections]
  sections[index] = section
  return { ...inventory, sections }
}

function toHostVars(vars: Record<string, string>): HostVar[] {
  return Object.entries(vars).map(([key, value]) => {
    assertKey(key)
    return { key, value: assertValue(key, value) }
  })
}

function assertKey(key: string): void {
  if (!KEY_RE.test(key)) {
    throw new InvalidHostEntryError(`variable name "${key}" is not valid`, { key })
  }
}

function assertValue(key: string, value: string): string {
  if (!VALUE_RE.test(value)) {
    throw new InvalidHostEntryError(`value of "${key}" contains whitespace`, { key })
  }
  return value
}
