/**
 * Deckhand Schema Registry
 *
 * The static declaration of recognized configuration options. A declaration
 * looks like:
 *
 *   options:
 *     - key: manager.ssh_user
 *       type: string
 *       default: ubuntu
 *       description: SSH user on the manager host
 *       category: Manager
 *       validation:
 *         pattern: '^[a-z_][a-z0-9_-]*$'
 *     - key: deploy.mode
 *       type: enum
 *       values: [single, cluster]
 *       default: single
 *
 * A `pattern` must match from the start of the value, as if it began
 * with `^`; it may stop short of the end unless it ends with `$`.
 *
 * The registry is frozen once built. A broken declaration throws
 * SchemaDeclarationError, which callers should treat as fatal.
 */

import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import {
  ConstraintViolationError,
  SchemaDeclarationError,
  TypeMismatchError,
  UnknownOptionError,
  isValidationError,
  toError
} from '../lib/errors.js'
import {
  OPTION_TYPES,
  type ConfigValue,
  type OptionType,
  type OptionValidation,
  type RawValue,
  type SchemaDeclaration,
  type SchemaOption,
  type SchemaOptionInput
} from '../types.js'

const KEY_RE = /^[A-Za-z_][\w-]*(\.[A-Za-z_][\w-]*)*$/
const TRUE_WORDS = ['true', 'yes', 'y', 'on', '1']
const FALSE_WORDS = ['false', 'no', 'n', 'off', '0']
const DEFAULT_CATEGORY = 'General'

export class SchemaRegistry {
  private readonly options: ReadonlyMap<string, SchemaOption>

  constructor(declaration: SchemaDeclaration, source?: string) {
    this.options = buildOptions(declaration, source)
  }

  /**
   * Load a YAML declaration file
   *
   * @throws SchemaDeclarationError when the file is unreadable or invalid
   */
  static async load(filePath: string): Promise<SchemaRegistry> {
    let content: string
    try {
      content = await readFile(filePath, 'utf-8')
    } catch (err) {
      throw new SchemaDeclarationError([`cannot read file: ${toError(err).message}`], filePath)
    }
    return SchemaRegistry.fromYaml(content, filePath)
  }

  static fromYaml(content: string, source?: string): SchemaRegistry {
    let parsed: unknown
    try {
      parsed = parseYaml(content)
    } catch (err) {
      throw new SchemaDeclarationError([`invalid YAML: ${toError(err).message}`], source)
    }
    return new SchemaRegistry(toDeclaration(parsed, source), source)
  }

  /**
   * @throws UnknownOptionError
   */
  resolve(key: string): SchemaOption {
    const option = this.options.get(key)
    if (!option) {
      throw new UnknownOptionError(key)
    }
    return option
  }

  has(key: string): boolean {
    return this.options.has(key)
  }

  /** Options in declaration order */
  list(): SchemaOption[] {
    return [...this.options.values()]
  }

  /**
   * Options grouped by category, categories in order of first appearance
   */
  categories(): Map<string, SchemaOption[]> {
    const grouped = new Map<string, SchemaOption[]>()
    for (const option of this.options.values()) {
      const bucket = grouped.get(option.category) ?? []
      bucket.push(option)
      grouped.set(option.category, bucket)
    }
    return grouped
  }

  /** Declared defaults of every option that has one */
  defaults(): Record<string, ConfigValue> {
    const values: Record<string, ConfigValue> = {}
    for (const option of this.options.values()) {
      if (option.default !== undefined) {
        values[option.key] = option.default
      }
    }
    return values
  }

  /**
   * Validate and coerce a raw value
   *
   * @throws UnknownOptionError | TypeMismatchError | ConstraintViolationError
   */
  validate(key: string, rawValue: RawValue): ConfigValue {
    return validateValue(this.resolve(key), rawValue)
  }
}

// ============================================================================
// Validation
// ============================================================================

export function validateValue(option: SchemaOption, rawValue: RawValue): ConfigValue {
  const value = coerce(option, rawValue)
  checkConstraints(option, value)
  return value
}

function coerce(option: SchemaOption, raw: RawValue): ConfigValue {
  const { key, type } = option

  switch (type) {
    case 'string':
    case 'secret':
    case 'enum': {
      if (Array.isArray(raw)) {
        throw new TypeMismatchError(key, type, describe(raw))
      }
      return String(raw)
    }

    case 'bool': {
      if (typeof raw === 'boolean') return raw
      const word = String(raw).trim().toLowerCase()
      if (!Array.isArray(raw)) {
        if (TRUE_WORDS.includes(word)) return true
        if (FALSE_WORDS.includes(word)) return false
      }
      throw new TypeMismatchError(key, 'a boolean', describe(raw))
    }

    case 'int': {
      if (typeof raw === 'number' && Number.isSafeInteger(raw)) return raw
      if (typeof raw === 'string' && /^[+-]?\d+$/.test(raw.trim())) {
        const parsed = Number(raw.trim())
        if (Number.isSafeInteger(parsed)) return parsed
      }
      throw new TypeMismatchError(key, 'an integer', describe(raw))
    }

    case 'list': {
      if (Array.isArray(raw)) return [...raw]
      if (typeof raw !== 'string') {
        throw new TypeMismatchError(key, 'a list', describe(raw))
      }
      const text = raw.trim()
      if (text.startsWith('[')) {
        return parseJsonList(key, text)
      }
      return text === '' ? [] : text.split(',').map(item => item.trim()).filter(item => item !== '')
    }
  }
}

function parseJsonList(key: string, text: string): string[] {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new TypeMismatchError(key, 'a list', text)
  }
  if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
    throw new TypeMismatchError(key, 'a list of strings', text)
  }
  return parsed
}

function checkConstraints(option: SchemaOption, value: ConfigValue): void {
  const { key, validation } = option
  const items = Array.isArray(value) ? value : [value]

  if (validation.values && validation.values.length > 0) {
    const allowed = validation.values
    const bad = items.find(item => !allowed.includes(String(item)))
    if (bad !== undefined) {
      throw new ConstraintViolationError(key, `must be one of: ${allowed.join(', ')} (got "${String(bad)}")`)
    }
  }

  if (typeof value === 'number') {
    if (validation.min !== undefined && value < validation.min) {
      throw new ConstraintViolationError(key, `must be >= ${validation.min}`)
    }
    if (validation.max !== undefined && value > validation.max) {
      throw new ConstraintViolationError(key, `must be <= ${validation.max}`)
    }
  }

  if (validation.pattern !== undefined && option.type !== 'int' && option.type !== 'bool') {
    const pattern = new RegExp(`^(?:${validation.pattern})`)
    const bad = items.find(item => !pattern.test(String(item)))
    if (bad !== undefined) {
      throw new ConstraintViolationError(key, `does not match required pattern: ${validation.pattern}`)
    }
  }
}

function describe(raw: RawValue): string {
  return Array.isArray(raw) ? JSON.stringify(raw) : String(raw)
}

// ============================================================================
// Declaration Loading
// ============================================================================

function toDeclaration(parsed: unknown, source?: string): SchemaDeclaration {
  if (!isRecord(parsed) || !Array.isArray(parsed.options)) {
    throw new SchemaDeclarationError(['top-level "options" list is required'], source)
  }
  const problems: string[] = []
  const options: SchemaOptionInput[] = []
  parsed.options.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry) || typeof entry.key !== 'string' || typeof entry.type !== 'string') {
      problems.push(`option #${index + 1}: "key" and "type" must be strings`)
      return
    }
    options.push({
      key: entry.key,
      type: entry.type,
      default: entry.default,
      description: typeof entry.description === 'string' ? entry.description : undefined,
      category: typeof entry.category === 'string' ? entry.category : undefined,
      required: entry.required === true,
      values: toStringList(entry.values),
      validation: toValidation(entry.validation)
    })
  })
  if (problems.length > 0) {
    throw new SchemaDeclarationError(problems, source)
  }
  return { options }
}

function buildOptions(declaration: SchemaDeclaration, source?: string): ReadonlyMap<string, SchemaOption> {
  const problems: string[] = []
  const options = new Map<string, SchemaOption>()

  for (const input of declaration.options) {
    const { key } = input

    if (!KEY_RE.test(key)) {
      problems.push(`"${key}": key must be a dotted path of identifiers`)
      continue
    }
    if (options.has(key)) {
      problems.push(`"${key}": declared more than once`)
      continue
    }
    const clash = [...options.keys()].find(other => key.startsWith(`${other}.`) || other.startsWith(`${key}.`))
    if (clash !== undefined) {
      problems.push(`"${key}": collides with "${clash}" (one cannot be both a value and a section)`)
      continue
    }
    if (!isOptionType(input.type)) {
      problems.push(`"${key}": unknown type "${input.type}" (expected ${OPTION_TYPES.join(', ')})`)
      continue
    }

    const validation: OptionValidation = { ...input.validation }
    if (input.values) {
      validation.values = input.values
    }
    if (input.type === 'enum' && (!validation.values || validation.values.length === 0)) {
      problems.push(`"${key}": enum options need a non-empty "values" list`)
      continue
    }
    if (validation.min !== undefined && validation.max !== undefined && validation.min > validation.max) {
      problems.push(`"${key}": min is greater than max`)
      continue
    }
    if (validation.pattern !== undefined && !isValidPattern(validation.pattern)) {
      problems.push(`"${key}": invalid pattern ${validation.pattern}`)
      continue
    }

    const option: SchemaOption = {
      key,
      type: input.type,
      description: input.description ?? '',
      category: input.category ?? DEFAULT_CATEGORY,
      required: input.required ?? false,
      validation: Object.freeze(validation)
    }

    if (input.default !== undefined && input.default !== null) {
      if (!isRawValue(input.default)) {
        problems.push(`"${key}": default must be a scalar or a list of strings`)
        continue
      }
      try {
        option.default = validateValue(option, input.default)
      } catch (err) {
        if (!isValidationError(err)) throw err
        problems.push(`"${key}": default is invalid: ${err.message}`)
        continue
      }
    }

    options.set(key, Object.freeze(option))
  }

  if (problems.length > 0) {
    throw new SchemaDeclarationError(problems, source)
  }
  return options
}

function isOptionType(type: string): type is OptionType {
  return OPTION_TYPES.some(known => known === type)
}

function isRawValue(value: unknown): value is RawValue {
  if (Array.isArray(value)) return value.every(item => typeof item === 'string')
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern)
    return true
  } catch {
    return false
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined
  return value.map(item => String(item))
}

function toValidation(value: unknown): OptionValidation {
  if (!isRecord(value)) return {}
  const validation: OptionValidation = {}
  const values = toStringList(value.values ?? value.allowed_values)
  if (values) validation.values = values
  if (typeof value.min === 'number') validation.min = value.min
  if (typeof value.max === 'number') validation.max = value.max
  if (typeof value.pattern === 'string') validation.pattern = value.pattern
  else if (typeof value.regex === 'string') validation.pattern = value.regex
  return validation
}
