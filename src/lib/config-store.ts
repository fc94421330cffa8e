/**
 * Deckhand Config Store
 *
 * Effective configuration variables, validated against the schema registry
 * and backed by a comment-preserving YAML document on disk.
 *
 * Writers (set, merge, unset, flush) run one at a time through a p-limit
 * queue. A rejected merge or a failed flush leaves both the in-memory
 * document and the file exactly as they were.
 */

import pLimit from 'p-limit'
import { ConfigDocument } from '../domain/config-document.js'
import type { SchemaRegistry } from '../domain/schema.js'
import type { ConfigValue, RawValue } from '../types.js'
import { ConstraintViolationError, isValidationError, toError } from './errors.js'
import { readTextFile, writeFileAtomic } from './fs-store.js'
import { silentLogger, type Logger } from './logger.js'
import { displayValue } from './masking.js'

export interface ConfigStoreOptions {
  /** Variables file, e.g. ansible/inventory/group_vars/all.yml */
  path: string
  schema: SchemaRegistry
  logger?: Logger
}

export type ConfigPatch = Record<string, RawValue>

export class ConfigStore {
  readonly path: string
  private readonly schema: SchemaRegistry
  private readonly logger: Logger
  private readonly queue = pLimit(1)
  private document: ConfigDocument
  /** Text last read from or written to disk; null when the file does not exist yet */
  private persisted: string | null

  private constructor(options: ConfigStoreOptions, document: ConfigDocument, persisted: string | null) {
    this.path = options.path
    this.schema = options.schema
    this.logger = options.logger ?? silentLogger
    this.document = document
    this.persisted = persisted
  }

  /**
   * Load the variables file. A missing file starts an empty document that
   * is created on the first flush.
   *
   * @throws InvalidConfigError when the file is not a YAML mapping
   */
  static async open(options: ConfigStoreOptions): Promise<ConfigStore> {
    const text = await readTextFile(options.path)
    const document = text === null
      ? ConfigDocument.empty()
      : ConfigDocument.parse(text, options.path)
    return new ConfigStore(options, document, text)
  }

  /**
   * Effective value of an option: the document's value, or the declared
   * default when the document has none
   *
   * @throws UnknownOptionError for keys the schema does not declare
   */
  get(key: string): ConfigValue | undefined {
    const option = this.schema.resolve(key)
    const stored = this.document.get(key)
    if (stored === undefined) {
      return option.default
    }
    if (!isRawValue(stored)) {
      this.logger.warn(`${key} holds a ${typeof stored} in ${this.path}; using the default`)
      return option.default
    }
    try {
      return this.schema.validate(key, stored)
    } catch (err) {
      if (!isValidationError(err)) throw err
      this.logger.warn(`${err.message} in ${this.path}; using the default`)
      return option.default
    }
  }

  /**
   * Validate and set one option
   *
   * @throws UnknownOptionError | TypeMismatchError | ConstraintViolationError
   */
  async set(key: string, rawValue: RawValue): Promise<ConfigValue> {
    const applied = await this.merge({ [key]: rawValue })
    return applied[key]
  }

  /**
   * Validate and apply several options as one unit, in key order. If any
   * entry is rejected nothing is applied.
   *
   * @returns the coerced values that were applied
   */
  merge(patch: ConfigPatch): Promise<Record<string, ConfigValue>> {
    return this.queue(() => this.applyPatch(patch))
  }

  /**
   * Remove an option from the document so its default applies again
   */
  unset(key: string): Promise<boolean> {
    return this.queue(() => {
      this.schema.resolve(key)
      const next = this.document.clone()
      const removed = next.delete(key)
      this.document = next
      return removed
    })
  }

  /**
   * Write the document to disk atomically. Does nothing when the file
   * already holds the current render.
   *
   * @returns whether the file was written
   * @throws PersistFailureError; the caller may retry
   */
  flush(): Promise<boolean> {
    return this.queue(async () => {
      const text = this.document.toString()
      if (text === this.persisted) {
        return false
      }
      await writeFileAtomic(this.path, text)
      this.persisted = text
      this.logger.debug(`wrote ${this.path}`)
      return true
    })
  }

  /** Whether the schema declares the key */
  hasOption(key: string): boolean {
    return this.schema.has(key)
  }

  /** Effective value of every declared option */
  snapshot(): Record<string, ConfigValue | undefined> {
    const values: Record<string, ConfigValue | undefined> = {}
    for (const option of this.schema.list()) {
      values[option.key] = this.get(option.key)
    }
    return values
  }

  /** Required options with neither a stored value nor a default */
  missingRequired(): string[] {
    return this.schema.list()
      .filter(option => option.required && this.get(option.key) === undefined)
      .map(option => option.key)
  }

  /** Document keys the schema does not declare; they are kept as-is */
  unknownKeys(): string[] {
    return this.document.keys().filter(key => !this.schema.has(key))
  }

  isDirty(): boolean {
    return this.document.toString() !== this.persisted
  }

  render(): string {
    return this.document.toString()
  }

  private applyPatch(patch: ConfigPatch): Record<string, ConfigValue> {
    const keys = Object.keys(patch).sort()

    // Validation has no side effects, so a rejection here changes nothing
    const coerced: Record<string, ConfigValue> = {}
    for (const key of keys) {
      coerced[key] = this.schema.validate(key, patch[key])
    }

    const next = this.document.clone()
    for (const key of keys) {
      try {
        next.set(key, coerced[key])
      } catch (err) {
        throw new ConstraintViolationError(key, `cannot be stored: ${toError(err).message}`)
      }
    }
    this.document = next

    for (const key of keys) {
      this.logger.debug(`set ${key} = ${displayValue(this.schema.resolve(key), coerced[key])}`)
    }
    return coerced
  }
}

function isRawValue(value: unknown): value is RawValue {
  if (Array.isArray(value)) return value.every(item => typeof item === 'string')
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}
