/**
 * Deckhand Config Document
 *
 * A YAML variables file (group_vars/all.yml) held as a `yaml` Document tree,
 * so comments, key order, blank lines and quoting survive edits. Keys are
 * dotted paths into nested mappings: `manager.ssh_user` addresses
 *
 *   manager:
 *     ssh_user: ubuntu
 *
 * Setting a scalar over an existing scalar keeps the node (and the comment
 * and quoting attached to it); only its value changes.
 */

import { Document, isMap, isScalar, isSeq, parseDocument } from 'yaml'
import { InvalidConfigError } from '../lib/errors.js'
import type { ConfigValue } from '../types.js'

export class ConfigDocument {
  private constructor(private readonly doc: Document) {}

  /**
   * @throws InvalidConfigError when the text is not valid YAML or not a mapping
   */
  static parse(text: string, source?: string): ConfigDocument {
    const doc = parseDocument(text)
    if (doc.errors.length > 0) {
      throw new InvalidConfigError(doc.errors[0].message, source, doc.errors[0])
    }
    if (doc.contents !== null && !isMap(doc.contents)) {
      throw new InvalidConfigError('top level must be a mapping', source)
    }
    return new ConfigDocument(doc)
  }

  static empty(): ConfigDocument {
    return ConfigDocument.parse('---\n')
  }

  has(key: string): boolean {
    return this.doc.hasIn(toPath(key))
  }

  /**
   * Plain JS value at key; undefined when absent or explicitly null
   */
  get(key: string): unknown {
    const node: unknown = this.doc.getIn(toPath(key), true)
    if (node === undefined || node === null) return undefined
    if (isScalar(node)) return node.value ?? undefined
    if (isMap(node) || isSeq(node)) return node.toJSON()
    return node
  }

  /**
   * Set one leaf value, creating missing parent mappings at the end of
   * their section
   *
   * @throws Error when a parent on the path is not a mapping
   */
  set(key: string, value: ConfigValue): void {
    const path = toPath(key)
    const existing: unknown = this.doc.getIn(path, true)
    if (Array.isArray(value)) {
      const flow = isSeq(existing) && existing.flow === true
      this.doc.setIn(path, this.doc.createNode(value, { flow }))
      return
    }
    this.doc.setIn(path, value)
  }

  /**
   * Remove a leaf. Returns false when the key was absent.
   */
  delete(key: string): boolean {
    return this.doc.deleteIn(toPath(key))
  }

  /**
   * Dotted paths of every leaf (non-mapping value), in document order
   */
  keys(): string[] {
    const keys: string[] = []
    const walk = (node: unknown, prefix: string[]): void => {
      if (!isMap(node)) {
        if (prefix.length > 0) keys.push(prefix.join('.'))
        return
      }
      for (const pair of node.items) {
        const key = isScalar(pair.key) ? String(pair.key.value) : String(pair.key)
        walk(pair.value, [...prefix, key])
      }
    }
    walk(this.doc.contents, [])
    return keys
  }

  clone(): ConfigDocument {
    return new ConfigDocument(this.doc.clone())
  }

  toString(): string {
    return this.doc.toString()
  }
}

function toPath(key: string): string[] {
  return key.split('.')
}
