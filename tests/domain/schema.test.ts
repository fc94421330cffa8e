/**
 * Tests for schema.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { SchemaRegistry } from '../../src/domain/schema.js'
import {
  ConstraintViolationError,
  SchemaDeclarationError,
  TypeMismatchError,
  UnknownOptionError
} from '../../src/lib/errors.js'

const SCHEMA_YAML = fs.readFileSync(new URL('../fixtures/config.schema.yml', import.meta.url), 'utf-8')

describe('SchemaRegistry', () => {
  let registry: SchemaRegistry

  beforeEach(() => {
    registry = SchemaRegistry.fromYaml(SCHEMA_YAML, 'config.schema.yml')
  })

  describe('declaration', () => {
    it('should list options in declaration order', () => {
      expect(registry.list().map(option => option.key)).toEqual([
        'manager.ssh_user',
        'manager.ssh_port',
        'deploy.mode',
        'features.tls',
        'admin.password',
        'enabled_roles'
      ])
    })

    it('should group options by category in order of first appearance', () => {
      const categories = registry.categories()
      expect([...categories.keys()]).toEqual(['Manager', 'General'])
      expect(categories.get('Manager')?.map(option => option.key)).toEqual(['manager.ssh_user', 'manager.ssh_port'])
    })

    it('should expose declared defaults', () => {
      expect(registry.defaults()).toEqual({
        'manager.ssh_user': 'ubuntu',
        'manager.ssh_port': 22,
        'deploy.mode': 'single',
        'features.tls': false
      })
    })

    it('should resolve options and freeze them', () => {
      const option = registry.resolve('deploy.mode')
      expect(option.type).toBe('enum')
      expect(option.validation.values).toEqual(['single', 'cluster'])
      expect(option.required).toBe(false)
      expect(Object.isFrozen(option)).toBe(true)
      expect(registry.resolve('admin.password').required).toBe(true)
    })

    it('should throw UnknownOptionError for undeclared keys', () => {
      expect(registry.has('nope')).toBe(false)
      expect(() => registry.resolve('nope')).toThrow(UnknownOptionError)
    })
  })

  describe('validate', () => {
    it('should coerce integers and check bounds', () => {
      expect(registry.validate('manager.ssh_port', '2222')).toBe(2222)
      expect(registry.validate('manager.ssh_port', 80)).toBe(80)
      expect(() => registry.validate('manager.ssh_port', '0')).toThrow('Option "manager.ssh_port" must be >= 1')
      expect(() => registry.validate('manager.ssh_port', '70000')).toThrow(ConstraintViolationError)
    })

    it('should reject non-integers', () => {
      expect(() => registry.validate('manager.ssh_port', 'abc')).toThrow(
        'Option "manager.ssh_port" expects an integer, got "abc"'
      )
      expect(() => registry.validate('manager.ssh_port', '2.5')).toThrow(TypeMismatchError)
    })

    it('should accept boolean words', () => {
      expect(registry.validate('features.tls', 'yes')).toBe(true)
      expect(registry.validate('features.tls', 'OFF')).toBe(false)
      expect(registry.validate('features.tls', true)).toBe(true)
      expect(() => registry.validate('features.tls', 'maybe')).toThrow(TypeMismatchError)
    })

    it('should restrict enums to their values', () => {
      expect(registry.validate('deploy.mode', 'cluster')).toBe('cluster')
      expect(() => registry.validate('deploy.mode', 'multi')).toThrow(
        'Option "deploy.mode" must be one of: single, cluster (got "multi")'
      )
    })

    it('should parse lists from comma or JSON text', () => {
      expect(registry.validate('enabled_roles', 'ufw, cleanup')).toEqual(['ufw', 'cleanup'])
      expect(registry.validate('enabled_roles', '["common"]')).toEqual(['common'])
      expect(registry.validate('enabled_roles', ['common', 'ufw'])).toEqual(['common', 'ufw'])
      expect(registry.validate('enabled_roles', '')).toEqual([])
      expect(() => registry.validate('enabled_roles', 'nginx')).toThrow(ConstraintViolationError)
    })

    it('should check patterns on strings', () => {
      expect(registry.validate('manager.ssh_user', 'deploy')).toBe('deploy')
      expect(() => registry.validate('manager.ssh_user', 'Root')).toThrow(
        'Option "manager.ssh_user" does not match required pattern: ^[a-z_][a-z0-9_-]*$'
      )
    })

    it('should match patterns from the start of the value', () => {
      const tags = new SchemaRegistry({
        options: [{ key: 'release.tag', type: 'string', validation: { pattern: 'v[0-9]+' } }]
      })

      expect(tags.validate('release.tag', 'v12-rc')).toBe('v12-rc')
      expect(() => tags.validate('release.tag', 'release-v12')).toThrow(
        'Option "release.tag" does not match required pattern: v[0-9]+'
      )
    })

    it('should stringify secrets and reject lists for scalar types', () => {
      expect(registry.validate('admin.password', 12345)).toBe('12345')
      expect(() => registry.validate('admin.password', ['a'])).toThrow(TypeMismatchError)
    })

    it('should report the offending key', () => {
      expect.assertions(1)
      try {
        registry.validate('deploy.mode', 'multi')
      } catch (err) {
        expect(err).toMatchObject({ key: 'deploy.mode', code: 'CONSTRAINT_VIOLATION' })
      }
    })
  })

  describe('broken declarations', () => {
    it('should collect every problem', () => {
      let caught: unknown
      try {
        new SchemaRegistry({
          options: [
            { key: 'a', type: 'string' },
            { key: 'a', type: 'string' },
            { key: 'a.b', type: 'int' },
            { key: 'c', type: 'float' },
            { key: 'd', type: 'enum' },
            { key: 'e', type: 'int', default: 'x' }
          ]
        })
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(SchemaDeclarationError)
      expect(caught).toMatchObject({
        problems: [
          '"a": declared more than once',
          '"a.b": collides with "a" (one cannot be both a value and a section)',
          '"c": unknown type "float" (expected string, bool, int, enum, secret, list)',
          '"d": enum options need a non-empty "values" list',
          '"e": default is invalid: Option "e" expects an integer, got "x"'
        ]
      })
    })

    it('should require a top-level options list', () => {
      expect(() => SchemaRegistry.fromYaml('settings: []')).toThrow(SchemaDeclarationError)
    })
  })

  describe('load', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deckhand-schema-test-'))
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should load a declaration file', async () => {
      const file = path.join(tempDir, 'config.schema.yml')
      fs.writeFileSync(file, SCHEMA_YAML)

      const loaded = await SchemaRegistry.load(file)
      expect(loaded.has('deploy.mode')).toBe(true)
    })

    it('should turn a missing file into a declaration error', async () => {
      await expect(SchemaRegistry.load(path.join(tempDir, 'missing.yml'))).rejects.toThrow(SchemaDeclarationError)
    })
  })
})
