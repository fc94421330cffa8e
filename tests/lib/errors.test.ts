/**
 * Tests for the Deckhand error hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  DeckhandError,
  ConfigError,
  InventoryError,
  ValidationError,
  JobError,
  InvalidConfigError,
  MalformedInventoryError,
  DuplicateHostError,
  UnknownOptionError,
  TypeMismatchError,
  UnknownRoleError,
  PersistFailureError,
  TargetBusyError,
  JobNotFoundError,
  isDeckhandError,
  isConfigError,
  isInventoryError,
  isValidationError,
  isJobError,
  formatErrorForCli,
  wrapError,
  toError
} from '../../src/lib/errors.js'

describe('errors', () => {
  describe('hierarchy', () => {
    it('should keep every error a DeckhandError with its own name and code', () => {
      const err = new DuplicateHostError('web', 'web1')

      expect(err).toBeInstanceOf(InventoryError)
      expect(err).toBeInstanceOf(DeckhandError)
      expect(err).toBeInstanceOf(Error)
      expect(err.name).toBe('DuplicateHostError')
      expect(err.code).toBe('DUPLICATE_HOST')
      expect(err.message).toBe('Host "web1" already exists in group "web"')
      expect(err.context).toEqual({ group: 'web', host: 'web1' })
    })

    it('should carry the offending key on validation errors', () => {
      const err = new TypeMismatchError('manager.ssh_port', 'an integer', 'abc')

      expect(err).toBeInstanceOf(ValidationError)
      expect(err.key).toBe('manager.ssh_port')
      expect(err.context).toEqual({ key: 'manager.ssh_port', expected: 'an integer', received: 'abc' })
    })

    it('should list known roles in the suggestion', () => {
      const err = new UnknownRoleError(['nginx'], ['cleanup', 'common'])
      expect(err.message).toBe('Unknown role(s): nginx')
      expect(err.suggestion).toBe('Known roles: cleanup, common')
      expect(err.key).toBe('roles')
    })

    it('should expose the busy target and its job', () => {
      const err = new TargetBusyError('web1', 'job_1')
      expect(err).toBeInstanceOf(JobError)
      expect(err.target).toBe('web1')
      expect(err.runningJobId).toBe('job_1')
      expect(err.message).toBe('Target "web1" is busy with job job_1')
    })

    it('should keep the cause of persistence failures', () => {
      const cause = new Error('EACCES: permission denied')
      const err = new PersistFailureError('/srv/all.yml', cause)

      expect(err.message).toBe('Failed to persist /srv/all.yml: EACCES: permission denied')
      expect(err.cause).toBe(cause)
    })

    it('should record the line of malformed inventory', () => {
      const err = new MalformedInventoryError(4, 'invalid group header', '[web')
      expect(err.line).toBe(4)
      expect(err.message).toBe('Malformed inventory at line 4: invalid group header')
    })
  })

  describe('type guards', () => {
    it('should narrow by family', () => {
      expect(isDeckhandError(new JobNotFoundError('job_1'))).toBe(true)
      expect(isDeckhandError(new Error('plain'))).toBe(false)
      expect(isConfigError(new InvalidConfigError('bad'))).toBe(true)
      expect(isInventoryError(new DuplicateHostError('a', 'b'))).toBe(true)
      expect(isValidationError(new UnknownOptionError('x'))).toBe(true)
      expect(isValidationError(new ConfigError('x', 'X'))).toBe(false)
      expect(isJobError(new JobNotFoundError('job_1'))).toBe(true)
    })
  })

  describe('formatting', () => {
    it('should format Deckhand errors with their suggestion', () => {
      expect(formatErrorForCli(new UnknownOptionError('x'))).toBe(
        'Error: Unknown option "x"\n  Suggestion: Only options declared in the schema can be read or set'
      )
    })

    it('should format other values', () => {
      expect(formatErrorForCli(new Error('boom'))).toBe('Error: boom')
      expect(formatErrorForCli('boom')).toBe('Error: boom')
    })

    it('should serialize to JSON', () => {
      const json = new JobNotFoundError('job_1').toJSON()
      expect(json).toMatchObject({ name: 'JobNotFoundError', code: 'JOB_NOT_FOUND', context: { jobId: 'job_1' } })
    })

    it('should wrap foreign errors', () => {
      const original = new Error('boom')
      const wrapped = wrapError(original, 'IO')

      expect(wrapped.code).toBe('IO')
      expect(wrapped.cause).toBe(original)
      expect(wrapError(wrapped)).toBe(wrapped)
      expect(toError('text').message).toBe('text')
    })
  })
})
