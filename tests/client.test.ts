/**
 * Tests for client.ts
 *
 * Each test builds a throwaway project whose PATH points at stub
 * `ansible-playbook` and `terraform` scripts.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { DeckhandClient, PROVISION_TARGET } from '../src/client.js'
import { JobNotFoundError } from '../src/lib/errors.js'

const HOSTS = '[admin]\nmgr1 ansible_host=10.0.0.1\n'
const VARS = 'deploy:\n  mode: single\n'

const FAKE_PLAYBOOK = `#!/bin/sh
case "$*" in *slow*) sleep 20 ;; esac
echo "TASK [Ping] ***"
echo "ok: [mgr1]"
echo "ARGS $*"
`

const FAKE_TERRAFORM = `#!/bin/sh
echo "terraform $*"
`

describe('DeckhandClient', () => {
  let tempDir: string
  let varsPath: string
  let client: DeckhandClient

  const script = (dir: string, name: string, content: string): void => {
    const file = path.join(dir, name)
    fs.writeFileSync(file, content)
    fs.chmodSync(file, 0o755)
  }

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deckhand-client-test-'))
    const binDir = path.join(tempDir, 'bin')
    fs.mkdirSync(binDir)
    script(binDir, 'ansible-playbook', FAKE_PLAYBOOK)
    script(binDir, 'terraform', FAKE_TERRAFORM)

    fs.mkdirSync(path.join(tempDir, '.deckhand'))
    fs.writeFileSync(path.join(tempDir, '.deckhand', 'config.yaml'), [
      'version: "1"',
      'paths:',
      '  inventory: hosts.ini',
      '  variables: group_vars/all.yml',
      'roles: [cleanup, common, ufw]',
      'jobs:',
      '  grace_period_ms: 300',
      '  env:',
      `    PATH: ${JSON.stringify(`${binDir}:${process.env.PATH ?? ''}`)}`,
      ''
    ].join('\n'))
    fs.copyFileSync(
      new URL('./fixtures/config.schema.yml', import.meta.url),
      path.join(tempDir, 'config.schema.yml')
    )
    fs.writeFileSync(path.join(tempDir, 'hosts.ini'), HOSTS)
    varsPath = path.join(tempDir, 'group_vars', 'all.yml')
    fs.mkdirSync(path.dirname(varsPath))
    fs.writeFileSync(varsPath, VARS)

    client = await DeckhandClient.open({ cwd: tempDir, logLevel: 'silent' })
  })

  afterEach(async () => {
    client.shutdown()
    await Promise.all(client.jobs().map(job => job.wait()))
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('deploy', () => {
    it('should persist settings, then run the playbook with ordered roles', async () => {
      const outcome = await client.deploy({
        target: 'mgr1',
        settings: { 'manager.ssh_port': '2222' },
        roles: ['ufw', 'common']
      })

      expect(outcome.status).toBe('submitted')
      if (outcome.status !== 'submitted') return
      expect(outcome.job.target).toBe('mgr1')
      await expect(outcome.job.wait()).resolves.toMatchObject({ status: 'succeeded', lines: 3 })

      expect(outcome.job.lastLines(1)).toEqual([
        `ARGS ${client.paths.playbook} -i ${client.paths.inventory} -l mgr1 -e {"enabled_roles":["common","ufw"]}`
      ])
      expect(client.settings()).toMatchObject({
        'manager.ssh_port': 2222,
        enabled_roles: ['common', 'ufw']
      })
      expect(fs.readFileSync(varsPath, 'utf-8')).toContain('ssh_port: 2222')
    })

    it('should pass --check for a dry run', async () => {
      const outcome = await client.deploy({ target: 'mgr1', check: true })

      expect(outcome.status).toBe('submitted')
      if (outcome.status !== 'submitted') return
      await outcome.job.wait()
      expect(outcome.job.lastLines(1)).toEqual([
        `ARGS ${client.paths.playbook} -i ${client.paths.inventory} -l mgr1 --check`
      ])
      expect(fs.readFileSync(varsPath, 'utf-8')).toBe(VARS)
    })

    it('should reject invalid settings without starting a job', async () => {
      const outcome = await client.deploy({ settings: { 'manager.ssh_port': '70000' } })

      expect(outcome).toMatchObject({
        status: 'config-rejected',
        key: 'manager.ssh_port',
        code: 'CONSTRAINT_VIOLATION'
      })
      expect(client.jobs()).toEqual([])
      expect(fs.readFileSync(varsPath, 'utf-8')).toBe(VARS)
    })

    it('should reject unknown roles', async () => {
      const outcome = await client.deploy({ roles: ['nginx'] })

      expect(outcome).toEqual({
        status: 'config-rejected',
        reason: 'Unknown role(s): nginx',
        key: 'roles',
        code: 'UNKNOWN_ROLE'
      })
      expect(client.jobs()).toEqual([])
    })

    it('should report a busy target with the running job id', async () => {
      const first = await client.deploy({ extraVars: { slow: true } })
      expect(first.status).toBe('submitted')
      if (first.status !== 'submitted') return

      const second = await client.cleanup()
      expect(second).toEqual({ status: 'target-busy', target: 'all', runningJobId: first.job.id })

      expect(client.cancel(first.job.id)).toBe(true)
      await expect(first.job.wait()).resolves.toMatchObject({ status: 'cancelled' })
      expect(client.cancel('job_missing')).toBe(false)
    })
  })

  describe('provision', () => {
    it('should run terraform init, plan and apply as one job under its own lock name', async () => {
      const outcome = await client.provision({ settings: { 'deploy.mode': 'cluster' } })

      expect(outcome.status).toBe('submitted')
      if (outcome.status !== 'submitted') return
      expect(outcome.job.target).toBe(PROVISION_TARGET)
      await expect(outcome.job.wait()).resolves.toMatchObject({ status: 'succeeded' })

      const chdir = `-chdir=${client.paths.terraform}`
      expect(outcome.job.lastLines(3)).toEqual([
        `terraform ${chdir} init -input=false`,
        `terraform ${chdir} plan -input=false -out=tfplan`,
        `terraform ${chdir} apply -auto-approve -input=false tfplan`
      ])
      expect(fs.readFileSync(varsPath, 'utf-8')).toBe('deploy:\n  mode: cluster\n')
    })
  })

  describe('summarize', () => {
    it('should parse task results from a job', async () => {
      const outcome = await client.cleanup()
      if (outcome.status !== 'submitted') throw new Error(`unexpected outcome ${outcome.status}`)
      await outcome.job.wait()

      expect(client.summarize(outcome.job.id)).toEqual({
        tasks: [{ host: 'mgr1', task: 'Ping', status: 'ok' }],
        recap: [],
        failedHosts: []
      })
      expect(() => client.summarize('job_missing')).toThrow(JobNotFoundError)
    })
  })

  describe('inventory', () => {
    it('should add hosts and return the new listing', async () => {
      const outcome = await client.addHost('agents', 'agent1', { ansible_host: '10.0.0.21' })

      expect(outcome).toEqual({
        status: 'updated',
        hosts: [
          { group: 'admin', host: 'mgr1', vars: { ansible_host: '10.0.0.1' } },
          { group: 'agents', host: 'agent1', vars: { ansible_host: '10.0.0.21' } }
        ]
      })
      expect(fs.readFileSync(path.join(tempDir, 'hosts.ini'), 'utf-8')).toBe(
        `${HOSTS}\n[agents]\nagent1 ansible_host=10.0.0.21\n`
      )
    })

    it('should turn inventory errors into a rejected outcome', async () => {
      const outcome = await client.addHost('admin', 'mgr1')

      expect(outcome).toEqual({
        status: 'inventory-rejected',
        reason: 'Host "mgr1" already exists in group "admin"',
        code: 'DUPLICATE_HOST'
      })
      expect(client.hosts()).toHaveLength(1)
    })
  })
})
