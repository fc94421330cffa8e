/**
 * Tests for inventory-store.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { addHost, updateHost } from '../../src/domain/inventory.js'
import { DuplicateHostError, HostNotFoundError } from '../../src/lib/errors.js'
import { InventoryStore } from '../../src/lib/inventory-store.js'

const HOSTS = `# Security lab
[admin]
mgr1 ansible_host=10.0.0.1

[agents]
agent1 ansible_host=10.0.0.21
`

describe('InventoryStore', () => {
  let tempDir: string
  let hostsPath: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deckhand-inventory-store-test-'))
    hostsPath = path.join(tempDir, 'hosts.ini')
    fs.writeFileSync(hostsPath, HOSTS)
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should load the file and list hosts', async () => {
    const store = await InventoryStore.open({ path: hostsPath })
    expect(store.render()).toBe(HOSTS)
    expect(store.listHosts('agents')).toEqual([
      { group: 'agents', host: 'agent1', vars: { ansible_host: '10.0.0.21' } }
    ])
  })

  it('should persist each change', async () => {
    const store = await InventoryStore.open({ path: hostsPath })

    await store.addHost('agents', 'agent2', { ansible_host: '10.0.0.22' })
    await store.updateHost('admin', 'mgr1', { ansible_user: 'ubuntu' })
    await store.removeHost('agents', 'agent1')

    expect(fs.readFileSync(hostsPath, 'utf-8')).toBe(`# Security lab
[admin]
mgr1 ansible_host=10.0.0.1 ansible_user=ubuntu

[agents]
agent2 ansible_host=10.0.0.22
`)
  })

  it('should apply a batch as one write, or not at all', async () => {
    const store = await InventoryStore.open({ path: hostsPath })

    await expect(
      store.update(
        inventory => addHost(inventory, 'agents', 'agent3'),
        inventory => updateHost(inventory, 'agents', 'ghost', { a: '1' })
      )
    ).rejects.toThrow(HostNotFoundError)

    expect(store.render()).toBe(HOSTS)
    expect(fs.readFileSync(hostsPath, 'utf-8')).toBe(HOSTS)
  })

  it('should reject a duplicate host and keep the file', async () => {
    const store = await InventoryStore.open({ path: hostsPath })
    await expect(store.addHost('admin', 'mgr1')).rejects.toThrow(DuplicateHostError)
    expect(fs.readFileSync(hostsPath, 'utf-8')).toBe(HOSTS)
  })

  it('should start empty when the file is missing', async () => {
    const freshPath = path.join(tempDir, 'inventory', 'hosts.ini')
    const store = await InventoryStore.open({ path: freshPath })

    expect(store.listHosts()).toEqual([])
    await store.addHost('admin', 'mgr1', { ansible_host: '10.0.0.1' })
    expect(fs.readFileSync(freshPath, 'utf-8')).toBe('[admin]\nmgr1 ansible_host=10.0.0.1\n')
  })

  it('should pick up external edits on reload', async () => {
    const store = await InventoryStore.open({ path: hostsPath })
    fs.appendFileSync(hostsPath, 'agent9\n')

    await store.reload()
    expect(store.listHosts('agents').map(record => record.host)).toEqual(['agent1', 'agent9'])
  })
})
