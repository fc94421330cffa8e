/**
 * Tests for playbook-summary.ts
 */

import { describe, it, expect } from 'vitest'
import { summarizePlaybook } from '../../src/domain/playbook-summary.js'

const OUTPUT = [
  'PLAY [Configure lab] ***********************************************************',
  '',
  'TASK [Gathering Facts] *********************************************************',
  'ok: [mgr1]',
  'ok: [agent1]',
  '',
  'TASK [common : Install packages] ***********************************************',
  'changed: [mgr1] => (item=curl)',
  'skipping: [agent1]',
  '',
  'TASK [ufw : Enable firewall] ***************************************************',
  'ok: [mgr1 -> localhost]',
  'fatal: [agent1]: FAILED! => {"changed": false, "msg": "ufw not found"}',
  '',
  'PLAY RECAP *********************************************************************',
  'agent1                     : ok=1    changed=0    unreachable=0    failed=1    skipped=1    rescued=0    ignored=0',
  'mgr1                       : ok=2    changed=1    unreachable=0    failed=0    skipped=0    rescued=0    ignored=0',
  ''
]

describe('summarizePlaybook', () => {
  it('should attribute host results to the enclosing task', () => {
    expect(summarizePlaybook(OUTPUT).tasks).toEqual([
      { host: 'mgr1', task: 'Gathering Facts', status: 'ok' },
      { host: 'agent1', task: 'Gathering Facts', status: 'ok' },
      { host: 'mgr1', task: 'common : Install packages', status: 'changed' },
      { host: 'agent1', task: 'common : Install packages', status: 'skipping' },
      { host: 'mgr1', task: 'ufw : Enable firewall', status: 'ok' },
      { host: 'agent1', task: 'ufw : Enable firewall', status: 'fatal' }
    ])
  })

  it('should parse the recap counters', () => {
    expect(summarizePlaybook(OUTPUT).recap).toEqual([
      { host: 'agent1', ok: 1, changed: 0, unreachable: 0, failed: 1, skipped: 1, rescued: 0, ignored: 0 },
      { host: 'mgr1', ok: 2, changed: 1, unreachable: 0, failed: 0, skipped: 0, rescued: 0, ignored: 0 }
    ])
  })

  it('should list failed hosts once', () => {
    expect(summarizePlaybook(OUTPUT).failedHosts).toEqual(['agent1'])
  })

  it('should strip color codes', () => {
    const summary = summarizePlaybook(['\u001b[0;32mTASK [ping] ***\u001b[0m', '\u001b[0;31munreachable: [db1]: UNREACHABLE!\u001b[0m'])
    expect(summary.tasks).toEqual([{ host: 'db1', task: 'ping', status: 'unreachable' }])
    expect(summary.failedHosts).toEqual(['db1'])
  })

  it('should record results before any task header with a null task', () => {
    expect(summarizePlaybook(['ok: [mgr1]']).tasks).toEqual([{ host: 'mgr1', task: null, status: 'ok' }])
  })

  it('should return empty results for unrelated output', () => {
    expect(summarizePlaybook(['Terraform has been successfully initialized!'])).toEqual({
      tasks: [],
      recap: [],
      failedHosts: []
    })
  })
})
