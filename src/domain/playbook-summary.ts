/**
 * Per-task results from ansible-playbook output
 *
 *   TASK [common : Install packages] *****
 *   ok: [mgr1]
 *   changed: [db1] => (item=curl)
 *   ...
 *   PLAY RECAP *****
 *   mgr1 : ok=3 changed=1 unreachable=0 failed=0 skipped=0 rescued=0 ignored=0
 */

export type TaskStatus = 'ok' | 'changed' | 'failed' | 'fatal' | 'skipping' | 'unreachable'

export interface TaskResult {
  host: string
  /** Name of the enclosing TASK header; null before the first one */
  task: string | null
  status: TaskStatus
}

export interface HostRecap {
  host: string
  ok: number
  changed: number
  unreachable: number
  failed: number
  skipped: number
  rescued: number
  ignored: number
}

export interface PlaybookSummary {
  tasks: TaskResult[]
  recap: HostRecap[]
  /** Hosts with a failed, fatal or unreachable result, in order of appearance */
  failedHosts: string[]
}

const TASK_STATUSES: readonly TaskStatus[] = ['ok', 'changed', 'failed', 'fatal', 'skipping', 'unreachable']
const ANSI_RE = /\u001b\[[0-9;]*m/g
const TASK_RE = /^TASK \[(.*?)\]/
const RESULT_RE = /^(ok|changed|failed|fatal|skipping|unreachable): \[([^\]]+)\]/
const RECAP_HEADER_RE = /^PLAY RECAP\b/
const RECAP_LINE_RE = /^(\S+)\s+:\s+(.*)$/
const COUNTER_RE = /(\w+)=(\d+)/g
const FAILURE_STATUSES: readonly TaskStatus[] = ['failed', 'fatal', 'unreachable']

export function summarizePlaybook(lines: Iterable<string>): PlaybookSummary {
  const tasks: TaskResult[] = []
  const recap: HostRecap[] = []
  const failedHosts = new Set<string>()
  let task: string | null = null
  let inRecap = false

  for (const rawLine of lines) {
    const line = rawLine.replace(ANSI_RE, '').trim()

    if (RECAP_HEADER_RE.test(line)) {
      inRecap = true
      continue
    }

    if (inRecap) {
      const entry = parseRecapLine(line)
      if (entry) {
        recap.push(entry)
        if (entry.failed > 0 || entry.unreachable > 0) failedHosts.add(entry.host)
        continue
      }
      if (line !== '') inRecap = false
    }

    const taskMatch = TASK_RE.exec(line)
    if (taskMatch) {
      task = taskMatch[1]
      continue
    }

    const result = RESULT_RE.exec(line)
    if (!result) continue
    const status = result[1]
    if (isTaskStatus(status)) {
      // "[web1 -> localhost]" for delegated tasks
      const host = result[2].split(' -> ')[0].trim()
      tasks.push({ host, task, status })
      if (FAILURE_STATUSES.includes(status)) failedHosts.add(host)
    }
  }

  return { tasks, recap, failedHosts: [...failedHosts] }
}

function parseRecapLine(line: string): HostRecap | null {
  const match = RECAP_LINE_RE.exec(line)
  if (!match) return null

  const counters = new Map<string, number>()
  for (const [, name, value] of match[2].matchAll(COUNTER_RE)) {
    counters.set(name, Number(value))
  }
  if (!counters.has('ok')) return null

  const count = (name: string): number => counters.get(name) ?? 0
  return {
    host: match[1],
    ok: count('ok'),
    changed: count('changed'),
    unreachable: count('unreachable'),
    failed: count('failed'),
    skipped: count('skipped'),
    rescued: count('rescued'),
    ignored: count('ignored')
  }
}

function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some(status => status === value)
}
