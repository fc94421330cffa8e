/**
 * Deckhand Job Runner
 *
 * Runs external commands (ansible-playbook, terraform, ...) as child
 * processes, one at a time per target. Output is split into lines and
 * fanned out to subscribers; every job ends in exactly one terminal state.
 *
 *   pending ──spawn──▶ running ──exit 0──────▶ succeeded
 *      │                  ├──exit ≠ 0 / error─▶ failed
 *      └─launch error─▶ failed
 *                         └──cancel──────────▶ cancelled
 *
 * A job may be a sequence of commands (terraform init, plan, apply). The
 * steps run one after another under the same target lock, and the first
 * step that fails ends the job.
 *
 * Cancellation sends SIGTERM to the job's process group and SIGKILL to
 * whatever is left of the group once the grace period runs out.
 */

import { spawn, type ChildProcess } from 'node:child_process'
import { randomBytes } from 'node:crypto'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import {
  TERMINAL_STATES,
  type CommandSpec,
  type JobEvent,
  type JobLine,
  type JobListener,
  type JobResult,
  type JobSnapshot,
  type JobState,
  type OutputStream,
  type Target
} from '../types.js'
import { JobError, JobNotFoundError, TargetBusyError, toError } from './errors.js'
import { silentLogger, type Logger } from './logger.js'

export const DEFAULT_GRACE_PERIOD_MS = 10_000
export const DEFAULT_TAIL_LINES = 20
export const DEFAULT_DRAIN_TIMEOUT_MS = 2_000

const USE_PROCESS_GROUPS = process.platform !== 'win32'

export interface JobRunnerOptions {
  /** Time between SIGTERM and SIGKILL on cancel (default: 10s) */
  gracePeriodMs?: number
  /** Lines kept in a failed result's tail (default: 20) */
  tailLines?: number
  /**
   * How long output may stay open after the process exits (default: 2s).
   * Background descendants holding stdout are cut off after this.
   */
  drainTimeoutMs?: number
  /** Run commands under /bin/sh with stderr redirected into stdout */
  mergeStderr?: boolean
  /** Environment merged over process.env for every job */
  env?: Record<string, string>
  logger?: Logger
}

export interface SubmitOptions {
  mergeStderr?: boolean
}

/** One command, or several run in order as a single job */
export type JobCommand = CommandSpec | readonly CommandSpec[]

/**
 * Caller's view of a job
 */
export interface JobHandle {
  readonly id: string
  readonly target: Target
  /** The step running now, or the last one run */
  readonly command: CommandSpec
  readonly steps: readonly CommandSpec[]
  readonly state: JobState
  /** Replays captured lines, then streams new lines and state changes */
  subscribe(listener: JobListener): () => void
  /** Resolves once the job is terminal */
  wait(): Promise<JobResult>
  lines(): readonly JobLine[]
  lastLines(count: number): string[]
  snapshot(): JobSnapshot
}

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.includes(state)
}

function generateJobId(): string {
  return `job_${Date.now().toString(36)}_${randomBytes(4).toString('hex')}`
}

class Job implements JobHandle {
  readonly id = generateJobId()
  readonly createdAt = new Date()
  startedAt?: Date
  finishedAt?: Date
  exitCode: number | null = null
  signal: NodeJS.Signals | null = null
  error?: string
  child: ChildProcess | null = null
  cancelRequested = false
  killTimer: NodeJS.Timeout | null = null
  step = 0

  private current: JobState = 'pending'
  private readonly captured: JobLine[] = []
  private readonly listeners = new Set<JobListener>()
  private readonly result: Promise<JobResult>
  private resolveResult: (result: JobResult) => void = () => {}

  constructor(
    readonly target: Target,
    readonly steps: readonly CommandSpec[],
    readonly mergeStderr: boolean,
    private readonly tailLines: number,
    private readonly logger: Logger
  ) {
    this.result = new Promise<JobResult>(resolve => {
      this.resolveResult = resolve
    })
  }

  get command(): CommandSpec {
    return this.steps[this.step]
  }

  get state(): JobState {
    return this.current
  }

  subscribe(listener: JobListener): () => void {
    for (const line of this.captured) {
      this.deliver(listener, { type: 'line', jobId: this.id, line })
    }
    this.deliver(listener, { type: 'state', jobId: this.id, state: this.current })
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  wait(): Promise<JobResult> {
    return this.result
  }

  lines(): readonly JobLine[] {
    return this.captured
  }

  lastLines(count: number): string[] {
    return count > 0 ? this.captured.slice(-count).map(line => line.text) : []
  }

  snapshot(): JobSnapshot {
    return {
      id: this.id,
      target: this.target,
      command: this.command,
      state: this.current,
      exitCode: this.exitCode,
      signal: this.signal,
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      lineCount: this.captured.length
    }
  }

  pushLine(stream: OutputStream, text: string): void {
    const line: JobLine = { seq: this.captured.length + 1, stream, text, at: new Date() }
    this.captured.push(line)
    this.emit({ type: 'line', jobId: this.id, line })
  }

  attach(child: ChildProcess): void {
    this.child = child
    this.exitCode = null
    this.signal = null
    if (this.current === 'pending') {
      this.startedAt = new Date()
      this.transition('running')
    }
  }

  hasNextStep(): boolean {
    return this.step < this.steps.length - 1
  }

  /**
   * Move to a terminal state. Returns false if the job was already terminal.
   */
  settle(state: 'succeeded' | 'failed' | 'cancelled'): boolean {
    if (isTerminal(this.current)) {
      return false
    }
    this.finishedAt = new Date()
    this.transition(state)
    this.resolveResult(this.toResult())
    return true
  }

  private toResult(): JobResult {
    const base = { jobId: this.id, target: this.target, lines: this.captured.length }
    switch (this.current) {
      case 'succeeded':
        return { ...base, status: 'succeeded', exitCode: 0 }
      case 'cancelled':
        return { ...base, status: 'cancelled', signal: this.signal }
      default:
        return {
          ...base,
          status: 'failed',
          exitCode: this.exitCode,
          signal: this.signal,
          tail: this.lastLines(this.tailLines),
          error: this.error
        }
    }
  }

  private transition(state: JobState): void {
    this.current = state
    this.emit({ type: 'state', jobId: this.id, state })
  }

  private emit(event: JobEvent): void {
    for (const listener of this.listeners) {
      this.deliver(listener, event)
    }
  }

  private deliver(listener: JobListener, event: JobEvent): void {
    try {
      listener(event)
    } catch (err) {
      this.logger.warn(`subscriber of ${this.id} threw: ${toError(err).message}`)
    }
  }
}

export class JobRunner {
  private readonly gracePeriodMs: number
  private readonly tailLines: number
  private readonly drainTimeoutMs: number
  private readonly mergeStderr: boolean
  private readonly env: Record<string, string>
  private readonly logger: Logger
  private readonly jobs = new Map<string, Job>()
  /** target -> id of the job holding it */
  private readonly locks = new Map<Target, string>()

  constructor(options: JobRunnerOptions = {}) {
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS
    this.tailLines = options.tailLines ?? DEFAULT_TAIL_LINES
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS
    this.mergeStderr = options.mergeStderr ?? false
    this.env = options.env ?? {}
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Start a job on a target. The target's lock is taken before anything
   * is awaited and released when the job becomes terminal. When the launch
   * itself fails, the lock is already released and the handle is `failed`
   * by the time this resolves.
   *
   * @throws TargetBusyError when another job holds the target
   * @throws JobError when given an empty command list
   */
  async submit(target: Target, command: JobCommand, options: SubmitOptions = {}): Promise<JobHandle> {
    const steps = isCommandList(command) ? [...command] : [command]
    if (steps.length === 0) {
      throw new JobError('A job needs at least one command', 'EMPTY_JOB')
    }
    const holder = this.locks.get(target)
    if (holder !== undefined) {
      throw new TargetBusyError(target, holder)
    }

    const job = new Job(target, steps, options.mergeStderr ?? this.mergeStderr, this.tailLines, this.logger.child(target))
    this.locks.set(target, job.id)
    this.jobs.set(job.id, job)
    this.logger.info(`${job.id} on ${target}: ${steps.map(describeCommand).join(' && ')}`)

    await this.launch(job)
    return job
  }

  /**
   * Request cancellation. No-op for jobs that are already terminal or
   * already being cancelled.
   *
   * @throws JobNotFoundError
   */
  cancel(jobId: string): void {
    const job = this.require(jobId)
    if (isTerminal(job.state) || job.cancelRequested) {
      return
    }
    job.cancelRequested = true
    this.logger.info(`cancelling ${job.id}`)
    if (job.state === 'running') {
      this.terminate(job)
    }
  }

  cancelAll(): void {
    for (const job of this.jobs.values()) {
      this.cancel(job.id)
    }
  }

  get(jobId: string): JobHandle | undefined {
    return this.jobs.get(jobId)
  }

  list(): JobHandle[] {
    return [...this.jobs.values()]
  }

  isBusy(target: Target): boolean {
    return this.locks.has(target)
  }

  private require(jobId: string): Job {
    const job = this.jobs.get(jobId)
    if (!job) {
      throw new JobNotFoundError(jobId)
    }
    return job
  }

  /**
   * Spawn the job's current step. Resolves once it has started or failed
   * to start.
   */
  private launch(job: Job): Promise<void> {
    const { file, args } = invocation(job.command, job.mergeStderr)

    return new Promise<void>(resolve => {
      let spawned = false
      let child: ChildProcess
      try {
        child = spawn(file, args, {
          cwd: job.command.cwd,
          env: { ...process.env, ...this.env, ...job.command.env },
          stdio: ['ignore', 'pipe', 'pipe'],
          detached: USE_PROCESS_GROUPS
        })
      } catch (err) {
        this.failLaunch(job, toError(err))
        resolve()
        return
      }

      child.once('spawn', () => {
        spawned = true
        job.attach(child)
        this.collect(job, child)
        if (job.cancelRequested) {
          this.terminate(job)
        }
        resolve()
      })

      child.on('error', err => {
        if (!spawned) {
          this.failLaunch(job, err)
          resolve()
          return
        }
        this.logger.warn(`${job.id}: ${err.message}`)
      })
    })
  }

  /**
   * Read both output streams line by line. Once the process has exited the
   * streams get `drainTimeoutMs` to reach EOF; after that they are closed,
   * since a background descendant may hold them open indefinitely.
   */
  private collect(job: Job, child: ChildProcess): void {
    const drained: Promise<Error | null> = Promise.all([
      readLines(child.stdout, text => job.pushLine('stdout', text)),
      readLines(child.stderr, text => job.pushLine('stderr', text))
    ]).then(() => null, (err: unknown) => toError(err))
    const exited = new Promise<void>(resolve => {
      child.once('exit', (code, signal) => {
        job.exitCode = code
        job.signal = signal
        resolve()
      })
    })

    exited
      .then(() => withTimeout(drained, this.drainTimeoutMs))
      .then(outcome => {
        if (outcome === 'timeout') {
          this.logger.warn(`${job.id}: output still open ${this.drainTimeoutMs}ms after exit, closing it`)
        } else if (outcome) {
          job.error = outcome.message
          this.logger.error(`${job.id}: ${job.error}`)
        }
        child.stdout?.destroy()
        child.stderr?.destroy()
        this.afterStep(job)
      })
      .catch((err: unknown) => {
        job.error = toError(err).message
        this.finish(job)
      })
  }

  /**
   * Start the next step after a successful one, or end the job
   */
  private afterStep(job: Job): void {
    const succeeded = job.exitCode === 0 && job.error === undefined
    if (!succeeded || job.cancelRequested || !job.hasNextStep()) {
      this.finish(job)
      return
    }

    job.step++
    this.logger.info(`${job.id} step ${job.step + 1}/${job.steps.length}: ${describeCommand(job.command)}`)
    this.launch(job).catch((err: unknown) => this.failLaunch(job, toError(err)))
  }

  private finish(job: Job): void {
    const state = job.cancelRequested
      ? 'cancelled'
      : job.exitCode === 0 && job.error === undefined ? 'succeeded' : 'failed'
    this.release(job)
    if (job.killTimer && !this.kill(job, 0)) {
      // the whole group is gone; nothing left for SIGKILL
      clearTimeout(job.killTimer)
      job.killTimer = null
    }
    if (job.settle(state)) {
      this.logger.info(`${job.id} ${state}${job.exitCode !== null ? ` (exit ${job.exitCode})` : ''}`)
    }
  }

  private failLaunch(job: Job, err: Error): void {
    job.error = err.message
    this.release(job)
    job.settle('failed')
    this.logger.error(`${job.id} failed to start: ${err.message}`)
  }

  private release(job: Job): void {
    if (this.locks.get(job.target) === job.id) {
      this.locks.delete(job.target)
    }
  }

  private terminate(job: Job): void {
    if (job.killTimer) {
      clearTimeout(job.killTimer)
    }
    this.kill(job, 'SIGTERM')
    // The timer outlives the job's terminal state: group members that
    // ignore SIGTERM must still be killed after the leader has exited.
    job.killTimer = setTimeout(() => {
      job.killTimer = null
      if (this.kill(job, 'SIGKILL')) {
        this.logger.warn(`${job.id} ignored SIGTERM for ${this.gracePeriodMs}ms, sent SIGKILL`)
      }
    }, this.gracePeriodMs)
    job.killTimer.unref()
  }

  /**
   * Signal the job's process group, or the child alone where there are no
   * process groups. Signal 0 only checks for a live member. Returns false when nothing was
   * left to signal.
   */
  private kill(job: Job, signal: NodeJS.Signals | 0): boolean {
    const child = job.child
    if (!child) {
      return false
    }
    try {
      if (USE_PROCESS_GROUPS && child.pid !== undefined) {
        // members of the group may outlive its leader
        process.kill(-child.pid, signal)
        return true
      }
      if (child.exitCode !== null || child.signalCode !== null) {
        return false
      }
      return child.kill(signal)
    } catch (err) {
      const error = toError(err)
      if (!('code' in error && error.code === 'ESRCH')) {
        this.logger.warn(`${job.id}: could not send ${signal}: ${error.message}`)
      }
      return false
    }
  }
}

function invocation(command: CommandSpec, mergeStderr: boolean): { file: string; args: string[] } {
  if (mergeStderr && USE_PROCESS_GROUPS) {
    // "$0" "$@" keeps the argument vector intact; no shell parsing of args
    return { file: '/bin/sh', args: ['-c', 'exec "$0" "$@" 2>&1', command.command, ...command.args] }
  }
  return { file: command.command, args: command.args }
}

function isCommandList(command: JobCommand): command is readonly CommandSpec[] {
  return Array.isArray(command)
}

function withTimeout<T>(work: Promise<T>, ms: number): Promise<T | 'timeout'> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<'timeout'>(resolve => {
    timer = setTimeout(() => resolve('timeout'), ms)
  })
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer))
}

function readLines(stream: Readable | null, onLine: (text: string) => void): Promise<void> {
  if (!stream) {
    return Promise.resolve()
  }
  return new Promise<void>((resolve, reject) => {
    const reader = createInterface({ input: stream, crlfDelay: Infinity })
    reader.on('line', onLine)
    reader.once('close', () => resolve())
    stream.once('error', reject)
  })
}

export function describeCommand(command: CommandSpec): string {
  return command.label ?? [command.command, ...command.args].join(' ')
}
