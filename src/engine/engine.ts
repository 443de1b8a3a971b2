import { randomUUID } from 'crypto'
import { EventEmitter } from 'events'
import * as path from 'path'
import type { HaulConfig } from '../config/schema.js'
import { DEFAULT_CONFIG } from '../config/schema.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'
import { ProgressAggregator, isTerminal } from './aggregator.js'
import { CancellationToken, PauseGate } from './cancellation.js'
import type { Clock } from './clock.js'
import { monotonicClock } from './clock.js'
import { FileEnumerator, type SkippedEntry } from './enumerator.js'
import {
  CancelledError,
  EnumerationError,
  JobFatalError,
  getErrorMessage,
  type PerFileError,
} from './errors.js'
import type { TransferFileSystem } from './fileSystem.js'
import { nodeFileSystem } from './fileSystem.js'
import { NotificationQueue } from './notifications.js'
import { RateEstimator } from './rateEstimator.js'
import {
  JobStatus,
  type AggregateProgress,
  type FileTask,
  type Notification,
  type NotificationSeverity,
  type ProgressSample,
  type TransferJob,
  type TransferRequest,
} from './types.js'
import { TransferWorker, type WorkerSink } from './worker.js'

/**
 * Transfer Engine
 *
 * Control surface over the enumerator, worker, aggregator and notification
 * queue. Jobs run one at a time in FIFO order; control calls are
 * synchronous and only set flags the running job observes at its next
 * checkpoint. All output goes through a single event channel.
 */

// ============================================================================
// Events
// ============================================================================

export type LifecycleKind = 'started' | 'file-error' | 'completed' | 'cancelled' | 'failed'

export type EngineEvent =
  | { type: 'progress'; jobId: string; snapshot: AggregateProgress }
  | { type: 'lifecycle'; jobId: string; kind: LifecycleKind; message: string }
  | { type: 'notifications'; visible: readonly Notification[] }

export type EngineListener = (event: EngineEvent) => void

export interface TransferEngineOptions {
  config?: HaulConfig
  fileSystem?: TransferFileSystem
  clock?: Clock
  logger?: Logger
}

interface JobEntry {
  job: TransferJob
  aggregator: ProgressAggregator
  token: CancellationToken
  gate: PauseGate
  done: Promise<AggregateProgress>
  settle: (snapshot: AggregateProgress) => void
  unsubscribe: () => void
  ticker?: ReturnType<typeof setInterval>
}

const EVENT = 'event'

// ============================================================================
// Engine
// ============================================================================

export class TransferEngine {
  private config: HaulConfig
  private fileSystem: TransferFileSystem
  private clock: Clock
  private logger: Logger

  private enumerator: FileEnumerator
  private worker: TransferWorker
  private notifications: NotificationQueue
  private emitter = new EventEmitter()

  private jobs: Map<string, JobEntry> = new Map()
  private queue: Promise<void> = Promise.resolve()
  private activeJobId?: string
  private lastJobId?: string
  private disposed = false

  constructor(options: TransferEngineOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG
    this.fileSystem = options.fileSystem ?? nodeFileSystem
    this.clock = options.clock ?? monotonicClock
    this.logger = options.logger ?? silentLogger

    const { transfer, notifications, enumeration } = this.config

    this.enumerator = new FileEnumerator({
      fileSystem: this.fileSystem,
      followSymlinks: enumeration.followSymlinks,
    })

    this.worker = new TransferWorker({
      fileSystem: this.fileSystem,
      clock: this.clock,
      logger: this.logger,
      chunkSize: transfer.chunkSize,
      sampleIntervalMs: transfer.sampleIntervalMs,
      preserveTimestamps: transfer.preserveTimestamps,
      verify: transfer.verify,
      checkFreeSpace: transfer.checkFreeSpace,
    })

    this.notifications = new NotificationQueue({
      maxVisible: notifications.maxVisible,
      defaultDurationMs: notifications.durationMs,
      maxBacklog: notifications.maxBacklog,
      clock: this.clock,
    })

    this.notifications.subscribe((state) => {
      this.emit({ type: 'notifications', visible: state.visible })
    })
  }

  // ==========================================================================
  // Job control
  // ==========================================================================

  /**
   * Queue a transfer
   *
   * @returns Id of the new job
   * @throws {Error} If the engine was disposed
   */
  start(request: TransferRequest): string {
    if (this.disposed) {
      throw new Error('Transfer engine has been disposed')
    }

    const job: TransferJob = {
      id: randomUUID(),
      sourceRoot: path.resolve(request.source),
      destinationRoot: path.resolve(request.destination),
      tasks: [],
      createdAt: Date.now(),
      status: JobStatus.PENDING,
    }

    const aggregator = new ProgressAggregator(job, {
      clock: this.clock,
      estimator: new RateEstimator(this.config.estimator),
    })

    let settle: (snapshot: AggregateProgress) => void = () => {}
    const done = new Promise<AggregateProgress>((resolve) => {
      settle = resolve
    })

    const entry: JobEntry = {
      job,
      aggregator,
      token: new CancellationToken(),
      gate: new PauseGate(),
      done,
      settle,
      unsubscribe: aggregator.subscribe((snapshot) => {
        this.emit({ type: 'progress', jobId: job.id, snapshot })
      }),
    }

    this.jobs.set(job.id, entry)
    this.lastJobId = job.id
    this.logger.debug(`Queued job ${job.id}: ${job.sourceRoot} -> ${job.destinationRoot}`)

    this.queue = this.queue.then(() => this.run(entry))
    return job.id
  }

  /**
   * Pause a running job at its next checkpoint
   *
   * @returns false if the job is unknown or not running
   */
  pause(jobId: string): boolean {
    const entry = this.jobs.get(jobId)
    if (!entry || !entry.aggregator.apply({ type: 'paused' })) {
      return false
    }
    entry.gate.pause()
    this.logger.debug(`Paused job ${jobId}`)
    return true
  }

  /**
   * Resume a paused job
   *
   * @returns false if the job is unknown or not paused
   */
  resume(jobId: string): boolean {
    const entry = this.jobs.get(jobId)
    if (!entry || !entry.aggregator.apply({ type: 'resumed' })) {
      return false
    }
    entry.gate.resume()
    this.logger.debug(`Resumed job ${jobId}`)
    return true
  }

  /**
   * Request cancellation
   *
   * A pending job is cancelled immediately and never runs. A running or
   * paused job stops at its next checkpoint.
   *
   * @returns false if the job is unknown, already cancelled or finished
   */
  cancel(jobId: string): boolean {
    const entry = this.jobs.get(jobId)
    if (!entry || entry.token.isCancelled || isTerminal(entry.aggregator.jobStatus)) {
      return false
    }

    entry.token.cancel()

    if (entry.aggregator.jobStatus === JobStatus.PENDING) {
      this.finishCancelled(entry)
    }
    return true
  }

  // ==========================================================================
  // Notifications
  // ==========================================================================

  dismiss(notificationId: string): boolean {
    return this.notifications.dismiss(notificationId)
  }

  getNotifications(): readonly Notification[] {
    return this.notifications.getVisible()
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Latest snapshot of a job
   *
   * Without an id, the active job or else the most recently started one.
   */
  getSnapshot(jobId?: string): AggregateProgress | undefined {
    const id = jobId ?? this.activeJobId ?? this.lastJobId
    if (id === undefined) {
      return undefined
    }
    return this.jobs.get(id)?.aggregator.getSnapshot()
  }

  getJob(jobId: string): Readonly<TransferJob> | undefined {
    return this.jobs.get(jobId)?.job
  }

  /**
   * Known jobs in start order
   */
  listJobs(): Array<Readonly<TransferJob>> {
    return [...this.jobs.values()].map((entry) => entry.job)
  }

  /**
   * Listen to progress, lifecycle and notification events
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: EngineListener): () => void {
    this.emitter.on(EVENT, listener)
    return () => {
      this.emitter.off(EVENT, listener)
    }
  }

  /**
   * Resolve with the terminal snapshot of a job
   *
   * @throws {Error} If the job is unknown
   */
  async waitForJob(jobId: string): Promise<AggregateProgress> {
    const entry = this.jobs.get(jobId)
    if (!entry) {
      throw new Error(`Unknown job: ${jobId}`)
    }
    return entry.done
  }

  /**
   * Forget a finished job
   *
   * @returns false if the job is unknown or still pending or running
   */
  acknowledge(jobId: string): boolean {
    const entry = this.jobs.get(jobId)
    if (!entry || !isTerminal(entry.aggregator.jobStatus)) {
      return false
    }

    entry.unsubscribe()
    this.jobs.delete(jobId)
    if (this.lastJobId === jobId) {
      this.lastJobId = undefined
    }
    return true
  }

  /**
   * Cancel every job, stop all timers and drop listeners
   *
   * Resolves once the queue has drained.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return
    }
    this.disposed = true

    for (const jobId of this.jobs.keys()) {
      this.cancel(jobId)
    }

    await this.queue

    this.notifications.clear()
    this.emitter.removeAllListeners()
  }

  // ==========================================================================
  // Job execution
  // ==========================================================================

  private async run(entry: JobEntry): Promise<void> {
    const { job, aggregator, token } = entry

    if (token.isCancelled) {
      return
    }

    this.activeJobId = job.id
    aggregator.apply({ type: 'job-started' })
    this.startTicker(entry)
    this.announce(entry, 'started', 'info', `Transfer started: ${job.sourceRoot}`)

    try {
      await this.transferJob(entry)
      aggregator.apply({ type: 'completed' })

      const snapshot = aggregator.getSnapshot()
      if (snapshot.filesSkipped > 0) {
        this.announce(entry, 'completed', 'warning', snapshot.statusText)
      } else {
        this.announce(entry, 'completed', 'success', 'Transfer complete')
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        this.finishCancelled(entry)
      } else {
        this.finishFailed(entry, error)
      }
    } finally {
      this.stopTicker(entry)
      if (this.activeJobId === job.id) {
        this.activeJobId = undefined
      }
      entry.settle(aggregator.getSnapshot())
    }
  }

  private async transferJob(entry: JobEntry): Promise<void> {
    const { job, aggregator, token, gate } = entry

    const onSkip = (skipped: SkippedEntry): void => {
      this.logger.warn(skipped.error.message)
      this.reportFileError(entry, skipped.error)
    }

    for await (const task of this.enumerator.enumerate(job.sourceRoot, token, onSkip)) {
      job.tasks.push(task)
      aggregator.apply({ type: 'file-discovered', task })
    }
    aggregator.apply({ type: 'enumeration-complete' })
    this.logger.debug(`Found ${job.tasks.length} files in ${job.sourceRoot}`)

    const sink = this.createSink(entry)
    let jobBytes = 0

    for (const task of job.tasks) {
      await this.worker.transfer(task, {
        destinationRoot: job.destinationRoot,
        token,
        gate,
        sink,
        jobBytes,
      })
      jobBytes += task.bytesCopied
    }

    token.throwIfCancelled()
  }

  private createSink(entry: JobEntry): WorkerSink {
    const { aggregator } = entry

    return {
      fileStarted: (task: FileTask, sample: ProgressSample) => {
        aggregator.apply({ type: 'file-started', task, sample })
      },
      sample: (task: FileTask, sample: ProgressSample) => {
        aggregator.apply({ type: 'sample', task, sample })
      },
      fileCompleted: (task: FileTask, sample: ProgressSample) => {
        aggregator.apply({ type: 'file-completed', task, sample })
      },
      fileFailed: (task: FileTask, error: PerFileError, sample: ProgressSample) => {
        aggregator.apply({ type: 'file-failed', task, sample })
        this.reportFileError(entry, error)
      },
    }
  }

  private reportFileError(entry: JobEntry, error: PerFileError): void {
    this.emitLifecycle(entry, 'file-error', error.message)
    if (this.config.notifications.perFileErrors) {
      this.notify(entry, 'warning', error.message)
    }
  }

  private finishCancelled(entry: JobEntry): void {
    if (!entry.aggregator.apply({ type: 'cancelled' })) {
      return
    }
    this.announce(entry, 'cancelled', 'info', entry.aggregator.getSnapshot().statusText)

    if (this.activeJobId !== entry.job.id) {
      // Never ran: nothing else will settle it
      entry.settle(entry.aggregator.getSnapshot())
    }
  }

  private finishFailed(entry: JobEntry, error: unknown): void {
    const reason = getErrorMessage(error)

    if (!(error instanceof EnumerationError) && !(error instanceof JobFatalError)) {
      this.logger.error(`Unexpected failure in job ${entry.job.id}: ${reason}`)
    }

    entry.aggregator.apply({ type: 'failed', reason })
    this.announce(entry, 'failed', 'error', `Transfer failed: ${reason}`)
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private startTicker(entry: JobEntry): void {
    const ticker = setInterval(() => {
      entry.aggregator.apply({ type: 'tick' })
    }, this.config.progress.tickIntervalMs)
    ticker.unref?.()
    entry.ticker = ticker
  }

  private stopTicker(entry: JobEntry): void {
    if (entry.ticker !== undefined) {
      clearInterval(entry.ticker)
      entry.ticker = undefined
    }
  }

  private announce(
    entry: JobEntry,
    kind: LifecycleKind,
    severity: NotificationSeverity,
    message: string
  ): void {
    this.logger.info(message)
    this.emitLifecycle(entry, kind, message)
    this.notify(entry, severity, message)
  }

  private notify(entry: JobEntry, severity: NotificationSeverity, message: string): void {
    this.notifications.enqueue({ message, severity, jobId: entry.job.id })
  }

  private emitLifecycle(entry: JobEntry, kind: LifecycleKind, message: string): void {
    this.emit({ type: 'lifecycle', jobId: entry.job.id, kind, message })
  }

  private emit(event: EngineEvent): void {
    try {
      this.emitter.emit(EVENT, event)
    } catch (error) {
      // Listener errors are logged, not rethrown
      this.logger.error(`Event listener failed: ${getErrorMessage(error)}`)
    }
  }
}
