import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Clock } from './clock.js'
import { monotonicClock } from './clock.js'
import { RateEstimator } from './rateEstimator.js'
import {
  FileTaskStatus,
  JobStatus,
  type AggregateProgress,
  type FileTask,
  type ProgressSample,
  type TransferJob,
} from './types.js'
import { formatDuration, formatSize, pluralize } from '../utils/format.js'

/**
 * Progress Aggregator
 *
 * Single writer of a job's AggregateProgress. Every accepted event
 * recomputes the snapshot and publishes it whole into a zustand store, so
 * readers (pull via getSnapshot, push via subscribe) never see a torn state.
 */

// ============================================================================
// Events
// ============================================================================

export type AggregatorEvent =
  | { type: 'job-started' }
  | { type: 'file-discovered'; task: FileTask }
  | { type: 'enumeration-complete' }
  | { type: 'file-started'; task: FileTask; sample: ProgressSample }
  | { type: 'sample'; task: FileTask; sample: ProgressSample }
  | { type: 'file-completed'; task: FileTask; sample: ProgressSample }
  | { type: 'file-failed'; task: FileTask; sample: ProgressSample }
  | { type: 'paused' }
  | { type: 'resumed' }
  | { type: 'cancelled' }
  | { type: 'failed'; reason: string }
  | { type: 'completed' }
  | { type: 'tick' }

const TERMINAL_STATES: ReadonlySet<JobStatus> = new Set([
  JobStatus.COMPLETED,
  JobStatus.CANCELLED,
  JobStatus.FAILED,
])

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATES.has(status)
}

export interface AggregatorOptions {
  clock?: Clock
  estimator?: RateEstimator
}

// ============================================================================
// Aggregator
// ============================================================================

export class ProgressAggregator {
  readonly store: StoreApi<AggregateProgress>

  private clock: Clock
  private estimator: RateEstimator

  private status: JobStatus = JobStatus.PENDING
  private scanning = false
  private totalsFinal = false
  private filesTotal = 0
  private bytesTotal = 0
  private filesDone = 0
  private filesSkipped = 0
  private bytesDone = 0
  private currentFile?: string
  private failureReason?: string
  private startedAt?: number
  private endedAt?: number
  private version = 0

  constructor(
    private job: TransferJob,
    options: AggregatorOptions = {}
  ) {
    this.clock = options.clock ?? monotonicClock
    this.estimator = options.estimator ?? new RateEstimator()
    this.store = createStore<AggregateProgress>()(() => this.buildSnapshot())
  }

  get jobStatus(): JobStatus {
    return this.status
  }

  getSnapshot(): AggregateProgress {
    return this.store.getState()
  }

  subscribe(listener: (snapshot: AggregateProgress, previous: AggregateProgress) => void): () => void {
    return this.store.subscribe(listener)
  }

  /**
   * Apply one event and publish a new snapshot
   *
   * @returns false if the event was rejected (terminal job or invalid transition)
   */
  apply(event: AggregatorEvent): boolean {
    if (isTerminal(this.status)) {
      return false
    }

    if (!this.reduce(event)) {
      return false
    }

    this.publish()
    return true
  }

  private reduce(event: AggregatorEvent): boolean {
    switch (event.type) {
      case 'job-started':
        if (this.status !== JobStatus.PENDING) {
          return false
        }
        this.status = JobStatus.RUNNING
        this.scanning = true
        this.startedAt = this.clock.now()
        return true

      case 'file-discovered':
        this.filesTotal += 1
        this.bytesTotal += event.task.size
        return true

      case 'enumeration-complete':
        this.scanning = false
        this.totalsFinal = true
        return true

      case 'file-started':
        this.currentFile = event.task.relativePath
        this.recordSample(event.sample)
        return true

      case 'sample':
        this.recordSample(event.sample)
        return true

      case 'file-completed':
        this.recordSample(event.sample)
        this.filesDone += 1
        return true

      case 'file-failed':
        this.recordSample(event.sample)
        this.filesSkipped += 1
        return true

      case 'paused':
        if (this.status !== JobStatus.RUNNING) {
          return false
        }
        this.status = JobStatus.PAUSED
        return true

      case 'resumed':
        if (this.status !== JobStatus.PAUSED) {
          return false
        }
        this.status = JobStatus.RUNNING
        return true

      case 'cancelled':
        this.finish(JobStatus.CANCELLED)
        return true

      case 'failed':
        this.failureReason = event.reason
        this.finish(JobStatus.FAILED)
        return true

      case 'completed':
        if (this.status === JobStatus.PENDING) {
          return false
        }
        this.finish(JobStatus.COMPLETED)
        return true

      case 'tick':
        return this.status === JobStatus.RUNNING || this.status === JobStatus.PAUSED
    }
  }

  private recordSample(sample: ProgressSample): void {
    this.bytesDone = Math.max(this.bytesDone, sample.bytes)
    this.estimator.addSample(sample)
  }

  /**
   * Bytes copied by the job's tasks, including chunks no sample has reported yet
   *
   * Never goes backward within a job.
   */
  private syncBytesDone(): number {
    const copied = this.job.tasks.reduce((sum, task) => sum + task.bytesCopied, 0)
    this.bytesDone = Math.max(this.bytesDone, copied)
    return this.bytesDone
  }

  private finish(status: JobStatus): void {
    this.status = status
    this.scanning = false
    this.currentFile = undefined
    this.endedAt = this.clock.now()
    this.job.status = status
  }

  private publish(): void {
    this.job.status = this.status
    this.store.setState(this.buildSnapshot(), true)
  }

  private buildSnapshot(): AggregateProgress {
    const now = this.clock.now()
    const bytesDone = this.syncBytesDone()
    const elapsedMs =
      this.startedAt === undefined ? 0 : Math.max(0, (this.endedAt ?? now) - this.startedAt)

    let bytesPerSecond = 0
    let etaSeconds: number | null = null
    if (this.status === JobStatus.COMPLETED) {
      etaSeconds = 0
    } else if (this.status === JobStatus.RUNNING && this.totalsFinal) {
      const estimate = this.estimator.estimate(this.bytesTotal, bytesDone, now)
      bytesPerSecond = estimate.bytesPerSecond
      etaSeconds = estimate.etaSeconds
    }

    const snapshot: AggregateProgress = {
      jobId: this.job.id,
      version: this.version++,
      status: this.status,
      statusText: this.describeStatus(),
      sourceRoot: this.job.sourceRoot,
      folderPath: folderOf(this.currentFile),
      currentFile: this.currentFile,
      filesDone: this.filesDone,
      filesSkipped: this.filesSkipped,
      filesTotal: this.filesTotal,
      bytesDone,
      bytesTotal: this.bytesTotal,
      totalsFinal: this.totalsFinal,
      percent: this.computePercent(),
      elapsedMs,
      bytesPerSecond,
      etaSeconds,
      filesText: `${this.filesDone} / ${this.filesTotal}`,
      sizeText: `${formatSize(bytesDone)} / ${formatSize(this.bytesTotal)}`,
      elapsedText: formatDuration(elapsedMs / 1000),
      etaText: formatDuration(etaSeconds),
    }

    return Object.freeze(snapshot)
  }

  private computePercent(): number {
    if (!this.totalsFinal) {
      return 0
    }

    // Files that shrank after enumeration leave bytesDone short of bytesTotal
    if (this.status === JobStatus.COMPLETED && this.filesSkipped === 0) {
      return 100
    }

    if (this.bytesTotal > 0) {
      return clampPercent(Math.floor((this.bytesDone / this.bytesTotal) * 100))
    }

    if (this.filesTotal > 0) {
      return clampPercent(Math.floor((this.filesDone / this.filesTotal) * 100))
    }

    return this.status === JobStatus.COMPLETED ? 100 : 0
  }

  private describeStatus(): string {
    switch (this.status) {
      case JobStatus.PENDING:
        return 'Pending'

      case JobStatus.PAUSED:
        return 'Paused'

      case JobStatus.RUNNING: {
        if (this.scanning) {
          return `Scanning source… (${pluralize(this.filesTotal, 'file')} found)`
        }
        if (this.currentFile === undefined) {
          return 'Starting…'
        }
        const skipped = this.filesSkipped > 0 ? ` (${pluralize(this.filesSkipped, 'file')} skipped)` : ''
        return `Copying ${this.currentFile}…${skipped}`
      }

      case JobStatus.COMPLETED:
        if (this.filesTotal === 0) {
          return 'No files to transfer'
        }
        if (this.filesSkipped > 0) {
          return `${this.filesDone} of ${this.filesTotal} files copied, ${this.filesSkipped} skipped`
        }
        return 'Completed'

      case JobStatus.CANCELLED:
        return `Cancelled: ${this.filesDone} of ${this.filesTotal} files copied`

      case JobStatus.FAILED:
        return `Failed: ${this.failureReason ?? 'unknown error'}`
    }
  }
}

function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, value))
}

/**
 * Folder part of a '/'-separated relative path ('.' for the source root)
 */
function folderOf(relativePath: string | undefined): string {
  if (relativePath === undefined) {
    return ''
  }
  const index = relativePath.lastIndexOf('/')
  return index === -1 ? '.' : relativePath.slice(0, index)
}

/**
 * Tasks that have not been processed
 */
export function pendingTasks(tasks: readonly FileTask[]): FileTask[] {
  return tasks.filter((task) => task.status === FileTaskStatus.PENDING)
}
