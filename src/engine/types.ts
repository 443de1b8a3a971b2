/**
 * Transfer Engine Data Model
 *
 * Types shared by the enumerator, worker, estimator, aggregator and
 * notification queue.
 */

// ============================================================================
// Jobs and Tasks
// ============================================================================

/**
 * Lifecycle of a transfer job
 *
 * pending → running → (paused ⇄ running) → completed | cancelled | failed
 */
export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  PAUSED = 'paused',
  CANCELLED = 'cancelled',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * Per-file status
 */
export enum FileTaskStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  DONE = 'done',
  SKIPPED = 'skipped',
  ERRORED = 'errored',
}

/**
 * One file to transfer
 *
 * `bytesCopied` is written by the TransferWorker only. It never exceeds
 * `size` and never decreases.
 */
export interface FileTask {
  /** Path relative to the job's source root, always '/'-separated */
  relativePath: string
  /** Absolute path of the source file */
  sourcePath: string
  /** Size in bytes resolved at enumeration time */
  size: number
  bytesCopied: number
  status: FileTaskStatus
  /** Reason for an errored or skipped task */
  error?: string
}

/**
 * One enumerate-then-copy operation
 */
export interface TransferJob {
  id: string
  sourceRoot: string
  destinationRoot: string
  /** Ordered tasks, filled while the source is enumerated */
  tasks: FileTask[]
  /** Wall-clock creation time (ms since epoch), for display only */
  createdAt: number
  status: JobStatus
}

/**
 * Request accepted by TransferEngine.start()
 */
export interface TransferRequest {
  source: string
  destination: string
}

// ============================================================================
// Progress
// ============================================================================

/**
 * Raw progress sample emitted by the worker
 */
export interface ProgressSample {
  /** Monotonic clock reading in milliseconds */
  readonly timestamp: number
  /** Cumulative bytes transferred for the whole job */
  readonly bytes: number
}

/**
 * Smoothed throughput and remaining time
 */
export interface RateEstimate {
  bytesPerSecond: number
  /** Seconds remaining, or null while the estimate is unknown */
  etaSeconds: number | null
}

/**
 * Externally visible progress snapshot
 *
 * Published whole and frozen; readers never observe a partial update.
 */
export interface AggregateProgress {
  readonly jobId: string
  /** Increases by one on every publish */
  readonly version: number
  readonly status: JobStatus
  readonly statusText: string
  readonly sourceRoot: string
  /** Folder of the file currently being processed, relative to the source */
  readonly folderPath: string
  readonly currentFile?: string
  readonly filesDone: number
  readonly filesSkipped: number
  readonly filesTotal: number
  readonly bytesDone: number
  readonly bytesTotal: number
  /** False while the source is still being enumerated */
  readonly totalsFinal: boolean
  /** 0-100, rounded down */
  readonly percent: number
  readonly elapsedMs: number
  readonly bytesPerSecond: number
  readonly etaSeconds: number | null
  readonly filesText: string
  readonly sizeText: string
  readonly elapsedText: string
  readonly etaText: string
}

// ============================================================================
// Notifications
// ============================================================================

export type NotificationSeverity = 'info' | 'success' | 'warning' | 'error'

export interface Notification {
  readonly id: string
  readonly message: string
  readonly severity: NotificationSeverity
  /** Monotonic clock reading at enqueue time */
  readonly createdAt: number
  readonly durationMs: number
  readonly jobId?: string
}

export interface NotificationInput {
  message: string
  severity: NotificationSeverity
  durationMs?: number
  jobId?: string
}
