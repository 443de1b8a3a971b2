import { createHash, type Hash } from 'crypto'
import * as path from 'path'
import type { CancellationToken, PauseGate } from './cancellation.js'
import type { Clock } from './clock.js'
import { monotonicClock } from './clock.js'
import {
  CancelledError,
  JobFatalError,
  PerFileError,
  classifyFileError,
  getErrorMessage,
  type FilePhase,
} from './errors.js'
import type { ReadHandle, TransferFileSystem, WriteHandle } from './fileSystem.js'
import { nodeFileSystem } from './fileSystem.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'
import { FileTaskStatus, type FileTask, type ProgressSample } from './types.js'

/**
 * Transfer Worker
 *
 * Copies one FileTask at a time in fixed-size chunks. Between chunks it
 * checks the cancellation token and the pause gate, so a single large file
 * stays responsive. Progress is coalesced: at most one sample per
 * sampleIntervalMs during a copy, plus one at each file boundary.
 */

// ============================================================================
// Types
// ============================================================================

export interface WorkerOptions {
  fileSystem?: TransferFileSystem
  clock?: Clock
  logger?: Logger
  /** @default 65536 */
  chunkSize?: number
  /** @default 100 */
  sampleIntervalMs?: number
  /** @default true */
  preserveTimestamps?: boolean
  /** Compare SHA-256 digests of source and destination after copying */
  verify?: boolean
  /** @default true */
  checkFreeSpace?: boolean
}

/**
 * Receives worker output
 *
 * The aggregator is the consumer; samples carry cumulative job bytes.
 */
export interface WorkerSink {
  fileStarted(task: FileTask, sample: ProgressSample): void
  sample(task: FileTask, sample: ProgressSample): void
  fileCompleted(task: FileTask, sample: ProgressSample): void
  fileFailed(task: FileTask, error: PerFileError, sample: ProgressSample): void
}

/**
 * Result of transferring one task
 */
export type FileOutcome =
  | { status: FileTaskStatus.DONE }
  | { status: FileTaskStatus.ERRORED; error: PerFileError }

/**
 * Per-job context passed to the worker
 */
export interface TransferContext {
  destinationRoot: string
  token: CancellationToken
  gate: PauseGate
  sink: WorkerSink
  /** Cumulative bytes already transferred for the job before this task */
  jobBytes: number
}

export const DEFAULT_CHUNK_SIZE = 64 * 1024
export const DEFAULT_SAMPLE_INTERVAL_MS = 100

// ============================================================================
// Worker
// ============================================================================

export class TransferWorker {
  private fileSystem: TransferFileSystem
  private clock: Clock
  private logger: Logger
  private chunkSize: number
  private sampleIntervalMs: number
  private preserveTimestamps: boolean
  private verify: boolean
  private checkFreeSpace: boolean

  constructor(options: WorkerOptions = {}) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem
    this.clock = options.clock ?? monotonicClock
    this.logger = options.logger ?? silentLogger
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
    this.sampleIntervalMs = options.sampleIntervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS
    this.preserveTimestamps = options.preserveTimestamps ?? true
    this.verify = options.verify ?? false
    this.checkFreeSpace = options.checkFreeSpace ?? true
  }

  /**
   * Check that the destination can take the task
   *
   * @throws {JobFatalError} If the destination root is gone or the volume cannot fit the file
   */
  async checkDestination(task: FileTask, destinationRoot: string): Promise<void> {
    if (!(await this.fileSystem.pathExists(destinationRoot))) {
      throw new JobFatalError(
        `Destination unavailable: ${destinationRoot}`,
        'destination-unavailable'
      )
    }

    if (!this.checkFreeSpace) {
      return
    }

    const free = await this.fileSystem.freeSpace(destinationRoot)
    if (free !== undefined && free < task.size) {
      throw new JobFatalError(
        `Destination full: ${task.relativePath} needs ${task.size} bytes, ${free} available`,
        'destination-full'
      )
    }
  }

  /**
   * Copy one task to the destination
   *
   * Per-file failures are returned as an ERRORED outcome. The partially
   * written destination file is removed on failure and on cancellation.
   *
   * @throws {CancelledError} If cancelled before or during the copy
   * @throws {JobFatalError} If the destination can take no more work
   */
  async transfer(task: FileTask, context: TransferContext): Promise<FileOutcome> {
    const { token, gate, sink } = context

    await gate.wait(token)
    await this.checkDestination(task, context.destinationRoot)

    const destinationPath = path.join(context.destinationRoot, ...task.relativePath.split('/'))
    task.status = FileTaskStatus.IN_PROGRESS
    sink.fileStarted(task, this.makeSample(context.jobBytes, task))

    this.logger.debug(`Copying ${task.relativePath} (${task.size} bytes)`)

    const attempt: CopyAttempt = { destinationPath, created: false }
    try {
      await this.copyFile(task, attempt, context)
    } catch (error) {
      if (attempt.created) {
        await this.removePartial(destinationPath)
      }

      if (error instanceof CancelledError) {
        task.status = FileTaskStatus.SKIPPED
        task.error = 'Cancelled'
        throw error
      }

      const classified =
        error instanceof CopyPhaseError
          ? classifyFileError(error.cause, task.relativePath, error.phase)
          : classifyFileError(error, task.relativePath, 'write')

      task.status = FileTaskStatus.ERRORED
      task.error = classified.message

      if (classified instanceof JobFatalError) {
        throw classified
      }

      this.logger.warn(classified.message)
      sink.fileFailed(task, classified, this.makeSample(context.jobBytes, task))
      return { status: FileTaskStatus.ERRORED, error: classified }
    }

    // bytesCopied stays below size when the file shrank after enumeration
    task.status = FileTaskStatus.DONE
    sink.fileCompleted(task, this.makeSample(context.jobBytes, task))
    return { status: FileTaskStatus.DONE }
  }

  private makeSample(jobBytes: number, task: FileTask): ProgressSample {
    return { timestamp: this.clock.now(), bytes: jobBytes + task.bytesCopied }
  }

  private async copyFile(task: FileTask, attempt: CopyAttempt, context: TransferContext): Promise<void> {
    const { destinationPath } = attempt

    await inPhase('write', () => this.fileSystem.ensureDir(path.dirname(destinationPath)))
    const source = await inPhase('read', () => this.fileSystem.openRead(task.sourcePath))

    let destination: WriteHandle | undefined
    const sourceHash = this.verify ? createHash('sha256') : undefined

    try {
      destination = await inPhase('write', () => this.fileSystem.openWrite(destinationPath))
      attempt.created = true
      await this.copyChunks(task, source, destination, sourceHash, context)
    } finally {
      await source.close()
      if (destination) {
        await destination.close()
      }
    }

    context.token.throwIfCancelled()

    if (sourceHash) {
      await this.verifyCopy(task, destinationPath, sourceHash.digest('hex'))
    }

    if (this.preserveTimestamps) {
      try {
        const stats = await this.fileSystem.stat(task.sourcePath)
        await this.fileSystem.utimes(destinationPath, stats.atime, stats.mtime)
      } catch (error) {
        this.logger.warn(
          `Could not preserve timestamps for ${task.relativePath}: ${getErrorMessage(error)}`
        )
      }
    }
  }

  private async copyChunks(
    task: FileTask,
    source: ReadHandle,
    destination: WriteHandle,
    sourceHash: Hash | undefined,
    context: TransferContext
  ): Promise<void> {
    const { token, gate, sink } = context
    const buffer = Buffer.alloc(this.chunkSize)
    let position = 0
    let lastSampleAt = this.clock.now()

    while (true) {
      await gate.wait(token)

      const bytesRead = await inPhase('read', () => source.read(buffer, position))
      if (bytesRead === 0) {
        break
      }

      await inPhase('write', () => destination.write(buffer, bytesRead))
      sourceHash?.update(buffer.subarray(0, bytesRead))
      position += bytesRead

      // A file that grew after enumeration is copied whole but reported at its enumerated size
      task.bytesCopied = Math.max(task.bytesCopied, Math.min(position, task.size))

      const now = this.clock.now()
      if (now - lastSampleAt >= this.sampleIntervalMs) {
        lastSampleAt = now
        sink.sample(task, { timestamp: now, bytes: context.jobBytes + task.bytesCopied })
      }
    }
  }

  private async verifyCopy(task: FileTask, destinationPath: string, expected: string): Promise<void> {
    const hash = createHash('sha256')
    const handle = await inPhase('read', () => this.fileSystem.openRead(destinationPath))
    const buffer = Buffer.alloc(this.chunkSize)
    let position = 0

    try {
      while (true) {
        const bytesRead = await inPhase('read', () => handle.read(buffer, position))
        if (bytesRead === 0) {
          break
        }
        hash.update(buffer.subarray(0, bytesRead))
        position += bytesRead
      }
    } finally {
      await handle.close()
    }

    if (hash.digest('hex') !== expected) {
      throw new PerFileError(
        `Checksum mismatch for ${task.relativePath}`,
        task.relativePath,
        'checksum'
      )
    }
  }

  private async removePartial(destinationPath: string): Promise<void> {
    try {
      await this.fileSystem.remove(destinationPath)
    } catch (error) {
      this.logger.warn(`Failed to remove partial file ${destinationPath}: ${getErrorMessage(error)}`)
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Destination state of one copy, used to clean up after a failure
 */
interface CopyAttempt {
  destinationPath: string
  /** Set once the destination file was opened for writing */
  created: boolean
}

/**
 * Wraps an I/O error with the phase it happened in
 */
class CopyPhaseError extends Error {
  constructor(
    public readonly phase: FilePhase,
    public readonly cause: unknown
  ) {
    super(getErrorMessage(cause))
    this.name = 'CopyPhaseError'
  }
}

async function inPhase<T>(phase: FilePhase, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation()
  } catch (error) {
    throw new CopyPhaseError(phase, error)
  }
}
