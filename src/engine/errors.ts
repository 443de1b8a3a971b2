/**
 * Transfer Error Taxonomy
 *
 * - EnumerationError: the source cannot be walked; aborts the job before any copy
 * - PerFileError: one file failed; recorded on the task, the job continues
 * - JobFatalError: the destination can take no more work; job fails
 * - CancelledError: user-initiated stop; not a failure
 */

/**
 * Get the system error code from an unknown error, if any
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined
  }
  return undefined
}

/**
 * Get a displayable message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export type EnumerationErrorReason = 'missing' | 'unreadable' | 'cycle'

/**
 * Error thrown when the source tree cannot be enumerated
 */
export class EnumerationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly reason: EnumerationErrorReason,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'EnumerationError'
  }
}

export type PerFileErrorReason =
  | 'permission'
  | 'not-found'
  | 'read'
  | 'write'
  | 'disk-full'
  | 'checksum'
  | 'unknown'

/**
 * Error recorded on a single task
 */
export class PerFileError extends Error {
  constructor(
    message: string,
    public readonly relativePath: string,
    public readonly reason: PerFileErrorReason,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'PerFileError'
  }
}

export type JobFatalErrorReason = 'destination-unavailable' | 'destination-full'

/**
 * Error that stops the remaining tasks of a job
 */
export class JobFatalError extends Error {
  constructor(
    message: string,
    public readonly reason: JobFatalErrorReason,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'JobFatalError'
  }
}

/**
 * Error raised at a checkpoint after cancellation was requested
 */
export class CancelledError extends Error {
  constructor(message = 'Transfer cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

/**
 * I/O phase in which a per-file error happened
 */
export type FilePhase = 'read' | 'write'

const PERMISSION_CODES = new Set(['EACCES', 'EPERM'])
const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR'])
const DESTINATION_GONE_CODES = new Set(['EROFS', 'ENODEV', 'ENXIO'])

/**
 * Map a raw I/O error to the transfer error taxonomy
 *
 * Read-only or vanished destination volumes are job-fatal; everything else
 * is recorded against the file.
 *
 * @param error - Error raised by the file system
 * @param relativePath - Task the error belongs to
 * @param phase - Whether the source was being read or the destination written
 */
export function classifyFileError(
  error: unknown,
  relativePath: string,
  phase: FilePhase
): PerFileError | JobFatalError {
  if (error instanceof PerFileError || error instanceof JobFatalError) {
    return error
  }

  const code = getErrorCode(error)
  const cause = error instanceof Error ? error : undefined
  const detail = getErrorMessage(error)

  if (phase === 'write' && code !== undefined && DESTINATION_GONE_CODES.has(code)) {
    return new JobFatalError(`Destination unavailable: ${detail}`, 'destination-unavailable', cause)
  }

  if (code !== undefined && PERMISSION_CODES.has(code)) {
    return new PerFileError(`Permission denied: ${relativePath}`, relativePath, 'permission', cause)
  }

  if (code === 'ENOSPC') {
    return new PerFileError(`Destination full while writing ${relativePath}`, relativePath, 'disk-full', cause)
  }

  if (phase === 'read' && code !== undefined && MISSING_CODES.has(code)) {
    return new PerFileError(`Source file disappeared: ${relativePath}`, relativePath, 'not-found', cause)
  }

  if (code === undefined) {
    return new PerFileError(`Failed to copy ${relativePath}: ${detail}`, relativePath, 'unknown', cause)
  }

  return new PerFileError(
    `Failed to ${phase} ${relativePath}: ${detail}`,
    relativePath,
    phase,
    cause
  )
}
