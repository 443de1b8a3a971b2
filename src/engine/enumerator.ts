import * as path from 'path'
import type { CancellationToken } from './cancellation.js'
import {
  EnumerationError,
  JobFatalError,
  classifyFileError,
  getErrorCode,
  getErrorMessage,
  type PerFileError,
} from './errors.js'
import type { FileStats, TransferFileSystem } from './fileSystem.js'
import { nodeFileSystem } from './fileSystem.js'
import { FileTaskStatus, type FileTask } from './types.js'

/**
 * File Enumerator
 *
 * Walks a source root depth-first and lazily yields one FileTask per file,
 * with its size resolved. Directory entries are visited in sorted order so
 * the task order is stable between runs.
 */

export interface EnumeratorOptions {
  fileSystem?: TransferFileSystem
  /**
   * Follow symbolic links to files and directories
   * When false, links are skipped
   * @default true
   */
  followSymlinks?: boolean
}

/**
 * Entry below the root that could not be read and was left out of the walk
 */
export interface SkippedEntry {
  path: string
  relativePath: string
  error: PerFileError
}

export type SkipListener = (skipped: SkippedEntry) => void

export class FileEnumerator {
  private fileSystem: TransferFileSystem
  private followSymlinks: boolean

  constructor(options: EnumeratorOptions = {}) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem
    this.followSymlinks = options.followSymlinks ?? true
  }

  /**
   * Enumerate the files under a source root
   *
   * Each call walks the tree afresh.
   *
   * Entries below the root that cannot be read (permissions, or removed
   * during the walk) are skipped and reported to `onSkip`.
   *
   * @param sourceRoot - Directory (or single file) to enumerate
   * @param token - Checked between directory entries
   * @throws {EnumerationError} If the root is missing or unreadable, or a symlink cycle exists
   * @throws {CancelledError} If the token is cancelled during the walk
   */
  async *enumerate(
    sourceRoot: string,
    token?: CancellationToken,
    onSkip?: SkipListener
  ): AsyncGenerator<FileTask> {
    const root = path.resolve(sourceRoot)
    const rootStats = await this.statRoot(root)

    if (rootStats.isFile()) {
      yield createTask(path.basename(root), root, rootStats.size)
      return
    }

    if (!rootStats.isDirectory()) {
      throw new EnumerationError(
        `Source is neither a file nor a directory: ${root}`,
        root,
        'unreadable'
      )
    }

    const rootReal = await this.resolveReal(root)
    yield* this.walk(root, '', [rootReal], token, onSkip)
  }

  private async statRoot(root: string): Promise<FileStats> {
    try {
      return await this.fileSystem.stat(root)
    } catch (error) {
      const code = getErrorCode(error)
      const cause = error instanceof Error ? error : undefined
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new EnumerationError(`Source does not exist: ${root}`, root, 'missing', cause)
      }
      if (code === 'ELOOP') {
        throw new EnumerationError(`Symbolic link cycle at ${root}`, root, 'cycle', cause)
      }
      throw new EnumerationError(
        `Cannot read source ${root}: ${getErrorMessage(error)}`,
        root,
        'unreadable',
        cause
      )
    }
  }

  private async resolveReal(dir: string): Promise<string> {
    try {
      return await this.fileSystem.realpath(dir)
    } catch (error) {
      throw new EnumerationError(
        `Cannot resolve ${dir}: ${getErrorMessage(error)}`,
        dir,
        getErrorCode(error) === 'ELOOP' ? 'cycle' : 'unreadable',
        error instanceof Error ? error : undefined
      )
    }
  }

  /**
   * Walk one directory
   *
   * @param ancestors - Real paths of the directories on the current descent path
   */
  private async *walk(
    dir: string,
    relativeDir: string,
    ancestors: string[],
    token?: CancellationToken,
    onSkip?: SkipListener
  ): AsyncGenerator<FileTask> {
    let entries: string[]
    try {
      entries = await this.fileSystem.readdir(dir)
    } catch (error) {
      if (relativeDir === '') {
        throw new EnumerationError(
          `Cannot read directory ${dir}: ${getErrorMessage(error)}`,
          dir,
          'unreadable',
          error instanceof Error ? error : undefined
        )
      }
      reportSkip(dir, relativeDir, error, onSkip)
      return
    }

    for (const name of [...entries].sort()) {
      token?.throwIfCancelled()

      const fullPath = path.join(dir, name)
      const relativePath = relativeDir ? `${relativeDir}/${name}` : name

      let stats: FileStats
      try {
        stats = await this.fileSystem.lstat(fullPath)
      } catch (error) {
        reportSkip(fullPath, relativePath, error, onSkip)
        continue
      }

      if (stats.isSymbolicLink()) {
        if (!this.followSymlinks) {
          continue
        }
        const target = await this.statLinkTarget(fullPath, relativePath, onSkip)
        if (!target) {
          continue
        }
        stats = target
      }

      if (stats.isDirectory()) {
        let real: string
        try {
          real = await this.fileSystem.realpath(fullPath)
        } catch (error) {
          if (getErrorCode(error) === 'ELOOP') {
            throw new EnumerationError(`Symbolic link cycle at ${fullPath}`, fullPath, 'cycle')
          }
          reportSkip(fullPath, relativePath, error, onSkip)
          continue
        }
        if (ancestors.includes(real)) {
          throw new EnumerationError(
            `Symbolic link cycle: ${fullPath} points back to ${real}`,
            fullPath,
            'cycle'
          )
        }
        yield* this.walk(fullPath, relativePath, [...ancestors, real], token, onSkip)
      } else if (stats.isFile()) {
        yield createTask(relativePath, fullPath, stats.size)
      }
      // Sockets, FIFOs and devices are not transferred
    }
  }

  /**
   * Stat the target of a link
   *
   * @returns undefined for a dangling link or an unreadable target
   */
  private async statLinkTarget(
    fullPath: string,
    relativePath: string,
    onSkip?: SkipListener
  ): Promise<FileStats | undefined> {
    try {
      return await this.fileSystem.stat(fullPath)
    } catch (error) {
      const code = getErrorCode(error)
      if (code === 'ENOENT') {
        // Dangling link
        return undefined
      }
      if (code === 'ELOOP') {
        throw new EnumerationError(
          `Symbolic link cycle at ${fullPath}`,
          fullPath,
          'cycle',
          error instanceof Error ? error : undefined
        )
      }
      reportSkip(fullPath, relativePath, error, onSkip)
      return undefined
    }
  }
}

function reportSkip(
  fullPath: string,
  relativePath: string,
  error: unknown,
  onSkip: SkipListener | undefined
): void {
  const classified = classifyFileError(error, relativePath, 'read')
  if (classified instanceof JobFatalError) {
    throw classified
  }
  onSkip?.({ path: fullPath, relativePath, error: classified })
}

function createTask(relativePath: string, sourcePath: string, size: number): FileTask {
  return {
    relativePath,
    sourcePath,
    size,
    bytesCopied: 0,
    status: FileTaskStatus.PENDING,
  }
}
