import fs from 'fs-extra'
import { lstat, open, readdir, realpath, stat, statfs, utimes } from 'fs/promises'
import type { FileHandle } from 'fs/promises'

/**
 * File System Boundary
 *
 * The engine reaches the operating system only through this interface:
 * directory listing, symlink detection, file open/read/write/remove,
 * timestamps and free-space queries.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Subset of fs.Stats the engine relies on
 */
export interface FileStats {
  size: number
  atime: Date
  mtime: Date
  isFile(): boolean
  isDirectory(): boolean
  isSymbolicLink(): boolean
}

/**
 * Open source file
 */
export interface ReadHandle {
  /**
   * Read up to buffer.length bytes from the given position
   *
   * @returns Number of bytes read (0 at end of file)
   */
  read(buffer: Buffer, position: number): Promise<number>
  close(): Promise<void>
}

/**
 * Open destination file, written sequentially
 */
export interface WriteHandle {
  write(buffer: Buffer, length: number): Promise<void>
  close(): Promise<void>
}

export interface TransferFileSystem {
  stat(path: string): Promise<FileStats>
  lstat(path: string): Promise<FileStats>
  readdir(path: string): Promise<string[]>
  realpath(path: string): Promise<string>
  pathExists(path: string): Promise<boolean>
  ensureDir(path: string): Promise<void>
  openRead(path: string): Promise<ReadHandle>
  /** Create or truncate the file for writing */
  openWrite(path: string): Promise<WriteHandle>
  remove(path: string): Promise<void>
  utimes(path: string, atime: Date, mtime: Date): Promise<void>
  /**
   * Free bytes available on the volume holding the path
   *
   * @returns undefined when the platform cannot tell
   */
  freeSpace(path: string): Promise<number | undefined>
}

// ============================================================================
// Node implementation
// ============================================================================

class NodeReadHandle implements ReadHandle {
  constructor(private handle: FileHandle) {}

  async read(buffer: Buffer, position: number): Promise<number> {
    const { bytesRead } = await this.handle.read(buffer, 0, buffer.length, position)
    return bytesRead
  }

  async close(): Promise<void> {
    await this.handle.close()
  }
}

class NodeWriteHandle implements WriteHandle {
  constructor(private handle: FileHandle) {}

  async write(buffer: Buffer, length: number): Promise<void> {
    let offset = 0
    // FileHandle.write may write fewer bytes than requested
    while (offset < length) {
      const { bytesWritten } = await this.handle.write(buffer, offset, length - offset)
      offset += bytesWritten
    }
  }

  async close(): Promise<void> {
    await this.handle.close()
  }
}

/**
 * TransferFileSystem over fs-extra and fs/promises
 */
export const nodeFileSystem: TransferFileSystem = {
  stat: (path) => stat(path),
  lstat: (path) => lstat(path),
  readdir: (path) => readdir(path),
  realpath: (path) => realpath(path),
  pathExists: (path) => fs.pathExists(path),
  ensureDir: (path) => fs.ensureDir(path),

  async openRead(path) {
    return new NodeReadHandle(await open(path, 'r'))
  },

  async openWrite(path) {
    return new NodeWriteHandle(await open(path, 'w'))
  },

  remove: (path) => fs.remove(path),
  utimes: (path, atime, mtime) => utimes(path, atime, mtime),

  async freeSpace(path) {
    try {
      const stats = await statfs(path)
      return Number(stats.bavail) * Number(stats.bsize)
    } catch {
      return undefined
    }
  },
}
