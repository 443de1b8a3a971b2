import { describe, it, expect } from 'vitest'
import {
  currentFolder,
  renderBar,
  renderNotification,
  renderProgress,
  renderProgressLine,
} from '../../src/utils/progressDisplay.js'
import { JobStatus, type AggregateProgress } from '../../src/engine/types.js'

const snapshot: AggregateProgress = {
  jobId: 'job-1',
  version: 7,
  status: JobStatus.RUNNING,
  statusText: 'Copying docs/b.txt…',
  sourceRoot: '/src',
  folderPath: 'docs',
  currentFile: 'docs/b.txt',
  filesDone: 1,
  filesSkipped: 0,
  filesTotal: 5,
  bytesDone: 1024,
  bytesTotal: 5120,
  totalsFinal: true,
  percent: 20,
  elapsedMs: 2000,
  bytesPerSecond: 512,
  etaSeconds: 8,
  filesText: '1 / 5',
  sizeText: '1 KB / 5 KB',
  elapsedText: '00:00:02',
  etaText: '00:00:08',
}

describe('renderBar', () => {
  it('fills the bar in proportion to the percentage', () => {
    expect(renderBar(25, 8)).toBe('[##------]')
    expect(renderBar(0, 4)).toBe('[----]')
    expect(renderBar(100, 4)).toBe('[####]')
  })

  it('clamps percentages outside 0-100', () => {
    expect(renderBar(150, 4)).toBe('[####]')
    expect(renderBar(-5, 4)).toBe('[----]')
  })
})

describe('renderProgressLine', () => {
  it('joins the bar and every progress slot', () => {
    expect(renderProgressLine(snapshot)).toBe(
      '[####----------------]  20% | 1 / 5 files | 1 KB / 5 KB | 512 B/s | ETA 00:00:08 | 00:00:02'
    )
  })

  it('honours the bar width', () => {
    expect(renderProgressLine(snapshot, 10).startsWith('[##--------]  20%')).toBe(true)
  })
})

describe('currentFolder', () => {
  it('joins the source root and the folder of the current file', () => {
    expect(currentFolder(snapshot)).toBe('/src/docs')
    expect(currentFolder({ ...snapshot, folderPath: 'docs/2024' })).toBe('/src/docs/2024')
  })

  it('uses the source root for files at the top and before the first file', () => {
    expect(currentFolder({ ...snapshot, folderPath: '.' })).toBe('/src')
    expect(currentFolder({ ...snapshot, folderPath: '' })).toBe('/src')
  })
})

describe('renderProgress', () => {
  it('puts the status text and folder above the progress line', () => {
    expect(renderProgress(snapshot, 5)).toBe(
      [
        'Copying docs/b.txt…',
        '  Folder: /src/docs',
        '  [#----]  20% | 1 / 5 files | 1 KB / 5 KB | 512 B/s | ETA 00:00:08 | 00:00:02',
      ].join('\n')
    )
  })
})

describe('renderNotification', () => {
  it('prefixes the message with the severity symbol', () => {
    const base = { id: 'n1', createdAt: 0, durationMs: 3500 }

    expect(renderNotification({ ...base, message: 'Transfer complete', severity: 'success' })).toBe(
      '✔ Transfer complete'
    )
    expect(renderNotification({ ...base, message: 'Permission denied: a.txt', severity: 'warning' })).toBe(
      '⚠ Permission denied: a.txt'
    )
    expect(renderNotification({ ...base, message: 'Transfer failed', severity: 'error' })).toBe(
      '✖ Transfer failed'
    )
    expect(renderNotification({ ...base, message: 'Transfer started: /src', severity: 'info' })).toBe(
      'ℹ Transfer started: /src'
    )
  })
})
