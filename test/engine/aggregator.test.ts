import { describe, it, expect, beforeEach } from 'vitest'
import { ProgressAggregator } from '../../src/engine/aggregator.js'
import {
  FileTaskStatus,
  JobStatus,
  type AggregateProgress,
  type FileTask,
  type TransferJob,
} from '../../src/engine/types.js'
import { ManualClock } from '../helpers/manualClock.js'

function makeJob(): TransferJob {
  return {
    id: 'job-1',
    sourceRoot: '/src',
    destinationRoot: '/dst',
    tasks: [],
    createdAt: 0,
    status: JobStatus.PENDING,
  }
}

function makeTask(relativePath: string, size: number): FileTask {
  return {
    relativePath,
    sourcePath: `/src/${relativePath}`,
    size,
    bytesCopied: 0,
    status: FileTaskStatus.PENDING,
  }
}

describe('ProgressAggregator', () => {
  let clock: ManualClock
  let job: TransferJob
  let aggregator: ProgressAggregator
  const a = makeTask('docs/a.txt', 100)
  const b = makeTask('b.bin', 200)
  const c = makeTask('c.bin', 300)

  /**
   * Start the job and discover three files of 100, 200 and 300 bytes
   */
  function startWithThreeFiles(): void {
    aggregator.apply({ type: 'job-started' })
    aggregator.apply({ type: 'file-discovered', task: a })
    aggregator.apply({ type: 'file-discovered', task: b })
    aggregator.apply({ type: 'file-discovered', task: c })
    aggregator.apply({ type: 'enumeration-complete' })
  }

  beforeEach(() => {
    clock = new ManualClock()
    job = makeJob()
    aggregator = new ProgressAggregator(job, { clock })
  })

  describe('initial snapshot', () => {
    it('describes a pending job with nothing known', () => {
      const snapshot = aggregator.getSnapshot()

      expect(snapshot).toMatchObject({
        jobId: 'job-1',
        version: 0,
        status: JobStatus.PENDING,
        statusText: 'Pending',
        sourceRoot: '/src',
        folderPath: '',
        filesText: '0 / 0',
        sizeText: '0 B / 0 B',
        percent: 0,
        elapsedMs: 0,
        elapsedText: '00:00:00',
        etaSeconds: null,
        etaText: '--:--:--',
        totalsFinal: false,
      })
    })
  })

  describe('enumeration', () => {
    it('reports running totals while scanning', () => {
      aggregator.apply({ type: 'job-started' })
      aggregator.apply({ type: 'file-discovered', task: a })
      aggregator.apply({ type: 'file-discovered', task: b })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.statusText).toBe('Scanning source… (2 files found)')
      expect(snapshot.filesTotal).toBe(2)
      expect(snapshot.bytesTotal).toBe(300)
      expect(snapshot.totalsFinal).toBe(false)
      expect(snapshot.percent).toBe(0)
      expect(snapshot.etaSeconds).toBeNull()
    })

    it('marks the totals final when enumeration completes', () => {
      startWithThreeFiles()

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.totalsFinal).toBe(true)
      expect(snapshot.filesText).toBe('0 / 3')
      expect(snapshot.sizeText).toBe('0 B / 600 B')
    })
  })

  describe('transfer progress', () => {
    it('reports percent, rate and ETA after the first file', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'file-started', task: a, sample: { timestamp: 0, bytes: 0 } })
      clock.advance(1000)
      aggregator.apply({ type: 'file-completed', task: a, sample: { timestamp: 1000, bytes: 100 } })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot).toMatchObject({
        filesDone: 1,
        bytesDone: 100,
        percent: 16,
        filesText: '1 / 3',
        sizeText: '100 B / 600 B',
        bytesPerSecond: 100,
        etaSeconds: 5,
        etaText: '00:00:05',
        elapsedMs: 1000,
        elapsedText: '00:00:01',
      })
    })

    it('shows the current file and its folder', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'file-started', task: a, sample: { timestamp: 0, bytes: 0 } })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.statusText).toBe('Copying docs/a.txt…')
      expect(snapshot.currentFile).toBe('docs/a.txt')
      expect(snapshot.folderPath).toBe('docs')
    })

    it('uses "." as the folder of files at the source root', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'file-started', task: b, sample: { timestamp: 0, bytes: 0 } })

      expect(aggregator.getSnapshot().folderPath).toBe('.')
    })

    it('counts failed files as skipped in the status text', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'file-started', task: b, sample: { timestamp: 0, bytes: 0 } })
      aggregator.apply({ type: 'file-failed', task: b, sample: { timestamp: 0, bytes: 50 } })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.filesSkipped).toBe(1)
      expect(snapshot.filesDone).toBe(0)
      expect(snapshot.statusText).toBe('Copying b.bin… (1 file skipped)')
    })

    it('never lets the byte count go backward', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'sample', task: a, sample: { timestamp: 0, bytes: 80 } })
      aggregator.apply({ type: 'sample', task: a, sample: { timestamp: 10, bytes: 40 } })

      expect(aggregator.getSnapshot().bytesDone).toBe(80)
    })

    it('counts chunks copied since the last sample in every snapshot', () => {
      const task = makeTask('d.bin', 100)
      job.tasks.push(task)
      aggregator.apply({ type: 'job-started' })
      aggregator.apply({ type: 'file-discovered', task })
      aggregator.apply({ type: 'enumeration-complete' })
      aggregator.apply({ type: 'file-started', task, sample: { timestamp: 0, bytes: 0 } })

      task.bytesCopied = 40
      aggregator.apply({ type: 'paused' })

      expect(aggregator.getSnapshot()).toMatchObject({ bytesDone: 40, percent: 40, sizeText: '40 B / 100 B' })

      task.bytesCopied = 60
      aggregator.apply({ type: 'resumed' })

      expect(aggregator.getSnapshot().bytesDone).toBe(60)
    })

    it('reports 100% for a clean completion short of the enumerated bytes', () => {
      const task = makeTask('d.bin', 100)
      job.tasks.push(task)
      aggregator.apply({ type: 'job-started' })
      aggregator.apply({ type: 'file-discovered', task })
      aggregator.apply({ type: 'enumeration-complete' })
      task.bytesCopied = 80
      aggregator.apply({ type: 'file-completed', task, sample: { timestamp: 0, bytes: 80 } })
      aggregator.apply({ type: 'completed' })

      expect(aggregator.getSnapshot()).toMatchObject({ bytesDone: 80, bytesTotal: 100, percent: 100 })
    })

    it('refreshes elapsed time on ticks', () => {
      aggregator.apply({ type: 'job-started' })
      clock.advance(2500)
      aggregator.apply({ type: 'tick' })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.elapsedMs).toBe(2500)
      expect(snapshot.elapsedText).toBe('00:00:02')
    })

    it('turns the ETA unknown once progress stalls', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'file-started', task: a, sample: { timestamp: 0, bytes: 0 } })
      clock.advance(1000)
      aggregator.apply({ type: 'file-completed', task: a, sample: { timestamp: 1000, bytes: 100 } })

      clock.advance(4000)
      aggregator.apply({ type: 'tick' })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.etaSeconds).toBeNull()
      expect(snapshot.etaText).toBe('--:--:--')
      expect(snapshot.bytesPerSecond).toBe(0)
    })
  })

  describe('pause and resume', () => {
    it('rejects pause before the job starts', () => {
      expect(aggregator.apply({ type: 'paused' })).toBe(false)
      expect(aggregator.getSnapshot().version).toBe(0)
    })

    it('shows the paused state without an ETA', () => {
      startWithThreeFiles()

      expect(aggregator.apply({ type: 'paused' })).toBe(true)

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.status).toBe(JobStatus.PAUSED)
      expect(snapshot.statusText).toBe('Paused')
      expect(snapshot.etaSeconds).toBeNull()
    })

    it('only resumes a paused job', () => {
      startWithThreeFiles()

      expect(aggregator.apply({ type: 'resumed' })).toBe(false)
      aggregator.apply({ type: 'paused' })
      expect(aggregator.apply({ type: 'resumed' })).toBe(true)
      expect(aggregator.getSnapshot().status).toBe(JobStatus.RUNNING)
    })
  })

  describe('terminal states', () => {
    it('summarizes a completed job with skipped files', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'file-started', task: a, sample: { timestamp: 0, bytes: 0 } })
      clock.advance(1000)
      aggregator.apply({ type: 'file-completed', task: a, sample: { timestamp: 1000, bytes: 100 } })
      aggregator.apply({ type: 'file-started', task: b, sample: { timestamp: 1000, bytes: 100 } })
      clock.advance(1000)
      aggregator.apply({ type: 'file-failed', task: b, sample: { timestamp: 2000, bytes: 150 } })
      aggregator.apply({ type: 'file-started', task: c, sample: { timestamp: 2000, bytes: 150 } })
      clock.advance(1000)
      aggregator.apply({ type: 'file-completed', task: c, sample: { timestamp: 3000, bytes: 450 } })
      aggregator.apply({ type: 'completed' })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot).toMatchObject({
        status: JobStatus.COMPLETED,
        statusText: '2 of 3 files copied, 1 skipped',
        percent: 75,
        etaSeconds: 0,
        etaText: '00:00:00',
        elapsedMs: 3000,
      })
      expect(snapshot.currentFile).toBeUndefined()
    })

    it('reports a clean completion', () => {
      aggregator.apply({ type: 'job-started' })
      aggregator.apply({ type: 'file-discovered', task: a })
      aggregator.apply({ type: 'enumeration-complete' })
      aggregator.apply({ type: 'file-completed', task: a, sample: { timestamp: 0, bytes: 100 } })
      aggregator.apply({ type: 'completed' })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.statusText).toBe('Completed')
      expect(snapshot.percent).toBe(100)
    })

    it('reports an empty source as complete at 100%', () => {
      aggregator.apply({ type: 'job-started' })
      aggregator.apply({ type: 'enumeration-complete' })
      aggregator.apply({ type: 'completed' })

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.statusText).toBe('No files to transfer')
      expect(snapshot.percent).toBe(100)
      expect(snapshot.filesText).toBe('0 / 0')
    })

    it('rejects completion of a job that never started', () => {
      expect(aggregator.apply({ type: 'completed' })).toBe(false)
    })

    it('describes a cancelled job', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'file-completed', task: a, sample: { timestamp: 0, bytes: 100 } })
      aggregator.apply({ type: 'cancelled' })

      expect(aggregator.getSnapshot().statusText).toBe('Cancelled: 1 of 3 files copied')
      expect(job.status).toBe(JobStatus.CANCELLED)
    })

    it('describes a failed job with its reason', () => {
      startWithThreeFiles()
      aggregator.apply({ type: 'failed', reason: 'Destination unavailable: /dst' })

      expect(aggregator.getSnapshot().statusText).toBe('Failed: Destination unavailable: /dst')
      expect(job.status).toBe(JobStatus.FAILED)
    })

    it('rejects every event once terminal and freezes elapsed time', () => {
      aggregator.apply({ type: 'job-started' })
      clock.advance(3000)
      aggregator.apply({ type: 'cancelled' })
      const version = aggregator.getSnapshot().version

      clock.advance(10_000)
      expect(aggregator.apply({ type: 'tick' })).toBe(false)
      expect(aggregator.apply({ type: 'resumed' })).toBe(false)
      expect(aggregator.apply({ type: 'file-discovered', task: a })).toBe(false)

      const snapshot = aggregator.getSnapshot()
      expect(snapshot.version).toBe(version)
      expect(snapshot.elapsedMs).toBe(3000)
    })
  })

  describe('publication', () => {
    it('publishes frozen snapshots with increasing versions', () => {
      const received: AggregateProgress[] = []
      aggregator.subscribe((snapshot) => {
        received.push(snapshot)
      })

      aggregator.apply({ type: 'job-started' })
      aggregator.apply({ type: 'file-discovered', task: a })

      expect(received.map((snapshot) => snapshot.version)).toEqual([1, 2])
      expect(received.every((snapshot) => Object.isFrozen(snapshot))).toBe(true)
    })

    it('leaves earlier snapshots untouched', () => {
      aggregator.apply({ type: 'job-started' })
      const before = aggregator.getSnapshot()

      aggregator.apply({ type: 'file-discovered', task: a })

      expect(before.filesTotal).toBe(0)
      expect(aggregator.getSnapshot().filesTotal).toBe(1)
    })

    it('mirrors the status onto the job', () => {
      aggregator.apply({ type: 'job-started' })
      expect(job.status).toBe(JobStatus.RUNNING)

      aggregator.apply({ type: 'paused' })
      expect(job.status).toBe(JobStatus.PAUSED)
    })
  })
})
