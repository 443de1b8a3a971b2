import type { ProgressSample, RateEstimate } from './types.js'

/**
 * Rate Estimator
 *
 * Keeps a time-based sliding window of progress samples, so the estimate
 * does not depend on how often samples arrive. The windowed rate is smoothed
 * with an exponential moving average to keep the displayed ETA steady under
 * bursty I/O.
 */

export interface RateEstimatorOptions {
  /**
   * Width of the sample window
   * @default 10000
   */
  windowMs?: number
  /**
   * EMA weight of the newest windowed rate, in (0, 1]
   * @default 0.3
   */
  smoothingFactor?: number
  /**
   * Without a sample for longer than this the ETA becomes unknown
   * @default 3000
   */
  idleThresholdMs?: number
}

export const DEFAULT_WINDOW_MS = 10_000
export const DEFAULT_SMOOTHING_FACTOR = 0.3
export const DEFAULT_IDLE_THRESHOLD_MS = 3_000

export class RateEstimator {
  private readonly windowMs: number
  private readonly smoothingFactor: number
  private readonly idleThresholdMs: number

  private samples: ProgressSample[] = []
  private smoothedRate = 0
  private hasRate = false

  constructor(options: RateEstimatorOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS
    this.smoothingFactor = options.smoothingFactor ?? DEFAULT_SMOOTHING_FACTOR
    this.idleThresholdMs = options.idleThresholdMs ?? DEFAULT_IDLE_THRESHOLD_MS

    if (this.windowMs <= 0) {
      throw new RangeError(`windowMs must be positive, got ${this.windowMs}`)
    }
    if (!(this.smoothingFactor > 0 && this.smoothingFactor <= 1)) {
      throw new RangeError(`smoothingFactor must be in (0, 1], got ${this.smoothingFactor}`)
    }
  }

  /**
   * Smoothed bytes per second (0 until a rate is known)
   */
  get bytesPerSecond(): number {
    return this.smoothedRate
  }

  /**
   * Timestamp of the newest accepted sample
   */
  get lastSampleAt(): number | undefined {
    return this.samples[this.samples.length - 1]?.timestamp
  }

  /**
   * Feed a sample
   *
   * Samples older than the newest one are ignored. Byte counts that go
   * backward are held at the previous value.
   */
  addSample(sample: ProgressSample): void {
    const last = this.samples[this.samples.length - 1]
    if (last && sample.timestamp < last.timestamp) {
      return
    }

    const accepted: ProgressSample = last
      ? { timestamp: sample.timestamp, bytes: Math.max(sample.bytes, last.bytes) }
      : sample

    this.samples.push(accepted)
    this.evict(accepted.timestamp)

    const anchor = this.samples[0]
    if (!anchor) {
      return
    }

    const elapsedMs = accepted.timestamp - anchor.timestamp
    if (elapsedMs <= 0) {
      return
    }

    const instantRate = ((accepted.bytes - anchor.bytes) / elapsedMs) * 1000
    this.smoothedRate = this.hasRate
      ? this.smoothingFactor * instantRate + (1 - this.smoothingFactor) * this.smoothedRate
      : instantRate
    this.hasRate = true
  }

  /**
   * Current rate and ETA
   *
   * @param totalBytes - Job byte total
   * @param doneBytes - Bytes transferred so far
   * @param now - Monotonic clock reading, used for idle detection
   */
  estimate(totalBytes: number, doneBytes: number, now?: number): RateEstimate {
    const remaining = Math.max(0, totalBytes - doneBytes)
    const lastAt = this.lastSampleAt

    if (!this.hasRate || lastAt === undefined) {
      return { bytesPerSecond: 0, etaSeconds: null }
    }

    if (now !== undefined && now - lastAt > this.idleThresholdMs) {
      return { bytesPerSecond: 0, etaSeconds: null }
    }

    if (remaining === 0) {
      return { bytesPerSecond: this.smoothedRate, etaSeconds: 0 }
    }

    if (this.smoothedRate <= 0) {
      return { bytesPerSecond: 0, etaSeconds: null }
    }

    return { bytesPerSecond: this.smoothedRate, etaSeconds: remaining / this.smoothedRate }
  }

  reset(): void {
    this.samples = []
    this.smoothedRate = 0
    this.hasRate = false
  }

  /**
   * Drop samples older than the window, keeping the newest of them as the
   * window anchor so a burst after a gap still yields a rate
   */
  private evict(now: number): void {
    const cutoff = now - this.windowMs
    let firstInWindow = this.samples.findIndex((sample) => sample.timestamp >= cutoff)
    if (firstInWindow === -1) {
      firstInWindow = this.samples.length
    }
    const keepFrom = Math.max(0, firstInWindow - 1)
    if (keepFrom > 0) {
      this.samples = this.samples.slice(keepFrom)
    }
  }
}
