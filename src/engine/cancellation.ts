import { CancelledError } from './errors.js'

type Listener = () => void

/**
 * Cooperative cancellation signal
 *
 * Setting the token is instantaneous; the worker and enumerator observe it
 * at their checkpoints.
 */
export class CancellationToken {
  private cancelled = false
  private reason = 'Transfer cancelled'
  private listeners: Set<Listener> = new Set()

  get isCancelled(): boolean {
    return this.cancelled
  }

  /**
   * Request cancellation. Later calls are no-ops.
   */
  cancel(reason?: string): void {
    if (this.cancelled) {
      return
    }

    this.cancelled = true
    if (reason) {
      this.reason = reason
    }

    const listeners = [...this.listeners]
    this.listeners.clear()
    for (const listener of listeners) {
      listener()
    }
  }

  /**
   * Throw CancelledError if cancellation was requested
   */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancelledError(this.reason)
    }
  }

  /**
   * Register a listener called once on cancellation
   *
   * @returns Function that removes the listener
   */
  onCancel(listener: Listener): () => void {
    if (this.cancelled) {
      listener()
      return () => {}
    }

    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }
}

/**
 * Cooperative pause signal
 *
 * The worker awaits wait() at the same checkpoints where it checks for
 * cancellation; the await returns immediately when not paused.
 */
export class PauseGate {
  private paused = false
  private waiters: Set<Listener> = new Set()

  get isPaused(): boolean {
    return this.paused
  }

  pause(): void {
    this.paused = true
  }

  resume(): void {
    if (!this.paused) {
      return
    }

    this.paused = false
    const waiters = [...this.waiters]
    this.waiters.clear()
    for (const wake of waiters) {
      wake()
    }
  }

  /**
   * Resolve once the gate is open
   *
   * @throws {CancelledError} If the token is cancelled before or while waiting
   */
  async wait(token: CancellationToken): Promise<void> {
    token.throwIfCancelled()
    if (!this.paused) {
      return
    }

    await new Promise<void>((resolve, reject) => {
      const wake = (): void => {
        removeCancel()
        resolve()
      }
      const removeCancel = token.onCancel(() => {
        this.waiters.delete(wake)
        reject(new CancelledError())
      })
      this.waiters.add(wake)
    })
  }
}
