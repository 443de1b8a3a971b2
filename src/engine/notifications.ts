import { randomUUID } from 'crypto'
import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Clock } from './clock.js'
import { monotonicClock } from './clock.js'
import type { Notification, NotificationInput } from './types.js'

/**
 * Notification Queue
 *
 * FIFO with bounded concurrency: at most maxVisible notifications are
 * visible, the rest wait in arrival order. Each visible notification expires
 * on its own timer. The visible list is published through a zustand store.
 * Enqueueing never blocks the caller.
 */

export interface NotificationQueueOptions {
  /** @default 3 */
  maxVisible?: number
  /** @default 3500 */
  defaultDurationMs?: number
  /**
   * Waiting entries kept before the oldest is dropped
   * @default 50
   */
  maxBacklog?: number
  clock?: Clock
}

export interface NotificationState {
  visible: readonly Notification[]
  /** Number of notifications waiting for a visible slot */
  waiting: number
  /** Number of waiting notifications dropped on backlog overflow */
  dropped: number
}

export const DEFAULT_MAX_VISIBLE = 3
export const DEFAULT_NOTIFICATION_DURATION_MS = 3500
export const DEFAULT_MAX_BACKLOG = 50

export class NotificationQueue {
  readonly store: StoreApi<NotificationState>

  private readonly maxVisible: number
  private readonly defaultDurationMs: number
  private readonly maxBacklog: number
  private clock: Clock

  private visible: Notification[] = []
  private backlog: Notification[] = []
  private dropped = 0
  private timers: Map<string, ReturnType<typeof setTimeout>> = new Map()

  constructor(options: NotificationQueueOptions = {}) {
    this.maxVisible = options.maxVisible ?? DEFAULT_MAX_VISIBLE
    this.defaultDurationMs = options.defaultDurationMs ?? DEFAULT_NOTIFICATION_DURATION_MS
    this.maxBacklog = options.maxBacklog ?? DEFAULT_MAX_BACKLOG
    this.clock = options.clock ?? monotonicClock

    if (!Number.isInteger(this.maxVisible) || this.maxVisible < 1) {
      throw new RangeError(`maxVisible must be a positive integer, got ${this.maxVisible}`)
    }

    this.store = createStore<NotificationState>()(() => ({ visible: [], waiting: 0, dropped: 0 }))
  }

  /**
   * Add a notification
   *
   * It becomes visible immediately when a slot is free, otherwise it waits.
   */
  enqueue(input: NotificationInput): Notification {
    const notification: Notification = Object.freeze({
      id: randomUUID(),
      message: input.message,
      severity: input.severity,
      createdAt: this.clock.now(),
      durationMs: input.durationMs ?? this.defaultDurationMs,
      jobId: input.jobId,
    })

    this.backlog.push(notification)
    this.promote()

    while (this.backlog.length > this.maxBacklog) {
      this.backlog.shift()
      this.dropped += 1
    }

    this.publish()
    return notification
  }

  /**
   * Remove a visible or waiting notification
   *
   * @returns false if no notification has that id
   */
  dismiss(id: string): boolean {
    const visibleIndex = this.visible.findIndex((n) => n.id === id)
    if (visibleIndex !== -1) {
      this.visible.splice(visibleIndex, 1)
      this.clearTimer(id)
      this.promote()
      this.publish()
      return true
    }

    const waitingIndex = this.backlog.findIndex((n) => n.id === id)
    if (waitingIndex !== -1) {
      this.backlog.splice(waitingIndex, 1)
      this.publish()
      return true
    }

    return false
  }

  getVisible(): readonly Notification[] {
    return this.store.getState().visible
  }

  subscribe(listener: (state: NotificationState, previous: NotificationState) => void): () => void {
    return this.store.subscribe(listener)
  }

  /**
   * Drop every notification and stop all timers
   */
  clear(): void {
    for (const id of [...this.timers.keys()]) {
      this.clearTimer(id)
    }
    this.visible = []
    this.backlog = []
    this.publish()
  }

  private promote(): void {
    while (this.visible.length < this.maxVisible) {
      const next = this.backlog.shift()
      if (!next) {
        return
      }
      this.visible.push(next)
      this.startTimer(next)
    }
  }

  private startTimer(notification: Notification): void {
    const timer = setTimeout(() => {
      this.timers.delete(notification.id)
      this.expire(notification.id)
    }, notification.durationMs)
    timer.unref?.()
    this.timers.set(notification.id, timer)
  }

  private clearTimer(id: string): void {
    const timer = this.timers.get(id)
    if (timer !== undefined) {
      clearTimeout(timer)
      this.timers.delete(id)
    }
  }

  private expire(id: string): void {
    const index = this.visible.findIndex((n) => n.id === id)
    if (index === -1) {
      return
    }
    this.visible.splice(index, 1)
    this.promote()
    this.publish()
  }

  private publish(): void {
    this.store.setState(
      {
        visible: Object.freeze([...this.visible]),
        waiting: this.backlog.length,
        dropped: this.dropped,
      },
      true
    )
  }
}
