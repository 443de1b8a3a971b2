import { describe, it, expect, vi } from 'vitest'
import { CancellationToken, PauseGate } from '../../src/engine/cancellation.js'
import { CancelledError } from '../../src/engine/errors.js'
import { flush } from '../helpers/manualClock.js'

describe('CancellationToken', () => {
  it('starts uncancelled', () => {
    const token = new CancellationToken()

    expect(token.isCancelled).toBe(false)
    expect(() => token.throwIfCancelled()).not.toThrow()
  })

  it('throws CancelledError with the given reason once cancelled', () => {
    const token = new CancellationToken()

    token.cancel('Stopped by user')

    expect(token.isCancelled).toBe(true)
    expect(() => token.throwIfCancelled()).toThrow(CancelledError)
    expect(() => token.throwIfCancelled()).toThrow('Stopped by user')
  })

  it('uses a default reason', () => {
    const token = new CancellationToken()

    token.cancel()

    expect(() => token.throwIfCancelled()).toThrow('Transfer cancelled')
  })

  it('notifies listeners exactly once', () => {
    const token = new CancellationToken()
    const listener = vi.fn()
    token.onCancel(listener)

    token.cancel()
    token.cancel('again')

    expect(listener).toHaveBeenCalledTimes(1)
    expect(() => token.throwIfCancelled()).toThrow('Transfer cancelled')
  })

  it('calls a listener registered after cancellation immediately', () => {
    const token = new CancellationToken()
    token.cancel()
    const listener = vi.fn()

    token.onCancel(listener)

    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('does not call a removed listener', () => {
    const token = new CancellationToken()
    const listener = vi.fn()
    const remove = token.onCancel(listener)

    remove()
    token.cancel()

    expect(listener).not.toHaveBeenCalled()
  })
})

describe('PauseGate', () => {
  it('passes straight through when open', async () => {
    const gate = new PauseGate()

    await expect(gate.wait(new CancellationToken())).resolves.toBeUndefined()
  })

  it('holds waiters until resumed', async () => {
    const gate = new PauseGate()
    const token = new CancellationToken()
    gate.pause()

    let released = false
    const waiting = gate.wait(token).then(() => {
      released = true
    })

    await flush()
    expect(released).toBe(false)
    expect(gate.isPaused).toBe(true)

    gate.resume()
    await waiting
    expect(released).toBe(true)
    expect(gate.isPaused).toBe(false)
  })

  it('rejects a waiter when the token is cancelled while paused', async () => {
    const gate = new PauseGate()
    const token = new CancellationToken()
    gate.pause()

    const waiting = gate.wait(token)
    token.cancel()

    await expect(waiting).rejects.toBeInstanceOf(CancelledError)
  })

  it('rejects immediately when the token is already cancelled', async () => {
    const gate = new PauseGate()
    const token = new CancellationToken()
    token.cancel()

    await expect(gate.wait(token)).rejects.toBeInstanceOf(CancelledError)
  })

  it('ignores resume when not paused', () => {
    const gate = new PauseGate()

    gate.resume()

    expect(gate.isPaused).toBe(false)
  })
})
