/**
 * Unit tests for TypedEventBusImpl.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { EngineEvents } from '../event-bus.types.js'
import type { JobEvent } from '../types.js'

const EVENT: JobEvent = {
  id: 'evt_1',
  jobId: 'job_1',
  sequence: 1,
  eventType: 'job_started',
  passNumber: null,
  message: 'Job started',
  details: {},
  createdAt: '2024-06-01T12:00:00.000Z',
}

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = createEventBus()
  })

  it('delivers the payload to a subscribed handler', () => {
    const handler = vi.fn<(payload: EngineEvents['job:event']) => void>()
    bus.on('job:event', handler)

    bus.emit('job:event', { event: EVENT })

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith({ event: EVENT })
  })

  it('does not deliver other event names', () => {
    const handler = vi.fn()
    bus.on('job:terminal', handler)

    bus.emit('job:queued', { jobId: 'job_1', position: 1 })

    expect(handler).not.toHaveBeenCalled()
  })

  it('stops delivering after off()', () => {
    const handlerA = vi.fn()
    const handlerB = vi.fn()
    bus.on('job:claimed', handlerA)
    bus.on('job:claimed', handlerB)

    bus.off('job:claimed', handlerA)
    bus.emit('job:claimed', { jobId: 'job_1', resumed: false })

    expect(handlerA).not.toHaveBeenCalled()
    expect(handlerB).toHaveBeenCalledOnce()
  })

  it('off() for an unknown handler is a no-op', () => {
    expect(() => bus.off('job:event', vi.fn())).not.toThrow()
  })

  it('calls handlers in registration order', () => {
    const order: number[] = []
    bus.on('engine:ready', () => order.push(1))
    bus.on('engine:ready', () => order.push(2))
    bus.on('engine:ready', () => order.push(3))

    bus.emit('engine:ready', {})

    expect(order).toEqual([1, 2, 3])
  })

  it('dispatches synchronously', () => {
    let called = false
    bus.on('engine:shutdown', () => {
      called = true
    })

    bus.emit('engine:shutdown', { reason: 'test' })

    expect(called).toBe(true)
  })

  it('emit() with no handlers does nothing', () => {
    expect(() => bus.emit('subscriber:overflow', { jobId: 'job_1', subscriptionId: 'sub_1', lastSequence: 4 })).not.toThrow()
  })

  it('reports a throwing handler and keeps delivering to the rest', () => {
    const errors: string[] = []
    const bus = new TypedEventBusImpl((err, event) => {
      errors.push(`${event}: ${err instanceof Error ? err.message : String(err)}`)
    })
    const after = vi.fn()
    bus.on('job:terminal', () => {
      throw new Error('renderer crashed')
    })
    bus.on('job:terminal', after)

    bus.emit('job:terminal', { jobId: 'job_1', status: 'completed' })

    expect(errors).toEqual(['job:terminal: renderer crashed'])
    expect(after).toHaveBeenCalledOnce()
  })
})
