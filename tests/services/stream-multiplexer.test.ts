import { describe, it, expect, vi } from 'vitest'
import { StreamMultiplexer } from '../../src/services/stream-multiplexer'
import { logger } from '../../src/utils/logger'
import type { JointsFrame, StreamEvent, TouchEvent } from '../../src/types/robot'

const joints = (value: number): JointsFrame => ({ kind: 'joints', names: ['HeadYaw'], angles: [value] })
const touch = (state: 0 | 1): TouchEvent => ({ kind: 'touch', part: 'FrontTactilTouched', state })

const deferred = () => {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

const flush = () => new Promise((resolve) => setImmediate(resolve))

describe('StreamMultiplexer', () => {
  it('keeps only the newest joints frame behind the one in flight', async () => {
    const multiplexer = new StreamMultiplexer()
    const gate = deferred()
    const received: number[] = []
    multiplexer.subscribe('joints', async (event) => {
      if (event.kind === 'joints') {
        received.push(event.angles[0])
      }
      if (received.length === 1) {
        await gate.promise
      }
    })

    multiplexer.publish(joints(1))
    multiplexer.publish(joints(2))
    multiplexer.publish(joints(3))
    multiplexer.publish(joints(4))
    gate.resolve()
    await flush()

    expect(received).toEqual([1, 4])
    expect(multiplexer.stats()).toEqual([{ kind: 'joints', queued: 0, delivered: 2, dropped: 2 }])
  })

  it('delivers every touch event in order even when the consumer is slow', async () => {
    const multiplexer = new StreamMultiplexer()
    const gate = deferred()
    const received: Array<0 | 1> = []
    multiplexer.subscribe('touch', async (event) => {
      if (event.kind === 'touch') {
        received.push(event.state)
      }
      await gate.promise
    })

    multiplexer.publish(touch(1))
    multiplexer.publish(touch(0))
    multiplexer.publish(touch(1))
    gate.resolve()
    await flush()

    expect(received).toEqual([1, 0, 1])
  })

  it('does not let a stalled kind block another kind', async () => {
    const multiplexer = new StreamMultiplexer()
    const stalled = deferred()
    const touches: StreamEvent[] = []
    multiplexer.subscribe('joints', () => stalled.promise)
    multiplexer.subscribe('touch', (event) => {
      touches.push(event)
    })

    multiplexer.publish(joints(1))
    multiplexer.publish(touch(1))
    await flush()

    expect(touches).toEqual([touch(1)])
    stalled.resolve()
  })

  it('stops calling the consumer as soon as unsubscribe returns', async () => {
    const multiplexer = new StreamMultiplexer()
    const gate = deferred()
    const consumer = vi.fn(async () => {
      await gate.promise
    })
    multiplexer.subscribe('touch', consumer)

    multiplexer.publish(touch(1))
    multiplexer.publish(touch(0))
    expect(multiplexer.unsubscribe('touch')).toBe(true)
    gate.resolve()
    await flush()
    multiplexer.publish(touch(1))

    expect(consumer).toHaveBeenCalledTimes(1)
    expect(multiplexer.activeKinds).not.toContain('touch')
  })

  it('replaces the consumer when a kind is subscribed again', async () => {
    const multiplexer = new StreamMultiplexer()
    const first = vi.fn()
    const second = vi.fn()
    multiplexer.subscribe('joints', first)
    multiplexer.subscribe('joints', second)

    multiplexer.publish(joints(1))
    await flush()

    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledWith(joints(1))
  })

  it('logs a failing consumer and keeps delivering', async () => {
    const warnSpy = vi.spyOn(logger, 'warn').mockReturnValue(undefined)
    const multiplexer = new StreamMultiplexer()
    const received: Array<0 | 1> = []
    multiplexer.subscribe('touch', (event) => {
      if (event.kind === 'touch') {
        received.push(event.state)
        if (event.state === 1) {
          throw new Error('consumer exploded')
        }
      }
    })

    multiplexer.publish(touch(1))
    multiplexer.publish(touch(0))
    await flush()

    expect(received).toEqual([1, 0])
    expect(warnSpy).toHaveBeenCalledWith(
      expect.objectContaining({ streamKind: 'touch', err: expect.any(Error) }),
      'Stream consumer failed'
    )
  })

  it('drops events for kinds nobody subscribed to and clears everything on close', () => {
    const multiplexer = new StreamMultiplexer()
    multiplexer.publish(touch(1))
    multiplexer.subscribe('audio', vi.fn())
    multiplexer.subscribe('touch', vi.fn())

    multiplexer.close()

    expect(multiplexer.activeKinds).toEqual([])
  })
})
