import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { LinkError, RobotLink } from '../../src/infra/robot-link'
import { RobotBridgeStub } from '../factories/robot-bridge'

const openLink = async (bridge: RobotBridgeStub, requestTimeoutMs = 1000) => {
  const link = new RobotLink({ url: `ws://127.0.0.1:${bridge.port}`, connectTimeoutMs: 1000, requestTimeoutMs })
  await link.open()
  return link
}

describe('RobotLink', () => {
  let bridge: RobotBridgeStub
  let link: RobotLink | null

  beforeEach(async () => {
    bridge = await RobotBridgeStub.start()
    link = null
  })

  afterEach(async () => {
    await link?.close()
    await bridge.close()
  })

  it('sends service calls as JSON-RPC requests and resolves with the result', async () => {
    bridge.handle('ALMotion.getAngles', () => [0.1, -0.2])
    link = await openLink(bridge)

    await expect(link.call('ALMotion', 'getAngles', ['Body', true])).resolves.toEqual([0.1, -0.2])
    expect(bridge.calls).toEqual([{ method: 'ALMotion.getAngles', params: ['Body', true] }])
  })

  it('matches concurrent responses to their requests', async () => {
    bridge.handle('Echo.slow', ([value]) => new Promise((resolve) => setTimeout(() => resolve(value), 30)))
    bridge.handle('Echo.fast', ([value]) => value)
    link = await openLink(bridge)

    const slow = link.call('Echo', 'slow', ['first'])
    const fast = link.call('Echo', 'fast', ['second'])

    await expect(Promise.all([slow, fast])).resolves.toEqual(['first', 'second'])
  })

  it('rejects with a remote error when the bridge reports a failure', async () => {
    bridge.handle('ALLeds.fadeRGB', () => {
      throw new Error('Unknown LED group')
    })
    link = await openLink(bridge)

    const call = link.call('ALLeds', 'fadeRGB', ['Nope', 'red', 0])

    await expect(call).rejects.toBeInstanceOf(LinkError)
    await expect(call).rejects.toMatchObject({ reason: 'remote', message: 'Unknown LED group' })
  })

  it('times out calls that get no answer', async () => {
    bridge.handle('ALMotion.wakeUp', () => new Promise(() => undefined))
    link = await openLink(bridge, 50)

    await expect(link.call('ALMotion', 'wakeUp')).rejects.toMatchObject({
      reason: 'timeout',
      message: 'ALMotion.wakeUp timed out after 50 ms',
    })
  })

  it('rejects a call when its signal is aborted', async () => {
    bridge.handle('ALBehaviorManager.runBehavior', () => new Promise(() => undefined))
    link = await openLink(bridge)
    const controller = new AbortController()

    const call = link.call('ALBehaviorManager', 'runBehavior', ['eagle-dance'], { signal: controller.signal })
    controller.abort()

    await expect(call).rejects.toMatchObject({ reason: 'aborted' })
  })

  it('refuses calls before the link is open', async () => {
    link = new RobotLink({ url: `ws://127.0.0.1:${bridge.port}`, connectTimeoutMs: 1000, requestTimeoutMs: 1000 })

    await expect(link.call('ALTextToSpeech', 'say', ['hi'])).rejects.toMatchObject({ reason: 'closed' })
  })

  it('reports an unreachable bridge', async () => {
    const closed = await RobotBridgeStub.start()
    const port = closed.port
    await closed.close()

    const unreachable = new RobotLink({ url: `ws://127.0.0.1:${port}`, connectTimeoutMs: 1000, requestTimeoutMs: 1000 })

    await expect(unreachable.open()).rejects.toMatchObject({ reason: 'unreachable' })
  })

  it('routes signal notifications to the matching subscription', async () => {
    link = await openLink(bridge)
    const front = vi.fn()
    const rear = vi.fn()
    link.onSignal('sub-front', front)
    const detachRear = link.onSignal('sub-rear', rear)
    detachRear()

    bridge.signal('sub-front', 1)
    bridge.signal('sub-rear', 1)

    await vi.waitFor(() => expect(front).toHaveBeenCalledWith(1))
    expect(rear).not.toHaveBeenCalled()
  })

  it('notifies close listeners and fails pending calls when the bridge drops the link', async () => {
    bridge.handle('ALMotion.rest', () => new Promise(() => undefined))
    link = await openLink(bridge)
    const closed = vi.fn()
    link.onClose(closed)

    const pending = link.call('ALMotion', 'rest')
    await vi.waitFor(() => expect(bridge.calls).toHaveLength(1))
    bridge.dropClients()

    await expect(pending).rejects.toMatchObject({ reason: 'closed' })
    await vi.waitFor(() => expect(closed).toHaveBeenCalledTimes(1))
    expect(link.isOpen).toBe(false)
  })

  it('does not notify close listeners after a requested close', async () => {
    link = await openLink(bridge)
    const closed = vi.fn()
    link.onClose(closed)

    await link.close()

    expect(closed).not.toHaveBeenCalled()
    expect(link.isOpen).toBe(false)
  })
})
