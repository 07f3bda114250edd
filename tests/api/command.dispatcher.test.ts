import { describe, it, expect, vi } from 'vitest'
import { CommandDispatcher, toErrorFrame, toEventFrame } from '../../src/api/command.dispatcher'
import type { EventFrame, LogFrame } from '../../src/api/schema'
import { syntheticJointAngles } from '../../src/services/backend/simulated.backend'
import { RobotSession } from '../../src/services/robot-session'
import { ConnectError, InvalidParametersError } from '../../src/utils/errors'
import { createConnectedSession, createSimulatedBackend } from '../factories/session'

const frame = (commandName: string, parameters?: unknown, requestId: string | number = 'req-1') =>
  JSON.stringify({ commandName, parameters, requestId })

const createDispatcher = (session: RobotSession) => {
  const events: EventFrame[] = []
  const logs: LogFrame[] = []
  const dispatcher = new CommandDispatcher({
    session,
    sendEvent: (event) => void events.push(event),
    sendLog: (log) => void logs.push(log),
  })
  return { dispatcher, events, logs }
}

describe('CommandDispatcher', () => {
  describe('frame validation', () => {
    it('rejects frames that are not JSON', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher } = createDispatcher(session)

      const reply = await dispatcher.dispatch('{"commandName": "Say"')

      expect(reply).toEqual({
        type: 'error',
        requestId: expect.any(String),
        error: { kind: 'InvalidParameters', message: 'Frame is not valid JSON', field: 'frame' },
      })
    })

    it('keeps the request id when the command name is missing', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher } = createDispatcher(session)

      const reply = await dispatcher.dispatch(JSON.stringify({ requestId: 7, parameters: {} }))

      expect(reply).toEqual({
        type: 'error',
        requestId: '7',
        error: { kind: 'InvalidParameters', message: "Invalid frame field 'commandName': Required", field: 'commandName' },
      })
    })

    it('assigns a request id when the client sends none', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher } = createDispatcher(session)

      const reply = await dispatcher.dispatch(JSON.stringify({ commandName: 'GetState' }))

      expect(reply.type).toBe('result')
      expect(reply.requestId).toMatch(/^[0-9a-f-]{36}$/)
    })

    it('reports unknown commands', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher } = createDispatcher(session)

      await expect(dispatcher.dispatch(frame('fly'))).resolves.toEqual({
        type: 'error',
        requestId: 'req-1',
        error: { kind: 'UnknownCommand', message: "Unknown command 'fly'" },
      })
      await expect(dispatcher.dispatch(frame('toString'))).resolves.toMatchObject({
        error: { kind: 'UnknownCommand' },
      })
    })

    it('names the invalid parameter', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher } = createDispatcher(session)

      await expect(dispatcher.dispatch(frame('Dance', {}))).resolves.toEqual({
        type: 'error',
        requestId: 'req-1',
        error: { kind: 'InvalidParameters', message: "Invalid parameter 'danceId': Required", field: 'danceId' },
      })
      await expect(
        dispatcher.dispatch(
          frame('SetBasicAwarenessState', { enabled: true, engagementMode: 'Curious', trackingMode: 'Head' })
        )
      ).resolves.toMatchObject({ error: { kind: 'InvalidParameters', field: 'engagementMode' } })
      await expect(dispatcher.dispatch(frame('Say', 'hello'))).resolves.toEqual({
        type: 'error',
        requestId: 'req-1',
        error: {
          kind: 'InvalidParameters',
          message: "Invalid parameter 'parameters': Expected object, received string",
          field: 'parameters',
        },
      })
    })
  })

  describe('commands', () => {
    it('replies null for actions without a result', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher } = createDispatcher(session)

      await expect(dispatcher.dispatch(frame('Say', { text: 'Hello' }, 42))).resolves.toEqual({
        type: 'result',
        requestId: '42',
        result: null,
      })
    })

    it('returns catalog listings', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher } = createDispatcher(session)

      const reply = await dispatcher.dispatch(frame('GetDanceBehaviors'))

      expect(reply.type).toBe('result')
      expect(reply).toMatchObject({
        result: expect.arrayContaining([
          {
            id: 'eagle-dance',
            displayName: 'Eagle Dance',
            metadata: {
              behaviorName: 'eagle-dance',
              localizedName: { en_US: 'Eagle Dance', fr_FR: "La danse de l'aigle" },
              description: 'A slow dance with wide wing-like moves, balanced on one foot.',
            },
          },
        ]),
      })
    })

    it('turns session failures into error replies', async () => {
      const session = new RobotSession(createSimulatedBackend())
      const { dispatcher } = createDispatcher(session)

      await expect(dispatcher.dispatch(frame('Say', { text: 'Hello' }))).resolves.toEqual({
        type: 'error',
        requestId: 'req-1',
        error: { kind: 'NotConnected', message: 'Robot is not connected' },
      })
      await expect(dispatcher.dispatch(frame('Dance', { danceId: 'moonwalk' }))).resolves.toMatchObject({
        error: { kind: 'NotConnected' },
      })
    })

    it('connects on request and returns the session state', async () => {
      const session = new RobotSession(createSimulatedBackend())
      const { dispatcher } = createDispatcher(session)

      const reply = await dispatcher.dispatch(frame('Connect'))

      expect(reply).toMatchObject({ type: 'result', result: { variant: 'simulated', state: 'Connected' } })
    })

    it('passes the connection signal to long-running actions', async () => {
      const { backend, session } = await createConnectedSession({ behaviorDurationMs: 60_000 })
      const { dispatcher } = createDispatcher(session)
      const invokeSpy = vi.spyOn(backend, 'invoke')
      const controller = new AbortController()

      const reply = dispatcher.dispatch(frame('Dance', { danceId: 'gangnam-style' }), controller.signal)
      await vi.waitFor(() => expect(session.snapshot().running.dances).toEqual(['gangnam-style']))
      controller.abort()
      await reply

      expect(invokeSpy).toHaveBeenCalledWith('stopBehavior', { behaviorName: 'gangnam-style' }, {})
    })
  })

  describe('log frames', () => {
    it('reports the lifecycle of a generic command', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher, logs } = createDispatcher(session)

      await expect(dispatcher.dispatch(frame('GenericNao', { text: 'hello' }))).resolves.toEqual({
        type: 'result',
        requestId: 'req-1',
        result: null,
      })
      expect(logs).toEqual([
        { type: 'log', level: 'info', message: "Applying command 'GenericNao'" },
        { type: 'log', level: 'info', message: 'text = hello' },
        { type: 'log', level: 'info', message: "Sending response after applying command 'GenericNao'" },
      ])
    })

    it('reports failed commands at error level', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher, logs } = createDispatcher(session)

      await dispatcher.dispatch(frame('Dance', {}))

      expect(logs).toEqual([
        { type: 'log', level: 'info', message: "Applying command 'Dance'" },
        { type: 'log', level: 'error', message: "Error in command 'Dance': Invalid parameter 'danceId': Required" },
      ])
    })

    it('sends nothing for frames that never reach a command', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher, logs } = createDispatcher(session)

      await dispatcher.dispatch(frame('fly'))
      await dispatcher.dispatch('not json')

      expect(logs).toEqual([])
    })
  })

  describe('subscriptions', () => {
    it('forwards stream events once subscribed and stops after unsubscribing', async () => {
      const { backend, session } = await createConnectedSession()
      const { dispatcher, events } = createDispatcher(session)

      await expect(dispatcher.dispatch(frame('SubscribeTouch'))).resolves.toEqual({
        type: 'result',
        requestId: 'req-1',
        result: { streamKind: 'touch', subscribed: true },
      })
      expect(dispatcher.subscriptions).toEqual(['touch'])

      backend.emitTouch('RearTactilTouched', 1)
      await vi.waitFor(() => expect(events).toHaveLength(1))
      expect(events[0]).toEqual({
        type: 'event',
        streamKind: 'touch',
        payload: { part: 'RearTactilTouched', state: 1 },
      })

      await dispatcher.dispatch(frame('UnsubscribeTouch'))
      backend.emitTouch('RearTactilTouched', 0)

      expect(dispatcher.subscriptions).toEqual([])
      expect(events).toHaveLength(1)
    })

    it('replies NotConnected to stream commands before the session connects', async () => {
      const session = new RobotSession(createSimulatedBackend())
      const { dispatcher } = createDispatcher(session)

      await expect(dispatcher.dispatch(frame('SubscribeJoints'))).resolves.toEqual({
        type: 'error',
        requestId: 'req-1',
        error: { kind: 'NotConnected', message: 'Robot is not connected' },
      })
      await expect(dispatcher.dispatch(frame('SubscribeAudio', undefined, 'req-2'))).resolves.toEqual({
        type: 'error',
        requestId: 'req-2',
        error: { kind: 'NotConnected', message: 'Robot is not connected' },
      })
      expect(dispatcher.subscriptions).toEqual([])
    })

    it('replies SubscribeError when the backend cannot open the stream', async () => {
      const { backend, session } = await createConnectedSession()
      vi.spyOn(backend, 'subscribe').mockRejectedValueOnce(new Error('Microphone is busy'))
      const { dispatcher } = createDispatcher(session)

      await expect(dispatcher.dispatch(frame('SubscribeAudio'))).resolves.toEqual({
        type: 'error',
        requestId: 'req-1',
        error: { kind: 'SubscribeError', message: 'Failed to subscribe to audio: Microphone is busy' },
      })
      expect(dispatcher.subscriptions).toEqual([])
    })

    it('does not register a subscription that was cancelled while opening', async () => {
      const { session } = await createConnectedSession()
      const { dispatcher } = createDispatcher(session)

      const subscribing = dispatcher.dispatch(frame('SubscribeJoints'))
      const unsubscribing = dispatcher.dispatch(frame('UnsubscribeJoints', undefined, 'req-2'))

      await expect(subscribing).resolves.toEqual({
        type: 'error',
        requestId: 'req-1',
        error: { kind: 'SubscribeError', message: 'Subscription to joints was cancelled by a later unsubscribe' },
      })
      await expect(unsubscribing).resolves.toEqual({
        type: 'result',
        requestId: 'req-2',
        result: { streamKind: 'joints', subscribed: false },
      })
      expect(dispatcher.subscriptions).toEqual([])
      await vi.waitFor(() => expect(session.snapshot().streams).toEqual([]))
    })

    it('delivers every joint frame once and in emission order', async () => {
      const { session } = await createConnectedSession({ jointsIntervalMs: 200 })
      vi.useFakeTimers()
      const { dispatcher, events } = createDispatcher(session)
      await dispatcher.subscribe('joints')

      for (let tick = 0; tick < 5; tick++) {
        await vi.advanceTimersByTimeAsync(200)
      }
      dispatcher.close()

      const angles = events.map((event) => ('angles' in event.payload ? event.payload.angles : []))
      expect(events.every((event) => event.streamKind === 'joints')).toBe(true)
      expect(angles).toEqual([0, 1, 2, 3, 4].map((tick) => syntheticJointAngles(tick)))
      expect(new Set(angles.map((values) => values.join(','))).size).toBe(5)
    })

    it('releases every subscription on close', async () => {
      const { backend, session } = await createConnectedSession()
      const unsubscribeSpy = vi.spyOn(backend, 'unsubscribe')
      const { dispatcher } = createDispatcher(session)
      await dispatcher.subscribe('touch')
      await dispatcher.subscribe('joints')

      dispatcher.close()

      await vi.waitFor(() => expect(unsubscribeSpy).toHaveBeenCalledTimes(2))
      expect(session.snapshot().streams).toEqual([])
      await expect(dispatcher.subscribe('audio')).rejects.toThrow('Cannot subscribe to audio: connection is closing')
    })
  })
})

describe('toEventFrame', () => {
  it('encodes audio samples as base64', () => {
    expect(
      toEventFrame({ kind: 'audio', sampleRate: 16000, channels: 1, samplesPerChannel: 2, data: Buffer.from([1, 0, 2, 0]) })
    ).toEqual({
      type: 'event',
      streamKind: 'audio',
      payload: { sampleRate: 16000, channels: 1, samplesPerChannel: 2, data: 'AQACAA==' },
    })
  })

  it('passes joint frames through', () => {
    expect(toEventFrame({ kind: 'joints', names: ['HeadYaw'], angles: [0.5] })).toEqual({
      type: 'event',
      streamKind: 'joints',
      payload: { names: ['HeadYaw'], angles: [0.5] },
    })
  })
})

describe('toErrorFrame', () => {
  it('adds the field of parameter errors and the fatal flag of connect errors', () => {
    expect(toErrorFrame('a', new InvalidParametersError('Invalid parameter', 'text')).error).toEqual({
      kind: 'InvalidParameters',
      message: 'Invalid parameter',
      field: 'text',
    })
    expect(toErrorFrame('b', new ConnectError('Robot unreachable', false)).error).toEqual({
      kind: 'ConnectError',
      message: 'Robot unreachable',
      fatal: false,
    })
  })
})
