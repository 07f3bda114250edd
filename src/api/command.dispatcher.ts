import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type { RobotSession, StreamHandle } from '../services/robot-session'
import { StreamMultiplexer, type ChannelStats } from '../services/stream-multiplexer'
import type { StreamEvent, StreamKind } from '../types/robot'
import {
  ConnectError,
  InvalidParametersError,
  RobotError,
  SubscribeError,
  UnknownCommandError,
  errorMessage,
  toRobotError,
} from '../utils/errors'
import { logger as rootLogger, type Logger } from '../utils/logger'
import {
  basicAwarenessSchema,
  behaviorSchema,
  bodyActionSchema,
  breathingSchema,
  changeEyesColorSchema,
  danceSchema,
  genericSchema,
  noParamsSchema,
  reactionSchema,
  requestFrameSchema,
  saySchema,
  setTtsLanguageSchema,
  type ErrorFrame,
  type EventFrame,
  type LogFrame,
  type LogLevel,
  type ReplyFrame,
} from './schema'

export interface CommandContext {
  session: RobotSession
  signal: AbortSignal
  /** サーバーログに書き、ログ転送が有効ならクライアントにも送る */
  log(level: LogLevel, message: string): void
  streams: {
    subscribe(kind: StreamKind): Promise<void>
    unsubscribe(kind: StreamKind): void
  }
}

interface CommandDefinition {
  execute(parameters: unknown, context: CommandContext): Promise<unknown>
}

const invalidParameters = (error: z.ZodError): InvalidParametersError => {
  const issue = error.issues[0]
  const field = issue.path.length > 0 ? issue.path.join('.') : 'parameters'
  return new InvalidParametersError(`Invalid parameter '${field}': ${issue.message}`, field)
}

const defineCommand = <P>(
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  run: (params: P, context: CommandContext) => Promise<unknown>
): CommandDefinition => ({
  async execute(parameters, context) {
    const parsed = schema.safeParse(parameters ?? {})
    if (!parsed.success) {
      throw invalidParameters(parsed.error)
    }
    return run(parsed.data, context)
  },
})

const subscription = (kind: StreamKind, subscribe: boolean): CommandDefinition =>
  defineCommand(noParamsSchema, async (_params, { streams }) => {
    if (subscribe) {
      await streams.subscribe(kind)
    } else {
      streams.unsubscribe(kind)
    }
    return { streamKind: kind, subscribed: subscribe }
  })

export const COMMANDS: Readonly<Record<string, CommandDefinition>> = {
  SetTTSLanguage: defineCommand(setTtsLanguageSchema, ({ language }, { session, signal }) =>
    session.setTtsLanguage(language, { signal })
  ),
  // 受け取ったテキストを記録するだけの汎用コマンド
  GenericNao: defineCommand(genericSchema, async ({ text }, { log }) => {
    log('info', `text = ${text}`)
  }),
  Say: defineCommand(saySchema, ({ text }, { session, signal }) => session.say(text, { signal })),
  StopSay: defineCommand(noParamsSchema, (_params, { session, signal }) => session.stopSay({ signal })),
  WakeUp: defineCommand(noParamsSchema, (_params, { session, signal }) => session.wakeUp({ signal })),
  Rest: defineCommand(noParamsSchema, (_params, { session, signal }) => session.rest({ signal })),
  StandUp: defineCommand(noParamsSchema, (_params, { session, signal }) => session.standUp({ signal })),
  SitDown: defineCommand(noParamsSchema, (_params, { session, signal }) => session.sitDown({ signal })),
  ChangeEyesColor: defineCommand(changeEyesColorSchema, ({ color }, { session, signal }) =>
    session.changeEyesColor(color, { signal })
  ),
  SetBasicAwarenessState: defineCommand(basicAwarenessSchema, (params, { session, signal }) =>
    session.setBasicAwarenessState(params.enabled, params.engagementMode, params.trackingMode, { signal })
  ),
  SetBreathingEnabled: defineCommand(breathingSchema, ({ enabled, chainName }, { session, signal }) =>
    session.setBreathingEnabled(enabled, chainName, { signal })
  ),
  GetDanceBehaviors: defineCommand(noParamsSchema, (_params, { session }) => session.getDanceBehaviors()),
  Dance: defineCommand(danceSchema, ({ danceId }, { session, signal }) => session.dance(danceId, { signal })),
  StopDance: defineCommand(danceSchema, ({ danceId }, { session, signal }) => session.stopDance(danceId, { signal })),
  GetExpressiveReactionTypes: defineCommand(noParamsSchema, (_params, { session }) =>
    session.getExpressiveReactionTypes()
  ),
  ExpressiveReaction: defineCommand(reactionSchema, ({ reactionType }, { session, signal }) =>
    session.expressiveReaction(reactionType, { signal })
  ),
  StopExpressiveReaction: defineCommand(reactionSchema, ({ reactionType }, { session, signal }) =>
    session.stopExpressiveReaction(reactionType, { signal })
  ),
  GetBodyActionBehaviors: defineCommand(noParamsSchema, (_params, { session }) => session.getBodyActionBehaviors()),
  BodyAction: defineCommand(bodyActionSchema, ({ bodyActionId }, { session, signal }) =>
    session.bodyAction(bodyActionId, { signal })
  ),
  StopBodyAction: defineCommand(bodyActionSchema, ({ bodyActionId }, { session, signal }) =>
    session.stopBodyAction(bodyActionId, { signal })
  ),
  RunBehavior: defineCommand(behaviorSchema, ({ name }, { session, signal }) => session.runBehavior(name, { signal })),
  StopBehavior: defineCommand(behaviorSchema, ({ name }, { session, signal }) =>
    session.stopBehavior(name, { signal })
  ),
  Connect: defineCommand(noParamsSchema, async (_params, { session }) => {
    await session.connect()
    return session.snapshot()
  }),
  GetState: defineCommand(noParamsSchema, async (_params, { session }) => session.snapshot()),
  SubscribeTouch: subscription('touch', true),
  SubscribeJoints: subscription('joints', true),
  SubscribeAudio: subscription('audio', true),
  UnsubscribeTouch: subscription('touch', false),
  UnsubscribeJoints: subscription('joints', false),
  UnsubscribeAudio: subscription('audio', false),
}

export const toEventFrame = (event: StreamEvent): EventFrame => {
  switch (event.kind) {
    case 'touch':
      return { type: 'event', streamKind: 'touch', payload: { part: event.part, state: event.state } }
    case 'joints':
      return { type: 'event', streamKind: 'joints', payload: { names: event.names, angles: event.angles } }
    case 'audio':
      return {
        type: 'event',
        streamKind: 'audio',
        payload: {
          sampleRate: event.sampleRate,
          channels: event.channels,
          samplesPerChannel: event.samplesPerChannel,
          data: event.data.toString('base64'),
        },
      }
    default: {
      const _exhaustiveCheck: never = event
      throw new Error(`Unsupported stream event: ${JSON.stringify(_exhaustiveCheck)}`)
    }
  }
}

export const toErrorFrame = (requestId: string, error: RobotError): ErrorFrame => ({
  type: 'error',
  requestId,
  error: {
    kind: error.kind,
    message: error.message,
    ...(error instanceof InvalidParametersError ? { field: error.field } : {}),
    ...(error instanceof ConnectError ? { fatal: error.fatal } : {}),
  },
})

export interface CommandDispatcherOptions {
  session: RobotSession
  sendEvent: (frame: EventFrame) => void | Promise<void>
  /** 指定するとコマンドの開始・完了・失敗を LogFrame としてクライアントにも送る */
  sendLog?: (frame: LogFrame) => void | Promise<void>
  log?: Logger
}

/**
 * 1 接続分のコマンド処理。
 * フレームを検証してセッションの操作を 1 回呼び、必ず 1 つの応答フレームを返す。
 * ストリーム購読もこの接続のマルチプレクサー経由で管理する。
 */
export class CommandDispatcher {
  private readonly session: RobotSession
  private readonly sendEvent: (frame: EventFrame) => void | Promise<void>
  private readonly sendLog: ((frame: LogFrame) => void | Promise<void>) | undefined
  private readonly log: Logger
  private readonly multiplexer: StreamMultiplexer
  private readonly handles = new Map<StreamKind, Promise<StreamHandle>>()
  private readonly fallbackSignal = new AbortController().signal
  private closed = false

  constructor(options: CommandDispatcherOptions) {
    this.session = options.session
    this.sendEvent = options.sendEvent
    this.sendLog = options.sendLog
    this.log = options.log ?? rootLogger
    this.multiplexer = new StreamMultiplexer(this.log)
  }

  get subscriptions(): StreamKind[] {
    return this.multiplexer.activeKinds
  }

  get streamStats(): ChannelStats[] {
    return this.multiplexer.stats()
  }

  async dispatch(raw: string, signal: AbortSignal = this.fallbackSignal): Promise<ReplyFrame> {
    let message: unknown
    try {
      message = JSON.parse(raw)
    } catch (err) {
      this.log.debug({ err }, 'Malformed command frame')
      return toErrorFrame(randomUUID(), new InvalidParametersError('Frame is not valid JSON', 'frame'))
    }

    const frame = requestFrameSchema.safeParse(message)
    if (!frame.success) {
      const requestId = this.extractRequestId(message)
      const issue = frame.error.issues[0]
      const field = issue.path.length > 0 ? issue.path.join('.') : 'frame'
      return toErrorFrame(requestId, new InvalidParametersError(`Invalid frame field '${field}': ${issue.message}`, field))
    }

    const { commandName, parameters } = frame.data
    const requestId = frame.data.requestId === undefined ? randomUUID() : String(frame.data.requestId)
    return this.execute(requestId, commandName, parameters, signal)
  }

  async execute(requestId: string, commandName: string, parameters: unknown, signal: AbortSignal): Promise<ReplyFrame> {
    const command = Object.hasOwn(COMMANDS, commandName) ? COMMANDS[commandName] : undefined
    if (!command) {
      return toErrorFrame(requestId, new UnknownCommandError(commandName))
    }

    const log = this.log.child({ requestId, commandName })
    log.debug('Command received')
    this.forwardLog('info', `Applying command '${commandName}'`)
    try {
      const result = await command.execute(parameters, {
        session: this.session,
        signal,
        log: (level, message) => {
          log[level](message)
          this.forwardLog(level, message)
        },
        streams: {
          subscribe: (kind) => this.subscribe(kind),
          unsubscribe: (kind) => this.unsubscribe(kind),
        },
      })
      log.debug('Command completed')
      this.forwardLog('info', `Sending response after applying command '${commandName}'`)
      return { type: 'result', requestId, result: result ?? null }
    } catch (err) {
      if (err instanceof RobotError) {
        log.info({ kind: err.kind, message: err.message }, 'Command failed')
      } else {
        log.error({ err }, 'Unexpected error while executing command')
      }
      const error = toRobotError(err, `${commandName} failed`)
      this.forwardLog('error', `Error in command '${commandName}': ${error.message}`)
      return toErrorFrame(requestId, error)
    }
  }

  /** この接続でストリームを購読する。再購読はコンシューマーの置き換えになる */
  async subscribe(kind: StreamKind): Promise<void> {
    if (this.closed) {
      throw new SubscribeError(`Cannot subscribe to ${kind}: connection is closing`)
    }
    let handle = this.handles.get(kind)
    if (!handle) {
      handle = this.session.subscribeStream(kind, (event) => this.multiplexer.publish(event))
      this.handles.set(kind, handle)
    }
    try {
      await handle
    } catch (err) {
      if (this.handles.get(kind) === handle) {
        this.handles.delete(kind)
      }
      // NotConnected などのロボット側エラーはそのまま返す
      throw err instanceof RobotError
        ? err
        : new SubscribeError(`Cannot subscribe to ${kind}: ${errorMessage(err)}`, { cause: err })
    }
    if (this.closed) {
      throw new SubscribeError(`Cannot subscribe to ${kind}: connection is closing`)
    }
    // 待っている間に Unsubscribe でハンドルが解放された
    if (this.handles.get(kind) !== handle) {
      throw new SubscribeError(`Subscription to ${kind} was cancelled by a later unsubscribe`)
    }
    this.multiplexer.subscribe(kind, (event) => this.sendEvent(toEventFrame(event)))
  }

  unsubscribe(kind: StreamKind): void {
    this.multiplexer.unsubscribe(kind)
    const handle = this.handles.get(kind)
    this.handles.delete(kind)
    if (handle) {
      // 購読に失敗したハンドルは subscribe() 側で報告済み
      void handle.then(
        (active) => active.unsubscribe(),
        () => undefined
      )
    }
  }

  /** 接続終了時に全購読を解除する */
  close(): void {
    this.closed = true
    for (const kind of [...this.handles.keys()]) {
      this.unsubscribe(kind)
    }
    this.multiplexer.close()
  }

  private forwardLog(level: LogLevel, message: string) {
    if (!this.sendLog || this.closed) {
      return
    }
    void Promise.resolve(this.sendLog({ type: 'log', level, message })).catch((err: unknown) =>
      this.log.warn({ err }, 'Failed to forward log frame')
    )
  }

  private extractRequestId(message: unknown): string {
    const candidate = z.object({ requestId: z.union([z.string().min(1), z.number()]) }).safeParse(message)
    return candidate.success ? String(candidate.data.requestId) : randomUUID()
  }
}
