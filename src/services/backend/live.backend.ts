import { z } from 'zod'
import { RobotLink, type RobotLinkOptions } from '../../infra/robot-link'
import { ActionError, ConnectError, NotConnectedError, SubscribeError, errorMessage } from '../../utils/errors'
import { delay } from '../../utils/async'
import { logger } from '../../utils/logger'
import { TOUCH_PARTS, type RobotEndpoint, type StreamEvent, type StreamKind } from '../../types/robot'
import { parseInstalledPackages } from '../behavior-catalog'
import type {
  ActionHandlers,
  ActionKind,
  ActionParamsMap,
  ActionPayloadMap,
  InvokeOptions,
  LinkLostListener,
  RobotBackend,
  StreamListener,
} from './types'

export const REQUIRED_SERVICES = [
  'ALMemory',
  'ALMotion',
  'ALRobotPosture',
  'ALLeds',
  'ALTextToSpeech',
  'ALAnimatedSpeech',
  'ALBasicAwareness',
  'ALBehaviorManager',
  'ALAudioDevice',
  'PackageManager',
] as const

export const AUDIO_CLIENT_NAME = 'humanoid-gateway'
export const AUDIO_SAMPLE_RATE = 16000
// 3 = フロントマイクのみ、0 = インターリーブなし
const AUDIO_CHANNEL_SELECTION = 3
const AUDIO_DEINTERLEAVE = 0

const servicesSchema = z.array(z.string())
const subscriptionIdSchema = z.string().min(1)
const touchValueSchema = z.coerce.number()
// 関節名と角度は同じ並び・同じ長さでなければならない
const jointsFrameSchema = z
  .object({ names: z.array(z.string()), angles: z.array(z.number()) })
  .refine(({ names, angles }) => names.length === angles.length, {
    message: 'Joint names and angles differ in length',
  })
const audioBufferSchema = z.object({
  channels: z.number().int().positive(),
  samplesPerChannel: z.number().int().nonnegative(),
  data: z.string(),
})

export interface LiveBackendOptions {
  endpoint: RobotEndpoint
  maxConnectTries: number
  connectRetryDelayMs: number
  connectTimeoutMs: number
  requestTimeoutMs: number
  behaviorTimeoutMs: number
  jointsIntervalMs: number
  createLink?: (options: RobotLinkOptions) => RobotLink
}

interface ActiveStream {
  listener: StreamListener
  stop: () => Promise<void>
}

/**
 * ロボット側サービスブリッジに WebSocket で接続する実機バックエンド。
 *
 * - 接続は maxConnectTries 回まで再試行し、尽きたら再試行可能な ConnectError
 * - リンク確立後のサービス初期化に失敗したら以後の connect はすべて致命的な ConnectError
 */
export class LiveBackend implements RobotBackend {
  readonly variant = 'live'
  private link: RobotLink | null = null
  private poisoned: ConnectError | null = null
  private detachClose: (() => void) | null = null
  private readonly streams = new Map<StreamKind, ActiveStream>()
  private readonly linkLostListeners = new Set<LinkLostListener>()
  private readonly handlers: ActionHandlers

  constructor(private readonly options: LiveBackendOptions) {
    const long = { timeoutMs: options.behaviorTimeoutMs }
    this.handlers = {
      setTtsLanguage: async ({ language }, { signal }) => {
        await this.call('ALTextToSpeech', 'setLanguage', [language], { signal })
      },
      say: async ({ text }, { signal }) => {
        await this.call('ALAnimatedSpeech', 'say', [text], { signal, ...long })
      },
      stopSay: async (_params, { signal }) => {
        await this.call('ALTextToSpeech', 'stopAll', [], { signal })
      },
      wakeUp: async (_params, { signal }) => {
        await this.call('ALMotion', 'wakeUp', [], { signal, ...long })
      },
      rest: async (_params, { signal }) => {
        await this.call('ALMotion', 'rest', [], { signal, ...long })
      },
      goToPosture: async ({ posture, speed, maxTries }, { signal }) => {
        await this.call('ALRobotPosture', 'setMaxTryNumber', [maxTries], { signal })
        const reached = await this.call('ALRobotPosture', 'goToPosture', [posture, speed], { signal, ...long })
        return z.boolean().parse(reached)
      },
      changeEyesColor: async ({ color }, { signal }) => {
        await this.call('ALLeds', 'fadeRGB', ['FaceLeds', color, 0], { signal })
      },
      setBasicAwareness: async ({ enabled, engagementMode, trackingMode }, { signal }) => {
        await this.call('ALBasicAwareness', 'setEngagementMode', [engagementMode], { signal })
        await this.call('ALBasicAwareness', 'setTrackingMode', [trackingMode], { signal })
        await this.call('ALBasicAwareness', enabled ? 'startAwareness' : 'stopAwareness', [], { signal })
      },
      setBreathing: async ({ enabled, chainName }, { signal }) => {
        await this.call('ALMotion', 'setBreathEnabled', [chainName, enabled], { signal })
      },
      runBehavior: async ({ behaviorName }, { signal }) => {
        await this.call('ALBehaviorManager', 'runBehavior', [behaviorName], { signal, ...long })
      },
      stopBehavior: async ({ behaviorName }, { signal }) => {
        await this.call('ALBehaviorManager', 'stopBehavior', [behaviorName], { signal })
      },
      listBehaviors: async (_params, { signal }) =>
        parseInstalledPackages(await this.call('PackageManager', 'packages2', [], { signal })),
    }
  }

  get endpoint(): RobotEndpoint {
    return this.options.endpoint
  }

  get url(): string {
    return `ws://${this.options.endpoint.host}:${this.options.endpoint.port}`
  }

  async connect(): Promise<void> {
    if (this.poisoned) {
      throw this.poisoned
    }
    if (this.link?.isOpen) {
      return
    }
    const { host, port } = this.options.endpoint
    if (!host || !port) {
      throw new ConnectError('Robot host and port must be configured to use the live backend', false)
    }

    const link = await this.openWithRetries()
    try {
      await this.initializeServices(link)
    } catch (err) {
      await link.close()
      this.poisoned = new ConnectError(
        `Robot services could not be initialized (${errorMessage(err)}); restart the gateway to retry`,
        true,
        { cause: err }
      )
      logger.error({ err, url: this.url }, 'Robot link initialization failed')
      throw this.poisoned
    }

    this.link = link
    this.detachClose = link.onClose((reason) => this.handleLinkLost(reason))
    logger.info({ url: this.url }, 'Robot connected')
  }

  async disconnect(): Promise<void> {
    const link = this.link
    if (!link) {
      return
    }
    try {
      for (const kind of [...this.streams.keys()]) {
        await this.unsubscribe(kind)
      }
    } finally {
      this.detachClose?.()
      this.detachClose = null
      this.link = null
      await link.close()
      logger.info({ url: this.url }, 'Robot disconnected')
    }
  }

  invoke<K extends ActionKind>(kind: K, params: ActionParamsMap[K], options: InvokeOptions = {}): Promise<ActionPayloadMap[K]> {
    if (!this.link) {
      return Promise.reject(new NotConnectedError())
    }
    const handler: ActionHandlers[K] = this.handlers[kind]
    return handler(params, options).catch((err: unknown) => {
      if (err instanceof ActionError || err instanceof NotConnectedError) {
        throw err
      }
      throw new ActionError(`${kind} failed: ${errorMessage(err)}`, { cause: err })
    })
  }

  async subscribe(kind: StreamKind, listener: StreamListener): Promise<void> {
    const link = this.link
    if (!link) {
      throw new SubscribeError(`Cannot subscribe to ${kind}: robot is not connected`)
    }
    const existing = this.streams.get(kind)
    if (existing) {
      existing.listener = listener
      return
    }

    const active: ActiveStream = { listener, stop: async () => undefined }
    const emit = (event: StreamEvent) => {
      try {
        active.listener(event)
      } catch (err) {
        logger.warn({ err, streamKind: kind }, 'Stream listener failed')
      }
    }
    try {
      active.stop = await this.openStream(link, kind, emit)
    } catch (err) {
      throw new SubscribeError(`Failed to subscribe to ${kind}: ${errorMessage(err)}`, { cause: err })
    }
    this.streams.set(kind, active)
  }

  async unsubscribe(kind: StreamKind): Promise<void> {
    const active = this.streams.get(kind)
    if (!active) {
      return
    }
    this.streams.delete(kind)
    try {
      await active.stop()
    } catch (err) {
      logger.warn({ err, streamKind: kind }, 'Failed to release robot stream subscription')
    }
  }

  onLinkLost(listener: LinkLostListener): () => void {
    this.linkLostListeners.add(listener)
    return () => {
      this.linkLostListeners.delete(listener)
    }
  }

  private async openWithRetries(): Promise<RobotLink> {
    const { maxConnectTries, connectRetryDelayMs } = this.options
    let lastError: unknown = null
    for (let attempt = 1; attempt <= maxConnectTries; attempt++) {
      const link = this.createLink()
      try {
        await link.open()
        return link
      } catch (err) {
        lastError = err
        logger.warn({ err, url: this.url, attempt, maxConnectTries }, 'Robot connection attempt failed')
        if (attempt < maxConnectTries) {
          await delay(connectRetryDelayMs)
        }
      }
    }
    throw new ConnectError(`Could not reach robot at ${this.url} after ${maxConnectTries} attempts`, false, {
      cause: lastError,
    })
  }

  private createLink(): RobotLink {
    const linkOptions: RobotLinkOptions = {
      url: this.url,
      connectTimeoutMs: this.options.connectTimeoutMs,
      requestTimeoutMs: this.options.requestTimeoutMs,
    }
    return this.options.createLink ? this.options.createLink(linkOptions) : new RobotLink(linkOptions)
  }

  private async initializeServices(link: RobotLink) {
    const services = servicesSchema.parse(await link.call('ServiceDirectory', 'services'))
    const missing = REQUIRED_SERVICES.filter((service) => !services.includes(service))
    if (missing.length > 0) {
      throw new Error(`missing services: ${missing.join(', ')}`)
    }
  }

  private call(service: string, method: string, args: unknown[], options: { signal?: AbortSignal; timeoutMs?: number }) {
    const link = this.link
    if (!link) {
      return Promise.reject(new NotConnectedError())
    }
    return link.call(service, method, args, options)
  }

  private async openStream(link: RobotLink, kind: StreamKind, emit: (event: StreamEvent) => void): Promise<() => Promise<void>> {
    switch (kind) {
      case 'touch':
        return this.openTouchStream(link, emit)
      case 'joints':
        return this.openJointsStream(link, emit)
      case 'audio':
        return this.openAudioStream(link, emit)
      default: {
        const _exhaustiveCheck: never = kind
        throw new Error(`Unsupported stream kind: ${_exhaustiveCheck}`)
      }
    }
  }

  private async openTouchStream(link: RobotLink, emit: (event: StreamEvent) => void) {
    const subscriptions: Array<{ id: string; detach: () => void }> = []
    const release = async () => {
      for (const { id, detach } of subscriptions) {
        detach()
        if (link.isOpen) {
          await link.call('ALMemory', 'unsubscribe', [id])
        }
      }
    }
    try {
      for (const part of TOUCH_PARTS) {
        const id = subscriptionIdSchema.parse(await link.call('ALMemory', 'subscriber', [part]))
        const detach = link.onSignal(id, (value) => {
          const parsed = touchValueSchema.safeParse(value)
          if (!parsed.success) {
            logger.warn({ part, value }, 'Ignoring malformed touch value')
            return
          }
          emit({ kind: 'touch', part, state: parsed.data >= 1 ? 1 : 0 })
        })
        subscriptions.push({ id, detach })
      }
    } catch (err) {
      await release().catch((releaseErr: unknown) =>
        logger.warn({ err: releaseErr }, 'Failed to roll back touch subscriptions')
      )
      throw err
    }
    return release
  }

  private async openJointsStream(link: RobotLink, emit: (event: StreamEvent) => void) {
    let active = true
    let timer: NodeJS.Timeout | null = null

    const poll = async () => {
      try {
        const [names, angles] = await Promise.all([
          link.call('ALMotion', 'getBodyNames', ['Body']),
          link.call('ALMotion', 'getAngles', ['Body', true]),
        ])
        const frame = jointsFrameSchema.safeParse({ names, angles })
        if (!active) {
          return
        }
        if (frame.success) {
          emit({ kind: 'joints', ...frame.data })
        } else {
          logger.warn({ issue: frame.error.issues[0].message }, 'Ignoring malformed joint frame')
        }
      } catch (err) {
        if (active) {
          logger.warn({ err }, 'Joint angle poll failed')
        }
      } finally {
        if (active && link.isOpen) {
          timer = setTimeout(() => void poll(), this.options.jointsIntervalMs)
        }
      }
    }

    timer = setTimeout(() => void poll(), this.options.jointsIntervalMs)
    return async () => {
      active = false
      if (timer) {
        clearTimeout(timer)
      }
    }
  }

  private async openAudioStream(link: RobotLink, emit: (event: StreamEvent) => void) {
    await link.call('ALAudioDevice', 'setClientPreferences', [
      AUDIO_CLIENT_NAME,
      AUDIO_SAMPLE_RATE,
      AUDIO_CHANNEL_SELECTION,
      AUDIO_DEINTERLEAVE,
    ])
    const id = subscriptionIdSchema.parse(await link.call('ALAudioDevice', 'subscribe', [AUDIO_CLIENT_NAME]))
    const detach = link.onSignal(id, (value) => {
      const parsed = audioBufferSchema.safeParse(value)
      if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues }, 'Ignoring malformed audio buffer')
        return
      }
      emit({
        kind: 'audio',
        sampleRate: AUDIO_SAMPLE_RATE,
        channels: parsed.data.channels,
        samplesPerChannel: parsed.data.samplesPerChannel,
        data: Buffer.from(parsed.data.data, 'base64'),
      })
    })
    return async () => {
      detach()
      if (link.isOpen) {
        await link.call('ALAudioDevice', 'unsubscribe', [AUDIO_CLIENT_NAME])
      }
    }
  }

  private handleLinkLost(reason: Error) {
    if (!this.link) {
      return
    }
    for (const active of this.streams.values()) {
      active.stop().catch((err: unknown) => logger.debug({ err }, 'Stream cleanup after link loss failed'))
    }
    this.streams.clear()
    this.detachClose?.()
    this.detachClose = null
    this.link = null
    for (const listener of [...this.linkLostListeners]) {
      listener(reason)
    }
  }
}
