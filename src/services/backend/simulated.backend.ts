import { z } from 'zod'
import { ActionError, NotConnectedError, SubscribeError } from '../../utils/errors'
import { delay } from '../../utils/async'
import { logger } from '../../utils/logger'
import {
  TOUCH_PARTS,
  type RobotBehavior,
  type RobotEndpoint,
  type StreamEvent,
  type StreamKind,
  type TouchPart,
  type TouchState,
} from '../../types/robot'
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
import simulatedBehaviors from './simulated-behaviors.json'

export const SIMULATED_JOINT_NAMES: readonly string[] = [
  'HeadYaw',
  'HeadPitch',
  'LShoulderPitch',
  'LShoulderRoll',
  'LElbowYaw',
  'LElbowRoll',
  'LWristYaw',
  'LHand',
  'LHipYawPitch',
  'LHipRoll',
  'LHipPitch',
  'LKneePitch',
  'LAnklePitch',
  'LAnkleRoll',
  'RHipYawPitch',
  'RHipRoll',
  'RHipPitch',
  'RKneePitch',
  'RAnklePitch',
  'RAnkleRoll',
  'RShoulderPitch',
  'RShoulderRoll',
  'RElbowYaw',
  'RElbowRoll',
  'RWristYaw',
  'RHand',
]

export const SIMULATED_SAMPLE_RATE = 16000

const robotBehaviorSchema = z.object({
  packageUuid: z.string(),
  behaviorPath: z.string(),
  behaviorName: z.string(),
  localizedName: z.object({ en_US: z.string(), fr_FR: z.string() }),
  description: z.string(),
  tags: z.array(z.string()),
})

export const SIMULATED_BEHAVIORS: readonly RobotBehavior[] = z.array(robotBehaviorSchema).parse(simulatedBehaviors)

/** tick 番目のフレームの関節角度（ラジアン）。関節ごとに位相をずらした正弦波 */
export const syntheticJointAngles = (tick: number): number[] =>
  SIMULATED_JOINT_NAMES.map((_name, index) => Math.round(Math.sin((tick + index) / 10) * 5000) / 10000)

export interface SimulatedBackendOptions {
  endpoint: RobotEndpoint
  connectDelayMs: number
  behaviorDurationMs: number
  jointsIntervalMs: number
  audioIntervalMs: number
  touchIntervalMs: number
  behaviors?: readonly RobotBehavior[]
}

/**
 * 実機なしで動作するバックエンド。
 * 接続・アクション・ストリームを擬似的に再現し、実機と同じ形のエラーを返す。
 */
export class SimulatedBackend implements RobotBackend {
  readonly variant = 'simulated'
  private connected = false
  private readonly behaviors: readonly RobotBehavior[]
  private readonly listeners = new Map<StreamKind, StreamListener>()
  private readonly timers = new Map<StreamKind, NodeJS.Timeout>()
  private readonly ticks = new Map<StreamKind, number>()
  private readonly running = new Map<string, () => void>()
  private readonly linkLostListeners = new Set<LinkLostListener>()
  private readonly handlers: ActionHandlers

  constructor(private readonly options: SimulatedBackendOptions) {
    this.behaviors = options.behaviors ?? SIMULATED_BEHAVIORS
    this.handlers = {
      setTtsLanguage: async ({ language }) => this.record('setTtsLanguage', { language }),
      say: async ({ text }) => this.record('say', { text }),
      stopSay: async () => this.record('stopSay'),
      wakeUp: async () => this.record('wakeUp'),
      rest: async () => this.record('rest'),
      goToPosture: async (params) => {
        this.record('goToPosture', params)
        return true
      },
      changeEyesColor: async ({ color }) => this.record('changeEyesColor', { color }),
      setBasicAwareness: async (params) => this.record('setBasicAwareness', params),
      setBreathing: async (params) => this.record('setBreathing', params),
      runBehavior: ({ behaviorName }, { signal }) => this.runBehavior(behaviorName, signal),
      stopBehavior: async ({ behaviorName }) => {
        this.record('stopBehavior', { behaviorName })
        this.running.get(behaviorName)?.()
      },
      listBehaviors: async () => this.behaviors.map((behavior) => ({ ...behavior, tags: [...behavior.tags] })),
    }
  }

  get endpoint(): RobotEndpoint {
    return this.options.endpoint
  }

  get isConnected(): boolean {
    return this.connected
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return
    }
    if (this.options.connectDelayMs > 0) {
      await delay(this.options.connectDelayMs)
    }
    this.connected = true
    logger.info({ endpoint: this.options.endpoint }, 'Simulated robot connected')
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return
    }
    this.teardown()
    logger.info('Simulated robot disconnected')
  }

  invoke<K extends ActionKind>(kind: K, params: ActionParamsMap[K], options: InvokeOptions = {}): Promise<ActionPayloadMap[K]> {
    if (!this.connected) {
      return Promise.reject(new NotConnectedError())
    }
    const handler: ActionHandlers[K] = this.handlers[kind]
    return handler(params, options)
  }

  async subscribe(kind: StreamKind, listener: StreamListener): Promise<void> {
    if (!this.connected) {
      throw new SubscribeError(`Cannot subscribe to ${kind}: robot is not connected`)
    }
    const alreadyActive = this.listeners.has(kind)
    this.listeners.set(kind, listener)
    if (!alreadyActive) {
      this.startTimer(kind)
    }
  }

  async unsubscribe(kind: StreamKind): Promise<void> {
    this.listeners.delete(kind)
    const timer = this.timers.get(kind)
    if (timer) {
      clearInterval(timer)
      this.timers.delete(kind)
    }
  }

  onLinkLost(listener: LinkLostListener): () => void {
    this.linkLostListeners.add(listener)
    return () => {
      this.linkLostListeners.delete(listener)
    }
  }

  /** タッチセンサーの押下・解放を注入する */
  emitTouch(part: TouchPart, state: TouchState): void {
    this.emit({ kind: 'touch', part, state })
  }

  /** 通信断を擬似的に発生させる */
  dropLink(reason = new Error('Simulated link lost')): void {
    if (!this.connected) {
      return
    }
    this.teardown()
    logger.warn({ err: reason }, 'Simulated robot link lost')
    for (const listener of [...this.linkLostListeners]) {
      listener(reason)
    }
  }

  private teardown() {
    this.connected = false
    for (const timer of this.timers.values()) {
      clearInterval(timer)
    }
    this.timers.clear()
    this.listeners.clear()
    this.ticks.clear()
    for (const finish of [...this.running.values()]) {
      finish()
    }
  }

  private record(action: string, params: Record<string, unknown> = {}): void {
    logger.debug({ action, ...params }, 'Simulated robot action')
  }

  private runBehavior(behaviorName: string, signal?: AbortSignal): Promise<void> {
    if (!this.behaviors.some((behavior) => behavior.behaviorName === behaviorName)) {
      return Promise.reject(new ActionError(`Behavior '${behaviorName}' is not installed`))
    }
    if (signal?.aborted) {
      return Promise.reject(new ActionError(`Behavior '${behaviorName}' was cancelled`))
    }
    // 同じビヘイビアが実行中なら先に終わらせる（実機の再実行と同じ挙動）
    this.running.get(behaviorName)?.()
    this.record('runBehavior', { behaviorName })

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
        if (this.running.get(behaviorName) === finish) {
          this.running.delete(behaviorName)
        }
      }
      const finish = () => {
        cleanup()
        resolve()
      }
      const onAbort = () => {
        cleanup()
        reject(new ActionError(`Behavior '${behaviorName}' was cancelled`))
      }
      const timer = setTimeout(finish, this.options.behaviorDurationMs)
      this.running.set(behaviorName, finish)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  private startTimer(kind: StreamKind) {
    const interval = this.intervalFor(kind)
    if (interval <= 0) {
      return
    }
    const timer = setInterval(() => {
      const tick = this.ticks.get(kind) ?? 0
      this.ticks.set(kind, tick + 1)
      this.emit(this.synthesize(kind, tick))
    }, interval)
    this.timers.set(kind, timer)
  }

  private intervalFor(kind: StreamKind): number {
    switch (kind) {
      case 'touch':
        return this.options.touchIntervalMs
      case 'joints':
        return this.options.jointsIntervalMs
      case 'audio':
        return this.options.audioIntervalMs
      default: {
        const _exhaustiveCheck: never = kind
        throw new Error(`Unsupported stream kind: ${_exhaustiveCheck}`)
      }
    }
  }

  private synthesize(kind: StreamKind, tick: number): StreamEvent {
    switch (kind) {
      case 'touch': {
        // 偶数 tick で押下、奇数 tick で同じセンサーを解放
        const part = TOUCH_PARTS[Math.floor(tick / 2) % TOUCH_PARTS.length]
        return { kind: 'touch', part, state: tick % 2 === 0 ? 1 : 0 }
      }
      case 'joints':
        return { kind: 'joints', names: [...SIMULATED_JOINT_NAMES], angles: syntheticJointAngles(tick) }
      case 'audio': {
        const samplesPerChannel = Math.round((SIMULATED_SAMPLE_RATE * this.options.audioIntervalMs) / 1000)
        return {
          kind: 'audio',
          sampleRate: SIMULATED_SAMPLE_RATE,
          channels: 1,
          samplesPerChannel,
          data: Buffer.alloc(samplesPerChannel * 2),
        }
      }
      default: {
        const _exhaustiveCheck: never = kind
        throw new Error(`Unsupported stream kind: ${_exhaustiveCheck}`)
      }
    }
  }

  private emit(event: StreamEvent) {
    const listener = this.listeners.get(event.kind)
    if (!listener) {
      return
    }
    try {
      listener(event)
    } catch (err) {
      logger.warn({ err, streamKind: event.kind }, 'Stream listener failed')
    }
  }
}
