import { randomInt } from 'node:crypto'
import {
  ActionError,
  BusyError,
  ConnectError,
  NotConnectedError,
  SubscribeError,
  errorMessage,
  toRobotError,
} from '../utils/errors'
import { logger } from '../utils/logger'
import type {
  BackendVariant,
  CatalogEntry,
  PostureName,
  ReactionType,
  RobotEndpoint,
  SessionState,
  StreamEvent,
  StreamKind,
} from '../types/robot'
import { REACTION_TYPES } from '../types/robot'
import { buildCatalogs, type BehaviorCatalogs } from './behavior-catalog'
import type { ActionKind, ActionParamsMap, ActionPayloadMap, InvokeOptions, RobotBackend } from './backend/types'

export interface PostureSettings {
  speed: number
  maxTries: number
}

export interface RobotSessionOptions {
  posture?: PostureSettings
  /** リアクション候補の選択。既定は一様乱数 */
  pick?: <T>(candidates: readonly T[]) => T
}

export type StreamSink = (event: StreamEvent) => void

export interface StreamHandle {
  readonly kind: StreamKind
  unsubscribe(): void
}

export interface SessionSnapshot {
  variant: BackendVariant
  state: SessionState
  endpoint: RobotEndpoint
  lastError: { kind: string; message: string; fatal: boolean } | null
  pendingPosture: string | null
  running: {
    dances: string[]
    reactions: string[]
    bodyActions: string[]
    behaviors: string[]
  }
  streams: Array<{ kind: StreamKind; consumers: number }>
}

type TrackedCatalog = 'dances' | 'reactions' | 'bodyActions' | 'behaviors'

// 実行ごとに別オブジェクト。同じキーで再実行されたら後の実行が所有者になる
interface TrackedRun {
  behaviorName: string
}

interface StreamFanout {
  sinks: Set<StreamSink>
  opening: Promise<void> | null
}

const DEFAULT_POSTURE: PostureSettings = { speed: 0.8, maxTries: 3 }

const randomPick = <T>(candidates: readonly T[]): T => candidates[randomInt(candidates.length)]

const isReactionType = (value: string): value is ReactionType => REACTION_TYPES.some((type) => type === value)

/**
 * ロボットとのセッション。サーバープロセスにつき 1 つを全接続で共有する。
 *
 * 接続状態の管理、アクションの受付可否、カタログのキャッシュ、姿勢操作の排他、
 * 実行中ビヘイビアの追跡、ストリームのファンアウトを担う。
 */
export class RobotSession {
  private currentState: SessionState = 'Disconnected'
  private lastError: ConnectError | null = null
  private connecting: Promise<void> | null = null
  private catalogCache: Promise<BehaviorCatalogs> | null = null
  private pendingPosture: string | null = null
  private readonly running: Record<TrackedCatalog, Map<string, TrackedRun>> = {
    dances: new Map(),
    reactions: new Map(),
    bodyActions: new Map(),
    behaviors: new Map(),
  }
  private readonly fanouts = new Map<StreamKind, StreamFanout>()
  private readonly linkLostListeners = new Set<(reason: Error) => void>()
  private readonly posture: PostureSettings
  private readonly pick: <T>(candidates: readonly T[]) => T

  constructor(private readonly backend: RobotBackend, options: RobotSessionOptions = {}) {
    this.posture = options.posture ?? DEFAULT_POSTURE
    this.pick = options.pick ?? randomPick
    backend.onLinkLost((reason) => this.handleLinkLost(reason))
  }

  get state(): SessionState {
    return this.currentState
  }

  get variant(): BackendVariant {
    return this.backend.variant
  }

  get isConnected(): boolean {
    return this.currentState === 'Connected'
  }

  snapshot(): SessionSnapshot {
    return {
      variant: this.backend.variant,
      state: this.currentState,
      endpoint: { ...this.backend.endpoint },
      lastError: this.lastError
        ? { kind: this.lastError.kind, message: this.lastError.message, fatal: this.lastError.fatal }
        : null,
      pendingPosture: this.pendingPosture,
      running: {
        dances: [...this.running.dances.keys()],
        reactions: [...this.running.reactions.keys()],
        bodyActions: [...this.running.bodyActions.keys()],
        behaviors: [...this.running.behaviors.keys()],
      },
      streams: [...this.fanouts.entries()].map(([kind, fanout]) => ({ kind, consumers: fanout.sinks.size })),
    }
  }

  onLinkLost(listener: (reason: Error) => void): () => void {
    this.linkLostListeners.add(listener)
    return () => {
      this.linkLostListeners.delete(listener)
    }
  }

  //#region 接続

  /** 進行中の接続があればその結果を共有する。致命的な失敗の後は同じエラーを返し続ける */
  connect(): Promise<void> {
    if (this.currentState === 'Connected') {
      return Promise.resolve()
    }
    if (this.lastError?.fatal) {
      return Promise.reject(this.lastError)
    }
    if (this.connecting) {
      return this.connecting
    }

    this.currentState = 'Connecting'
    const attempt = this.backend
      .connect()
      .then(
        () => {
          this.currentState = 'Connected'
          this.lastError = null
          logger.info({ variant: this.backend.variant, endpoint: this.backend.endpoint }, 'Robot session connected')
        },
        (err: unknown) => {
          const error =
            err instanceof ConnectError ? err : new ConnectError(`Connection failed: ${errorMessage(err)}`, false, { cause: err })
          this.currentState = 'Failed'
          this.lastError = error
          logger.error({ err: error, fatal: error.fatal }, 'Robot session failed to connect')
          throw error
        }
      )
      .finally(() => {
        this.connecting = null
      })
    this.connecting = attempt
    return attempt
  }

  async disconnect(): Promise<void> {
    if (this.connecting) {
      await this.connecting.catch(() => undefined)
    }
    this.resetTracking()
    const kinds = [...this.fanouts.keys()]
    this.fanouts.clear()
    try {
      for (const kind of kinds) {
        await this.backend.unsubscribe(kind)
      }
    } finally {
      await this.backend.disconnect()
      if (!this.lastError?.fatal) {
        this.currentState = 'Disconnected'
      }
    }
  }

  //#endregion

  //#region 音声・姿勢・LED

  async setTtsLanguage(language: string, options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    await this.invoke('setTtsLanguage', { language }, options)
  }

  async say(text: string, options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    await this.invoke('say', { text }, options)
  }

  async stopSay(options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    await this.invoke('stopSay', {}, options)
  }

  wakeUp(options?: InvokeOptions): Promise<void> {
    return this.withPostureGate('wakeUp', () => this.invoke('wakeUp', {}, options))
  }

  rest(options?: InvokeOptions): Promise<void> {
    return this.withPostureGate('rest', () => this.invoke('rest', {}, options))
  }

  standUp(options?: InvokeOptions): Promise<void> {
    return this.withPostureGate('standUp', () => this.goToPosture('Stand', options))
  }

  sitDown(options?: InvokeOptions): Promise<void> {
    return this.withPostureGate('sitDown', () => this.goToPosture('Sit', options))
  }

  async changeEyesColor(color: string, options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    await this.invoke('changeEyesColor', { color }, options)
  }

  async setBasicAwarenessState(
    enabled: boolean,
    engagementMode: string,
    trackingMode: string,
    options?: InvokeOptions
  ): Promise<void> {
    this.ensureConnected()
    await this.invoke('setBasicAwareness', { enabled, engagementMode, trackingMode }, options)
  }

  async setBreathingEnabled(enabled: boolean, chainName: string, options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    await this.invoke('setBreathing', { enabled, chainName }, options)
  }

  /** 対話開始時の準備。目を水色にして起き上がり、呼吸モーションを有効にする */
  async prepareForInteraction(options?: InvokeOptions): Promise<void> {
    await this.changeEyesColor('cyan', options)
    await this.wakeUp(options)
    await this.setBreathingEnabled(true, 'Body', options)
  }

  /** 対話終了時の後片付け */
  async resetAfterInteraction(options?: InvokeOptions): Promise<void> {
    await this.changeEyesColor('white', options)
    await this.setBreathingEnabled(false, 'Body', options)
    await this.rest(options)
  }

  //#endregion

  //#region カタログとビヘイビア

  async getDanceBehaviors(): Promise<CatalogEntry[]> {
    this.ensureConnected()
    const catalogs = await this.loadCatalogs()
    return [...catalogs.dances.values()]
  }

  async dance(danceId: string, options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    const entry = (await this.loadCatalogs()).dances.get(danceId)
    if (!entry) {
      throw new ActionError(`Dance with id '${danceId}' not found`)
    }
    await this.runTracked('dances', danceId, entry.metadata.behaviorName, options)
  }

  async stopDance(danceId: string, options?: InvokeOptions): Promise<void> {
    await this.stopTracked('dances', danceId, options)
  }

  async getExpressiveReactionTypes(): Promise<ReactionType[]> {
    this.ensureConnected()
    const catalogs = await this.loadCatalogs()
    return [...catalogs.reactions.keys()]
  }

  async expressiveReaction(reactionType: string, options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    const catalogs = await this.loadCatalogs()
    const candidates = isReactionType(reactionType) ? catalogs.reactions.get(reactionType) : undefined
    if (!candidates) {
      throw new ActionError(`Reaction type '${reactionType}' not found`)
    }
    if (candidates.length === 0) {
      throw new ActionError(`No behavior available for reaction type '${reactionType}'`)
    }
    const chosen = this.pick(candidates)
    await this.runTracked('reactions', reactionType, chosen.metadata.behaviorName, options)
  }

  async stopExpressiveReaction(reactionType: string, options?: InvokeOptions): Promise<void> {
    await this.stopTracked('reactions', reactionType, options)
  }

  async getBodyActionBehaviors(): Promise<CatalogEntry[]> {
    this.ensureConnected()
    const catalogs = await this.loadCatalogs()
    return [...catalogs.bodyActions.values()]
  }

  async bodyAction(bodyActionId: string, options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    const entry = (await this.loadCatalogs()).bodyActions.get(bodyActionId)
    if (!entry) {
      throw new ActionError(`Body action with id '${bodyActionId}' not found`)
    }
    await this.runTracked('bodyActions', bodyActionId, entry.metadata.behaviorName, options)
  }

  async stopBodyAction(bodyActionId: string, options?: InvokeOptions): Promise<void> {
    await this.stopTracked('bodyActions', bodyActionId, options)
  }

  /** インストール済みの任意のビヘイビアを名前で実行する */
  async runBehavior(behaviorName: string, options?: InvokeOptions): Promise<void> {
    this.ensureConnected()
    await this.runTracked('behaviors', behaviorName, behaviorName, options)
  }

  async stopBehavior(behaviorName: string, options?: InvokeOptions): Promise<void> {
    await this.stopTracked('behaviors', behaviorName, options)
  }

  //#endregion

  //#region ストリーム

  /**
   * ストリームを購読する。最初の購読者でバックエンドの購読を開き、最後の購読者が抜けたら閉じる。
   */
  async subscribeStream(kind: StreamKind, sink: StreamSink): Promise<StreamHandle> {
    if (!this.isConnected) {
      throw new NotConnectedError()
    }
    let fanout = this.fanouts.get(kind)
    if (!fanout) {
      const created: StreamFanout = { sinks: new Set(), opening: null }
      created.opening = this.backend
        .subscribe(kind, (event) => this.fanOut(created, event))
        .finally(() => {
          created.opening = null
        })
      this.fanouts.set(kind, created)
      fanout = created
    }

    const current = fanout
    current.sinks.add(sink)
    if (current.opening) {
      try {
        await current.opening
      } catch (err) {
        current.sinks.delete(sink)
        if (this.fanouts.get(kind) === current) {
          this.fanouts.delete(kind)
        }
        throw err instanceof SubscribeError
          ? err
          : new SubscribeError(`Failed to subscribe to ${kind}: ${errorMessage(err)}`, { cause: err })
      }
    }

    let active = true
    return {
      kind,
      unsubscribe: () => {
        if (!active) {
          return
        }
        active = false
        this.releaseSink(kind, current, sink)
      },
    }
  }

  //#endregion

  private ensureConnected() {
    if (!this.isConnected) {
      throw new NotConnectedError()
    }
  }

  private async invoke<K extends ActionKind>(
    kind: K,
    params: ActionParamsMap[K],
    options: InvokeOptions = {}
  ): Promise<ActionPayloadMap[K]> {
    this.ensureConnected()
    try {
      return await this.backend.invoke(kind, params, options)
    } catch (err) {
      throw toRobotError(err, `${kind} failed`)
    }
  }

  private async withPostureGate(operation: string, run: () => Promise<void>): Promise<void> {
    this.ensureConnected()
    if (this.pendingPosture) {
      throw new BusyError(`Posture operation '${this.pendingPosture}' is still in progress`)
    }
    this.pendingPosture = operation
    try {
      await run()
    } finally {
      this.pendingPosture = null
    }
  }

  private async goToPosture(posture: PostureName, options?: InvokeOptions): Promise<void> {
    const reached = await this.invoke(
      'goToPosture',
      { posture, speed: this.posture.speed, maxTries: this.posture.maxTries },
      options
    )
    if (!reached) {
      throw new ActionError(`Robot could not reach the '${posture}' posture`)
    }
  }

  private loadCatalogs(): Promise<BehaviorCatalogs> {
    if (this.catalogCache) {
      return this.catalogCache
    }
    const pending = this.invoke('listBehaviors', {}).then((behaviors) => {
      const catalogs = buildCatalogs(behaviors)
      logger.info(
        {
          dances: catalogs.dances.size,
          bodyActions: catalogs.bodyActions.size,
          reactions: Object.fromEntries([...catalogs.reactions].map(([type, entries]) => [type, entries.length])),
        },
        'Behavior catalogs loaded'
      )
      return catalogs
    })
    this.catalogCache = pending
    // 失敗した取得はキャッシュしない（呼び出し元には pending 経由でエラーが届く）
    pending.catch(() => {
      if (this.catalogCache === pending) {
        this.catalogCache = null
      }
    })
    return pending
  }

  private async runTracked(catalog: TrackedCatalog, key: string, behaviorName: string, options: InvokeOptions = {}) {
    const registry = this.running[catalog]
    const { signal } = options
    const run: TrackedRun = { behaviorName }
    registry.set(key, run)

    const onAbort = () => {
      this.invoke('stopBehavior', { behaviorName }).catch((err: unknown) =>
        logger.warn({ err, behaviorName }, 'Failed to stop behavior after cancellation')
      )
    }
    signal?.addEventListener('abort', onAbort, { once: true })
    try {
      await this.invoke('runBehavior', { behaviorName }, options)
    } finally {
      signal?.removeEventListener('abort', onAbort)
      if (registry.get(key) === run) {
        registry.delete(key)
      }
    }
  }

  /** 実行中でなければ何もせず成功する */
  private async stopTracked(catalog: TrackedCatalog, key: string, options?: InvokeOptions) {
    this.ensureConnected()
    const run = this.running[catalog].get(key)
    if (!run) {
      logger.debug({ catalog, key }, 'Stop requested for behavior that is not running')
      return
    }
    await this.invoke('stopBehavior', { behaviorName: run.behaviorName }, options)
    if (this.running[catalog].get(key) === run) {
      this.running[catalog].delete(key)
    }
  }

  private fanOut(fanout: StreamFanout, event: StreamEvent) {
    for (const sink of [...fanout.sinks]) {
      try {
        sink(event)
      } catch (err) {
        logger.warn({ err, streamKind: event.kind }, 'Stream sink failed')
      }
    }
  }

  private releaseSink(kind: StreamKind, fanout: StreamFanout, sink: StreamSink) {
    fanout.sinks.delete(sink)
    if (fanout.sinks.size > 0 || this.fanouts.get(kind) !== fanout) {
      return
    }
    this.fanouts.delete(kind)
    if (!this.isConnected) {
      return
    }
    this.backend.unsubscribe(kind).catch((err: unknown) => logger.warn({ err, streamKind: kind }, 'Failed to close stream'))
  }

  private resetTracking() {
    this.catalogCache = null
    this.pendingPosture = null
    for (const registry of Object.values(this.running)) {
      registry.clear()
    }
  }

  private handleLinkLost(reason: Error) {
    logger.error({ err: reason }, 'Robot link lost')
    this.resetTracking()
    this.fanouts.clear()
    this.currentState = 'Failed'
    this.lastError = new ConnectError(`Robot link lost: ${reason.message}`, false, { cause: reason })
    for (const listener of [...this.linkLostListeners]) {
      listener(reason)
    }
  }
}
