import type {
  BackendVariant,
  PostureName,
  RobotBehavior,
  RobotEndpoint,
  StreamEvent,
  StreamKind,
} from '../../types/robot'

type NoParams = Record<string, never>

export interface ActionParamsMap {
  setTtsLanguage: { language: string }
  say: { text: string }
  stopSay: NoParams
  wakeUp: NoParams
  rest: NoParams
  goToPosture: { posture: PostureName; speed: number; maxTries: number }
  changeEyesColor: { color: string }
  setBasicAwareness: { enabled: boolean; engagementMode: string; trackingMode: string }
  setBreathing: { enabled: boolean; chainName: string }
  runBehavior: { behaviorName: string }
  stopBehavior: { behaviorName: string }
  listBehaviors: NoParams
}

export interface ActionPayloadMap {
  setTtsLanguage: void
  say: void
  stopSay: void
  wakeUp: void
  rest: void
  goToPosture: boolean
  changeEyesColor: void
  setBasicAwareness: void
  setBreathing: void
  runBehavior: void
  stopBehavior: void
  listBehaviors: RobotBehavior[]
}

export type ActionKind = keyof ActionParamsMap

export interface InvokeOptions {
  signal?: AbortSignal
}

export type ActionHandlers = {
  [K in ActionKind]: (params: ActionParamsMap[K], options: InvokeOptions) => Promise<ActionPayloadMap[K]>
}

export type LinkLostListener = (reason: Error) => void

/** バックエンドからのストリーム通知。同期的に呼ばれ、例外はバックエンド側でログに記録される */
export type StreamListener = (event: StreamEvent) => void

/**
 * 実機・シミュレーターを問わずセッションが利用するバックエンドの契約。
 * エラーは ConnectError / ActionError / SubscribeError / NotConnectedError に正規化して返す。
 */
export interface RobotBackend {
  readonly variant: BackendVariant
  readonly endpoint: RobotEndpoint
  connect(): Promise<void>
  disconnect(): Promise<void>
  invoke<K extends ActionKind>(kind: K, params: ActionParamsMap[K], options?: InvokeOptions): Promise<ActionPayloadMap[K]>
  subscribe(kind: StreamKind, listener: StreamListener): Promise<void>
  unsubscribe(kind: StreamKind): Promise<void>
  onLinkLost(listener: LinkLostListener): () => void
}
