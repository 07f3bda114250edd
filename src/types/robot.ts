export type BackendVariant = 'live' | 'simulated'

export type SessionState = 'Disconnected' | 'Connecting' | 'Connected' | 'Failed'

export interface RobotEndpoint {
  host: string
  port: number
}

export type TouchPart = 'FrontTactilTouched' | 'MiddleTactilTouched' | 'RearTactilTouched'

export const TOUCH_PARTS: readonly TouchPart[] = ['FrontTactilTouched', 'MiddleTactilTouched', 'RearTactilTouched']

export type TouchState = 0 | 1

export interface TouchEvent {
  kind: 'touch'
  part: TouchPart
  state: TouchState
}

export interface JointsFrame {
  kind: 'joints'
  names: string[]
  angles: number[]
}

export interface AudioFrame {
  kind: 'audio'
  sampleRate: number
  channels: number
  samplesPerChannel: number
  data: Buffer
}

export type StreamEvent = TouchEvent | JointsFrame | AudioFrame

export type StreamKind = StreamEvent['kind']

export const STREAM_KINDS: readonly StreamKind[] = ['touch', 'joints', 'audio']

export type StreamConsumer = (event: StreamEvent) => void | Promise<void>

export interface LocalizedName {
  en_US: string
  fr_FR: string
}

/** ロボットにインストールされているビヘイビア */
export interface RobotBehavior {
  packageUuid: string
  behaviorPath: string
  behaviorName: string
  localizedName: LocalizedName
  description: string
  tags: string[]
}

export interface CatalogEntry {
  id: string
  displayName: string
  metadata: {
    behaviorName: string
    localizedName: LocalizedName
    description: string
  }
}

export const REACTION_TYPES = ['Happy', 'Proud', 'Laugh', 'Sad', 'HeadTouched'] as const

export type ReactionType = (typeof REACTION_TYPES)[number]

export type PostureName = 'Stand' | 'Sit'
