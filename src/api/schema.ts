import { z } from 'zod'
import type { SessionSnapshot } from '../services/robot-session'
import type { StreamKind } from '../types/robot'
import type { RobotErrorKind } from '../utils/errors'

/**
 * クライアントから届くコマンドフレーム
 * requestId を省略した場合はサーバー側で UUID を採番する
 */
export const requestFrameSchema = z.object({
  commandName: z.string().min(1),
  parameters: z.unknown().optional(),
  requestId: z.union([z.string().min(1), z.number()]).optional(),
})

export const noParamsSchema = z.object({})

export const engagementModeSchema = z.enum(['Unengaged', 'FullyEngaged', 'SemiEngaged'])
export const trackingModeSchema = z.enum(['Head', 'BodyRotation', 'WholeBody', 'MoveContextually'])
export const breathingChainSchema = z.enum(['Body', 'Legs', 'Arms', 'LArm', 'RArm', 'Head'])

export const setTtsLanguageSchema = z.object({ language: z.string().min(1) })
export const genericSchema = z.object({ text: z.string() })
export const saySchema = z.object({ text: z.string() })
export const changeEyesColorSchema = z.object({ color: z.string().min(1) })

export const basicAwarenessSchema = z.object({
  enabled: z.boolean(),
  engagementMode: engagementModeSchema,
  trackingMode: trackingModeSchema,
})

export const breathingSchema = z.object({
  enabled: z.boolean(),
  chainName: breathingChainSchema,
})

export const danceSchema = z.object({ danceId: z.string().min(1) })
export const reactionSchema = z.object({ reactionType: z.string().min(1) })
export const bodyActionSchema = z.object({ bodyActionId: z.string().min(1) })
export const behaviorSchema = z.object({ name: z.string().min(1) })

//#region サーバーから送るフレーム

export interface ErrorBody {
  kind: RobotErrorKind
  message: string
  field?: string
  fatal?: boolean
}

export interface ResultFrame {
  type: 'result'
  requestId: string
  result: unknown
}

export interface ErrorFrame {
  type: 'error'
  requestId: string
  error: ErrorBody
}

export type ReplyFrame = ResultFrame | ErrorFrame

export type EventPayload =
  | { part: string; state: number }
  | { names: string[]; angles: number[] }
  | { sampleRate: number; channels: number; samplesPerChannel: number; data: string }

export interface EventFrame {
  type: 'event'
  streamKind: StreamKind
  payload: EventPayload
}

export interface HelloFrame {
  type: 'hello'
  state: SessionSnapshot
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** サーバー側のログをクライアントに転送するフレーム（requestId なし） */
export interface LogFrame {
  type: 'log'
  level: LogLevel
  message: string
}

export type ServerFrame = ReplyFrame | EventFrame | HelloFrame | LogFrame

//#endregion
