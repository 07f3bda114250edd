import { z } from 'zod'

export const backendModeSchema = z.enum(['simulated', 'live'])

const serverSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().positive().default(8002),
  path: z.string().startsWith('/').default('/ws'),
  // コマンドの実行ログを LogFrame としてクライアントにも送る
  forwardLogs: z.boolean().default(false),
})

// 実機（サービスブリッジ）への接続設定
const robotSchema = z.object({
  mode: backendModeSchema.default('simulated'),
  host: z.string().default(''),
  port: z.number().int().nonnegative().default(9559),
  maxConnectTries: z.number().int().positive().default(10),
  connectRetryDelayMs: z.number().int().nonnegative().default(1000),
  connectTimeoutMs: z.number().int().positive().default(5000),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  behaviorTimeoutMs: z.number().int().positive().default(600_000),
  jointsIntervalMs: z.number().int().positive().default(200),
})

const postureSchema = z.object({
  speed: z.number().positive().max(1).default(0.8),
  maxTries: z.number().int().positive().default(3),
})

const simulationSchema = z.object({
  connectDelayMs: z.number().int().nonnegative().default(100),
  behaviorDurationMs: z.number().int().nonnegative().default(3000),
  jointsIntervalMs: z.number().int().positive().default(200),
  audioIntervalMs: z.number().int().positive().default(170),
  touchIntervalMs: z.number().int().nonnegative().default(0),
})

const streamsSchema = z.object({
  touch: z.boolean().default(true),
  joints: z.boolean().default(false),
  audio: z.boolean().default(false),
})

// 最初のクライアント接続時・最後のクライアント切断時の準備/後片付け
const interactionSchema = z.object({
  prepareOnConnect: z.boolean().default(true),
  resetOnDisconnect: z.boolean().default(true),
})

export const configSchema = z.object({
  server: serverSchema.default({}),
  robot: robotSchema.default({}),
  posture: postureSchema.default({}),
  simulation: simulationSchema.default({}),
  streams: streamsSchema.default({}),
  interaction: interactionSchema.default({}),
})

export type BackendMode = z.infer<typeof backendModeSchema>
export type GatewayConfig = z.infer<typeof configSchema>
export type GatewayConfigInput = z.input<typeof configSchema>
