import { promises as fs } from 'node:fs'
import path from 'node:path'
import process from 'node:process'
import { backendModeSchema, configSchema, type BackendMode, type GatewayConfig } from './schema'

export const DEFAULT_CONFIG_PATH = 'config/gateway.json'

export interface ConfigOverrides {
  server?: Partial<GatewayConfig['server']>
  robot?: Partial<GatewayConfig['robot']>
  streams?: Partial<GatewayConfig['streams']>
}

export interface ResolvedConfig extends GatewayConfig {
  /** 読み込んだ設定ファイルの絶対パス。ファイルなしで起動した場合は null */
  configPath: string | null
}

export interface LoadConfigOptions {
  configPath?: string
  overrides?: ConfigOverrides
  env?: NodeJS.ProcessEnv
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath: string | null, options: { cause?: unknown } = {}) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

interface ConfigFile {
  found: boolean
  data: unknown
}

const readConfigFile = async (configPath: string, required: boolean): Promise<ConfigFile> => {
  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf8')
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { found: false, data: {} }
    }
    throw new ConfigError(`Cannot read config file ${configPath}`, configPath, { cause: error })
  }
  try {
    const data: unknown = JSON.parse(raw)
    return { found: true, data }
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, configPath, { cause: error })
  }
}

const parsePort = (value: string | undefined, name: string): number | undefined => {
  if (value === undefined || value === '') {
    return undefined
  }
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0) {
    throw new ConfigError(`${name} must be a non-negative integer (got '${value}')`, null)
  }
  return port
}

const parseMode = (value: string | undefined): BackendMode | undefined => {
  if (value === undefined || value === '') {
    return undefined
  }
  const parsed = backendModeSchema.safeParse(value)
  if (!parsed.success) {
    throw new ConfigError(`ROBOT_MODE must be 'simulated' or 'live' (got '${value}')`, null)
  }
  return parsed.data
}

/** 環境変数からの上書き。CLI オプションはさらにこの上に重なる */
export const envOverrides = (env: NodeJS.ProcessEnv): ConfigOverrides => {
  const server: NonNullable<ConfigOverrides['server']> = {}
  const robot: NonNullable<ConfigOverrides['robot']> = {}

  if (env.HOST) {
    server.host = env.HOST
  }
  const port = parsePort(env.PORT, 'PORT')
  if (port !== undefined) {
    server.port = port
  }
  if (env.ROBOT_HOST !== undefined) {
    robot.host = env.ROBOT_HOST
  }
  const robotPort = parsePort(env.ROBOT_PORT, 'ROBOT_PORT')
  if (robotPort !== undefined) {
    robot.port = robotPort
  }
  const mode = parseMode(env.ROBOT_MODE)
  if (mode) {
    robot.mode = mode
  }

  return { server, robot }
}

const merge = (base: GatewayConfig, ...layers: ConfigOverrides[]): GatewayConfig =>
  layers.reduce<GatewayConfig>(
    (acc, layer) => ({
      ...acc,
      server: { ...acc.server, ...layer.server },
      robot: { ...acc.robot, ...layer.robot },
      streams: { ...acc.streams, ...layer.streams },
    }),
    base
  )

const parseConfig = (input: unknown, configPath: string | null): GatewayConfig => {
  const parsed = configSchema.safeParse(input)
  if (parsed.success) {
    return parsed.data
  }
  const issue = parsed.error.issues[0]
  const field = issue.path.join('.')
  throw new ConfigError(`Invalid config${field ? ` at '${field}'` : ''}: ${issue.message}`, configPath, {
    cause: parsed.error,
  })
}

/**
 * 設定ファイル → 環境変数 → CLI の順に重ねて検証する。
 * configPath を省略した場合は既定パスを探し、無ければ既定値だけで起動する。
 */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<ResolvedConfig> => {
  const required = options.configPath !== undefined
  const configPath = path.resolve(process.cwd(), options.configPath ?? DEFAULT_CONFIG_PATH)
  const file = await readConfigFile(configPath, required)
  const fileConfig = parseConfig(file.data, configPath)
  const merged = merge(fileConfig, envOverrides(options.env ?? process.env), options.overrides ?? {})

  return {
    ...parseConfig(merged, configPath),
    configPath: file.found ? configPath : null,
  }
}
