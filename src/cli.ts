#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander'
import packageJson from '../package.json'
import type { ConfigOverrides } from './config/loader'
import { runToolServer } from './mcp/tool.server'
import { start } from './server'
import { logger } from './utils/logger'

interface RobotOptions {
  simulated?: boolean
  ip?: string
  port?: number
  config?: string
}

interface ServeOptions extends RobotOptions {
  websocketPort?: number
  withJointsData?: boolean
  withAudioData?: boolean
}

interface Closable {
  close(): Promise<void>
}

export interface CliHandlers {
  serve: typeof start
  mcp: typeof runToolServer
}

const parsePort = (value: string): number => {
  const port = Number(value)
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidArgumentError('Must be a port number between 1 and 65535.')
  }
  return port
}

// --simulated が最優先。--ip だけ指定された場合は実機モードとみなす
export const robotOverrides = (options: RobotOptions): ConfigOverrides['robot'] => {
  const robot: NonNullable<ConfigOverrides['robot']> = {}
  if (options.ip !== undefined) {
    robot.host = options.ip
  }
  if (options.port !== undefined) {
    robot.port = options.port
  }
  if (options.simulated) {
    robot.mode = 'simulated'
  } else if (options.ip) {
    robot.mode = 'live'
  }
  return robot
}

export const serveOverrides = (options: ServeOptions): ConfigOverrides => {
  const overrides: ConfigOverrides = { robot: robotOverrides(options), streams: {} }
  if (options.websocketPort !== undefined) {
    overrides.server = { port: options.websocketPort }
  }
  if (options.withJointsData) {
    overrides.streams = { ...overrides.streams, joints: true }
  }
  if (options.withAudioData) {
    overrides.streams = { ...overrides.streams, audio: true }
  }
  return overrides
}

const shutdownOnSignals = (running: Closable | undefined) => {
  if (!running) {
    return
  }
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down')
    running
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed')
        process.exit(1)
      })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

export const createProgram = (handlers: CliHandlers = { serve: start, mcp: runToolServer }): Command => {
  const program = new Command()

  program.name('humanoid-gateway').description(packageJson.description).version(packageJson.version)

  program
    .command('serve')
    .description('Run the WebSocket message server')
    .option('--simulated', 'Use the simulated robot instead of a real one')
    .option('--ip <address>', 'Robot (service bridge) address')
    .option('--port <number>', 'Robot (service bridge) port', parsePort)
    .option('--websocket-port <number>', 'Port of the WebSocket server', parsePort)
    .option('--with-joints-data', 'Stream joint angles to every client')
    .option('--with-audio-data', 'Stream microphone audio to every client')
    .option('--config <path>', 'Path to the JSON configuration file')
    .action(async (options: ServeOptions) => {
      const running = await handlers.serve({ configPath: options.config, overrides: serveOverrides(options) })
      shutdownOnSignals(running)
    })

  program
    .command('mcp')
    .description('Run the MCP tool server on stdio')
    .option('--simulated', 'Use the simulated robot instead of a real one')
    .option('--ip <address>', 'Robot (service bridge) address')
    .option('--port <number>', 'Robot (service bridge) port', parsePort)
    .option('--config <path>', 'Path to the JSON configuration file')
    .action(async (options: RobotOptions) => {
      const running = await handlers.mcp({ configPath: options.config, overrides: { robot: robotOverrides(options) } })
      shutdownOnSignals(running)
    })

  return program
}

const isMainModule = typeof require !== 'undefined' && typeof module !== 'undefined' && require.main === module

if (isMainModule) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      logger.error({ err }, 'Command failed')
      process.exit(1)
    })
}
