import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js'
import packageJson from '../../package.json'
import { loadConfig, type LoadConfigOptions } from '../config/loader'
import { createBackend } from '../services/backend/factory'
import type { RobotBackend } from '../services/backend/types'
import { RobotSession } from '../services/robot-session'
import { EXIT_FATAL_CONNECT, EXIT_STARTUP_FAILURE } from '../server'
import { ConnectError } from '../utils/errors'
import { logger } from '../utils/logger'
import { TOOL_DEFINITIONS, callTool } from './tools'

export const createToolServer = (session: RobotSession): Server => {
  const server = new Server({ name: packageJson.name, version: packageJson.version }, { capabilities: { tools: {} } })

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOL_DEFINITIONS,
  }))

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params
    return callTool(session, name, args)
  })

  return server
}

export interface RunToolServerOptions extends LoadConfigOptions {
  backend?: RobotBackend
  exit?: (code?: number) => never
}

/**
 * stdio で MCP サーバーを起動する。
 * ロボットに接続できない場合は起動せず、致命的な失敗なら終了コード 2 で終了する。
 */
export const runToolServer = async (options: RunToolServerOptions = {}): Promise<{ close(): Promise<void> } | undefined> => {
  const exit = options.exit ?? ((code?: number) => process.exit(code))
  let session: RobotSession
  try {
    const config = await loadConfig(options)
    session = new RobotSession(options.backend ?? createBackend(config), { posture: config.posture })
    await session.connect()
  } catch (err) {
    logger.error({ err }, 'Failed to start tool server')
    exit(err instanceof ConnectError && err.fatal ? EXIT_FATAL_CONNECT : EXIT_STARTUP_FAILURE)
    return undefined
  }

  const server = createToolServer(session)
  const transport = new StdioServerTransport()
  await server.connect(transport)
  logger.info({ variant: session.variant, tools: TOOL_DEFINITIONS.length }, 'Tool server listening on stdio')

  return {
    close: async () => {
      await server.close()
      await session.disconnect()
    },
  }
}
