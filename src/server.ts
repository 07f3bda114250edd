import { createApp } from './app'
import type { LoadConfigOptions } from './config/loader'
import { logger } from './utils/logger'

export interface StartOptions extends LoadConfigOptions {
  exit?: (code?: number) => never
}

export interface RunningServer {
  close(): Promise<void>
}

export const EXIT_STARTUP_FAILURE = 1
export const EXIT_FATAL_CONNECT = 2

export const start = async (options: StartOptions = {}): Promise<RunningServer | undefined> => {
  const exit = options.exit ?? ((code?: number) => process.exit(code))
  try {
    const { app, config, connectionServer } = await createApp(options)
    const { port, host } = config.server
    const server = app.listen(port, host, () => {
      logger.info({ port, host, path: config.server.path, mode: config.robot.mode }, 'Server started')
    })
    connectionServer.attach(server)
    // 致命的な接続エラーは再起動でしか回復しないため、終了コード 2 で落とす
    connectionServer.onFatal((err) => {
      logger.fatal({ err }, 'Fatal robot connection error; exiting for restart')
      exit(EXIT_FATAL_CONNECT)
    })

    return {
      close: async () => {
        await connectionServer.close()
        await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
      },
    }
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server')
    exit(EXIT_STARTUP_FAILURE)
    return undefined
  }
}
