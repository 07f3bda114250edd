import express from 'express'
import { loadConfig, type LoadConfigOptions, type ResolvedConfig } from './config/loader'
import { createBackend } from './services/backend/factory'
import type { RobotBackend } from './services/backend/types'
import { RobotSession } from './services/robot-session'
import { ConnectionServer } from './infra/connection-server'
import { createStatusRouter } from './api/status.controller'
import { createErrorHandler, notFoundHandler } from './api/middleware/error-handler'
import { logger } from './utils/logger'

export interface CreateAppOptions extends LoadConfigOptions {
  /** 読み込み済みの設定。指定時は loadConfig を呼ばない */
  config?: ResolvedConfig
  backend?: RobotBackend
}

export const createApp = async (options: CreateAppOptions = {}) => {
  const config = options.config ?? (await loadConfig(options))
  const backend = options.backend ?? createBackend(config)
  const session = new RobotSession(backend, { posture: config.posture })
  const connectionServer = new ConnectionServer({
    session,
    path: config.server.path,
    forwardLogs: config.server.forwardLogs,
    streams: config.streams,
    interaction: config.interaction,
  })

  const app = express()
  app.use(express.json({ limit: '64kb' }))
  app.get('/health', (_req, res) => res.json({ status: 'ok' }))
  app.use('/api', createStatusRouter(session, connectionServer))
  app.use(notFoundHandler)
  app.use(createErrorHandler(logger))

  return { app, config, session, connectionServer }
}

export type { ResolvedConfig }
