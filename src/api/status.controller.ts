import { Router } from 'express'
import type { ConnectionStreamStats } from '../infra/connection-server'
import type { RobotSession } from '../services/robot-session'

export interface ConnectionStats {
  readonly clientCount: number
  connectionStats(): ConnectionStreamStats[]
}

export const createStatusRouter = (session: RobotSession, connections: ConnectionStats): Router => {
  const router = Router()

  router.get('/status', (_req, res) => {
    return res.json({
      session: session.snapshot(),
      clients: connections.clientCount,
      connections: connections.connectionStats(),
    })
  })

  // クライアント接続を待たずにロボットへ接続する（失敗はエラーハンドラーに委ねる）
  router.post('/session/connect', (_req, res, next) => {
    session
      .connect()
      .then(() => res.json({ session: session.snapshot() }))
      .catch(next)
  })

  return router
}
