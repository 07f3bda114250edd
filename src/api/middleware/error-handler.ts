import type { Request, Response, NextFunction } from 'express'
import type { Logger } from 'pino'
import { RobotError, type RobotErrorKind } from '../../utils/errors'

interface HttpError extends Error {
  status?: number
}

const STATUS_BY_KIND: Record<RobotErrorKind, number> = {
  ConnectError: 503,
  NotConnected: 503,
  Busy: 409,
  UnknownCommand: 404,
  InvalidParameters: 400,
  ActionError: 502,
  SubscribeError: 502,
}

export function createErrorHandler(logger: Logger) {
  // express はエラーハンドラーを引数の数で判別するため next は省略できない
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  return (err: HttpError, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof RobotError) {
      res.status(STATUS_BY_KIND[err.kind]).json({ kind: err.kind, message: err.message })
      return
    }
    const statusCode = err.status ?? 500
    if (statusCode >= 500) {
      logger.error({ err }, 'Unhandled error')
    }
    res.status(statusCode).json({ message: statusCode >= 500 ? 'Internal Server Error' : err.message })
  }
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ message: 'Not Found' })
}
