export type RobotErrorKind =
  | 'ConnectError'
  | 'NotConnected'
  | 'Busy'
  | 'UnknownCommand'
  | 'InvalidParameters'
  | 'ActionError'
  | 'SubscribeError'

interface RobotErrorOptions {
  cause?: unknown
}

/**
 * ゲートウェイが呼び出し元に返すエラーの基底クラス。
 * `kind` はワイヤー上のエラー種別としてそのまま使われる。
 */
export abstract class RobotError extends Error {
  abstract readonly kind: RobotErrorKind
}

/**
 * ロボットへの接続に失敗した。
 * `fatal` が true の場合はプロセスを再起動するまで再試行できない。
 */
export class ConnectError extends RobotError {
  readonly kind = 'ConnectError'

  constructor(message: string, public readonly fatal: boolean, options: RobotErrorOptions = {}) {
    super(message, options)
    this.name = 'ConnectError'
  }
}

export class NotConnectedError extends RobotError {
  readonly kind = 'NotConnected'

  constructor(message = 'Robot is not connected') {
    super(message)
    this.name = 'NotConnectedError'
  }
}

export class BusyError extends RobotError {
  readonly kind = 'Busy'

  constructor(message: string) {
    super(message)
    this.name = 'BusyError'
  }
}

export class UnknownCommandError extends RobotError {
  readonly kind = 'UnknownCommand'

  constructor(public readonly commandName: string) {
    super(`Unknown command '${commandName}'`)
    this.name = 'UnknownCommandError'
  }
}

export class InvalidParametersError extends RobotError {
  readonly kind = 'InvalidParameters'

  constructor(message: string, public readonly field: string) {
    super(message)
    this.name = 'InvalidParametersError'
  }
}

export class ActionError extends RobotError {
  readonly kind = 'ActionError'

  constructor(message: string, options: RobotErrorOptions = {}) {
    super(message, options)
    this.name = 'ActionError'
  }
}

export class SubscribeError extends RobotError {
  readonly kind = 'SubscribeError'

  constructor(message: string, options: RobotErrorOptions = {}) {
    super(message, options)
    this.name = 'SubscribeError'
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error))

// 分類済みのエラーはそのまま、それ以外は ActionError に包む
export const toRobotError = (error: unknown, context: string): RobotError => {
  if (error instanceof RobotError) {
    return error
  }
  return new ActionError(`${context}: ${errorMessage(error)}`, { cause: error })
}
