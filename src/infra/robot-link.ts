import WebSocket from 'ws'
import { z } from 'zod'
import { logger } from '../utils/logger'

export type LinkErrorReason = 'unreachable' | 'timeout' | 'closed' | 'aborted' | 'remote' | 'protocol'

export class LinkError extends Error {
  constructor(message: string, public readonly reason: LinkErrorReason, options: { cause?: unknown } = {}) {
    super(message, options)
    this.name = 'LinkError'
  }
}

export interface RobotLinkOptions {
  url: string
  connectTimeoutMs: number
  requestTimeoutMs: number
}

export interface CallOptions {
  signal?: AbortSignal
  timeoutMs?: number
}

type SignalListener = (value: unknown) => void

interface PendingCall {
  resolve: (value: unknown) => void
  reject: (error: Error) => void
}

const responseSchema = z.object({
  id: z.number().int(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string(),
    })
    .optional(),
})

const signalSchema = z.object({
  method: z.literal('signal'),
  params: z.object({
    subscription: z.string(),
    value: z.unknown(),
  }),
})

/**
 * ロボット側サービスブリッジへの JSON-RPC 2.0 クライアント。
 *
 * リクエストは `{ jsonrpc, id, method: "Service.method", params: [...] }`、
 * サブスクリプションの通知は `{ method: "signal", params: { subscription, value } }` で届く。
 */
export class RobotLink {
  private socket: WebSocket | null = null
  private nextId = 1
  private closing = false
  private readonly pending = new Map<number, PendingCall>()
  private readonly signalListeners = new Map<string, Set<SignalListener>>()
  private readonly closeListeners = new Set<(reason: Error) => void>()

  constructor(private readonly options: RobotLinkOptions) {}

  get url(): string {
    return this.options.url
  }

  get isOpen(): boolean {
    return this.socket?.readyState === WebSocket.OPEN
  }

  async open(): Promise<void> {
    const socket = new WebSocket(this.options.url)
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.terminate()
        reject(new LinkError(`Timed out connecting to ${this.options.url}`, 'timeout'))
      }, this.options.connectTimeoutMs)
      socket.once('open', () => {
        clearTimeout(timer)
        resolve()
      })
      socket.once('error', (err) => {
        clearTimeout(timer)
        reject(new LinkError(`Cannot reach ${this.options.url}: ${err.message}`, 'unreachable', { cause: err }))
      })
    })

    this.socket = socket
    socket.on('message', (data) => this.handleMessage(data.toString()))
    socket.on('error', (err) => logger.warn({ err, url: this.options.url }, 'Robot link socket error'))
    socket.on('close', (code, reason) => this.handleClose(code, reason.toString()))
  }

  call(service: string, method: string, args: unknown[] = [], options: CallOptions = {}): Promise<unknown> {
    const socket = this.socket
    const target = `${service}.${method}`
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new LinkError(`Robot link is not open (${target})`, 'closed'))
    }
    const { signal } = options
    if (signal?.aborted) {
      return Promise.reject(new LinkError(`${target} was cancelled`, 'aborted'))
    }

    const id = this.nextId++
    const timeoutMs = options.timeoutMs ?? this.options.requestTimeoutMs

    return new Promise<unknown>((resolve, reject) => {
      const settle = () => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
        this.pending.delete(id)
      }
      const onAbort = () => {
        settle()
        reject(new LinkError(`${target} was cancelled`, 'aborted'))
      }
      const timer = setTimeout(() => {
        settle()
        reject(new LinkError(`${target} timed out after ${timeoutMs} ms`, 'timeout'))
      }, timeoutMs)

      this.pending.set(id, {
        resolve: (value) => {
          settle()
          resolve(value)
        },
        reject: (error) => {
          settle()
          reject(error)
        },
      })
      signal?.addEventListener('abort', onAbort, { once: true })

      socket.send(JSON.stringify({ jsonrpc: '2.0', id, method: target, params: args }), (err) => {
        if (err) {
          this.pending.get(id)?.reject(new LinkError(`Failed to send ${target}: ${err.message}`, 'closed', { cause: err }))
        }
      })
    })
  }

  /** サブスクリプション ID 宛ての通知を購読する。戻り値で解除する */
  onSignal(subscription: string, listener: SignalListener): () => void {
    const listeners = this.signalListeners.get(subscription) ?? new Set<SignalListener>()
    listeners.add(listener)
    this.signalListeners.set(subscription, listeners)
    return () => {
      listeners.delete(listener)
      if (listeners.size === 0) {
        this.signalListeners.delete(subscription)
      }
    }
  }

  /** 自分から close() した場合を除き、接続が切れたときに呼ばれる */
  onClose(listener: (reason: Error) => void): () => void {
    this.closeListeners.add(listener)
    return () => {
      this.closeListeners.delete(listener)
    }
  }

  async close(): Promise<void> {
    this.closing = true
    const socket = this.socket
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      this.rejectPending(new LinkError('Robot link closed', 'closed'))
      return
    }
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        socket.terminate()
        resolve()
      }, 1000)
      socket.once('close', () => {
        clearTimeout(timer)
        resolve()
      })
      socket.close()
    })
  }

  private handleMessage(raw: string) {
    let message: unknown
    try {
      message = JSON.parse(raw)
    } catch (err) {
      logger.warn({ err }, 'Ignoring malformed message from robot link')
      return
    }

    const signal = signalSchema.safeParse(message)
    if (signal.success) {
      const listeners = this.signalListeners.get(signal.data.params.subscription)
      for (const listener of listeners ?? []) {
        try {
          listener(signal.data.params.value)
        } catch (err) {
          logger.warn({ err, subscription: signal.data.params.subscription }, 'Signal listener failed')
        }
      }
      return
    }

    const response = responseSchema.safeParse(message)
    if (!response.success) {
      logger.warn({ issues: response.error.issues }, 'Ignoring unexpected message from robot link')
      return
    }
    const call = this.pending.get(response.data.id)
    if (!call) {
      logger.debug({ id: response.data.id }, 'Response for unknown or expired request')
      return
    }
    if (response.data.error) {
      call.reject(new LinkError(response.data.error.message, 'remote'))
      return
    }
    call.resolve(response.data.result)
  }

  private handleClose(code: number, reason: string) {
    this.socket = null
    const error = new LinkError(`Robot link closed (code ${code}${reason ? `: ${reason}` : ''})`, 'closed')
    this.rejectPending(error)
    this.signalListeners.clear()
    if (this.closing) {
      return
    }
    logger.warn({ code, reason, url: this.options.url }, 'Robot link lost')
    for (const listener of [...this.closeListeners]) {
      listener(error)
    }
  }

  private rejectPending(error: Error) {
    for (const call of [...this.pending.values()]) {
      call.reject(error)
    }
  }
}
