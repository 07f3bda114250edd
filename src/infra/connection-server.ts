import { randomUUID } from 'node:crypto'
import type { Server as HttpServer } from 'node:http'
import WebSocket, { WebSocketServer, type RawData } from 'ws'
import { CommandDispatcher, toErrorFrame } from '../api/command.dispatcher'
import type { ServerFrame } from '../api/schema'
import type { RobotSession } from '../services/robot-session'
import type { ChannelStats } from '../services/stream-multiplexer'
import { STREAM_KINDS, type StreamKind } from '../types/robot'
import { ConnectError, InvalidParametersError } from '../utils/errors'
import { logger, type Logger } from '../utils/logger'

export interface ConnectionServerOptions {
  session: RobotSession
  path: string
  /** コマンドの実行ログを LogFrame としてクライアントに送る */
  forwardLogs: boolean
  /** 接続直後に自動購読するストリーム */
  streams: Record<StreamKind, boolean>
  interaction: {
    prepareOnConnect: boolean
    resetOnDisconnect: boolean
  }
}

interface ClientConnection {
  id: string
  socket: WebSocket
  dispatcher: CommandDispatcher
  controller: AbortController
  log: Logger
  chain: Promise<void>
}

export interface ConnectionStreamStats {
  connectionId: string
  streams: ChannelStats[]
}

export type FatalListener = (error: ConnectError) => void

/**
 * WebSocket のメッセージサーバー。
 *
 * 接続ごとに CommandDispatcher（とそのマルチプレクサー）を持ち、RobotSession は全接続で共有する。
 * 最初の接続でセッションを接続し、最後の接続が切れたら後片付けして切断する。
 */
export class ConnectionServer {
  private wss: WebSocketServer | null = null
  private readonly clients = new Map<string, ClientConnection>()
  private readonly fatalListeners = new Set<FatalListener>()
  private lifecycle: Promise<void> = Promise.resolve()
  private readonly detachLinkLost: () => void

  constructor(private readonly options: ConnectionServerOptions) {
    this.detachLinkLost = options.session.onLinkLost((reason) => this.handleLinkLost(reason))
  }

  get clientCount(): number {
    return this.clients.size
  }

  /** 接続ごとの購読状況（配信数・間引き数） */
  connectionStats(): ConnectionStreamStats[] {
    return [...this.clients.values()].map((client) => ({
      connectionId: client.id,
      streams: client.dispatcher.streamStats,
    }))
  }

  attach(server: HttpServer): void {
    const wss = new WebSocketServer({ server, path: this.options.path })
    wss.on('connection', (socket) => this.handleConnection(socket))
    wss.on('error', (err) => logger.error({ err }, 'WebSocket server error'))
    this.wss = wss
    logger.info({ path: this.options.path }, 'WebSocket endpoint attached')
  }

  onFatal(listener: FatalListener): () => void {
    this.fatalListeners.add(listener)
    return () => {
      this.fatalListeners.delete(listener)
    }
  }

  async close(): Promise<void> {
    const closing = [...this.clients.values()].map(
      (client) =>
        new Promise<void>((resolve) => {
          if (client.socket.readyState === WebSocket.CLOSED) {
            resolve()
            return
          }
          client.socket.once('close', () => resolve())
          client.socket.terminate()
        })
    )
    await Promise.all(closing)
    await this.lifecycle
    const wss = this.wss
    this.wss = null
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()))
    }
    this.detachLinkLost()
  }

  private handleConnection(socket: WebSocket) {
    const id = randomUUID()
    const log = logger.child({ connectionId: id })
    const client: ClientConnection = {
      id,
      socket,
      log,
      controller: new AbortController(),
      dispatcher: new CommandDispatcher({
        session: this.options.session,
        sendEvent: (frame) => this.send(client, frame),
        sendLog: this.options.forwardLogs ? (frame) => this.send(client, frame) : undefined,
        log,
      }),
      chain: Promise.resolve(),
    }
    this.clients.set(id, client)
    log.info({ clients: this.clients.size }, 'Client connected')

    client.chain = this.runLifecycle(() => this.acquire(client))
    socket.on('message', (data, isBinary) => this.enqueue(client, data, isBinary))
    socket.on('error', (err) => log.warn({ err }, 'Client socket error'))
    socket.once('close', (code) => {
      void this.release(client, code)
    })
  }

  private async acquire(client: ClientConnection) {
    const { session, interaction } = this.options
    const wasConnected = session.isConnected
    try {
      await session.connect()
      if (!wasConnected && interaction.prepareOnConnect) {
        await session
          .prepareForInteraction({ signal: client.controller.signal })
          .catch((err: unknown) => client.log.warn({ err }, 'Failed to prepare robot for interaction'))
      }
    } catch (err) {
      client.log.error({ err }, 'Robot session is not available')
      if (err instanceof ConnectError && err.fatal) {
        this.emitFatal(err)
      }
    }

    if (client.controller.signal.aborted) {
      return
    }
    await this.send(client, { type: 'hello', state: session.snapshot() })
    if (!session.isConnected) {
      return
    }
    for (const kind of STREAM_KINDS) {
      if (!this.options.streams[kind]) {
        continue
      }
      try {
        await client.dispatcher.subscribe(kind)
      } catch (err) {
        client.log.warn({ err, streamKind: kind }, 'Automatic stream subscription failed')
      }
    }
  }

  // 受信順に dispatch を開始し、応答はそれぞれの完了時に返す
  private enqueue(client: ClientConnection, data: RawData, isBinary: boolean) {
    if (isBinary) {
      void this.send(
        client,
        toErrorFrame(randomUUID(), new InvalidParametersError('Binary frames are not supported', 'frame'))
      )
      return
    }
    const raw = data.toString()
    client.chain = client.chain.then(() => {
      client.dispatcher
        .dispatch(raw, client.controller.signal)
        .then((reply) => this.send(client, reply))
        .catch((err: unknown) => client.log.error({ err }, 'Failed to deliver reply'))
    })
  }

  private release(client: ClientConnection, code: number): Promise<void> {
    this.clients.delete(client.id)
    client.controller.abort(new Error('Connection closed'))
    client.dispatcher.close()
    client.log.info({ code, clients: this.clients.size }, 'Client disconnected')

    return this.runLifecycle(async () => {
      if (this.clients.size > 0) {
        return
      }
      const { session, interaction } = this.options
      if (session.isConnected && interaction.resetOnDisconnect) {
        await session
          .resetAfterInteraction()
          .catch((err: unknown) => logger.warn({ err }, 'Failed to reset robot after interaction'))
      }
      await session.disconnect()
    })
  }

  private runLifecycle(task: () => Promise<void>): Promise<void> {
    this.lifecycle = this.lifecycle
      .then(task)
      .catch((err: unknown) => logger.error({ err }, 'Connection lifecycle task failed'))
    return this.lifecycle
  }

  private send(client: ClientConnection, frame: ServerFrame): Promise<void> {
    const { socket } = client
    if (socket.readyState !== WebSocket.OPEN) {
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      socket.send(JSON.stringify(frame), (err) => {
        if (err) {
          client.log.warn({ err, type: frame.type }, 'Failed to send frame')
        }
        resolve()
      })
    })
  }

  private handleLinkLost(reason: Error) {
    logger.warn({ err: reason, clients: this.clients.size }, 'Closing client connections after robot link loss')
    for (const client of this.clients.values()) {
      client.socket.close(1011, 'Robot link lost')
    }
  }

  private emitFatal(error: ConnectError) {
    for (const listener of [...this.fatalListeners]) {
      listener(error)
    }
  }
}
