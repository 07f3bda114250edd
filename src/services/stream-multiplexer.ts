import { logger as rootLogger, type Logger } from '../utils/logger'
import type { StreamConsumer, StreamEvent, StreamKind } from '../types/robot'

// 関節角度と音声は最新だけが意味を持つので、待ち行列は 1 件で古いものから置き換える
const LOSSY_KINDS: Record<StreamKind, boolean> = {
  touch: false,
  joints: true,
  audio: true,
}

interface Channel {
  kind: StreamKind
  consumer: StreamConsumer
  queue: StreamEvent[]
  draining: boolean
  closed: boolean
  delivered: number
  dropped: number
}

export interface ChannelStats {
  kind: StreamKind
  queued: number
  delivered: number
  dropped: number
}

/**
 * ストリーム種別ごとの配信チャネル。
 *
 * 種別ごとに独立した drain ループを持つため、遅いコンシューマーが他の種別を止めることはない。
 * touch は FIFO で欠落なし、joints と audio は処理中の 1 件の後ろに最大 1 件だけ保持する。
 */
export class StreamMultiplexer {
  private readonly channels = new Map<StreamKind, Channel>()

  constructor(private readonly log: Logger = rootLogger) {}

  /** 同じ種別に再度 subscribe した場合はコンシューマーを置き換える */
  subscribe(kind: StreamKind, consumer: StreamConsumer): void {
    const existing = this.channels.get(kind)
    if (existing) {
      existing.consumer = consumer
      return
    }
    this.channels.set(kind, {
      kind,
      consumer,
      queue: [],
      draining: false,
      closed: false,
      delivered: 0,
      dropped: 0,
    })
  }

  /** 戻った時点以降、この種別のコンシューマー呼び出しは始まらない */
  unsubscribe(kind: StreamKind): boolean {
    const channel = this.channels.get(kind)
    if (!channel) {
      return false
    }
    channel.closed = true
    channel.queue.length = 0
    this.channels.delete(kind)
    return true
  }

  get activeKinds(): StreamKind[] {
    return [...this.channels.keys()]
  }

  publish(event: StreamEvent): void {
    const channel = this.channels.get(event.kind)
    if (!channel) {
      return
    }
    if (LOSSY_KINDS[event.kind] && channel.queue.length > 0) {
      channel.dropped += channel.queue.length
      channel.queue.splice(0, channel.queue.length, event)
    } else {
      channel.queue.push(event)
    }
    if (!channel.draining) {
      void this.drain(channel)
    }
  }

  stats(): ChannelStats[] {
    return [...this.channels.values()].map(({ kind, queue, delivered, dropped }) => ({
      kind,
      queued: queue.length,
      delivered,
      dropped,
    }))
  }

  close(): void {
    for (const kind of [...this.channels.keys()]) {
      this.unsubscribe(kind)
    }
  }

  private async drain(channel: Channel) {
    channel.draining = true
    try {
      while (!channel.closed) {
        const event = channel.queue.shift()
        if (!event) {
          break
        }
        channel.delivered += 1
        try {
          await channel.consumer(event)
        } catch (err) {
          this.log.warn({ err, streamKind: channel.kind }, 'Stream consumer failed')
        }
      }
    } finally {
      channel.draining = false
    }
  }
}
