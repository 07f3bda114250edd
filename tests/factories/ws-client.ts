import WebSocket from 'ws'

/** 受信フレームを順に取り出せるテスト用 WebSocket クライアント */
export class TestClient {
  readonly opened: Promise<void>
  readonly closed: Promise<number>
  private readonly received: unknown[] = []
  private readonly waiting: Array<(frame: unknown) => void> = []

  private constructor(private readonly socket: WebSocket) {
    socket.on('message', (data) => {
      const frame: unknown = JSON.parse(data.toString())
      const waiter = this.waiting.shift()
      if (waiter) {
        waiter(frame)
      } else {
        this.received.push(frame)
      }
    })
    this.opened = new Promise((resolve, reject) => {
      socket.once('open', () => resolve())
      socket.once('error', reject)
    })
    this.closed = new Promise((resolve) => socket.once('close', (code) => resolve(code)))
  }

  static async connect(url: string): Promise<TestClient> {
    const client = new TestClient(new WebSocket(url))
    await client.opened
    return client
  }

  next(timeoutMs = 2000): Promise<unknown> {
    const frame = this.received.shift()
    if (frame !== undefined) {
      return Promise.resolve(frame)
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const index = this.waiting.indexOf(deliver)
        if (index >= 0) {
          this.waiting.splice(index, 1)
        }
        reject(new Error(`No frame received within ${timeoutMs} ms`))
      }, timeoutMs)
      const deliver = (value: unknown) => {
        clearTimeout(timer)
        resolve(value)
      }
      this.waiting.push(deliver)
    })
  }

  send(frame: unknown): void {
    this.socket.send(JSON.stringify(frame))
  }

  sendBinary(data: Buffer): void {
    this.socket.send(data, { binary: true })
  }

  async close(): Promise<number> {
    this.socket.close()
    return this.closed
  }
}
