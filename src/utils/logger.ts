import pino from 'pino'

// stdio の MCP サーバーが stdout を占有するため、ログは常に stderr に出す
export const logger = pino(
  {
    name: 'humanoid-gateway',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination(2)
)

export type Logger = pino.Logger
