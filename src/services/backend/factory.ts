import type { GatewayConfig } from '../../config/schema'
import type { RobotBackend } from './types'
import { LiveBackend } from './live.backend'
import { SimulatedBackend } from './simulated.backend'

/**
 * 設定からバックエンドを生成するファクトリー
 *
 * @param config 検証済みの設定（robot と simulation を参照する）
 * @returns 実機またはシミュレーターのバックエンド
 */
export function createBackend(config: Pick<GatewayConfig, 'robot' | 'simulation'>): RobotBackend {
  const { robot, simulation } = config
  const endpoint = { host: robot.host, port: robot.port }
  const mode = robot.mode

  switch (mode) {
    // 実機（サービスブリッジ経由）
    case 'live':
      return new LiveBackend({
        endpoint,
        maxConnectTries: robot.maxConnectTries,
        connectRetryDelayMs: robot.connectRetryDelayMs,
        connectTimeoutMs: robot.connectTimeoutMs,
        requestTimeoutMs: robot.requestTimeoutMs,
        behaviorTimeoutMs: robot.behaviorTimeoutMs,
        jointsIntervalMs: robot.jointsIntervalMs,
      })

    // シミュレーター
    case 'simulated':
      return new SimulatedBackend({ endpoint, ...simulation })

    default: {
      // TypeScriptの網羅性チェック
      const _exhaustiveCheck: never = mode
      throw new Error(`未対応のバックエンド: ${String(_exhaustiveCheck)}`)
    }
  }
}
