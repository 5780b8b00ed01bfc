import type { Settings } from '../shared/config/settings-schema.js';

/**
 * キャッシュ/キュー接続プールの設定
 */
export interface PoolConfig {
  readonly endpoint: string;
  readonly decodeResponses: boolean;
  readonly maxConnections: number;
}

/** ワーカー1つあたりの接続数 */
export const CONNECTIONS_PER_WORKER = 2;

export function derivePoolConfig(settings: Settings): PoolConfig {
  return Object.freeze({
    endpoint: settings.redisUrl,
    decodeResponses: true,
    maxConnections: settings.maxWorkers * CONNECTIONS_PER_WORKER
  });
}
