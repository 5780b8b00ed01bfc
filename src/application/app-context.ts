import type { Result } from '../shared/types/index.js';
import { map } from '../shared/types/index.js';
import { createLogger, type Logger, type LogMeta, type LogWriter } from '../shared/logging/logger.js';
import type { ConfigManager } from '../config/config-loader.js';
import type { ConfigurationError } from '../config/errors.js';
import type { Settings } from '../shared/config/settings-schema.js';
import { redactCredentials, type Credentials } from '../config/credentials.js';
import type { PoolConfig } from '../config/pool-config.js';

/**
 * アプリケーションコンテキスト
 *
 * 起動時に一度だけ作り、各コンポーネントのコンストラクタへ渡す。
 * グローバルな設定参照の代わりに使う。
 */
export interface AppContext {
  readonly settings: Settings;
  readonly credentials: Credentials;
  readonly poolConfig: PoolConfig;
  readonly logger: Logger;
}

export interface AppContextOptions {
  /** false ならログファイルへ書かない */
  logToFile?: boolean;
  write?: LogWriter;
}

export function createAppContext(
  manager: ConfigManager,
  options: AppContextOptions = {}
): Result<AppContext, ConfigurationError> {
  const { logToFile = true, write } = options;

  return map(manager.initializeOnce(), ({ settings, credentials, poolConfig }) =>
    Object.freeze({
      settings,
      credentials,
      poolConfig,
      logger: createLogger({
        level: settings.logLevel,
        filePath: logToFile ? settings.logFile : undefined,
        write
      })
    })
  );
}

/**
 * ログ出力用の要約（秘密鍵は伏せる）
 */
export function describeContext(context: AppContext): LogMeta {
  const { settings, poolConfig } = context;
  return {
    credentials: redactCredentials(context.credentials),
    databaseUrl: settings.databaseUrl,
    logLevel: settings.logLevel,
    maxWorkers: settings.maxWorkers,
    pool: {
      endpoint: poolConfig.endpoint,
      maxConnections: poolConfig.maxConnections
    }
  };
}
