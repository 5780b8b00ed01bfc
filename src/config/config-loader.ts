import type { Result } from '../shared/types/index.js';
import { Ok, Err, flatMap, map } from '../shared/types/index.js';
import type { Settings } from '../shared/config/settings-schema.js';
import { createLogger, type Logger } from '../shared/logging/logger.js';
import { loadSettings, inspectSettings } from './settings-loader.js';
import { createCredentials, type Credentials } from './credentials.js';
import { derivePoolConfig, type PoolConfig } from './pool-config.js';
import {
  createProcessEnvSource,
  type AsyncKeyValueSource,
  type EnvRecord,
  type KeyValueSource
} from './environment-source.js';
import {
  type ConfigurationError,
  type ConfigurationWarning,
  createUnreadableSourceError,
  formatConfigurationError
} from './errors.js';

/**
 * 設定管理クラス
 *
 * 設計思想:
 * - 初回アクセス時に一度だけ読み込み・検証する
 * - 成功時のみ Settings と Credentials をまとめてキャッシュする
 * - 以降の呼び出しではソースを読み直さない
 */

export interface ConfigSnapshot {
  readonly settings: Settings;
  readonly credentials: Credentials;
  readonly poolConfig: PoolConfig;
  readonly warnings: readonly ConfigurationWarning[];
}

export interface ConfigManagerOptions {
  /** 読み込み時の記録先。省略時は warn 以上のみコンソールへ */
  logger?: Logger;
}

// 読み込み前はまだ LOG_LEVEL を知らないため、既定では警告とエラーだけを出す
const createLoadLogger = (): Logger => createLogger({ level: 'warn' });

/**
 * 環境から設定一式を組み立てる（キャッシュなし、ログなし）
 */
export function buildConfigSnapshot(env: EnvRecord): Result<ConfigSnapshot, ConfigurationError> {
  return flatMap(loadSettings(env), (settings) =>
    map(createCredentials(settings), ({ credentials, warnings }) =>
      Object.freeze({
        settings,
        credentials,
        poolConfig: derivePoolConfig(settings),
        warnings: [...inspectSettings(env), ...warnings]
      })
    )
  );
}

function reportLoad(
  result: Result<ConfigSnapshot, ConfigurationError>,
  logger: Logger
): void {
  if (!result.success) {
    logger.error('Failed to load configuration', {
      type: result.error.type,
      code: result.error.code,
      detail: formatConfigurationError(result.error)
    });
    return;
  }

  for (const warning of result.data.warnings) {
    logger.warn(warning.message, { type: warning.type, field: warning.field });
  }
  logger.info('Configuration loaded successfully');
}

export class ConfigManager {
  private snapshot: ConfigSnapshot | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly source: KeyValueSource,
    options: ConfigManagerOptions = {}
  ) {
    this.logger = options.logger ?? createLoadLogger();
  }

  /**
   * 一度だけの読み込み・検証
   *
   * 同期処理のため、確認から格納までの間に他の呼び出しが割り込むことはない。
   * 失敗時は何もキャッシュしない。ソースの読み込み失敗も例外ではなく Err で返す。
   */
  initializeOnce(): Result<ConfigSnapshot, ConfigurationError> {
    if (this.snapshot) {
      return Ok(this.snapshot);
    }

    const result = flatMap(this.readSource(), buildConfigSnapshot);
    reportLoad(result, this.logger);
    if (result.success) {
      this.snapshot = result.data;
    }
    return result;
  }

  isInitialized(): boolean {
    return this.snapshot !== null;
  }

  getSettings(): Result<Settings, ConfigurationError> {
    return map(this.initializeOnce(), (snapshot) => snapshot.settings);
  }

  getCredentials(): Result<Credentials, ConfigurationError> {
    return map(this.initializeOnce(), (snapshot) => snapshot.credentials);
  }

  /**
   * キャッシュ済みSettingsからの導出のみ。I/Oなし
   */
  getDerivedPoolConfig(): Result<PoolConfig, ConfigurationError> {
    return map(this.initializeOnce(), (snapshot) => snapshot.poolConfig);
  }

  private readSource(): Result<EnvRecord, ConfigurationError> {
    try {
      return Ok(this.source.read());
    } catch (error) {
      return Err(createUnreadableSourceError(error));
    }
  }
}

/**
 * 非同期ソース（シークレットストア等）向けの設定管理クラス
 *
 * 初回アクセスが並行しても読み込みは1回だけ行い、全員が同じ結果を受け取る。
 */
export class AsyncConfigManager {
  private snapshot: ConfigSnapshot | null = null;
  private pending: Promise<Result<ConfigSnapshot, ConfigurationError>> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly source: AsyncKeyValueSource,
    options: ConfigManagerOptions = {}
  ) {
    this.logger = options.logger ?? createLoadLogger();
  }

  initializeOnce(): Promise<Result<ConfigSnapshot, ConfigurationError>> {
    if (this.snapshot) {
      return Promise.resolve(Ok(this.snapshot));
    }
    if (!this.pending) {
      // 完了後は枠を空ける。失敗していれば次の呼び出しで読み直せる
      this.pending = this.load().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  isInitialized(): boolean {
    return this.snapshot !== null;
  }

  async getSettings(): Promise<Result<Settings, ConfigurationError>> {
    return map(await this.initializeOnce(), (snapshot) => snapshot.settings);
  }

  async getCredentials(): Promise<Result<Credentials, ConfigurationError>> {
    return map(await this.initializeOnce(), (snapshot) => snapshot.credentials);
  }

  async getDerivedPoolConfig(): Promise<Result<PoolConfig, ConfigurationError>> {
    return map(await this.initializeOnce(), (snapshot) => snapshot.poolConfig);
  }

  private async load(): Promise<Result<ConfigSnapshot, ConfigurationError>> {
    const result = flatMap(await this.readSource(), buildConfigSnapshot);
    reportLoad(result, this.logger);
    if (result.success) {
      this.snapshot = result.data;
    }
    return result;
  }

  private async readSource(): Promise<Result<EnvRecord, ConfigurationError>> {
    try {
      return Ok(await this.source.read());
    } catch (error) {
      return Err(createUnreadableSourceError(error));
    }
  }
}

// === プロセス既定のインスタンス ===

export const DEFAULT_ENV_FILE = '.env';

let defaultManager: ConfigManager | null = null;

/**
 * プロセス環境変数と .env を読む既定のマネージャ
 */
export function getConfigManager(): ConfigManager {
  if (!defaultManager) {
    defaultManager = new ConfigManager(
      createProcessEnvSource({ envFile: DEFAULT_ENV_FILE })
    );
  }
  return defaultManager;
}

export function getSettings(): Result<Settings, ConfigurationError> {
  return getConfigManager().getSettings();
}

export function getCredentials(): Result<Credentials, ConfigurationError> {
  return getConfigManager().getCredentials();
}

export function getDerivedPoolConfig(): Result<PoolConfig, ConfigurationError> {
  return getConfigManager().getDerivedPoolConfig();
}

/**
 * テスト用: 既定のマネージャを破棄する
 */
export function resetConfigManagerForTesting(manager: ConfigManager | null = null): void {
  defaultManager = manager;
}
