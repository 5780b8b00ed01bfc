/**
 * 設定管理モジュール
 *
 * - 環境変数からの読み込みと検証
 * - 認証情報と接続プール設定の導出
 * - 一度だけの初期化とキャッシュ
 */

// 設定スキーマ
export {
  type Settings,
  type SettingKey,
  type SettingBinding,
  type SettingRange,
  type LogLevel,
  LOG_LEVELS,
  FALLBACK_LOG_LEVEL,
  parseLogLevel,
  SettingsSchema,
  SETTING_BINDINGS
} from '../shared/config/settings-schema.js';

// デフォルト設定値
export {
  DEFAULT_SETTINGS,
  MIN_DEFAULT_WORKERS,
  PRIVATE_KEY_HEADER,
  defaultWorkerCount
} from '../shared/config/default-settings.js';

// 環境変数ソース
export {
  type EnvRecord,
  type KeyValueSource,
  type AsyncKeyValueSource,
  type ProcessEnvSourceOptions,
  createRecordSource,
  createProcessEnvSource,
  createAsyncSource,
  readVariable
} from './environment-source.js';

// エラー
export {
  type ConfigurationError,
  type ConfigurationWarning,
  type ConfigurationIssue,
  type MissingRequiredValueError,
  type OutOfRangeValueError,
  type InvalidValueError,
  type IncompleteCredentialsError,
  type UnreadableSourceError,
  type MalformedCredentialFormatWarning,
  type UnrecognizedValueWarning,
  ConfigurationErrorSchema,
  isMissingRequiredValueError,
  isOutOfRangeValueError,
  isInvalidValueError,
  isIncompleteCredentialsError,
  isUnreadableSourceError,
  formatConfigurationError
} from './errors.js';

export { loadSettings, inspectSettings } from './settings-loader.js';
export {
  type Credentials,
  type CredentialsWithWarnings,
  REDACTED,
  createCredentials,
  redactCredentials
} from './credentials.js';
export { type PoolConfig, CONNECTIONS_PER_WORKER, derivePoolConfig } from './pool-config.js';

// 設定マネージャ
export {
  type ConfigSnapshot,
  type ConfigManagerOptions,
  ConfigManager,
  AsyncConfigManager,
  buildConfigSnapshot,
  DEFAULT_ENV_FILE,
  getConfigManager,
  getSettings,
  getCredentials,
  getDerivedPoolConfig,
  resetConfigManagerForTesting
} from './config-loader.js';
