import { z } from 'zod';
import { DEFAULT_SETTINGS, defaultWorkerCount } from './default-settings.js';

/**
 * 設定スキーマ定義
 *
 * - 型安全性: Zodによる実行時検証と文字列からの変換
 * - 環境変数との対応: SETTING_BINDINGS に変数名・必須/デフォルト・範囲を宣言
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** 解釈できない LOG_LEVEL の代わりに使うレベル */
export const FALLBACK_LOG_LEVEL: LogLevel = 'info';

const LOG_LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  trace: 'debug',
  notset: 'debug',
  warning: 'warn',
  critical: 'error',
  fatal: 'error'
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * 大文字小文字・別名を吸収してレベルに直す。解釈できなければ undefined
 */
export const parseLogLevel = (value: string): LogLevel | undefined => {
  const lowered = value.trim().toLowerCase();
  const resolved = LOG_LEVEL_ALIASES[lowered] ?? lowered;
  return isLogLevel(resolved) ? resolved : undefined;
};

// 未知のレベルでは起動を止めない（警告は settings-loader が出す）
const normalizeLogLevel = (value: unknown): unknown =>
  typeof value === 'string' ? parseLogLevel(value) ?? FALLBACK_LOG_LEVEL : value;

// 環境変数では改行が "\n" の2文字で渡されることが多い
const unescapeNewlines = (value: string): string => value.replace(/\\n/g, '\n');

// 精度を失った巨大な整数（1e300 等）は受け付けない
const positiveInteger = () => z.coerce.number().int().positive().safe();
const unitInterval = () => z.coerce.number().min(0).max(1);

// === 設定スキーマ ===
export const SettingsSchema = z.object({
  // 外部ドキュメントDBの接続情報
  projectId: z.string(),
  privateKey: z.string().transform(unescapeNewlines),
  clientEmail: z.string(),
  databaseUrl: z.string().url(),

  // 容量ガード
  maxGraphNodes: positiveInteger(),
  maxGraphEdges: positiveInteger(),
  graphCacheTtlSeconds: positiveInteger(),

  // 閾値（0〜1）
  causalConfidenceThreshold: unitInterval(),
  correlationThreshold: unitInterval(),
  discoveryBatchSize: positiveInteger(),

  // ログ
  logLevel: z.preprocess(normalizeLogLevel, z.enum(LOG_LEVELS)),
  logFile: z.string().min(1),

  // 性能
  maxWorkers: positiveInteger(),
  redisUrl: z.string().url()
});

export type Settings = Readonly<z.infer<typeof SettingsSchema>>;
export type SettingKey = keyof Settings;

// === 環境変数バインディング ===
export interface SettingRange {
  readonly min?: number;
  readonly max?: number;
}

export interface SettingBinding {
  /** 環境変数名 */
  readonly variable: string;
  /** 未設定なら MissingRequiredValue */
  readonly required: boolean;
  /** 未設定時の値。読み込みのたびに評価する */
  readonly default?: () => string | number;
  /** 範囲外なら OutOfRangeValue */
  readonly range?: SettingRange;
}

const UNIT_RANGE: SettingRange = { min: 0, max: 1 };
const POSITIVE_RANGE: SettingRange = { min: 1, max: Number.MAX_SAFE_INTEGER };

/**
 * 宣言順は検証順（最初の違反を報告する）
 */
export const SETTING_BINDINGS: { readonly [K in SettingKey]: SettingBinding } = {
  projectId: { variable: 'FIREBASE_PROJECT_ID', required: true },
  privateKey: { variable: 'FIREBASE_PRIVATE_KEY', required: true },
  clientEmail: { variable: 'FIREBASE_CLIENT_EMAIL', required: true },
  databaseUrl: {
    variable: 'FIRESTORE_DATABASE_URL',
    required: false,
    default: () => DEFAULT_SETTINGS.databaseUrl
  },

  maxGraphNodes: {
    variable: 'MAX_GRAPH_NODES',
    required: false,
    default: () => DEFAULT_SETTINGS.maxGraphNodes,
    range: POSITIVE_RANGE
  },
  maxGraphEdges: {
    variable: 'MAX_GRAPH_EDGES',
    required: false,
    default: () => DEFAULT_SETTINGS.maxGraphEdges,
    range: POSITIVE_RANGE
  },
  graphCacheTtlSeconds: {
    variable: 'GRAPH_CACHE_TTL',
    required: false,
    default: () => DEFAULT_SETTINGS.graphCacheTtlSeconds,
    range: POSITIVE_RANGE
  },

  causalConfidenceThreshold: {
    variable: 'CAUSAL_CONFIDENCE_THRESHOLD',
    required: false,
    default: () => DEFAULT_SETTINGS.causalConfidenceThreshold,
    range: UNIT_RANGE
  },
  correlationThreshold: {
    variable: 'CORRELATION_THRESHOLD',
    required: false,
    default: () => DEFAULT_SETTINGS.correlationThreshold,
    range: UNIT_RANGE
  },
  discoveryBatchSize: {
    variable: 'DISCOVERY_BATCH_SIZE',
    required: false,
    default: () => DEFAULT_SETTINGS.discoveryBatchSize,
    range: POSITIVE_RANGE
  },

  logLevel: {
    variable: 'LOG_LEVEL',
    required: false,
    default: () => DEFAULT_SETTINGS.logLevel
  },
  logFile: {
    variable: 'LOG_FILE',
    required: false,
    default: () => DEFAULT_SETTINGS.logFile
  },

  maxWorkers: {
    variable: 'MAX_WORKERS',
    required: false,
    default: defaultWorkerCount,
    range: POSITIVE_RANGE
  },
  redisUrl: {
    variable: 'REDIS_URL',
    required: false,
    default: () => DEFAULT_SETTINGS.redisUrl
  }
};
