import { z } from 'zod';

/**
 * 設定エラー設計
 *
 * 致命的なエラーはResult型の値として返し、呼び出し側で分岐させる。
 * 鍵形式の警告だけは失敗にせず、ログに残すための値として扱う。
 */

// === 基底エラースキーマ ===
export const ConfigurationErrorBaseSchema = z.object({
  type: z.string(),
  message: z.string(),
  code: z.string(),
  timestamp: z.date().default(() => new Date())
});

// 検証時に集めた個々の問題
export const ConfigurationIssueSchema = z.object({
  variable: z.string(),
  message: z.string()
});

// === 必須の環境変数が存在しない ===
export const MissingRequiredValueErrorSchema = ConfigurationErrorBaseSchema.extend({
  type: z.literal('MissingRequiredValue'),
  variable: z.string(),
  issues: z.array(ConfigurationIssueSchema)
});

// === 数値が宣言された範囲外 ===
export const OutOfRangeValueErrorSchema = ConfigurationErrorBaseSchema.extend({
  type: z.literal('OutOfRangeValue'),
  variable: z.string(),
  value: z.unknown(),
  min: z.number().optional(),
  max: z.number().optional(),
  issues: z.array(ConfigurationIssueSchema)
});

// === 値を解釈できない（数値でない、URLでない等） ===
export const InvalidValueErrorSchema = ConfigurationErrorBaseSchema.extend({
  type: z.literal('InvalidValue'),
  variable: z.string(),
  value: z.unknown(),
  issues: z.array(ConfigurationIssueSchema)
});

// === 認証情報が空 ===
export const IncompleteCredentialsErrorSchema = ConfigurationErrorBaseSchema.extend({
  type: z.literal('IncompleteCredentials'),
  missingFields: z.array(z.string())
});

// === ソース自体を読めない（.env が読めない、シークレットストアが落ちている等） ===
export const UnreadableSourceErrorSchema = ConfigurationErrorBaseSchema.extend({
  type: z.literal('UnreadableSource'),
  cause: z.string()
});

// === 統合エラー型（Discriminated Union） ===
export const ConfigurationErrorSchema = z.discriminatedUnion('type', [
  MissingRequiredValueErrorSchema,
  OutOfRangeValueErrorSchema,
  InvalidValueErrorSchema,
  IncompleteCredentialsErrorSchema,
  UnreadableSourceErrorSchema
]);

// === 警告（非致命的） ===
export const MalformedCredentialFormatWarningSchema = z.object({
  type: z.literal('MalformedCredentialFormat'),
  field: z.string(),
  message: z.string()
});

// 解釈できないが既定値で続行できる値
export const UnrecognizedValueWarningSchema = z.object({
  type: z.literal('UnrecognizedValue'),
  field: z.string(),
  variable: z.string(),
  value: z.string(),
  message: z.string()
});

export type ConfigurationIssue = z.infer<typeof ConfigurationIssueSchema>;
export type MissingRequiredValueError = z.infer<typeof MissingRequiredValueErrorSchema>;
export type OutOfRangeValueError = z.infer<typeof OutOfRangeValueErrorSchema>;
export type InvalidValueError = z.infer<typeof InvalidValueErrorSchema>;
export type IncompleteCredentialsError = z.infer<typeof IncompleteCredentialsErrorSchema>;
export type UnreadableSourceError = z.infer<typeof UnreadableSourceErrorSchema>;
export type ConfigurationError = z.infer<typeof ConfigurationErrorSchema>;
export type MalformedCredentialFormatWarning = z.infer<typeof MalformedCredentialFormatWarningSchema>;
export type UnrecognizedValueWarning = z.infer<typeof UnrecognizedValueWarningSchema>;
export type ConfigurationWarning = MalformedCredentialFormatWarning | UnrecognizedValueWarning;

// === エラーファクトリ関数 ===
export const createMissingRequiredValueError = (
  variable: string,
  issues: ConfigurationIssue[] = []
): MissingRequiredValueError => ({
  type: 'MissingRequiredValue',
  message: `Required environment variable ${variable} is not set`,
  code: 'MISSING_REQUIRED_VALUE',
  variable,
  issues,
  timestamp: new Date()
});

export const createOutOfRangeValueError = (
  variable: string,
  value: unknown,
  bounds: { min?: number; max?: number },
  issues: ConfigurationIssue[] = []
): OutOfRangeValueError => ({
  type: 'OutOfRangeValue',
  message: `${variable}=${String(value)} is out of range${describeBounds(bounds)}`,
  code: 'OUT_OF_RANGE_VALUE',
  variable,
  value,
  min: bounds.min,
  max: bounds.max,
  issues,
  timestamp: new Date()
});

export const createInvalidValueError = (
  variable: string,
  value: unknown,
  reason: string,
  issues: ConfigurationIssue[] = []
): InvalidValueError => ({
  type: 'InvalidValue',
  message: `${variable}=${String(value)} is invalid: ${reason}`,
  code: 'INVALID_VALUE',
  variable,
  value,
  issues,
  timestamp: new Date()
});

export const createIncompleteCredentialsError = (
  missingFields: string[]
): IncompleteCredentialsError => ({
  type: 'IncompleteCredentials',
  message: `Missing credentials in configuration: ${missingFields.join(', ')}`,
  code: 'INCOMPLETE_CREDENTIALS',
  missingFields,
  timestamp: new Date()
});

export const createUnreadableSourceError = (cause: unknown): UnreadableSourceError => {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return {
    type: 'UnreadableSource',
    message: `Configuration source could not be read: ${detail}`,
    code: 'UNREADABLE_SOURCE',
    cause: detail,
    timestamp: new Date()
  };
};

export const createUnrecognizedValueWarning = (
  field: string,
  variable: string,
  value: string,
  fallback: string
): UnrecognizedValueWarning => ({
  type: 'UnrecognizedValue',
  field,
  variable,
  value,
  message: `Unrecognized ${variable}=${value}, using ${fallback}`
});

export const createMalformedCredentialFormatWarning = (
  field: string,
  message: string
): MalformedCredentialFormatWarning => ({
  type: 'MalformedCredentialFormat',
  field,
  message
});

function describeBounds(bounds: { min?: number; max?: number }): string {
  if (bounds.min !== undefined && bounds.max !== undefined) {
    return ` [${bounds.min}, ${bounds.max}]`;
  }
  if (bounds.min !== undefined) {
    return ` (min ${bounds.min})`;
  }
  if (bounds.max !== undefined) {
    return ` (max ${bounds.max})`;
  }
  return '';
}

// === 型ガード ===
export const isMissingRequiredValueError = (
  error: ConfigurationError
): error is MissingRequiredValueError => error.type === 'MissingRequiredValue';

export const isOutOfRangeValueError = (
  error: ConfigurationError
): error is OutOfRangeValueError => error.type === 'OutOfRangeValue';

export const isInvalidValueError = (
  error: ConfigurationError
): error is InvalidValueError => error.type === 'InvalidValue';

export const isIncompleteCredentialsError = (
  error: ConfigurationError
): error is IncompleteCredentialsError => error.type === 'IncompleteCredentials';

export const isUnreadableSourceError = (
  error: ConfigurationError
): error is UnreadableSourceError => error.type === 'UnreadableSource';

/**
 * ログ出力用の1行メッセージ
 */
export const formatConfigurationError = (error: ConfigurationError): string =>
  `[${error.code}] ${error.message}`;
