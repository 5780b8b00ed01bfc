import type { z } from 'zod';
import type { Result } from '../shared/types/index.js';
import { Ok, Err } from '../shared/types/index.js';
import {
  SettingsSchema,
  SETTING_BINDINGS,
  FALLBACK_LOG_LEVEL,
  parseLogLevel,
  type Settings,
  type SettingBinding
} from '../shared/config/settings-schema.js';
import { readVariable, type EnvRecord } from './environment-source.js';
import {
  type ConfigurationError,
  type ConfigurationIssue,
  createMissingRequiredValueError,
  createOutOfRangeValueError,
  createInvalidValueError,
  createUnrecognizedValueWarning,
  type UnrecognizedValueWarning
} from './errors.js';

/**
 * 環境からSettingsを組み立てる
 *
 * 1. 宣言された変数を読む（未設定・空文字はデフォルトへ）
 * 2. スキーマで変換・検証
 * 3. 最初の違反を型付きエラーとして返す（全件は issues に付ける）
 */

const BINDING_ENTRIES: ReadonlyArray<readonly [string, SettingBinding]> =
  Object.entries(SETTING_BINDINGS);

interface ResolvedInput {
  values: Record<string, unknown>;
  raw: Record<string, string | undefined>;
}

function resolveInput(env: EnvRecord): ResolvedInput {
  const values: Record<string, unknown> = {};
  const raw: Record<string, string | undefined> = {};

  for (const [key, binding] of BINDING_ENTRIES) {
    const value = readVariable(env, binding.variable);
    raw[key] = value;

    if (binding.required) {
      // 空文字はそのまま残し、認証情報の検証で弾く
      values[key] = value;
    } else if (value === undefined || value.trim() === '') {
      values[key] = binding.default?.();
    } else {
      values[key] = value.trim();
    }
  }

  return { values, raw };
}

function declarationIndex(key: string): number {
  const index = BINDING_ENTRIES.findIndex(([name]) => name === key);
  return index === -1 ? BINDING_ENTRIES.length : index;
}

function bindingFor(key: string): SettingBinding | undefined {
  return BINDING_ENTRIES.find(([name]) => name === key)?.[1];
}

function classifyIssue(
  issue: z.ZodIssue,
  input: ResolvedInput,
  issues: ConfigurationIssue[]
): ConfigurationError {
  const key = String(issue.path[0] ?? '');
  const binding = bindingFor(key);
  const variable = binding?.variable ?? key;
  const rawValue = input.raw[key];

  if (binding?.required && rawValue === undefined) {
    return createMissingRequiredValueError(variable, issues);
  }

  const value = rawValue ?? input.values[key];
  if (issue.code === 'too_small' || issue.code === 'too_big') {
    return createOutOfRangeValueError(variable, value, binding?.range ?? {}, issues);
  }
  return createInvalidValueError(variable, value, issue.message, issues);
}

export function loadSettings(env: EnvRecord): Result<Settings, ConfigurationError> {
  const input = resolveInput(env);
  const parsed = SettingsSchema.safeParse(input.values);

  if (parsed.success) {
    return Ok(Object.freeze(parsed.data));
  }

  const ordered = [...parsed.error.issues].sort(
    (a, b) => declarationIndex(String(a.path[0] ?? '')) - declarationIndex(String(b.path[0] ?? ''))
  );
  const issues: ConfigurationIssue[] = ordered.map((issue) => {
    const key = String(issue.path[0] ?? '');
    return {
      variable: bindingFor(key)?.variable ?? key,
      message: issue.message
    };
  });

  // ordered は safeParse 失敗時に必ず1件以上ある
  const [first] = ordered;
  if (first === undefined) {
    return Err(createInvalidValueError('settings', undefined, parsed.error.message, issues));
  }
  return Err(classifyIssue(first, input, issues));
}

/**
 * 読み込みは通るが既定値に置き換えた値を警告として列挙する
 */
export function inspectSettings(env: EnvRecord): UnrecognizedValueWarning[] {
  const { variable } = SETTING_BINDINGS.logLevel;
  const value = readVariable(env, variable);
  if (value === undefined || value.trim() === '' || parseLogLevel(value) !== undefined) {
    return [];
  }
  return [createUnrecognizedValueWarning('logLevel', variable, value.trim(), FALLBACK_LOG_LEVEL)];
}
