import { existsSync, readFileSync } from 'node:fs';
import dotenv from 'dotenv';

/**
 * 環境変数ソース
 *
 * 設定読み込みはこのインターフェース越しに行う。
 * テストではメモリ上のレコードに差し替える。
 */

export type EnvRecord = Readonly<Record<string, string | undefined>>;

export interface KeyValueSource {
  /** 現時点の環境を丸ごと読む */
  read(): EnvRecord;
}

export interface AsyncKeyValueSource {
  read(): Promise<EnvRecord>;
}

/**
 * メモリ上のレコードをそのまま返すソース
 */
export function createRecordSource(record: EnvRecord): KeyValueSource {
  return {
    read: () => ({ ...record })
  };
}

export interface ProcessEnvSourceOptions {
  /** 既定は process.env */
  env?: NodeJS.ProcessEnv;
  /** .env ファイルのパス。存在しなければ無視する */
  envFile?: string;
}

/**
 * プロセス環境変数 + .env ファイル
 *
 * 優先順位:
 * 1. プロセス環境変数
 * 2. .env ファイル
 *
 * process.env は書き換えない。
 */
export function createProcessEnvSource(
  options: ProcessEnvSourceOptions = {}
): KeyValueSource {
  const { env = process.env, envFile } = options;

  return {
    read: () => {
      const fromFile = envFile ? readEnvFile(envFile) : {};
      return { ...fromFile, ...env };
    }
  };
}

/**
 * 非同期ローダー（シークレットストア等）をソースとして包む
 */
export function createAsyncSource(
  loader: () => Promise<EnvRecord>
): AsyncKeyValueSource {
  return {
    read: async () => ({ ...(await loader()) })
  };
}

function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }
  return dotenv.parse(readFileSync(path, 'utf-8'));
}

/**
 * 大文字小文字を区別せずに変数を引く。
 * 完全一致（大文字表記）を優先する。
 */
export function readVariable(env: EnvRecord, name: string): string | undefined {
  const exact = env[name];
  if (exact !== undefined) {
    return exact;
  }
  const wanted = name.toUpperCase();
  for (const [key, value] of Object.entries(env)) {
    if (key.toUpperCase() === wanted && value !== undefined) {
      return value;
    }
  }
  return undefined;
}
