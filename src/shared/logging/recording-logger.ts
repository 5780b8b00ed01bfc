import type { LogLevel } from '../config/settings-schema.js';
import type { Logger, LogMeta } from './logger.js';

export interface LogRecord {
  level: LogLevel;
  message: string;
  meta: LogMeta;
}

/**
 * 記録ロガー実装
 *
 * テスト・開発用の実装。出力せずにメモリへ記録する。
 */
export class RecordingLogger implements Logger {
  private readonly records: LogRecord[];
  private readonly bindings: LogMeta;

  constructor(bindings: LogMeta = {}, records: LogRecord[] = []) {
    this.bindings = bindings;
    this.records = records;
  }

  debug(message: string, meta?: LogMeta): void {
    this.record('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.record('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.record('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.record('error', message, meta);
  }

  /** 子ロガーは記録先を親と共有する */
  child(bindings: LogMeta): Logger {
    return new RecordingLogger({ ...this.bindings, ...bindings }, this.records);
  }

  // === テスト用ヘルパーメソッド ===

  getRecords(level?: LogLevel): LogRecord[] {
    return this.records.filter((record) => level === undefined || record.level === level);
  }

  getMessages(level?: LogLevel): string[] {
    return this.getRecords(level).map((record) => record.message);
  }

  clear(): void {
    this.records.length = 0;
  }

  private record(level: LogLevel, message: string, meta: LogMeta = {}): void {
    this.records.push({ level, message, meta: { ...this.bindings, ...meta } });
  }
}
