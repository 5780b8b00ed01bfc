import { appendFileSync } from 'node:fs';
import type { LogLevel } from '../config/settings-schema.js';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** bindings を全レコードに付けた子ロガー */
  child(bindings: LogMeta): Logger;
}

export type LogWriter = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** 指定するとコンソールに加えてファイルへ追記する */
  filePath?: string;
  write?: LogWriter;
  bindings?: LogMeta;
}

type FileSink = (line: string) => void;

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const consoleWriter: LogWriter = (line, level) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

/**
 * ファイル追記先。書けなかった時点で一度だけ write に報告し、以降は追記しない
 */
function createFileSink(filePath: string, write: LogWriter): FileSink {
  let disabled = false;
  return (line) => {
    if (disabled) {
      return;
    }
    try {
      appendFileSync(filePath, `${line}\n`);
    } catch (error) {
      disabled = true;
      write(
        JSON.stringify({
          level: 'error',
          message: 'Log file is not writable; file output disabled',
          filePath,
          detail: error instanceof Error ? error.message : String(error),
          timestamp: Date.now()
        }),
        'error'
      );
    }
  };
}

/**
 * JSON1行形式の構造化ロガー
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { filePath, write = consoleWriter } = options;
  return buildLogger(options, write, filePath ? createFileSink(filePath, write) : undefined);
}

function buildLogger(options: LoggerOptions, write: LogWriter, sink: FileSink | undefined): Logger {
  const { level: threshold = 'info', bindings = {} } = options;

  const emit = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const line = JSON.stringify({
      level,
      message,
      ...bindings,
      ...meta,
      timestamp: Date.now()
    });
    write(line, level);
    sink?.(line);
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    // 子ロガーは追記先を共有する
    child: (childBindings) =>
      buildLogger({ level: threshold, bindings: { ...bindings, ...childBindings } }, write, sink)
  };
}
