/**
 * 構造化ロギングユーティリティ
 *
 * @description 1行1オブジェクトの JSON 形式でログを出力する（バッチ実行ログの集計用）
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export interface LogContext {
  /** モジュール名 */
  module?: string;
  /** 実行ID (UUID) */
  runId?: string;
  /** FRED series_id */
  seriesId?: string;
  /** パイプライン上の状態 */
  state?: string;
  /** 処理行数 */
  rowCount?: number;
  /** 処理時間（ミリ秒） */
  durationMs?: number;
  /** エラーコード */
  errorCode?: string;
  /** その他のコンテキスト */
  [key: string]: unknown;
}

interface LogPayload extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

/**
 * ログレベルの優先度
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

let configuredLevel: LogLevel | undefined;

/**
 * 最小ログレベルを設定する（undefined で環境変数の評価に戻す）
 */
export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level;
}

/**
 * 最小ログレベル。setLogLevel > LOG_LEVEL > NODE_ENV の順に出力時点で評価する
 */
function resolveMinLogLevel(): LogLevel {
  if (configuredLevel) {
    return configuredLevel;
  }
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[resolveMinLogLevel()];
}

/**
 * エラーオブジェクトをシリアライズ可能な形式に変換
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack?.split('\n').slice(0, 5).join('\n'), // スタックトレースを5行に制限
      ...(error.cause ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return { value: String(error) };
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (additionalContext: LogContext) => Logger;
  startTimer: (label: string) => {
    end: (context?: LogContext) => number;
    endWithError: (error: Error, context?: LogContext) => number;
  };
}

/**
 * ロガーを作成
 *
 * @param defaultContext 全ログに付与するデフォルトコンテキスト
 *
 * @example
 * ```typescript
 * const logger = createLogger({ module: 'orchestrator', runId: 'xxx-xxx' });
 * logger.info('Series loaded', { seriesId: 'GDP', rowCount: 4 });
 * logger.error('Failed to load series', { seriesId: 'UNRATE', error: err });
 * ```
 */
export function createLogger(defaultContext: LogContext = {}): Logger {
  const log = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (!shouldLog(level)) {
      return;
    }

    // エラーオブジェクトがあればシリアライズ
    const processedContext = { ...context };
    if (processedContext.error) {
      processedContext.error = serializeError(processedContext.error);
    }

    const payload: LogPayload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...defaultContext,
      ...processedContext,
    };

    const jsonStr = JSON.stringify(payload);

    switch (level) {
      case 'error':
        console.error(jsonStr);
        break;
      case 'warn':
        console.warn(jsonStr);
        break;
      default:
        console.log(jsonStr);
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),

    /**
     * 子ロガーを作成（コンテキストを追加）
     */
    child: (additionalContext) => createLogger({ ...defaultContext, ...additionalContext }),

    /**
     * 処理時間を計測するタイマーを開始
     */
    startTimer: (label) => {
      const startTime = Date.now();
      return {
        end: (context) => {
          const durationMs = Date.now() - startTime;
          log('info', `${label} completed`, { ...context, durationMs });
          return durationMs;
        },
        endWithError: (error, context) => {
          const durationMs = Date.now() - startTime;
          log('error', `${label} failed`, { ...context, durationMs, error });
          return durationMs;
        },
      };
    },
  };
}

/**
 * 実行単位のロガーを作成するファクトリ関数
 */
export function createRunLogger(module: string, runId: string): Logger {
  return createLogger({ module, runId });
}
