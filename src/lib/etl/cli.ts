/**
 * ETL 実行コマンドの引数解析
 *
 * @example
 * ```
 * npm run etl
 * npm run etl -- --series=GDP,UNRATE
 * npm run etl -- --full-refresh --end=2024-12-31
 * ```
 */

import { isValidDateFormat } from '../utils/date';

export interface EtlCliOptions {
  /** 対象 series_id（省略時はレジストリ全件） */
  seriesIds?: string[];
  /** ウォーターマークを無視して全期間を取り直す */
  fullRefresh: boolean;
  /** 取得終了日 (YYYY-MM-DD) */
  observationEnd?: string;
}

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

/**
 * CLI 引数をパース
 *
 * @throws {CliArgumentError} 不正な引数
 */
export function parseEtlArgs(argv: readonly string[]): EtlCliOptions {
  const options: EtlCliOptions = { fullRefresh: false };

  for (const arg of argv) {
    if (arg.startsWith('--series=')) {
      const ids = arg
        .slice('--series='.length)
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id !== '');
      if (ids.length === 0) {
        throw new CliArgumentError('--series requires at least one series id');
      }
      options.seriesIds = [...new Set(ids)];
    } else if (arg === '--full-refresh') {
      options.fullRefresh = true;
    } else if (arg.startsWith('--end=')) {
      const value = arg.slice('--end='.length);
      if (!isValidDateFormat(value)) {
        throw new CliArgumentError(`Invalid --end date: ${value}. Expected YYYY-MM-DD`);
      }
      options.observationEnd = value;
    } else {
      throw new CliArgumentError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
