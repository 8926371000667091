/**
 * Transformer: 未加工の観測値を検証・正規化する
 *
 * @description
 * - 欠損値マーカー（"."）の行は保存しない（null 行にもしない）
 * - 日付・値を変換できない行は InvalidRecordError を添えて破棄し、警告ログを出す
 * - 同一日付の2行目以降は破棄（先勝ち）
 * - 採用した行には呼び出し単位で1つの処理時刻を付与する
 */

import { FRED_MISSING_VALUE } from '../fred/client';
import { isValidDateFormat } from '../utils/date';
import { toFixedPoint } from '../utils/decimal';
import { createLogger, type Logger } from '../utils/logger';
import { InvalidRecordError } from './errors';
import type { CanonicalObservation, RawObservation } from './types';

export type DiscardReason = 'missing' | 'invalid_date' | 'invalid_value' | 'duplicate';

export type RecordOutcome =
  | { status: 'accepted'; record: CanonicalObservation }
  | {
      status: 'discarded';
      reason: DiscardReason;
      raw: RawObservation;
      /** invalid_date / invalid_value の場合のみ */
      error?: InvalidRecordError;
    };

export interface TransformCounts {
  accepted: number;
  missing: number;
  invalid: number;
  duplicate: number;
}

export interface TransformReport {
  seriesId: string;
  /** 採用したレコード（入力順） */
  records: CanonicalObservation[];
  /** 全行の判定結果（入力順） */
  outcomes: RecordOutcome[];
  counts: TransformCounts;
}

export interface NormalizeOptions {
  /** 処理時刻（省略時は現在時刻） */
  now?: Date;
  /** 欠損値マーカー（デフォルト: "."） */
  missingSentinel?: string;
  logger?: Logger;
}

const defaultLogger = createLogger({ module: 'transformer' });

/**
 * 1行を判定（重複判定は normalize 側で行う）
 */
function classify(
  seriesId: string,
  raw: RawObservation,
  processedAt: string,
  missingSentinel: string
): RecordOutcome {
  const date = raw.date.trim();
  const value = raw.value.trim();

  if (value === missingSentinel) {
    return { status: 'discarded', reason: 'missing', raw };
  }

  if (!isValidDateFormat(date)) {
    return {
      status: 'discarded',
      reason: 'invalid_date',
      raw,
      error: new InvalidRecordError(`Invalid observation date for ${seriesId}: "${raw.date}"`, raw),
    };
  }

  const fixedPoint = toFixedPoint(value);
  if (fixedPoint === null) {
    return {
      status: 'discarded',
      reason: 'invalid_value',
      raw,
      error: new InvalidRecordError(
        `Invalid observation value for ${seriesId} on ${date}: "${raw.value}"`,
        raw
      ),
    };
  }

  return {
    status: 'accepted',
    record: { seriesId, date, value: fixedPoint, processedAt },
  };
}

/**
 * 未加工の観測値を正規化
 */
export function normalize(
  seriesId: string,
  rawObservations: readonly RawObservation[],
  options: NormalizeOptions = {}
): TransformReport {
  const logger = (options.logger ?? defaultLogger).child({ seriesId });
  const processedAt = (options.now ?? new Date()).toISOString();
  const missingSentinel = options.missingSentinel ?? FRED_MISSING_VALUE;

  const seenDates = new Set<string>();
  const outcomes: RecordOutcome[] = [];
  const records: CanonicalObservation[] = [];
  const counts: TransformCounts = { accepted: 0, missing: 0, invalid: 0, duplicate: 0 };

  for (const raw of rawObservations) {
    let outcome = classify(seriesId, raw, processedAt, missingSentinel);

    if (outcome.status === 'accepted' && seenDates.has(outcome.record.date)) {
      outcome = { status: 'discarded', reason: 'duplicate', raw };
    }

    outcomes.push(outcome);

    if (outcome.status === 'accepted') {
      seenDates.add(outcome.record.date);
      records.push(outcome.record);
      counts.accepted++;
      continue;
    }

    switch (outcome.reason) {
      case 'missing':
        counts.missing++;
        break;
      case 'duplicate':
        counts.duplicate++;
        break;
      case 'invalid_date':
      case 'invalid_value':
        counts.invalid++;
        logger.warn('Skipping invalid observation', {
          reason: outcome.reason,
          rawDate: raw.date,
          rawValue: raw.value,
          error: outcome.error,
        });
        break;
    }
  }

  logger.info('Observations normalized', {
    total: rawObservations.length,
    ...counts,
  });

  return { seriesId, records, outcomes, counts };
}
