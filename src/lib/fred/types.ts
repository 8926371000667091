/**
 * FRED API レスポンス型定義
 *
 * @description FRED (Federal Reserve Economic Data) API のレスポンススキーマ。
 * 受信時に zod で検証し、不一致は MalformedResponseError として扱う
 * @see https://fred.stlouisfed.org/docs/api/fred/
 */

import { z } from 'zod';

// ============================================
// series/observations エンドポイント
// ============================================

/**
 * 1観測値（値は文字列のまま受け取る。欠損値は "."）
 */
export const FredObservationSchema = z.object({
  /** 観測日 (YYYY-MM-DD) */
  date: z.string(),
  /** 観測値（欠損値の場合は "."） */
  value: z.string(),
  realtime_start: z.string().optional(),
  realtime_end: z.string().optional(),
});

export type FredObservation = z.infer<typeof FredObservationSchema>;

/**
 * GET /fred/series/observations レスポンス
 */
export const FredObservationsResponseSchema = z.object({
  observation_start: z.string().optional(),
  observation_end: z.string().optional(),
  count: z.number().optional(),
  observations: z.array(FredObservationSchema),
});

export type FredObservationsResponse = z.infer<typeof FredObservationsResponseSchema>;

// ============================================
// series エンドポイント
// ============================================

export const FredSeriesInfoSchema = z.object({
  id: z.string(),
  title: z.string(),
  observation_start: z.string(),
  observation_end: z.string(),
  frequency: z.string(),
  units: z.string(),
  seasonal_adjustment: z.string(),
  last_updated: z.string(),
  notes: z.string().optional(),
});

export type FredSeriesInfo = z.infer<typeof FredSeriesInfoSchema>;

/**
 * GET /fred/series レスポンス（配列名は API 仕様どおり "seriess"）
 */
export const FredSeriesResponseSchema = z.object({
  seriess: z.array(FredSeriesInfoSchema),
});

/**
 * エラーレスポンス（HTTP 400 等）
 *
 * @example { "error_code": 400, "error_message": "Bad Request.  The series does not exist." }
 */
export const FredErrorResponseSchema = z.object({
  error_code: z.number(),
  error_message: z.string(),
});
