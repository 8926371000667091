/**
 * Supabase / Postgres エラーユーティリティ
 */

import { StorageError } from '../etl/errors';

/**
 * PostgREST 固有のエラーコード
 */
export const POSTGREST_ERROR_CODES = {
  FUNCTION_NOT_FOUND: 'PGRST202',
} as const;

/**
 * Postgres の SQLSTATE
 */
export const POSTGRES_ERROR_CODES = {
  FOREIGN_KEY_VIOLATION: '23503',
} as const;

/**
 * Supabase クライアントが返すエラーの形
 */
export interface SupabaseErrorLike {
  message: string;
  code?: string;
  details?: string | null;
  hint?: string | null;
}

/**
 * 指定コードのエラーか判定
 */
export function isPostgrestError(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}

/**
 * Supabase のエラーを StorageError に変換
 *
 * @param operation 失敗した操作名（メッセージに含める）
 */
export function toStorageError(operation: string, error: SupabaseErrorLike): StorageError {
  const detail = error.details ? ` (${error.details})` : '';
  return new StorageError(`${operation} failed: ${error.message}${detail}`, {
    dbCode: error.code,
    cause: error,
  });
}
