/**
 * 環境変数の読み込みと検証
 *
 * @description 起動時に一度だけ process.env を検証し、型付きの設定を返す
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

export const EnvSchema = z.object({
  FRED_API_KEY: z.string().min(1),
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  /** FRED API のリクエストタイムアウト（ミリ秒） */
  FRED_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  /** 失敗通知（Resend）。未設定なら通知しない */
  RESEND_API_KEY: optionalString,
  ALERT_EMAIL_TO: optionalString.pipe(z.string().email().optional()),
  EMAIL_FROM: optionalString,
});

export type EtlEnv = z.infer<typeof EnvSchema>;

/**
 * 環境変数エラー
 */
export class EnvironmentError extends Error {
  constructor(readonly issues: string[]) {
    super(
      `Invalid or missing environment variables: ${issues.join(', ')}\n` +
        `Please ensure .env exists with these variables.`
    );
    this.name = 'EnvironmentError';
  }
}

/**
 * 環境変数を検証して設定を返す
 *
 * @throws {EnvironmentError} 必須変数の不足・形式不正
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): EtlEnv {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')} (${issue.message})`
    );
    throw new EnvironmentError(issues);
  }

  return parsed.data;
}
