/**
 * メール通知（Resend）
 *
 * @description 失敗系列がある実行の通知
 * @see https://resend.com/docs
 */

import { Resend } from 'resend';
import type { RunSummary } from '../etl/orchestrator';
import { createLogger } from '../utils/logger';
import { getRunFailureEmailTemplate } from './templates';

const logger = createLogger({ module: 'email' });

const DEFAULT_EMAIL_FROM = 'Economic Series ETL <noreply@resend.dev>';

export interface NotificationConfig {
  resendApiKey?: string;
  alertEmailTo?: string;
  emailFrom?: string;
}

/**
 * 失敗通知メールを送信
 *
 * 未設定・失敗系列なし・送信エラーのいずれでも例外は投げない
 *
 * @returns 送信成功した場合 true
 */
export async function sendRunFailureEmail(
  summary: RunSummary,
  config: NotificationConfig
): Promise<boolean> {
  if (summary.failed.length === 0) {
    return false;
  }

  if (!config.resendApiKey || !config.alertEmailTo) {
    logger.info('Email notification skipped (not configured)', { runId: summary.runId });
    return false;
  }

  const resend = new Resend(config.resendApiKey);
  const { subject, html } = getRunFailureEmailTemplate(summary);

  try {
    const result = await resend.emails.send({
      from: config.emailFrom ?? DEFAULT_EMAIL_FROM,
      to: [config.alertEmailTo],
      subject,
      html,
    });

    if (result.error) {
      logger.error('Failed to send failure notification email', {
        runId: summary.runId,
        error: result.error.message,
      });
      return false;
    }

    logger.info('Failure notification email sent', {
      runId: summary.runId,
      emailId: result.data?.id,
    });
    return true;
  } catch (error) {
    // 通知失敗はログに記録するが、実行結果は変えない
    logger.error('Error sending failure notification email', {
      runId: summary.runId,
      error,
    });
    return false;
  }
}
