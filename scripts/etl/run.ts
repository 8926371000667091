/**
 * ETL 実行スクリプト
 *
 * @description 全系列（または --series の指定分）を差分ロードして終了する
 * - CLI引数: --series=GDP,UNRATE, --full-refresh, --end=YYYY-MM-DD
 * - 環境変数は .env（存在すれば）と実行環境から読み込み、起動時に一度だけ検証する
 * - 1系列でも失敗すれば終了コード 1（成功した系列はコミット済み）
 */

import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';
import { config } from 'dotenv';
import { EnvironmentError, loadEnv } from '../../src/lib/config/env';
import { parseEtlArgs, CliArgumentError } from '../../src/lib/etl/cli';
import { FredExtractor } from '../../src/lib/etl/extractor';
import { completeEtlRun, failEtlRun, startEtlRun } from '../../src/lib/etl/job-run';
import { SupabaseObservationStore } from '../../src/lib/etl/loader';
import { runPipeline } from '../../src/lib/etl/orchestrator';
import { formatRunSummary } from '../../src/lib/etl/summary';
import { createFredClient } from '../../src/lib/fred/client';
import { DEFAULT_SERIES_REGISTRY, selectSeries } from '../../src/lib/fred/series-config';
import { sendRunFailureEmail } from '../../src/lib/notification/email';
import { createAdminClient } from '../../src/lib/supabase/admin';
import { createLogger, createRunLogger, setLogLevel } from '../../src/lib/utils/logger';

const logger = createLogger({ module: 'etl-run' });

async function main(): Promise<number> {
  config({ path: resolve(process.cwd(), '.env') });

  const options = parseEtlArgs(process.argv.slice(2));
  const env = loadEnv();
  setLogLevel(env.LOG_LEVEL);

  const registry = options.seriesIds
    ? selectSeries(DEFAULT_SERIES_REGISTRY, options.seriesIds)
    : DEFAULT_SERIES_REGISTRY;

  const runId = randomUUID();
  const supabase = createAdminClient({
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
  });

  const runLogger = createRunLogger('etl-run', runId);
  const runMeta = {
    series: registry.map((definition) => definition.seriesId),
    fullRefresh: options.fullRefresh,
    observationEnd: options.observationEnd ?? null,
  };
  runLogger.info('Starting ETL run', runMeta);

  await startEtlRun(runId, runMeta, supabase);

  try {
    const extractor = new FredExtractor(
      createFredClient({
        apiKey: env.FRED_API_KEY,
        timeoutMs: env.FRED_TIMEOUT_MS,
        logContext: { runId },
      })
    );
    const store = new SupabaseObservationStore(supabase, runLogger.child({ module: 'loader' }));

    const summary = await runPipeline(
      registry,
      { extractor, store, logger: runLogger.child({ module: 'orchestrator' }) },
      { runId, fullRefresh: options.fullRefresh, observationEnd: options.observationEnd }
    );

    await completeEtlRun(summary, supabase);
    await sendRunFailureEmail(summary, {
      resendApiKey: env.RESEND_API_KEY,
      alertEmailTo: env.ALERT_EMAIL_TO,
      emailFrom: env.EMAIL_FROM,
    });

    console.log(formatRunSummary(summary));
    return summary.success ? 0 : 1;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    runLogger.error('ETL run aborted', { error });
    await failEtlRun(runId, errorMessage, supabase);
    throw error;
  }
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    if (error instanceof CliArgumentError || error instanceof EnvironmentError) {
      console.error(error.message);
    } else {
      logger.error('Script failed', { error });
    }
    process.exitCode = 1;
  });
