/**
 * サーバーサイド専用 Supabase 管理クライアント
 *
 * @description Service Role Key を使用し、RLS をバイパスして ETL テーブルにアクセス
 * @warning このクライアントはバッチ実行環境でのみ使用すること
 *
 * @see https://supabase.com/docs/guides/api/api-keys
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface AdminClientOptions {
  /** プロジェクト URL（省略時は環境変数 SUPABASE_URL） */
  url?: string;
  /** Service Role Key（省略時は環境変数 SUPABASE_SERVICE_ROLE_KEY） */
  serviceRoleKey?: string;
}

/**
 * クライアントキャッシュ（1プロセス1接続先）
 */
let cachedClient: SupabaseClient | null = null;

/**
 * 接続情報を検証
 */
function resolveCredentials(options?: AdminClientOptions): { url: string; key: string } {
  const url = options?.url ?? process.env.SUPABASE_URL;
  const key = options?.serviceRoleKey ?? process.env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url) {
    throw new Error('Missing env.SUPABASE_URL');
  }
  if (!key) {
    throw new Error('Missing env.SUPABASE_SERVICE_ROLE_KEY');
  }

  return { url, key };
}

/**
 * 管理クライアントを取得（遅延初期化・キャッシュ付き）
 *
 * @example
 * ```typescript
 * const client = createAdminClient();
 * const { data } = await client.from('series_metadata').select('*');
 * ```
 */
export function createAdminClient(options?: AdminClientOptions): SupabaseClient {
  if (cachedClient) {
    return cachedClient;
  }

  const { url, key } = resolveCredentials(options);
  const client = createClient(url, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  cachedClient = client;
  return client;
}
