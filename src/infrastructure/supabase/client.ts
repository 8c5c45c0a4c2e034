import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import { loadEnv } from '../../config/env';
import { createBaseError } from '../../shared/errors/base-error';

export interface SupabaseConnection {
  url: string;
  anonKey: string;
  /** テスト用に fetch を差し替える */
  fetch?: typeof fetch;
}

/**
 * Supabaseクライアントを作成する
 */
export function createSupabase(connection: SupabaseConnection): SupabaseClient {
  return createClient(connection.url, connection.anonKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: {
      headers: {
        'x-client-info': 'random-coffee-bot',
      },
      fetch: connection.fetch,
    },
  });
}

let cached: SupabaseClient | null = null;

/**
 * 環境変数の設定で Supabaseクライアントを取得する
 */
export function getSupabaseClient(): SupabaseClient {
  if (!cached) {
    const env = loadEnv();
    if (!env.SUPABASE_URL || !env.SUPABASE_ANON_KEY) {
      throw createBaseError('SUPABASE_URL と SUPABASE_ANON_KEY が必要です', 'CONFIG_INVALID');
    }
    cached = createSupabase({ url: env.SUPABASE_URL, anonKey: env.SUPABASE_ANON_KEY });
  }
  return cached;
}
