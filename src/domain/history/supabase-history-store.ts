import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { logger } from '../../infrastructure/logging/logger';
import { createBaseError } from '../../shared/errors/base-error';
import type { PairingRound } from '../coffee/types';

import type { HistoryQuery, HistoryStore } from './types';

const TABLE = 'coffee_rounds';

const roundRowSchema = z.object({
  posted_at: z.string(),
  pairs: z.array(z.tuple([z.string(), z.string()])),
});

export interface SupabaseHistoryStoreConfig {
  supabase: SupabaseClient;
  /** ラウンドを記録するチャンネル（メモリー用チャンネル） */
  channelId: string;
}

/**
 * coffee_rounds テーブルに履歴を保存するストア
 */
export function createSupabaseHistoryStore(config: SupabaseHistoryStoreConfig): HistoryStore {
  const { supabase, channelId } = config;
  const log = logger.getSubLogger({ name: 'supabase-history' });

  const loadRecentRounds = async (query: HistoryQuery): Promise<PairingRound[]> => {
    if (query.maxRounds <= 0) return [];

    const { data, error } = await supabase
      .from(TABLE)
      .select('posted_at, pairs')
      .eq('channel_id', channelId)
      .gte('posted_at', query.since.toISOString())
      .order('posted_at', { ascending: false })
      .limit(query.maxRounds);

    if (error) {
      log.error('Failed to load coffee rounds', error);
      throw createBaseError('履歴の取得に失敗しました', 'HISTORY_READ_FAILED', { error });
    }

    const rows: unknown[] = data ?? [];
    const rounds: PairingRound[] = [];

    for (const row of rows) {
      const parsed = roundRowSchema.safeParse(row);
      if (!parsed.success) {
        log.warn('Skipping malformed coffee round row', parsed.error.issues);
        continue;
      }
      rounds.push({ postedAt: new Date(parsed.data.posted_at), pairs: parsed.data.pairs });
    }

    log.info(`Loaded ${rounds.length} rounds for ${channelId}`);
    return rounds;
  };

  const recordRound = async (round: PairingRound): Promise<void> => {
    const { error } = await supabase.from(TABLE).insert({
      channel_id: channelId,
      posted_at: round.postedAt.toISOString(),
      pairs: round.pairs,
    });

    if (error) {
      log.error('Failed to record coffee round', error);
      throw createBaseError('履歴の保存に失敗しました', 'HISTORY_WRITE_FAILED', { error });
    }

    log.info(`Recorded round of ${round.pairs.length} pairs for ${channelId}`);
  };

  return { loadRecentRounds, recordRound };
}
