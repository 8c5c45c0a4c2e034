import { logger } from '../../infrastructure/logging/logger';
import type { HistoryMessage, SlackGateway } from '../../infrastructure/slack/slack-gateway';
import { createBaseError } from '../../shared/errors/base-error';
import { fromSlackTs } from '../../shared/utils/time';
import { isSummaryMessage, parseSummary } from '../coffee/message-format';
import type { MentionStyle, Pair, PairingRound, Participant } from '../coffee/types';

import type { HistoryQuery, HistoryStore } from './types';

export interface SlackHistoryStoreConfig {
  gateway: SlackGateway;
  memoryChannelId: string;
  magicalText: string;
  mentionStyle: MentionStyle;
  /** ボット自身の投稿だけを読む。null なら全投稿が対象 */
  botUserId: string | null;
  /** plain 表記のハンドルを ID に戻すための現在の名簿 */
  participants: readonly Participant[];
  now?: () => Date;
}

/**
 * メモリー用チャンネルに投稿したまとめメッセージを履歴として使うストア
 */
export function createSlackHistoryStore(config: SlackHistoryStoreConfig): HistoryStore {
  const log = logger.getSubLogger({ name: 'slack-history' });
  const now = config.now ?? (() => new Date());
  const idByName = new Map(config.participants.map((p) => [p.name, p.id]));

  const toMemberId = (token: string): string =>
    config.mentionStyle === 'plain' ? (idByName.get(token) ?? token) : token;

  const loadRecentRounds = async (query: HistoryQuery): Promise<PairingRound[]> => {
    let messages: HistoryMessage[];
    try {
      messages = await config.gateway.fetchHistory(config.memoryChannelId, {
        oldest: query.since,
        latest: now(),
      });
    } catch (error) {
      log.error(`Error getting conversation history for ${config.memoryChannelId}`, error);
      throw createBaseError('履歴の取得に失敗しました', 'HISTORY_READ_FAILED', { error });
    }

    log.info(`Convo history has ${messages.length} messages`);

    const own = config.botUserId
      ? messages.filter((message) => message.user === config.botUserId)
      : messages;
    const recent = own.slice(0, Math.max(0, query.maxRounds));
    log.info(`Keeping ${recent.length} from the bot`);

    return recent
      .filter((message) => isSummaryMessage(message.text, config.magicalText, config.mentionStyle))
      .map((message) => ({
        postedAt: fromSlackTs(message.ts),
        pairs: parseSummary(message.text, config.mentionStyle).map(
          ([a, b]): Pair => [toMemberId(a), toMemberId(b)]
        ),
      }))
      .filter((round) => round.pairs.length > 0);
  };

  const recordRound = async (round: PairingRound): Promise<void> => {
    // メモリー用チャンネルに投稿したまとめがそのまま記録になる
    log.debug(`Round of ${round.pairs.length} pairs is recorded by the summary post`);
  };

  return { loadRecentRounds, recordRound };
}
