import { logger } from '../../infrastructure/logging/logger';
import { describeSlackError, type SlackGateway } from '../../infrastructure/slack/slack-gateway';
import { sleep } from '../../shared/utils/time';

import { formatLaunchNotice, formatPairIntroduction } from './message-format';
import type { Pair } from './types';

export interface AnnouncerConfig {
  gateway: SlackGateway;
  /** ペアを選んだチャンネル */
  channelId: string;
  /** まとめを投稿するチャンネル（公開時は channelId と同じ） */
  memoryChannelId: string;
  pairsArePublic: boolean;
  /** false ならグループ DM を送らない（テストモード） */
  sendDirectMessages: boolean;
  /** DM 送信間の待機時間 */
  delayMs?: number;
}

export interface AnnouncementResult {
  directMessagesSent: number;
  summaryPosted: boolean;
  noticePosted: boolean;
}

/**
 * ラウンドの告知を行うアナウンサーを作成する
 */
export function createAnnouncer(config: AnnouncerConfig) {
  const { gateway } = config;
  const log = logger.getSubLogger({ name: 'announcer' });
  const delayMs = config.delayMs ?? 1000;

  /**
   * 各ペアにグループ DM を送る。失敗したペアはログに残して続行
   */
  const introducePairs = async (pairs: readonly Pair[]): Promise<number> => {
    let sent = 0;

    for (const [index, pair] of pairs.entries()) {
      try {
        const dmChannelId = await gateway.openGroupDm(pair);
        const ok = await gateway.postMessage(
          dmChannelId,
          formatPairIntroduction(pair, config.channelId)
        );
        if (ok) sent++;
      } catch (error) {
        log.error(`Error posting group DM to ${pair.join(', ')}`, describeSlackError(error));
      }

      if (index < pairs.length - 1) {
        await sleep(delayMs);
      }
    }

    log.info(`Sent ${sent}/${pairs.length} group DMs`);
    return sent;
  };

  /**
   * DM → まとめ → （非公開時は）告知 の順に投稿する
   */
  const announce = async (pairs: readonly Pair[], summary: string | null): Promise<AnnouncementResult> => {
    const directMessagesSent = config.sendDirectMessages ? await introducePairs(pairs) : 0;
    if (!config.sendDirectMessages) {
      log.info(`Skipping ${pairs.length} group DMs`);
    }

    if (!summary) {
      log.info('Nothing to announce');
      return { directMessagesSent, summaryPosted: false, noticePosted: false };
    }

    const summaryPosted = await gateway.postMessage(config.memoryChannelId, summary);
    let noticePosted = false;
    if (!config.pairsArePublic) {
      noticePosted = await gateway.postMessage(config.channelId, formatLaunchNotice(pairs.length));
    }

    return { directMessagesSent, summaryPosted, noticePosted };
  };

  return { announce };
}
