import type { Env } from '../../config/env';
import { logger } from '../../infrastructure/logging/logger';
import type { SlackGateway } from '../../infrastructure/slack/slack-gateway';
import { createBaseError } from '../../shared/errors/base-error';
import type { RandomSource } from '../../shared/utils/random';
import { daysBefore } from '../../shared/utils/time';
import type { HistoryStore } from '../history/types';

import { createAnnouncer } from './announcer';
import { fetchParticipants } from './membership';
import { formatSummary } from './message-format';
import { generatePairs } from './pairing-engine';
import type { MentionStyle, PairingRound, Participant, RunResult } from './types';

export interface CoffeeSettings {
  channelName: string;
  testingChannelName?: string;
  memoryChannelName?: string;
  testing: boolean;
  pairsArePublic: boolean;
  channelNamesAreIds: boolean;
  lookbackDays: number;
  magicalText: string;
  delayMs: number;
}

/**
 * 履歴ストアの生成に必要な、実行時に決まる情報
 */
export interface HistoryContext {
  memoryChannelId: string;
  botUserId: string | null;
  participants: readonly Participant[];
  mentionStyle: MentionStyle;
}

export interface CoffeeRunnerDeps {
  gateway: SlackGateway;
  settings: CoffeeSettings;
  createHistoryStore: (context: HistoryContext) => HistoryStore;
  random?: RandomSource;
  now?: () => Date;
}

/**
 * 環境変数から実行設定を組み立てる
 */
export function settingsFromEnv(env: Env): CoffeeSettings {
  return {
    channelName: env.CHANNEL_NAME,
    testingChannelName: env.CHANNEL_NAME_TESTING,
    memoryChannelName: env.PRIVATE_CHANNEL_NAME_FOR_MEMORY,
    testing: env.TESTING_MODE,
    pairsArePublic: env.PAIRS_ARE_PUBLIC,
    channelNamesAreIds: env.CHAN_NAMES_ARE_IDS,
    lookbackDays: env.LOOKBACK_DAYS,
    magicalText: env.MAGICAL_TEXT,
    delayMs: env.SLACK_PAGE_DELAY_MS,
  };
}

/**
 * ランダムコーヒーを1ラウンド実行するランナーを作成する
 */
export function createCoffeeRunner(deps: CoffeeRunnerDeps) {
  const { gateway, settings } = deps;
  const now = deps.now ?? (() => new Date());
  const random = deps.random ?? Math.random;
  const mentionStyle: MentionStyle = settings.testing ? 'plain' : 'link';

  /**
   * チャンネル名（または ID）を ID に解決する
   */
  const resolveChannel = async (name: string | undefined, setting: string): Promise<string> => {
    if (!name) {
      throw createBaseError(`${setting} が設定されていません`, 'CONFIG_INVALID', { setting });
    }
    if (settings.channelNamesAreIds) return name;

    const channelId = await gateway.resolveChannelId(name);
    if (!channelId) {
      throw createBaseError(`チャンネル ${name} が見つかりません`, 'CHANNEL_NOT_FOUND', {
        channel: name,
      });
    }
    return channelId;
  };

  /**
   * 履歴を読み込む。失敗しても履歴なしでラウンドは続行する
   */
  const loadPreviousRounds = async (
    store: HistoryStore,
    participantCount: number
  ): Promise<PairingRound[]> => {
    try {
      return await store.loadRecentRounds({
        since: daysBefore(now(), settings.lookbackDays),
        // n 人なら n-1 ラウンドで全員と一巡するため、直近 n-2 ラウンドだけを避ける
        maxRounds: Math.max(0, participantCount - 2),
      });
    } catch (error) {
      logger.warn('Continuing without pairing history', error);
      return [];
    }
  };

  const run = async (): Promise<RunResult> => {
    const channelName = settings.testing ? settings.testingChannelName : settings.channelName;
    logger.info(`Using channel ${channelName ?? '(unset)'}`);

    const channelId = await resolveChannel(
      channelName,
      settings.testing ? 'CHANNEL_NAME_TESTING' : 'CHANNEL_NAME'
    );
    const memoryChannelId = settings.pairsArePublic
      ? channelId
      : await resolveChannel(settings.memoryChannelName, 'PRIVATE_CHANNEL_NAME_FOR_MEMORY');

    const botUserId = await gateway.getBotUserId();
    const participants = await fetchParticipants(gateway, channelId);
    logger.info(`Found ${participants.length} members in ${channelId}`);

    const store = deps.createHistoryStore({ memoryChannelId, botUserId, participants, mentionStyle });
    const previousRounds = await loadPreviousRounds(store, participants.length);
    logger.info(`Considering ${previousRounds.length} previous rounds`);

    const pairs = generatePairs(
      participants.map((participant) => participant.id),
      previousRounds.map((round) => round.pairs),
      random
    );

    const summary = formatSummary(
      pairs,
      new Map(participants.map((participant) => [participant.id, participant])),
      {
        magicalText: settings.magicalText,
        lookbackDays: settings.lookbackDays,
        mentionStyle,
      }
    );

    const announcer = createAnnouncer({
      gateway,
      channelId,
      memoryChannelId,
      pairsArePublic: settings.pairsArePublic,
      sendDirectMessages: !settings.testing,
      delayMs: settings.delayMs,
    });
    const announcement = await announcer.announce(pairs, summary);

    if (announcement.summaryPosted) {
      await store.recordRound({ postedAt: now(), pairs });
    }

    logger.info(`Round complete: ${pairs.length} pairs from ${participants.length} members`);

    return {
      channelId,
      memoryChannelId,
      participants: participants.length,
      pairs,
      summary,
      summaryPosted: announcement.summaryPosted,
      directMessagesSent: announcement.directMessagesSent,
    };
  };

  return { run };
}
