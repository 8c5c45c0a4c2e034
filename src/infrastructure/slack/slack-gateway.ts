import {
  ErrorCode,
  type Block,
  type KnownBlock,
  type WebAPIPlatformError,
  type WebClient,
} from '@slack/web-api';

import { createBaseError } from '../../shared/errors/base-error';
import { sleep, toSlackTs } from '../../shared/utils/time';
import { logger } from '../logging/logger';

/**
 * ゲートウェイが使う WebClient のメソッドだけを切り出した型
 */
export type SlackApi = {
  auth: Pick<WebClient['auth'], 'test'>;
  chat: Pick<WebClient['chat'], 'postMessage'>;
  conversations: Pick<WebClient['conversations'], 'list' | 'members' | 'history' | 'open'>;
  users: Pick<WebClient['users'], 'list'>;
};

export type SlackBlocks = Array<KnownBlock | Block>;

export interface SlackUser {
  id: string;
  name: string;
  isBot: boolean;
  deleted: boolean;
}

export interface HistoryMessage {
  ts: string;
  user?: string;
  text: string;
}

export interface HistoryRange {
  oldest: Date;
  latest: Date;
}

export interface SlackGateway {
  getBotUserId(): Promise<string | null>;
  resolveChannelId(name: string): Promise<string | null>;
  listChannelMemberIds(channelId: string): Promise<string[]>;
  listUsers(): Promise<SlackUser[]>;
  fetchHistory(channelId: string, range: HistoryRange): Promise<HistoryMessage[]>;
  openGroupDm(userIds: readonly string[]): Promise<string>;
  postMessage(channelId: string, message: string | SlackBlocks): Promise<boolean>;
}

export interface SlackGatewayOptions {
  /** ページング間の待機時間（レート制限対策） */
  pageDelayMs?: number;
}

const SLACKBOT_USER_ID = 'USLACKBOT';

function isPlatformError(error: Error): error is WebAPIPlatformError {
  return 'code' in error && error.code === ErrorCode.PlatformError && 'data' in error;
}

/**
 * Slack のエラーから原因文字列を取り出す
 */
export function describeSlackError(error: unknown): string {
  if (error instanceof Error) {
    return isPlatformError(error) ? error.data.error : error.message;
  }
  return String(error);
}

function nextCursorOf(page: { response_metadata?: { next_cursor?: string } }): string | undefined {
  const cursor = page.response_metadata?.next_cursor;
  return cursor ? cursor : undefined;
}

/**
 * Slack ゲートウェイを作成する
 */
export function createSlackGateway(api: SlackApi, options: SlackGatewayOptions = {}): SlackGateway {
  const log = logger.getSubLogger({ name: 'slack' });
  const pageDelayMs = options.pageDelayMs ?? 1000;

  /**
   * API 呼び出しを実行し、失敗を BaseError に包んで投げ直す
   * ログは呼び出し側で出す
   */
  const call = async <T>(method: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (error) {
      const reason = describeSlackError(error);
      throw createBaseError(`Slack API ${method} の呼び出しに失敗しました: ${reason}`, 'SLACK_API_ERROR', {
        method,
        reason,
      });
    }
  };

  const getBotUserId = async (): Promise<string | null> => {
    try {
      const result = await call('auth.test', () => api.auth.test());
      return result.user_id ?? null;
    } catch (error) {
      log.warn(`Could not determine the bot's user id: ${describeSlackError(error)}`);
      return null;
    }
  };

  /**
   * チャンネル名から ID を引く。見つかった時点でページングを打ち切る
   */
  const resolveChannelId = async (name: string): Promise<string | null> => {
    let cursor: string | undefined;
    let pages = 0;

    while (true) {
      const page = await call('conversations.list', () =>
        api.conversations.list({
          limit: 500,
          cursor,
          types: 'public_channel,private_channel',
          exclude_archived: true,
        })
      );
      pages++;

      const match = (page.channels ?? []).find((channel) => channel.name === name);
      if (match?.id) {
        log.debug(`Resolved #${name} to ${match.id} (${pages} pages)`);
        return match.id;
      }

      cursor = nextCursorOf(page);
      if (!cursor) break;
      await sleep(pageDelayMs);
    }

    log.warn(`Channel #${name} not found after ${pages} pages`);
    return null;
  };

  const listChannelMemberIds = async (channelId: string): Promise<string[]> => {
    const members: string[] = [];
    let cursor: string | undefined;

    while (true) {
      const page = await call('conversations.members', () =>
        api.conversations.members({ channel: channelId, limit: 1000, cursor })
      );
      members.push(...(page.members ?? []));

      cursor = nextCursorOf(page);
      if (!cursor) break;
      await sleep(pageDelayMs);
    }

    return members;
  };

  const listUsers = async (): Promise<SlackUser[]> => {
    const users: SlackUser[] = [];
    let cursor: string | undefined;

    while (true) {
      const page = await call('users.list', () => api.users.list({ limit: 200, cursor }));

      for (const member of page.members ?? []) {
        if (!member.id) continue;
        users.push({
          id: member.id,
          name: member.name ?? member.id,
          isBot: Boolean(member.is_bot) || member.id === SLACKBOT_USER_ID,
          deleted: Boolean(member.deleted),
        });
      }

      cursor = nextCursorOf(page);
      if (!cursor) break;
      await sleep(pageDelayMs);
    }

    return users;
  };

  /**
   * チャンネル履歴を新しい順に取得する（200 件ずつ）
   */
  const fetchHistory = async (channelId: string, range: HistoryRange): Promise<HistoryMessage[]> => {
    const messages: HistoryMessage[] = [];
    let cursor: string | undefined;
    let fetchCount = 0;

    while (true) {
      const page = await call('conversations.history', () =>
        api.conversations.history({
          channel: channelId,
          limit: 200,
          oldest: toSlackTs(range.oldest),
          latest: toSlackTs(range.latest),
          cursor,
        })
      );
      fetchCount++;

      for (const message of page.messages ?? []) {
        if (!message.ts) continue;
        messages.push({ ts: message.ts, user: message.user, text: message.text ?? '' });
      }

      cursor = page.has_more ? nextCursorOf(page) : undefined;
      if (!cursor) break;
      await sleep(pageDelayMs);
    }

    log.info(`  → ${channelId}: ${messages.length} messages fetched (${fetchCount} API calls)`);
    return messages;
  };

  const openGroupDm = async (userIds: readonly string[]): Promise<string> => {
    const result = await call('conversations.open', () =>
      api.conversations.open({ users: userIds.join(',') })
    );
    const channelId = result.channel?.id;
    if (!channelId) {
      throw createBaseError('グループ DM を開けませんでした', 'SLACK_API_ERROR', {
        method: 'conversations.open',
        users: userIds,
      });
    }
    return channelId;
  };

  /**
   * メッセージを投稿する。失敗はログに残して false を返す
   */
  const postMessage = async (channelId: string, message: string | SlackBlocks): Promise<boolean> => {
    try {
      const response = await call('chat.postMessage', () =>
        typeof message === 'string'
          ? api.chat.postMessage({ channel: channelId, text: message })
          : api.chat.postMessage({ channel: channelId, blocks: message })
      );

      if (!response.ok) {
        log.warn(`chat.postMessage to ${channelId} was not ok`, response.error);
        return false;
      }
      return true;
    } catch (error) {
      log.error(`Error posting in ${channelId}: ${describeSlackError(error)}`);
      return false;
    }
  };

  return {
    getBotUserId,
    resolveChannelId,
    listChannelMemberIds,
    listUsers,
    fetchHistory,
    openGroupDm,
    postMessage,
  };
}
