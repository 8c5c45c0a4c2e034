import type {
  HistoryMessage,
  HistoryRange,
  SlackBlocks,
  SlackGateway,
  SlackUser,
} from '../infrastructure/slack/slack-gateway';
import { createBaseError } from '../shared/errors/base-error';
import { fromSlackTs } from '../shared/utils/time';

export interface FakeWorkspace {
  botUserId?: string | null;
  channels: Array<{ id: string; name: string; members: string[] }>;
  users: SlackUser[];
  history?: Record<string, HistoryMessage[]>;
  /** conversations.open が失敗するユーザー */
  unreachableUsers?: string[];
  failHistory?: boolean;
  /** chat.postMessage が失敗するチャンネル */
  failingChannels?: string[];
}

export interface PostedMessage {
  channelId: string;
  message: string | SlackBlocks;
}

/**
 * テスト用のインメモリ Slack ゲートウェイ
 */
export function createFakeSlackGateway(workspace: FakeWorkspace) {
  const posted: PostedMessage[] = [];
  const openedDms: string[][] = [];

  const gateway: SlackGateway = {
    getBotUserId: async () => workspace.botUserId ?? null,
    resolveChannelId: async (name) =>
      workspace.channels.find((channel) => channel.name === name)?.id ?? null,
    listChannelMemberIds: async (channelId) => {
      const channel = workspace.channels.find((c) => c.id === channelId);
      if (!channel) {
        throw createBaseError('channel_not_found', 'SLACK_API_ERROR', { channelId });
      }
      return channel.members;
    },
    listUsers: async () => workspace.users,
    fetchHistory: async (channelId: string, range: HistoryRange) => {
      if (workspace.failHistory) {
        throw createBaseError('ratelimited', 'SLACK_API_ERROR');
      }
      return (workspace.history?.[channelId] ?? []).filter((message) => {
        const at = fromSlackTs(message.ts);
        return at >= range.oldest && at <= range.latest;
      });
    },
    openGroupDm: async (userIds) => {
      if (userIds.some((id) => workspace.unreachableUsers?.includes(id))) {
        throw createBaseError('user_not_found', 'SLACK_API_ERROR');
      }
      openedDms.push([...userIds]);
      return `D-${userIds.join('-')}`;
    },
    postMessage: async (channelId, message) => {
      if (workspace.failingChannels?.includes(channelId)) return false;
      posted.push({ channelId, message });
      return true;
    },
  };

  return { gateway, posted, openedDms };
}
