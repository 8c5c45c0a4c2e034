import type { SlackGateway } from '../../infrastructure/slack/slack-gateway';

import type { Participant } from './types';

/**
 * チャンネルの参加者（ボット・削除済みユーザーを除く）を取得する
 * 並び順は users.list の順序に従う
 */
export async function fetchParticipants(
  gateway: SlackGateway,
  channelId: string
): Promise<Participant[]> {
  const [memberIds, users] = await Promise.all([
    gateway.listChannelMemberIds(channelId),
    gateway.listUsers(),
  ]);

  const inChannel = new Set(memberIds);
  return users
    .filter((user) => inChannel.has(user.id) && !user.isBot && !user.deleted)
    .map((user) => ({ id: user.id, name: user.name }));
}
