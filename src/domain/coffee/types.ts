export interface Participant {
  id: string;
  name: string;
}

/** [引かれたメンバー, その相手] */
export type Pair = [string, string];

export interface PairingRound {
  postedAt: Date;
  pairs: Pair[];
}

/**
 * link: <@U123> 形式（通知される）, plain: @name 形式（通知されない）
 */
export type MentionStyle = 'link' | 'plain';

export interface RunResult {
  channelId: string;
  memoryChannelId: string;
  participants: number;
  pairs: Pair[];
  summary: string | null;
  /** まとめの投稿に成功したか（Slack ストアではこれが記録になる） */
  summaryPosted: boolean;
  directMessagesSent: number;
}
