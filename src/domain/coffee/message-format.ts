import type { MentionStyle, Pair, Participant } from './types';

export interface SummaryOptions {
  magicalText: string;
  lookbackDays: number;
  mentionStyle: MentionStyle;
}

const LINK_MENTION = /^<@([A-Z0-9]+)(?:\|[^>]*)?>$/;
const PLAIN_MENTION = /^@([\w.-]+)$/;
const PAIR_LINE = /^\s*\d+\.\s+(\S+)\s+and\s+(\S+)\s*$/;

/**
 * メンバーを投稿用の表記に変換する
 * plain は通知が飛ばないのでテスト用
 */
export function renderMention(participant: Participant, style: MentionStyle): string {
  return style === 'link' ? `<@${participant.id}>` : `@${participant.name}`;
}

/**
 * 表記からメンバーを表すトークン（link なら ID、plain ならハンドル）を取り出す
 */
export function parseMention(token: string, style: MentionStyle): string | null {
  const match = (style === 'link' ? LINK_MENTION : PLAIN_MENTION).exec(token);
  return match ? match[1] : null;
}

/**
 * ラウンドのまとめメッセージを作る。ペアがなければ null
 */
export function formatSummary(
  pairs: readonly Pair[],
  participants: ReadonlyMap<string, Participant>,
  options: SummaryOptions
): string | null {
  if (pairs.length === 0) return null;

  const mention = (id: string) =>
    renderMention(participants.get(id) ?? { id, name: id }, options.mentionStyle);

  const lines = pairs.map(([a, b], index) => ` ${index + 1}. ${mention(a)} and ${mention(b)}`);

  return [
    `${options.magicalText}:`,
    ...lines,
    'An uneven number of members results in one person getting two coffee matches. ' +
      `Matches from the last ${options.lookbackDays} days considered to avoid matching the same members several times in the time period.`,
  ].join('\n');
}

/**
 * 過去のまとめメッセージかどうかを判定する
 */
export function isSummaryMessage(text: string, magicalText: string, style: MentionStyle): boolean {
  if (!text.includes(magicalText)) return false;
  return style === 'link' ? text.includes('<@U') || text.includes('<@W') : text.includes('@');
}

/**
 * まとめメッセージからペアを取り出す
 * "<番号>. <メンション> and <メンション>" の行だけを対象にする
 */
export function parseSummary(text: string, style: MentionStyle): Pair[] {
  const pairs: Pair[] = [];

  for (const line of text.split('\n')) {
    const match = PAIR_LINE.exec(line);
    if (!match) continue;

    const first = parseMention(match[1], style);
    const second = parseMention(match[2], style);
    if (first && second) {
      pairs.push([first, second]);
    }
  }

  return pairs;
}

/**
 * ペア向けグループ DM の本文
 */
export function formatPairIntroduction(pair: Pair, channelId: string): string {
  const [a, b] = pair;
  return `Hello <@${a}> and <@${b}>\nYou've been randomly selected for <#${channelId}>!\nTake some time to meet soon.`;
}

/**
 * ペアを非公開にしたときにメインチャンネルへ流す告知
 */
export function formatLaunchNotice(pairCount: number): string {
  return `I just launched a new round of ${pairCount} pairs! Check your DMs.`;
}
