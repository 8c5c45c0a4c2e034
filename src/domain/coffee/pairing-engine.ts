import { pickOne, shuffle, type RandomSource } from '../../shared/utils/random';

import type { Pair } from './types';

/**
 * 過去のラウンドから、メンバーごとの過去の相手を集計する
 */
export function collectPreviousMatches(
  previousRounds: ReadonlyArray<readonly Pair[]>
): Map<string, Set<string>> {
  const matches = new Map<string, Set<string>>();

  const add = (member: string, partner: string) => {
    const partners = matches.get(member) ?? new Set<string>();
    partners.add(partner);
    matches.set(member, partners);
  };

  for (const round of previousRounds) {
    for (const [first, second] of round) {
      add(first, second);
      add(second, first);
    }
  }

  return matches;
}

/**
 * メンバーをランダムにペアにする
 *
 * 過去のラウンドで組んだ相手は、他に候補がいる限り避ける。
 * 人数が奇数のときは最初に引かれたメンバーが残った1人とも組む（2回コーヒー）。
 * 2人未満ならペアは作らない。
 */
export function generatePairs(
  memberIds: readonly string[],
  previousRounds: ReadonlyArray<readonly Pair[]> = [],
  random: RandomSource = Math.random
): Pair[] {
  const remaining = shuffle([...new Set(memberIds)], random);
  if (remaining.length < 2) return [];

  const previousMatches = collectPreviousMatches(previousRounds);
  const firstDrawn = remaining[remaining.length - 1];
  const pairs: Pair[] = [];

  const takeMatchFor = (member: string): string => {
    const seen = previousMatches.get(member);
    const fresh = seen ? remaining.filter((candidate) => !seen.has(candidate)) : remaining;
    // 未対戦の候補がいなければ全員から選ぶ
    const match = pickOne(fresh, random) ?? pickOne(remaining, random) ?? member;
    remaining.splice(remaining.indexOf(match), 1);
    return match;
  };

  while (remaining.length > 0) {
    if (remaining.length >= 2) {
      const drawn = remaining.pop() ?? firstDrawn;
      pairs.push([drawn, takeMatchFor(drawn)]);
    } else {
      pairs.push([firstDrawn, takeMatchFor(firstDrawn)]);
    }
  }

  return pairs;
}
