const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * 指定されたミリ秒数だけ待機する
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 基準時刻から指定日数さかのぼった時刻を返す
 */
export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/**
 * Slack の ts（"1712345678.000100" 形式の秒）を Date に変換する
 */
export function fromSlackTs(ts: string): Date {
  return new Date(Math.round(Number(ts) * 1000));
}

/**
 * Date を Slack API が受け付ける秒単位の文字列に変換する
 */
export function toSlackTs(date: Date): string {
  return (date.getTime() / 1000).toFixed(6);
}
