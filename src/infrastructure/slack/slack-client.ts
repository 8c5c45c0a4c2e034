import { LogLevel, WebClient, retryPolicies, type Logger as SlackLogger } from '@slack/web-api';

import { logger } from '../logging/logger';

/**
 * WebClient のログを tslog に流すアダプター
 */
function createSlackLogger(): SlackLogger {
  const sub = logger.getSubLogger({ name: 'web-api' });
  let level: LogLevel = process.env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;

  return {
    debug: (...msg: unknown[]) => sub.debug(...msg),
    info: (...msg: unknown[]) => sub.info(...msg),
    warn: (...msg: unknown[]) => sub.warn(...msg),
    error: (...msg: unknown[]) => sub.error(...msg),
    setLevel: (next: LogLevel) => {
      level = next;
    },
    getLevel: () => level,
    setName: () => {
      // 名前は sub logger 側で固定
    },
  };
}

/**
 * Slack Web API クライアントを作成する
 * レート制限（429）は WebClient 側で Retry-After に従って待機・再試行される
 */
export function createSlackClient(token: string): WebClient {
  return new WebClient(token, {
    logger: createSlackLogger(),
    retryConfig: retryPolicies.fiveRetriesInFiveMinutes,
  });
}
