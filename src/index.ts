import { loadEnv } from './config/env';
import { createCoffeeRunner, settingsFromEnv } from './domain/coffee/coffee-runner';
import { createSlackHistoryStore } from './domain/history/slack-history-store';
import { createSupabaseHistoryStore } from './domain/history/supabase-history-store';
import { logger } from './infrastructure/logging/logger';
import { createSlackClient } from './infrastructure/slack/slack-client';
import { createSlackGateway } from './infrastructure/slack/slack-gateway';
import { getSupabaseClient } from './infrastructure/supabase/client';
import { isBaseError } from './shared/errors/base-error';

/**
 * ランダムコーヒーを1ラウンド実行して終了する
 * 定期実行は外部（cron やコンテナのスケジューラ）に任せる
 */
async function bootstrap() {
  const env = loadEnv();
  const settings = settingsFromEnv(env);
  const gateway = createSlackGateway(createSlackClient(env.SLACK_API_TOKEN), {
    pageDelayMs: env.SLACK_PAGE_DELAY_MS,
  });

  const runner = createCoffeeRunner({
    gateway,
    settings,
    createHistoryStore: (context) =>
      env.HISTORY_STORE === 'supabase'
        ? createSupabaseHistoryStore({
            supabase: getSupabaseClient(),
            channelId: context.memoryChannelId,
          })
        : createSlackHistoryStore({
            gateway,
            memoryChannelId: context.memoryChannelId,
            magicalText: settings.magicalText,
            mentionStyle: context.mentionStyle,
            botUserId: context.botUserId,
            participants: context.participants,
          }),
  });

  const result = await runner.run();
  if (result.summary && !result.summaryPosted) {
    logger.warn(
      `Summary was not posted to ${result.memoryChannelId}; this round is not recorded in the Slack history`
    );
  }
  logger.info(
    `Posted ${result.pairs.length} pairs (${result.directMessagesSent} DMs) for ${result.channelId}`
  );
}

bootstrap().catch((error) => {
  if (isBaseError(error)) {
    logger.fatal(`Random coffee run failed [${error.code}]: ${error.message}`, error.details);
  } else {
    logger.fatal('Random coffee run failed', error);
  }
  process.exitCode = 1;
});
