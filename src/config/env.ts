import 'dotenv/config';
import { z } from 'zod';

import { createBaseError } from '../shared/errors/base-error';

const TRUTHY = new Set(['true', 't', 'yes', 'y', '1']);

/**
 * "True" / "yes" / "1" などを真、それ以外（未設定を含む）を偽として扱う
 */
const flag = z
  .string()
  .optional()
  .transform((value) => (value ? TRUTHY.has(value.trim().toLowerCase()) : false));

const envSchema = z
  .object({
    SLACK_API_TOKEN: z.string().min(1),
    CHANNEL_NAME: z.string().min(1),
    CHANNEL_NAME_TESTING: z.string().min(1).optional(),
    PRIVATE_CHANNEL_NAME_FOR_MEMORY: z.string().min(1).optional(),
    TESTING_MODE: flag,
    PAIRS_ARE_PUBLIC: flag,
    CHAN_NAMES_ARE_IDS: flag,
    LOOKBACK_DAYS: z.coerce.number().int().positive().default(28),
    MAGICAL_TEXT: z.string().min(1).default('This weeks random coffees are'),
    HISTORY_STORE: z.enum(['slack', 'supabase']).default('slack'),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_ANON_KEY: z.string().min(1).optional(),
    SLACK_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  })
  .superRefine((env, ctx) => {
    if (env.TESTING_MODE && !env.CHANNEL_NAME_TESTING) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHANNEL_NAME_TESTING'],
        message: 'Required when TESTING_MODE is enabled',
      });
    }
    if (!env.PAIRS_ARE_PUBLIC && !env.PRIVATE_CHANNEL_NAME_FOR_MEMORY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PRIVATE_CHANNEL_NAME_FOR_MEMORY'],
        message: 'Required when PAIRS_ARE_PUBLIC is disabled',
      });
    }
    if (env.HISTORY_STORE === 'supabase') {
      for (const key of ['SUPABASE_URL', 'SUPABASE_ANON_KEY'] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'Required when HISTORY_STORE is supabase',
          });
        }
      }
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * 任意のソースから環境変数をパースする（キャッシュなし）
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  // 空文字は未設定として扱う（Dockerfile の ENV="" 対策）
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw createBaseError(`環境変数が不正です: ${problems.join(', ')}`, 'CONFIG_INVALID', {
      problems,
    });
  }
  return result.data;
}

let cached: Env | null = null;

/**
 * 環境変数を読み込み、バリデーションして返す
 */
export function loadEnv(): Env {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}
