import { index, jsonb, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';

/**
 * ランダムコーヒーの1ラウンド。pairs は [[id, id], ...]
 */
export const coffeeRounds = pgTable(
  'coffee_rounds',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    channelId: text('channel_id').notNull(),
    postedAt: timestamp('posted_at', { withTimezone: true }).notNull().defaultNow(),
    pairs: jsonb('pairs').$type<Array<[string, string]>>().notNull(),
  },
  (table) => ({
    channelPostedAtIdx: index('coffee_rounds_channel_posted_at_idx').on(
      table.channelId,
      table.postedAt
    ),
  })
);
