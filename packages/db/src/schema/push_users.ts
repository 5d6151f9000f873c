import { index, pgTable, uniqueIndex, varchar } from 'drizzle-orm/pg-core'
import { createdAt, idWithTag, textSet, updatedAt } from './_common.js'

/**
 * push_users
 *
 * Device-token registry. One row per authenticated identity, or one anonymous
 * row per raw device token when nobody is signed in.
 *
 * `topics` is keyed to the identity, not to a single token. The push gateway
 * keeps its own per-token subscription table which this row mirrors.
 */
export const pushUsers = pgTable('push_users', {
  id: idWithTag('push_user'),

  /** Stable external identity; null for anonymous device registrations. */
  userId: varchar('user_id', { length: 255 }),

  /** Push gateway device tokens (set semantics). */
  tokens: textSet('tokens'),

  /** Topic names this identity is subscribed to (set semantics). */
  topics: textSet('topics'),

  createdAt: createdAt,
  updatedAt: updatedAt,
}, (table) => ({
  /** Postgres treats NULLs as distinct, so anonymous rows never collide. */
  pushUsersUserIdUnique: uniqueIndex('push_users_user_id_unique').on(table.userId),
  pushUsersTokensIdx: index('push_users_tokens_idx').using('gin', table.tokens),
}))

export type PushUserRow = typeof pushUsers.$inferSelect
export type NewPushUserRow = typeof pushUsers.$inferInsert
