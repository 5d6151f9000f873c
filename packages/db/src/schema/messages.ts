import { sql } from 'drizzle-orm'
import { index, integer, jsonb, pgTable, text, varchar } from 'drizzle-orm/pg-core'
import type { MessageData, Recipient, Sender } from '@pushrelay/schema'
import { createdAt, idWithTag, updatedAt } from './_common.js'

/**
 * messages
 *
 * Every notification the relay accepted, whether it was delivered to
 * recipients, broadcast to a topic, or only recorded.
 *
 * `recipients` is a snapshot taken at creation time. Tokens are resolved from
 * `push_users` when sending and are never stored here.
 */
export const messages = pgTable('messages', {
  id: idWithTag('msg'),

  priority: integer('priority').default(0).notNull(),

  /** `{ type: 'user', user: {...} }` or `{ type: 'system' }`. */
  sender: jsonb('sender').$type<Sender>().notNull(),

  /** Ordered `{ userId, name }` descriptors. */
  recipients: jsonb('recipients')
    .$type<Recipient[]>()
    .default(sql`'[]'::jsonb`)
    .notNull(),

  /** Soft reference to `topics.name`. */
  topic: varchar('topic', { length: 255 }),

  subject: text('subject').default('').notNull(),
  body: text('body').default('').notNull(),

  /** Opaque string metadata forwarded to the device with each send. */
  data: jsonb('data')
    .$type<MessageData>()
    .default(sql`'{}'::jsonb`)
    .notNull(),

  createdAt: createdAt,
  updatedAt: updatedAt,
}, (table) => ({
  messagesCreatedAtIdx: index('messages_created_at_idx').on(table.createdAt),
  messagesTopicCreatedAtIdx: index('messages_topic_created_at_idx').on(table.topic, table.createdAt),
  /** Serves the `recipients @> '[{"userId": ...}]'` standing filter. */
  messagesRecipientsIdx: index('messages_recipients_idx').using('gin', table.recipients),
}))

export type MessageRow = typeof messages.$inferSelect
export type NewMessageRow = typeof messages.$inferInsert
