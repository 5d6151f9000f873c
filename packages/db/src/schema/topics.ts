import { pgTable, text, varchar } from 'drizzle-orm/pg-core'
import { createdAt, updatedAt } from './_common.js'

/**
 * topics
 *
 * Named broadcast channels. Messages and push users reference topics by name
 * only, so renaming is not supported and deleting is not exposed.
 */
export const topics = pgTable('topics', {
  name: varchar('name', { length: 255 }).primaryKey(),
  description: text('description').default('').notNull(),
  createdAt: createdAt,
  updatedAt: updatedAt,
})

export type TopicRow = typeof topics.$inferSelect
export type NewTopicRow = typeof topics.$inferInsert
