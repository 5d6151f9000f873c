import { sql } from 'drizzle-orm'
import { text, timestamp } from 'drizzle-orm/pg-core'
import KSUID from 'ksuid'

/** Prefixes of the tables that mint their own ids. */
export type IdTag = 'msg' | 'push_user'

/** `msg_<ksuid>`; KSUIDs sort by creation second. */
export function generateId(tag: IdTag): string {
  return `${tag}_${KSUID.randomSync().string}`
}

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = timestamp('created_at', { withTimezone: true }).defaultNow().notNull()

/** Last update timestamp (application refreshes on mutation). */
export const updatedAt = timestamp('updated_at', { withTimezone: true }).defaultNow().notNull()

/** Text FK helper for tagged KSUID ids. */
export const idRef = (name: string) => text(name)

/** Primary key helper using tagged KSUID generation. */
export const idWithTag = (tag: IdTag) => idRef('id').primaryKey().$defaultFn(() => generateId(tag))

/**
 * Set-like `text[]` column.
 *
 * The column itself does not enforce uniqueness; writers go through
 * `array_append` guarded by `= ANY(...)` so duplicates never land.
 */
export const textSet = (name: string) =>
  text(name)
    .array()
    .default(sql`'{}'::text[]`)
    .notNull()
