import { drizzle } from 'drizzle-orm/node-postgres'
import type { NodePgDatabase } from 'drizzle-orm/node-postgres'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import { Pool } from 'pg'

import * as pushUsersSchema from './schema/push_users.js'
import * as topicsSchema from './schema/topics.js'
import * as messagesSchema from './schema/messages.js'

export * from './schema/_common.js'
export * from './schema/push_users.js'
export * from './schema/topics.js'
export * from './schema/messages.js'

/**
 * Unified Drizzle schema registry for the relay.
 */
export const schema = {
  ...pushUsersSchema,
  ...topicsSchema,
  ...messagesSchema,
}

/** Any Postgres driver over the relay schema (node-postgres in production). */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>

export type DatabaseHandle = {
  db: NodePgDatabase<typeof schema>
  pool: Pool
}

/**
 * Open a pooled connection. Nothing connects until the first query.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to initialize @pushrelay/db')
  }
  const pool = new Pool({ connectionString })
  return { pool, db: drizzle(pool, { schema }) }
}

export async function checkDatabaseConnection(pool: Pool): Promise<boolean> {
  const client = await pool.connect()
  try {
    await client.query('SELECT 1')
    return true
  } finally {
    client.release()
  }
}
