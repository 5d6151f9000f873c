/**
 * Postgres-backed notification store (drizzle-orm).
 *
 * Every set mutation is a single UPDATE so concurrent requests for the same
 * push user or message never lose each other's writes:
 * - add:    array_append guarded by `= ANY(...)`
 * - remove: array_remove
 * - recipients: jsonb_agg over the remaining elements, in original order
 */

import { and, asc, desc, eq, gte, inArray, isNull, lte, sql, type SQL } from 'drizzle-orm'
import { messages, pushUsers, topics, type Database } from '@pushrelay/db'
import { NotFoundError, ValidationError } from '../errors.js'
import {
  DEFAULT_PAGE_SIZE,
  type Message,
  type MessageChanges,
  type MessageFilter,
  type NewMessage,
  type NotificationStore,
  type PushUser,
  type Recipient,
  type Topic,
  type TopicInput,
} from '../services/types.js'

const UNIQUE_VIOLATION = '23505'

function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined
  if ('code' in error && typeof error.code === 'string') return error.code
  if ('cause' in error) return pgErrorCode(error.cause)
  return undefined
}

/**
 * SQL form of `hasStanding` (services/message-access.ts): the user sent the
 * message or is listed among its recipients.
 */
export function standingFilter(userId: string): SQL {
  return sql`(${messages.sender} -> 'user' ->> 'userId' = ${userId} or ${messages.recipients} @> ${JSON.stringify([{ userId }])}::jsonb)`
}

export class PgNotificationStore implements NotificationStore {
  constructor(private readonly db: Database) {}

  // ------------------------------------------------------------------
  // Push users
  // ------------------------------------------------------------------

  async getPushUser(id: string): Promise<PushUser | null> {
    const row = await this.db.query.pushUsers.findFirst({
      where: eq(pushUsers.id, id),
    })
    return row ?? null
  }

  async findUserByIdentity(userId: string): Promise<PushUser | null> {
    const row = await this.db.query.pushUsers.findFirst({
      where: eq(pushUsers.userId, userId),
    })
    return row ?? null
  }

  async findAnonymousUser(token: string): Promise<PushUser | null> {
    const row = await this.db.query.pushUsers.findFirst({
      where: and(isNull(pushUsers.userId), sql`${token}::text = any(${pushUsers.tokens})`),
    })
    return row ?? null
  }

  async findOrCreateUser(userId: string): Promise<PushUser> {
    const [created] = await this.db
      .insert(pushUsers)
      .values({ userId })
      .onConflictDoNothing({ target: pushUsers.userId })
      .returning()
    if (created) return created

    const existing = await this.findUserByIdentity(userId)
    if (!existing) {
      throw new Error(`push user for (${userId}) could not be created or resolved`)
    }
    return existing
  }

  /**
   * Anonymous rows have no unique key, so two first-time registrations of the
   * same token racing each other can both insert. Lookups take the first.
   */
  async findOrCreateAnonymousUser(token: string): Promise<PushUser> {
    const existing = await this.findAnonymousUser(token)
    if (existing) return existing

    const [created] = await this.db
      .insert(pushUsers)
      .values({ userId: null, tokens: [token] })
      .returning()
    if (!created) {
      throw new Error('anonymous push user insert returned no row')
    }
    return created
  }

  async addToken(pushUserId: string, token: string): Promise<void> {
    const rows = await this.db
      .update(pushUsers)
      .set({
        tokens: sql`array_append(${pushUsers.tokens}, ${token}::text)`,
        updatedAt: new Date(),
      })
      .where(and(eq(pushUsers.id, pushUserId), sql`not (${token}::text = any(${pushUsers.tokens}))`))
      .returning({ id: pushUsers.id })
    if (rows.length === 0) await this.requirePushUser(pushUserId)
  }

  async removeToken(pushUserId: string, token: string): Promise<void> {
    const rows = await this.db
      .update(pushUsers)
      .set({
        tokens: sql`array_remove(${pushUsers.tokens}, ${token}::text)`,
        updatedAt: new Date(),
      })
      .where(eq(pushUsers.id, pushUserId))
      .returning({ id: pushUsers.id })
    if (rows.length === 0) throw new NotFoundError(`push user (${pushUserId}) not found`)
  }

  async addTopic(pushUserId: string, topic: string): Promise<void> {
    const rows = await this.db
      .update(pushUsers)
      .set({
        topics: sql`array_append(${pushUsers.topics}, ${topic}::text)`,
        updatedAt: new Date(),
      })
      .where(and(eq(pushUsers.id, pushUserId), sql`not (${topic}::text = any(${pushUsers.topics}))`))
      .returning({ id: pushUsers.id })
    if (rows.length === 0) await this.requirePushUser(pushUserId)
  }

  async removeTopic(pushUserId: string, topic: string): Promise<void> {
    const rows = await this.db
      .update(pushUsers)
      .set({
        topics: sql`array_remove(${pushUsers.topics}, ${topic}::text)`,
        updatedAt: new Date(),
      })
      .where(eq(pushUsers.id, pushUserId))
      .returning({ id: pushUsers.id })
    if (rows.length === 0) throw new NotFoundError(`push user (${pushUserId}) not found`)
  }

  /** A guarded append that touched nothing is fine as long as the row exists. */
  private async requirePushUser(pushUserId: string) {
    const row = await this.db.query.pushUsers.findFirst({
      where: eq(pushUsers.id, pushUserId),
      columns: { id: true },
    })
    if (!row) throw new NotFoundError(`push user (${pushUserId}) not found`)
  }

  // ------------------------------------------------------------------
  // Messages
  // ------------------------------------------------------------------

  async insertMessage(message: NewMessage): Promise<Message> {
    const [row] = await this.db.insert(messages).values(message).returning()
    if (!row) {
      throw new Error('message insert returned no row')
    }
    return row
  }

  async getMessage(id: string): Promise<Message | null> {
    const row = await this.db.query.messages.findFirst({
      where: eq(messages.id, id),
    })
    return row ?? null
  }

  async updateMessage(changes: MessageChanges): Promise<Message> {
    const { id, ...fields } = changes
    const [row] = await this.db
      .update(messages)
      .set({ ...fields, updatedAt: new Date() })
      .where(eq(messages.id, id))
      .returning()
    if (!row) throw new NotFoundError(`message (${id}) not found`)
    return row
  }

  async deleteMessage(id: string): Promise<void> {
    const rows = await this.db
      .delete(messages)
      .where(eq(messages.id, id))
      .returning({ id: messages.id })
    if (rows.length === 0) throw new NotFoundError(`message (${id}) not found`)
  }

  async removeRecipientFromMessage(userId: string, messageId: string): Promise<void> {
    const rows = await this.db
      .update(messages)
      .set({
        recipients: sql`coalesce((
          select jsonb_agg(r.value order by r.ordinality)
          from jsonb_array_elements(${messages.recipients}) with ordinality as r(value, ordinality)
          where r.value ->> 'userId' is distinct from ${userId}
        ), '[]'::jsonb)`,
        updatedAt: new Date(),
      })
      .where(eq(messages.id, messageId))
      .returning({ id: messages.id })
    if (rows.length === 0) throw new NotFoundError(`message (${messageId}) not found`)
  }

  async listMessages(filter: MessageFilter): Promise<Message[]> {
    const where = and(
      filter.userId ? standingFilter(filter.userId) : undefined,
      filter.ids && filter.ids.length > 0 ? inArray(messages.id, filter.ids) : undefined,
      filter.topic ? eq(messages.topic, filter.topic) : undefined,
      filter.startDate ? gte(messages.createdAt, filter.startDate) : undefined,
      filter.endDate ? lte(messages.createdAt, filter.endDate) : undefined,
    )
    const direction = filter.order === 'asc' ? asc : desc

    return this.db
      .select()
      .from(messages)
      .where(where)
      .orderBy(direction(messages.createdAt), direction(messages.id))
      .limit(filter.limit ?? DEFAULT_PAGE_SIZE)
      .offset(filter.offset ?? 0)
  }

  async resolveTokensForRecipients(recipients: Recipient[]): Promise<string[]> {
    const userIds = [...new Set(recipients.map((recipient) => recipient.userId))]
    if (userIds.length === 0) return []

    const rows = await this.db
      .select({ tokens: pushUsers.tokens })
      .from(pushUsers)
      .where(inArray(pushUsers.userId, userIds))
    return [...new Set(rows.flatMap((row) => row.tokens))]
  }

  // ------------------------------------------------------------------
  // Topics
  // ------------------------------------------------------------------

  async listTopics(): Promise<Topic[]> {
    return this.db.select().from(topics).orderBy(asc(topics.name))
  }

  async insertTopic(topic: TopicInput): Promise<Topic> {
    try {
      const [row] = await this.db
        .insert(topics)
        .values({ name: topic.name, description: topic.description })
        .returning()
      if (!row) throw new Error('topic insert returned no row')
      return row
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        throw new ValidationError(`topic (${topic.name}) already exists`)
      }
      throw error
    }
  }

  async updateTopic(topic: TopicInput): Promise<Topic> {
    const [row] = await this.db
      .update(topics)
      .set({ description: topic.description, updatedAt: new Date() })
      .where(eq(topics.name, topic.name))
      .returning()
    if (!row) throw new NotFoundError(`topic (${topic.name}) not found`)
    return row
  }
}
