/**
 * In-process `NotificationStore` for tests.
 *
 * Ids are sequential (`push_user_1`, `msg_1`, ...) and every write advances a
 * fake clock by one second, so listing order is deterministic. Records are
 * cloned on the way in and out.
 */

import { NotFoundError, ValidationError } from '../errors.js'
import { hasStanding } from '../services/message-access.js'
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

export const MEMORY_STORE_EPOCH = Date.UTC(2026, 0, 1)

type StoreOperation = keyof NotificationStore

export class MemoryNotificationStore implements NotificationStore {
  readonly users = new Map<string, PushUser>()
  readonly messages = new Map<string, Message>()
  readonly topics = new Map<string, Topic>()

  private sequence = 0
  private tick = 0
  private readonly failures = new Map<StoreOperation, Error>()

  /** Make the next call of `operation` reject with `error`. */
  failNext(operation: StoreOperation, error = new Error(`store unavailable (${operation})`)) {
    this.failures.set(operation, error)
  }

  private check(operation: StoreOperation) {
    const error = this.failures.get(operation)
    if (error) {
      this.failures.delete(operation)
      throw error
    }
  }

  private nextId(tag: string) {
    this.sequence += 1
    return `${tag}_${this.sequence}`
  }

  private now() {
    this.tick += 1
    return new Date(MEMORY_STORE_EPOCH + this.tick * 1000)
  }

  private requireUser(pushUserId: string): PushUser {
    const user = this.users.get(pushUserId)
    if (!user) throw new NotFoundError(`push user (${pushUserId}) not found`)
    return user
  }

  private requireMessage(id: string): Message {
    const message = this.messages.get(id)
    if (!message) throw new NotFoundError(`message (${id}) not found`)
    return message
  }

  // Push users

  private userByIdentity(userId: string): PushUser | undefined {
    return [...this.users.values()].find((user) => user.userId === userId)
  }

  private anonymousUserByToken(token: string): PushUser | undefined {
    return [...this.users.values()].find((user) => user.userId === null && user.tokens.includes(token))
  }

  async getPushUser(id: string): Promise<PushUser | null> {
    this.check('getPushUser')
    const user = this.users.get(id)
    return user ? structuredClone(user) : null
  }

  async findUserByIdentity(userId: string): Promise<PushUser | null> {
    this.check('findUserByIdentity')
    const user = this.userByIdentity(userId)
    return user ? structuredClone(user) : null
  }

  async findAnonymousUser(token: string): Promise<PushUser | null> {
    this.check('findAnonymousUser')
    const user = this.anonymousUserByToken(token)
    return user ? structuredClone(user) : null
  }

  async findOrCreateUser(userId: string): Promise<PushUser> {
    this.check('findOrCreateUser')
    const existing = this.userByIdentity(userId)
    if (existing) return structuredClone(existing)
    return this.createUser(userId, [])
  }

  async findOrCreateAnonymousUser(token: string): Promise<PushUser> {
    this.check('findOrCreateAnonymousUser')
    const existing = this.anonymousUserByToken(token)
    if (existing) return structuredClone(existing)
    return this.createUser(null, [token])
  }

  private createUser(userId: string | null, tokens: string[]): PushUser {
    const at = this.now()
    const user: PushUser = {
      id: this.nextId('push_user'),
      userId,
      tokens,
      topics: [],
      createdAt: at,
      updatedAt: at,
    }
    this.users.set(user.id, user)
    return structuredClone(user)
  }

  async addToken(pushUserId: string, token: string): Promise<void> {
    this.check('addToken')
    const user = this.requireUser(pushUserId)
    if (!user.tokens.includes(token)) {
      user.tokens.push(token)
      user.updatedAt = this.now()
    }
  }

  async removeToken(pushUserId: string, token: string): Promise<void> {
    this.check('removeToken')
    const user = this.requireUser(pushUserId)
    user.tokens = user.tokens.filter((existing) => existing !== token)
    user.updatedAt = this.now()
  }

  async addTopic(pushUserId: string, topic: string): Promise<void> {
    this.check('addTopic')
    const user = this.requireUser(pushUserId)
    if (!user.topics.includes(topic)) {
      user.topics.push(topic)
      user.updatedAt = this.now()
    }
  }

  async removeTopic(pushUserId: string, topic: string): Promise<void> {
    this.check('removeTopic')
    const user = this.requireUser(pushUserId)
    user.topics = user.topics.filter((existing) => existing !== topic)
    user.updatedAt = this.now()
  }

  // Messages

  async insertMessage(message: NewMessage): Promise<Message> {
    this.check('insertMessage')
    const at = this.now()
    const stored: Message = {
      ...structuredClone(message),
      id: this.nextId('msg'),
      createdAt: at,
      updatedAt: at,
    }
    this.messages.set(stored.id, stored)
    return structuredClone(stored)
  }

  async getMessage(id: string): Promise<Message | null> {
    this.check('getMessage')
    const message = this.messages.get(id)
    return message ? structuredClone(message) : null
  }

  async updateMessage(changes: MessageChanges): Promise<Message> {
    this.check('updateMessage')
    const existing = this.requireMessage(changes.id)
    const updated: Message = {
      ...existing,
      ...structuredClone(changes),
      updatedAt: this.now(),
    }
    this.messages.set(updated.id, updated)
    return structuredClone(updated)
  }

  async deleteMessage(id: string): Promise<void> {
    this.check('deleteMessage')
    this.requireMessage(id)
    this.messages.delete(id)
  }

  async removeRecipientFromMessage(userId: string, messageId: string): Promise<void> {
    this.check('removeRecipientFromMessage')
    const message = this.requireMessage(messageId)
    message.recipients = message.recipients.filter((recipient) => recipient.userId !== userId)
    message.updatedAt = this.now()
  }

  async listMessages(filter: MessageFilter): Promise<Message[]> {
    this.check('listMessages')
    const { userId, ids, topic, startDate, endDate } = filter
    const direction = filter.order === 'asc' ? 1 : -1
    const offset = filter.offset ?? 0
    const limit = filter.limit ?? DEFAULT_PAGE_SIZE

    return [...this.messages.values()]
      .filter((message) => !userId || hasStanding(message, { userId }))
      .filter((message) => !ids || ids.length === 0 || ids.includes(message.id))
      .filter((message) => !topic || message.topic === topic)
      .filter((message) => !startDate || message.createdAt >= startDate)
      .filter((message) => !endDate || message.createdAt <= endDate)
      .sort((a, b) => direction * (a.createdAt.getTime() - b.createdAt.getTime()))
      .slice(offset, offset + limit)
      .map((message) => structuredClone(message))
  }

  async resolveTokensForRecipients(recipients: Recipient[]): Promise<string[]> {
    this.check('resolveTokensForRecipients')
    const userIds = new Set(recipients.map((recipient) => recipient.userId))
    const tokens = new Set<string>()
    for (const user of this.users.values()) {
      if (user.userId !== null && userIds.has(user.userId)) {
        user.tokens.forEach((token) => tokens.add(token))
      }
    }
    return [...tokens]
  }

  // Topics

  async listTopics(): Promise<Topic[]> {
    this.check('listTopics')
    return [...this.topics.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((topic) => structuredClone(topic))
  }

  async insertTopic(topic: TopicInput): Promise<Topic> {
    this.check('insertTopic')
    if (this.topics.has(topic.name)) {
      throw new ValidationError(`topic (${topic.name}) already exists`)
    }
    const at = this.now()
    const stored: Topic = { name: topic.name, description: topic.description, createdAt: at, updatedAt: at }
    this.topics.set(stored.name, stored)
    return structuredClone(stored)
  }

  async updateTopic(topic: TopicInput): Promise<Topic> {
    this.check('updateTopic')
    const existing = this.topics.get(topic.name)
    if (!existing) throw new NotFoundError(`topic (${topic.name}) not found`)
    existing.description = topic.description
    existing.updatedAt = this.now()
    return structuredClone(existing)
  }
}
