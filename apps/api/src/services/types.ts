import type { Logger } from 'pino'
import type {
  Identity,
  MessageData,
  Recipient,
  Sender,
  SortOrder,
} from '@pushrelay/schema'

export type { Identity, MessageData, Recipient, Sender, SortOrder }

/** Token/topic registry record. */
export type PushUser = {
  id: string
  userId: string | null
  tokens: string[]
  topics: string[]
  createdAt: Date
  updatedAt: Date
}

export type Topic = {
  name: string
  description: string
  createdAt: Date
  updatedAt: Date
}

export type TopicInput = Pick<Topic, 'name' | 'description'>

export type Message = {
  id: string
  priority: number
  sender: Sender
  recipients: Recipient[]
  topic: string | null
  subject: string
  body: string
  data: MessageData
  createdAt: Date
  updatedAt: Date
}

/** A message before the store assigned it an id and timestamps. */
export type NewMessage = Omit<Message, 'id' | 'createdAt' | 'updatedAt'>

/** Fields a sender may replace on an existing message. */
export type MessageChanges = Pick<
  Message,
  'id' | 'priority' | 'recipients' | 'topic' | 'subject' | 'body' | 'data'
>

export type MessageDraftInput = {
  id?: string | null
  priority?: number
  recipients?: Recipient[]
  topic?: string | null
  subject?: string
  body?: string
  data?: MessageData
}

/** Page size used when a listing does not ask for one. */
export const DEFAULT_PAGE_SIZE = 20

export type MessageFilter = {
  /** Restrict to messages where this identity has standing. */
  userId?: string
  ids?: string[]
  startDate?: Date
  endDate?: Date
  topic?: string
  offset?: number
  /** Unset means the store's default page size. */
  limit?: number
  order: SortOrder
}

/**
 * Durable store contract.
 *
 * Lookups resolve to `null` when nothing matches. Mutations on a record that
 * does not exist reject with `NotFoundError`. Set mutations must be atomic
 * single-record updates.
 */
export interface NotificationStore {
  getPushUser(id: string): Promise<PushUser | null>
  findUserByIdentity(userId: string): Promise<PushUser | null>
  findAnonymousUser(token: string): Promise<PushUser | null>
  findOrCreateUser(userId: string): Promise<PushUser>
  findOrCreateAnonymousUser(token: string): Promise<PushUser>
  addToken(pushUserId: string, token: string): Promise<void>
  removeToken(pushUserId: string, token: string): Promise<void>
  addTopic(pushUserId: string, topic: string): Promise<void>
  removeTopic(pushUserId: string, topic: string): Promise<void>

  insertMessage(message: NewMessage): Promise<Message>
  getMessage(id: string): Promise<Message | null>
  updateMessage(changes: MessageChanges): Promise<Message>
  deleteMessage(id: string): Promise<void>
  removeRecipientFromMessage(userId: string, messageId: string): Promise<void>
  listMessages(filter: MessageFilter): Promise<Message[]>
  resolveTokensForRecipients(recipients: Recipient[]): Promise<string[]>

  listTopics(): Promise<Topic[]>
  insertTopic(topic: TopicInput): Promise<Topic>
  updateTopic(topic: TopicInput): Promise<Topic>
}

/**
 * Push gateway contract. Calls resolve once the gateway accepted the request;
 * no delivery receipt is modeled.
 */
export interface PushGateway {
  sendToToken(token: string, subject: string, body: string, data: MessageData): Promise<void>
  sendToTopic(topic: string, subject: string, body: string): Promise<void>
  subscribeTokenToTopic(token: string, topic: string): Promise<void>
  unsubscribeTokenFromTopic(token: string, topic: string): Promise<void>
}

export type ServiceDeps = {
  store: NotificationStore
  gateway: PushGateway
  logger: Logger
}
