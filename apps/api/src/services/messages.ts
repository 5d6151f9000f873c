/**
 * Message fan-out engine.
 *
 * Flow for a new message:
 * 1. Reject drafts that already carry an id (messages are create-once).
 * 2. Stamp the sender (user snapshot or system).
 * 3. Persist. Nothing is delivered if this fails.
 * 4. Deliver by audience:
 *    - recipients -> resolve tokens, send to each token through a bounded
 *      pool; per-token failures are logged and counted, never raised
 *    - topic      -> one broadcast; its failure is the operation's failure
 *    - neither    -> record only
 */

import {
  AppError,
  AuthorizationError,
  NotFoundError,
  ValidationError,
  callDependency,
  describeError,
} from '../errors.js'
import { runBounded } from '../lib/bounded.js'
import { assertStanding, canUpdateMessage } from './message-access.js'
import type {
  Identity,
  Message,
  MessageChanges,
  MessageDraftInput,
  MessageFilter,
  Sender,
  ServiceDeps,
  SortOrder,
} from './types.js'

export const DEFAULT_FANOUT_CONCURRENCY = 50

export type DeliveryMode = 'recipients' | 'topic' | 'none'

export type DeliveryReport = {
  mode: DeliveryMode
  /** Gateway calls started. */
  attempted: number
  sent: number
  failed: number
  /** Calls never started because the caller cancelled. */
  skipped: number
}

export type CreatedMessage = {
  message: Message
  delivery: DeliveryReport
}

export type CreateMessageOptions = {
  signal?: AbortSignal
}

export type MessageQuery = {
  identity?: Identity | null
  ids?: string[]
  startDate?: Date
  endDate?: Date
  topic?: string
  offset?: number
  limit?: number
  order?: SortOrder
}

export type BatchDeleteFailure = {
  id: string
  code: string
  message: string
}

type MessageServiceOptions = {
  fanoutConcurrency?: number
}

function senderFor(actor: Identity | null): Sender {
  if (!actor) return { type: 'system' }
  return {
    type: 'user',
    user: {
      userId: actor.userId,
      email: actor.email ?? null,
      phone: actor.phone ?? null,
    },
  }
}

export function createMessageService(
  { store, gateway, logger }: ServiceDeps,
  options: MessageServiceOptions = {},
) {
  const log = logger.child({ service: 'messages' })
  const concurrency = options.fanoutConcurrency ?? DEFAULT_FANOUT_CONCURRENCY

  async function deliverToRecipients(message: Message, signal?: AbortSignal): Promise<DeliveryReport> {
    const tokens = await callDependency('store', 'resolveTokensForRecipients', () =>
      store.resolveTokensForRecipients(message.recipients),
    )

    const results = await runBounded(
      tokens,
      concurrency,
      (token) => gateway.sendToToken(token, message.subject, message.body, message.data),
      signal,
    )

    const report: DeliveryReport = { mode: 'recipients', attempted: 0, sent: 0, failed: 0, skipped: 0 }
    results.forEach((result, index) => {
      if (result.status === 'skipped') {
        report.skipped += 1
        return
      }
      report.attempted += 1
      if (result.status === 'fulfilled') {
        report.sent += 1
        return
      }
      report.failed += 1
      log.warn(
        { messageId: message.id, token: tokens[index], reason: describeError(result.reason) },
        'push_send_failed',
      )
    })
    return report
  }

  async function deliverToTopic(message: Message, topic: string, signal?: AbortSignal): Promise<DeliveryReport> {
    if (signal?.aborted) {
      return { mode: 'topic', attempted: 0, sent: 0, failed: 0, skipped: 1 }
    }
    await callDependency('gateway', 'sendToTopic', () =>
      gateway.sendToTopic(topic, message.subject, message.body),
    )
    return { mode: 'topic', attempted: 1, sent: 1, failed: 0, skipped: 0 }
  }

  /**
   * Persist a new message and fan it out.
   *
   * Returns the stored message whatever happened to individual token sends.
   * A failed topic broadcast rejects with `DependencyError`, although the
   * message is already stored by then.
   */
  async function createMessage(
    actor: Identity | null,
    draft: MessageDraftInput,
    { signal }: CreateMessageOptions = {},
  ): Promise<CreatedMessage> {
    if (draft.id) {
      throw new ValidationError(`message with id (${draft.id}) is already sent`)
    }

    const message = await callDependency('store', 'insertMessage', () =>
      store.insertMessage({
        priority: draft.priority ?? 0,
        sender: senderFor(actor),
        recipients: draft.recipients ?? [],
        topic: draft.topic || null,
        subject: draft.subject ?? '',
        body: draft.body ?? '',
        data: draft.data ?? {},
      }),
    )

    let delivery: DeliveryReport
    if (message.recipients.length > 0) {
      delivery = await deliverToRecipients(message, signal)
    } else if (message.topic) {
      delivery = await deliverToTopic(message, message.topic, signal)
    } else {
      delivery = { mode: 'none', attempted: 0, sent: 0, failed: 0, skipped: 0 }
    }

    log.info({ messageId: message.id, senderType: message.sender.type, ...delivery }, 'message_created')
    return { message, delivery }
  }

  /**
   * Time-ordered page of messages. An identity restricts the result to
   * messages it sent or receives; a topic restricts it to that topic.
   */
  async function getMessages(query: MessageQuery = {}): Promise<Message[]> {
    const filter: MessageFilter = {
      userId: query.identity?.userId,
      ids: query.ids,
      startDate: query.startDate,
      endDate: query.endDate,
      topic: query.topic,
      offset: query.offset,
      limit: query.limit,
      order: query.order ?? 'desc',
    }
    return callDependency('store', 'listMessages', () => store.listMessages(filter))
  }

  async function getMessage(id: string): Promise<Message> {
    const message = await callDependency('store', 'getMessage', () => store.getMessage(id))
    if (!message) {
      throw new NotFoundError(`message (${id}) not found`)
    }
    return message
  }

  /** Load a message on behalf of an identity that must have standing on it. */
  async function getUserMessage(identity: Identity, id: string): Promise<Message> {
    const message = await getMessage(id)
    assertStanding(message, identity)
    return message
  }

  /**
   * Replace the editable fields of an existing message. Only the original
   * sender may do this, and nothing is re-delivered.
   */
  async function updateMessage(identity: Identity | null, changes: MessageChanges): Promise<Message> {
    if (!changes.id) {
      throw new ValidationError('message id is required')
    }
    const existing = await getMessage(changes.id)
    if (!canUpdateMessage(existing, identity)) {
      throw new AuthorizationError('only creator can update the original message')
    }
    const updated = await callDependency('store', 'updateMessage', () => store.updateMessage(changes))
    log.info({ messageId: updated.id, userId: identity?.userId ?? null }, 'message_updated')
    return updated
  }

  /**
   * Remove the identity from a message's recipients. The message itself stays,
   * even with no recipients left.
   */
  async function deleteUserMessage(identity: Identity, id: string): Promise<void> {
    await callDependency('store', 'removeRecipientFromMessage', () =>
      store.removeRecipientFromMessage(identity.userId, id),
    )
    log.info({ messageId: id, userId: identity.userId }, 'recipient_removed')
  }

  /** Batch form of `deleteUserMessage`; one failing id does not stop the rest. */
  async function deleteUserMessages(identity: Identity, ids: string[]): Promise<BatchDeleteFailure[]> {
    const failures: BatchDeleteFailure[] = []
    for (const id of ids) {
      try {
        await deleteUserMessage(identity, id)
      } catch (error) {
        log.warn({ messageId: id, userId: identity.userId, err: error }, 'recipient_remove_failed')
        failures.push({
          id,
          code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
          message: describeError(error),
        })
      }
    }
    return failures
  }

  /** Administrative, irreversible delete. */
  async function deleteMessage(id: string): Promise<void> {
    await callDependency('store', 'deleteMessage', () => store.deleteMessage(id))
    log.info({ messageId: id }, 'message_deleted')
  }

  return {
    createMessage,
    getMessages,
    getMessage,
    getUserMessage,
    updateMessage,
    deleteUserMessage,
    deleteUserMessages,
    deleteMessage,
  }
}

export type MessageService = ReturnType<typeof createMessageService>
