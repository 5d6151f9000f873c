/**
 * Message access policy.
 *
 * "Standing" on a message means the identity sent it or is one of its
 * recipients. These predicates only look at already-loaded state; the store's
 * listing filter (`standingFilter` in storage/pg-store.ts) encodes the same
 * rule in SQL and must stay in step with `hasStanding`.
 */

import { AuthorizationError } from '../errors.js'
import type { Identity, Message } from './types.js'

type StandingSubject = Pick<Message, 'sender' | 'recipients'>
type Actor = Pick<Identity, 'userId'> | null | undefined

export function isMessageSender(message: Pick<Message, 'sender'>, identity: Actor): boolean {
  if (!identity) return false
  return message.sender.type === 'user' && message.sender.user.userId === identity.userId
}

export function isMessageRecipient(message: Pick<Message, 'recipients'>, identity: Actor): boolean {
  if (!identity) return false
  return message.recipients.some((recipient) => recipient.userId === identity.userId)
}

export function hasStanding(message: StandingSubject, identity: Actor): boolean {
  return isMessageSender(message, identity) || isMessageRecipient(message, identity)
}

/** Only the original sender may edit a message. */
export function canUpdateMessage(message: Pick<Message, 'sender'>, identity: Actor): boolean {
  return isMessageSender(message, identity)
}

export function assertStanding(message: StandingSubject & Pick<Message, 'id'>, identity: Actor) {
  if (!hasStanding(message, identity)) {
    throw new AuthorizationError(`no standing on message (${message.id})`)
  }
}
