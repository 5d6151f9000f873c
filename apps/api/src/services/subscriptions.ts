/**
 * Subscription synchronizer.
 *
 * Keeps an identity's token/topic registry in the store mirrored at the push
 * gateway. The store is authoritative: it is written first, and the gateway is
 * only called once the store write succeeded. A gateway failure afterwards is
 * reported but not rolled back; calling again is idempotent (set semantics)
 * and retries the gateway, which is how drift heals.
 */

import { NotFoundError, ValidationError, callDependency } from '../errors.js'
import type { Identity, PushUser, ServiceDeps } from './types.js'

export function createSubscriptionService({ store, gateway, logger }: ServiceDeps) {
  const log = logger.child({ service: 'subscriptions' })

  function requireTopic(topic: string) {
    if (!topic || !topic.trim()) {
      throw new ValidationError('topic is required')
    }
  }

  function requireToken(token: string, identity: Identity | null) {
    if (token) return
    throw new ValidationError(identity ? 'token is required' : 'token or authenticated identity is required')
  }

  async function mirrorAtGateway(
    operation: 'subscribeTokenToTopic' | 'unsubscribeTokenFromTopic',
    token: string,
    topic: string,
    identity: Identity | null,
  ) {
    try {
      await callDependency('gateway', operation, () => gateway[operation](token, topic))
    } catch (error) {
      if (identity) {
        // Store already holds the new state; the next call for this pair retries.
        log.warn({ err: error, userId: identity.userId, topic, operation }, 'subscription_drift')
      }
      throw error
    }
  }

  /**
   * Subscribe `token` to `topic`. With an identity the registry is updated
   * first; without one the device is treated as anonymous and only the
   * gateway learns about it.
   */
  async function subscribe(token: string, identity: Identity | null, topic: string): Promise<void> {
    requireTopic(topic)
    requireToken(token, identity)

    if (identity) {
      const user = await callDependency('store', 'findOrCreateUser', () =>
        store.findOrCreateUser(identity.userId),
      )
      await callDependency('store', 'addToken', () => store.addToken(user.id, token))
      await callDependency('store', 'addTopic', () => store.addTopic(user.id, topic))
    }

    await mirrorAtGateway('subscribeTokenToTopic', token, topic, identity)
    log.info({ userId: identity?.userId ?? null, topic, anonymous: !identity }, 'topic_subscribed')
  }

  /**
   * Reverse of `subscribe`. Only the topic leaves the registry; the token stays
   * registered for direct delivery. Missing records and topics are no-ops.
   */
  async function unsubscribe(token: string, identity: Identity | null, topic: string): Promise<void> {
    requireTopic(topic)
    requireToken(token, identity)

    if (identity) {
      const user = await callDependency('store', 'findUserByIdentity', () =>
        store.findUserByIdentity(identity.userId),
      )
      if (user) {
        await callDependency('store', 'removeTopic', () => store.removeTopic(user.id, topic))
      }
    }

    await mirrorAtGateway('unsubscribeTokenFromTopic', token, topic, identity)
    log.info({ userId: identity?.userId ?? null, topic, anonymous: !identity }, 'topic_unsubscribed')
  }

  async function resolveAnonymousRegistry(token: string, previousToken: string | null): Promise<PushUser> {
    if (previousToken) {
      const previous = await callDependency('store', 'findAnonymousUser', () =>
        store.findAnonymousUser(previousToken),
      )
      if (previous) return previous
    }
    return callDependency('store', 'findOrCreateAnonymousUser', () =>
      store.findOrCreateAnonymousUser(token),
    )
  }

  /**
   * Register `token` for the caller and retire `previousToken` when the device
   * rotated its token.
   *
   * Topics are kept on the identity, but the gateway only knows tokens: the
   * new token is NOT re-subscribed to the identity's topics here. Clients are
   * expected to subscribe again after a rotation.
   */
  async function storeFirebaseToken(
    token: string,
    previousToken: string | null,
    identity: Identity | null,
  ): Promise<PushUser> {
    if (!token) {
      throw new ValidationError('token is empty or null')
    }

    const user = identity
      ? await callDependency('store', 'findOrCreateUser', () => store.findOrCreateUser(identity.userId))
      : await resolveAnonymousRegistry(token, previousToken)

    await callDependency('store', 'addToken', () => store.addToken(user.id, token))

    let rotated = false
    if (previousToken && previousToken !== token) {
      await callDependency('store', 'removeToken', () => store.removeToken(user.id, previousToken))
      rotated = true
    }

    const stored = await callDependency('store', 'getPushUser', () => store.getPushUser(user.id))
    if (!stored) throw new NotFoundError(`push user (${user.id}) not found`)

    log.info(
      { pushUserId: stored.id, userId: identity?.userId ?? null, rotated, topics: stored.topics.length },
      'push_token_stored',
    )
    return stored
  }

  return {
    subscribe,
    unsubscribe,
    storeFirebaseToken,
  }
}

export type SubscriptionService = ReturnType<typeof createSubscriptionService>
