/**
 * @fileoverview Subscription synchronizer unit tests
 *
 * @description
 * Drives subscribe / unsubscribe / storeFirebaseToken against the in-memory
 * store and the recording gateway, including partial failures between the
 * two.
 *
 * @architecture
 * Tests: src/services/__tests__/subscriptions.test.ts
 * Tests: subscriptions.ts
 */

import { beforeEach, describe, expect, it } from 'vitest'
import { DependencyError, ValidationError } from '../../errors'
import { createTestDeps } from '../../testing'
import { createSubscriptionService } from '../subscriptions'
import type { Identity } from '../types'

const alice: Identity = { userId: 'alice', email: 'alice@example.test' }

describe('subscriptions.ts', () => {
  let deps: ReturnType<typeof createTestDeps>
  let service: ReturnType<typeof createSubscriptionService>

  beforeEach(() => {
    deps = createTestDeps()
    service = createSubscriptionService(deps)
  })

  describe('subscribe', () => {
    it('registers token and topic, then mirrors at the gateway', async () => {
      await service.subscribe('T1', alice, 'sports')

      const user = await deps.store.findUserByIdentity('alice')
      expect(user?.tokens).toEqual(['T1'])
      expect(user?.topics).toEqual(['sports'])
      expect(deps.gateway.topicMembers('sports')).toEqual(['T1'])
    })

    it('is idempotent for the same identity, token and topic', async () => {
      await service.subscribe('T1', alice, 'sports')
      await service.subscribe('T1', alice, 'sports')

      const user = await deps.store.findUserByIdentity('alice')
      expect(user?.tokens).toEqual(['T1'])
      expect(user?.topics).toEqual(['sports'])
      expect(deps.store.users.size).toBe(1)
      expect(deps.gateway.topicMembers('sports')).toEqual(['T1'])
    })

    it('subscribes anonymous devices at the gateway only', async () => {
      await service.subscribe('T9', null, 'sports')

      expect(deps.store.users.size).toBe(0)
      expect(deps.gateway.subscribed).toEqual([{ token: 'T9', topic: 'sports' }])
    })

    it('rejects an empty topic before touching anything', async () => {
      await expect(service.subscribe('T1', alice, '')).rejects.toThrow(ValidationError)
      await expect(service.subscribe('T1', alice, '   ')).rejects.toThrow('topic is required')

      expect(deps.store.users.size).toBe(0)
      expect(deps.gateway.calls).toBe(0)
    })

    it('rejects a missing token', async () => {
      await expect(service.subscribe('', null, 'sports')).rejects.toThrow(
        'token or authenticated identity is required',
      )
      await expect(service.subscribe('', alice, 'sports')).rejects.toThrow('token is required')
      expect(deps.gateway.calls).toBe(0)
    })

    it('does not call the gateway when the store write fails', async () => {
      deps.store.failNext('addTopic')

      const error = await service.subscribe('T1', alice, 'sports').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(DependencyError)
      expect(error).toMatchObject({ source: 'store', operation: 'addTopic', status: 500 })
      expect(deps.gateway.calls).toBe(0)
    })

    it('keeps the store write when the gateway fails, and heals on retry', async () => {
      deps.gateway.failTopics = true

      const error = await service.subscribe('T1', alice, 'sports').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(DependencyError)
      expect(error).toMatchObject({ source: 'gateway', status: 502, code: 'DEPENDENCY_ERROR' })
      expect((await deps.store.findUserByIdentity('alice'))?.topics).toEqual(['sports'])
      expect(deps.gateway.topicMembers('sports')).toEqual([])

      const drift = deps.logs.find((line) => line.msg === 'subscription_drift')
      expect(drift).toMatchObject({
        level: 40,
        service: 'subscriptions',
        userId: 'alice',
        topic: 'sports',
        operation: 'subscribeTokenToTopic',
      })

      deps.gateway.failTopics = false
      await service.subscribe('T1', alice, 'sports')

      expect((await deps.store.findUserByIdentity('alice'))?.topics).toEqual(['sports'])
      expect(deps.gateway.topicMembers('sports')).toEqual(['T1'])
    })
  })

  describe('unsubscribe', () => {
    it('empties both the store and the gateway for the pair', async () => {
      await service.subscribe('T1', alice, 'sports')
      await service.unsubscribe('T1', alice, 'sports')

      const user = await deps.store.findUserByIdentity('alice')
      expect(user?.topics).toEqual([])
      expect(deps.gateway.topicMembers('sports')).toEqual([])
    })

    it('keeps the token registered for direct delivery', async () => {
      await service.subscribe('T1', alice, 'sports')
      await service.unsubscribe('T1', alice, 'sports')

      expect((await deps.store.findUserByIdentity('alice'))?.tokens).toEqual(['T1'])
    })

    it('treats an unknown identity as a no-op on the store side', async () => {
      await service.unsubscribe('T1', { userId: 'bob' }, 'sports')

      expect(deps.store.users.size).toBe(0)
      expect(deps.gateway.unsubscribed).toEqual([{ token: 'T1', topic: 'sports' }])
    })

    it('leaves other topics alone', async () => {
      await service.subscribe('T1', alice, 'sports')
      await service.subscribe('T1', alice, 'weather')
      await service.unsubscribe('T1', alice, 'sports')

      expect((await deps.store.findUserByIdentity('alice'))?.topics).toEqual(['weather'])
      expect(deps.gateway.topicMembers('weather')).toEqual(['T1'])
    })

    it('does not call the gateway when the store removal fails', async () => {
      await service.subscribe('T1', alice, 'sports')
      const callsBefore = deps.gateway.calls
      deps.store.failNext('removeTopic')

      const error = await service.unsubscribe('T1', alice, 'sports').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(DependencyError)
      expect(error).toMatchObject({ source: 'store', operation: 'removeTopic', status: 500 })
      expect(deps.gateway.calls).toBe(callsBefore)
      expect((await deps.store.findUserByIdentity('alice'))?.topics).toEqual(['sports'])
      expect(deps.gateway.topicMembers('sports')).toEqual(['T1'])
    })

    it('keeps the store removal when the gateway fails, and heals on retry', async () => {
      await service.subscribe('T1', alice, 'sports')
      deps.gateway.failTopics = true

      const error = await service.unsubscribe('T1', alice, 'sports').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(DependencyError)
      expect(error).toMatchObject({ source: 'gateway', operation: 'unsubscribeTokenFromTopic', status: 502 })
      expect((await deps.store.findUserByIdentity('alice'))?.topics).toEqual([])
      expect(deps.gateway.topicMembers('sports')).toEqual(['T1'])

      const drift = deps.logs.find((line) => line.msg === 'subscription_drift')
      expect(drift).toMatchObject({
        level: 40,
        service: 'subscriptions',
        userId: 'alice',
        topic: 'sports',
        operation: 'unsubscribeTokenFromTopic',
      })

      deps.gateway.failTopics = false
      await service.unsubscribe('T1', alice, 'sports')

      expect((await deps.store.findUserByIdentity('alice'))?.topics).toEqual([])
      expect(deps.gateway.topicMembers('sports')).toEqual([])
    })
  })

  describe('storeFirebaseToken', () => {
    it('creates the registry on first registration', async () => {
      const user = await service.storeFirebaseToken('T1', null, alice)

      expect(user.userId).toBe('alice')
      expect((await deps.store.findUserByIdentity('alice'))?.tokens).toEqual(['T1'])
    })

    it('returns the registry as stored after the token writes', async () => {
      const first = await service.storeFirebaseToken('T1', null, alice)
      const rotated = await service.storeFirebaseToken('T2', 'T1', alice)

      expect(first.tokens).toEqual(['T1'])
      expect(rotated).toMatchObject({ id: first.id, userId: 'alice', tokens: ['T2'] })
    })

    it('resolves an existing registry even when a plain lookup would fail', async () => {
      await service.storeFirebaseToken('T1', null, alice)
      deps.store.failNext('findUserByIdentity')

      const user = await service.storeFirebaseToken('T2', null, alice)

      expect(user.tokens).toEqual(['T1', 'T2'])
      await expect(deps.store.findUserByIdentity('alice')).rejects.toThrow('store unavailable (findUserByIdentity)')
    })

    it('replaces the previous token on rotation', async () => {
      await service.storeFirebaseToken('T1', null, alice)
      await service.storeFirebaseToken('T2', 'T1', alice)

      expect((await deps.store.findUserByIdentity('alice'))?.tokens).toEqual(['T2'])
      expect(deps.logs.filter((line) => line.msg === 'push_token_stored').map((line) => line.rotated)).toEqual([
        false,
        true,
      ])
    })

    it('keeps the token when previous and new are the same', async () => {
      await service.storeFirebaseToken('T1', 'T1', alice)

      expect((await deps.store.findUserByIdentity('alice'))?.tokens).toEqual(['T1'])
    })

    it('does not re-subscribe the new token at the gateway', async () => {
      await service.subscribe('T1', alice, 'sports')
      await service.storeFirebaseToken('T2', 'T1', alice)

      const user = await deps.store.findUserByIdentity('alice')
      expect(user?.topics).toEqual(['sports'])
      expect(user?.tokens).toEqual(['T2'])
      expect(deps.gateway.topicMembers('sports')).toEqual(['T1'])
    })

    it('rotates an anonymous registry in place', async () => {
      const first = await service.storeFirebaseToken('T1', null, null)
      const second = await service.storeFirebaseToken('T2', 'T1', null)

      expect(second.id).toBe(first.id)
      expect(deps.store.users.size).toBe(1)
      expect(await deps.store.findAnonymousUser('T2')).toMatchObject({ id: first.id, tokens: ['T2'] })
      expect(await deps.store.findAnonymousUser('T1')).toBeNull()
    })

    it('rejects an empty token', async () => {
      await expect(service.storeFirebaseToken('', null, alice)).rejects.toThrow('token is empty or null')
      expect(deps.store.users.size).toBe(0)
    })
  })
})
