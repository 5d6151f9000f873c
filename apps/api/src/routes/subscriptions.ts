/**
 * Device token + topic subscription routes.
 *
 * Authentication is optional on all of them: an authenticated caller's
 * registry is updated, an anonymous device only talks to the gateway (or its
 * anonymous registry record for token storage).
 */

import { Hono } from 'hono'
import { storeTokenBodySchema, tokenBodySchema, topicNameSchema } from '@pushrelay/schema'
import { getIdentity } from '../middleware/auth.js'
import { ValidationError } from '../errors.js'
import { ok, parseBody, type RouteDeps } from './_api.js'

function topicParam(raw: string) {
  const parsed = topicNameSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ValidationError('topic is required')
  }
  return parsed.data
}

export function createSubscriptionRoutes({ services, auth }: RouteDeps) {
  const routes = new Hono()

  routes.post('/token', auth.optionalAuth, async (c) => {
    const body = await parseBody(c, storeTokenBodySchema)
    const user = await services.subscriptions.storeFirebaseToken(
      body.token,
      body.previous_token ?? null,
      getIdentity(c),
    )
    return ok(c, { id: user.id, topics: user.topics })
  })

  routes.post('/topic/:topic/subscribe', auth.optionalAuth, async (c) => {
    const topic = topicParam(c.req.param('topic'))
    const body = await parseBody(c, tokenBodySchema)
    await services.subscriptions.subscribe(body.token, getIdentity(c), topic)
    return ok(c, { topic, subscribed: true })
  })

  routes.post('/topic/:topic/unsubscribe', auth.optionalAuth, async (c) => {
    const topic = topicParam(c.req.param('topic'))
    const body = await parseBody(c, tokenBodySchema)
    await services.subscriptions.unsubscribe(body.token, getIdentity(c), topic)
    return ok(c, { topic, subscribed: false })
  })

  return routes
}
