/**
 * Service-to-service routes, guarded by the internal API key. Messages sent
 * here carry the system sender.
 */

import { Hono } from 'hono'
import { messageDraftSchema } from '@pushrelay/schema'
import { ok, parseBody, type RouteDeps } from './_api.js'

export function createInternalRoutes({ services, auth }: RouteDeps) {
  const routes = new Hono()

  routes.post('/message', auth.requireInternalKey, async (c) => {
    const draft = await parseBody(c, messageDraftSchema)
    const created = await services.messages.createMessage(null, draft, {
      signal: c.req.raw.signal,
    })
    return ok(c, created, 201)
  })

  return routes
}
