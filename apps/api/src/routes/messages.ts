/**
 * Caller-scoped message routes.
 *
 * Every route here requires a user. Listing and reads are limited to
 * messages the caller sent or receives; deleting only removes the caller from
 * the recipients.
 */

import { Hono, type Context } from 'hono'
import {
  idSchema,
  listMessagesQuerySchema,
  messageDraftSchema,
  messageIdsBodySchema,
} from '@pushrelay/schema'
import { getIdentity } from '../middleware/auth.js'
import { AuthenticationError } from '../errors.js'
import { ok, parseBody, parseQuery, type RouteDeps } from './_api.js'

function requireIdentity(c: Context) {
  const identity = getIdentity(c)
  if (!identity) throw new AuthenticationError()
  return identity
}

function messageIdParam(c: Context) {
  return idSchema.parse(c.req.param('id'))
}

export function createMessageRoutes({ services, auth }: RouteDeps) {
  const routes = new Hono()

  routes.get('/messages', auth.requireAuth, async (c) => {
    const query = parseQuery(c, listMessagesQuerySchema)
    const messages = await services.messages.getMessages({
      identity: requireIdentity(c),
      ids: query.ids,
      startDate: query.start_date,
      endDate: query.end_date,
      offset: query.offset,
      limit: query.limit,
      order: query.order,
    })
    return ok(c, messages)
  })

  routes.delete('/messages', auth.requireAuth, async (c) => {
    const body = await parseBody(c, messageIdsBodySchema)
    const failures = await services.messages.deleteUserMessages(requireIdentity(c), body.ids)
    return ok(c, { removed: body.ids.length - failures.length, failures })
  })

  routes.get('/message/:id', auth.requireAuth, async (c) => {
    const message = await services.messages.getUserMessage(requireIdentity(c), messageIdParam(c))
    return ok(c, message)
  })

  routes.delete('/message/:id', auth.requireAuth, async (c) => {
    const id = messageIdParam(c)
    await services.messages.deleteUserMessage(requireIdentity(c), id)
    return ok(c, { id })
  })

  routes.post('/message', auth.requireAuth, async (c) => {
    const draft = await parseBody(c, messageDraftSchema)
    const created = await services.messages.createMessage(requireIdentity(c), draft, {
      signal: c.req.raw.signal,
    })
    return ok(c, created, 201)
  })

  return routes
}
