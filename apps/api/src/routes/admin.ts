/**
 * Administrative routes (topic catalogue and unrestricted message access).
 *
 * Callers must carry the admin group. Updating a message still requires the
 * caller to be its original sender.
 */

import { Hono } from 'hono'
import {
  idSchema,
  listMessagesQuerySchema,
  messageDraftSchema,
  messageUpdateSchema,
  topicNameSchema,
  topicSchema,
} from '@pushrelay/schema'
import { getIdentity } from '../middleware/auth.js'
import { ok, parseBody, parseQuery, type RouteDeps } from './_api.js'

const adminMessagesQuerySchema = listMessagesQuerySchema.extend({
  topic: topicNameSchema.optional(),
})

export function createAdminRoutes({ services, auth }: RouteDeps) {
  const routes = new Hono()

  routes.use('*', auth.requireAdmin)

  routes.get('/topics', async (c) => {
    return ok(c, await services.topics.getTopics())
  })

  routes.post('/topic', async (c) => {
    const topic = await parseBody(c, topicSchema)
    return ok(c, await services.topics.appendTopic(topic), 201)
  })

  routes.put('/topic', async (c) => {
    const topic = await parseBody(c, topicSchema)
    return ok(c, await services.topics.updateTopic(topic))
  })

  routes.get('/messages', async (c) => {
    const query = parseQuery(c, adminMessagesQuerySchema)
    const messages = await services.messages.getMessages({
      ids: query.ids,
      startDate: query.start_date,
      endDate: query.end_date,
      topic: query.topic,
      offset: query.offset,
      limit: query.limit,
      order: query.order,
    })
    return ok(c, messages)
  })

  routes.post('/message', async (c) => {
    const draft = await parseBody(c, messageDraftSchema)
    const created = await services.messages.createMessage(getIdentity(c), draft, {
      signal: c.req.raw.signal,
    })
    return ok(c, created, 201)
  })

  routes.put('/message', async (c) => {
    const body = await parseBody(c, messageUpdateSchema)
    const updated = await services.messages.updateMessage(getIdentity(c), {
      id: body.id,
      priority: body.priority,
      recipients: body.recipients,
      topic: body.topic || null,
      subject: body.subject,
      body: body.body,
      data: body.data,
    })
    return ok(c, updated)
  })

  routes.get('/message/:id', async (c) => {
    return ok(c, await services.messages.getMessage(idSchema.parse(c.req.param('id'))))
  })

  routes.delete('/message/:id', async (c) => {
    const id = idSchema.parse(c.req.param('id'))
    await services.messages.deleteMessage(id)
    return ok(c, { id })
  })

  return routes
}
