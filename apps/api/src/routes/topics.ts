/**
 * Public topic routes: the topic catalogue and a topic's broadcast history.
 */

import { Hono } from 'hono'
import { paginationSchema, topicNameSchema } from '@pushrelay/schema'
import { ValidationError } from '../errors.js'
import { ok, parseQuery, type RouteDeps } from './_api.js'

export function createTopicRoutes({ services, auth }: RouteDeps) {
  const routes = new Hono()

  routes.get('/topics', auth.optionalAuth, async (c) => {
    const topics = await services.topics.getTopics()
    return ok(c, topics)
  })

  routes.get('/topic/:topic/messages', auth.optionalAuth, async (c) => {
    const topic = topicNameSchema.safeParse(c.req.param('topic'))
    if (!topic.success) {
      throw new ValidationError('topic is required')
    }
    const query = parseQuery(c, paginationSchema)
    const messages = await services.messages.getMessages({
      topic: topic.data,
      offset: query.offset,
      limit: query.limit,
      order: query.order,
    })
    return ok(c, messages)
  })

  return routes
}
