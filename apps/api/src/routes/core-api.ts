/**
 * Canonical API router, mounted under `/api`.
 *
 * Route modules are split by audience (devices, users, internal services,
 * administrators) but share the same services and auth middleware.
 */

import { Hono } from 'hono'
import { createAdminRoutes } from './admin.js'
import { createInternalRoutes } from './internal.js'
import { createMessageRoutes } from './messages.js'
import { createSubscriptionRoutes } from './subscriptions.js'
import { createTopicRoutes } from './topics.js'
import type { RouteDeps } from './_api.js'

export function createCoreApiRoutes(deps: RouteDeps) {
  const coreApiRoutes = new Hono()

  coreApiRoutes.route('/', createSubscriptionRoutes(deps))
  coreApiRoutes.route('/', createTopicRoutes(deps))
  coreApiRoutes.route('/', createMessageRoutes(deps))
  coreApiRoutes.route('/int', createInternalRoutes(deps))
  coreApiRoutes.route('/admin', createAdminRoutes(deps))

  return coreApiRoutes
}
