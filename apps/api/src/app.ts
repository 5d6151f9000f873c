/**
 * HTTP application: middleware stack, `/api` routes and error rendering.
 *
 * Kept apart from `server.ts` so tests can drive it through `app.request`
 * with in-process collaborators.
 */

import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import { ZodError } from 'zod'
import { AppError } from './errors.js'
import type { Logger } from './logger.js'
import { createAuthMiddleware, requestId, requestLogger, type AuthSettings } from './middleware/auth.js'
import { createCoreApiRoutes } from './routes/core-api.js'
import { fail, ok } from './routes/_api.js'
import type { Services } from './services/index.js'

export type AppOptions = {
  services: Services
  logger: Logger
  settings: AuthSettings & { version: string }
}

export function createApp({ services, logger, settings }: AppOptions) {
  const log = logger.child({ component: 'http' })
  const auth = createAuthMiddleware(settings)
  const app = new Hono()

  app.use('*', requestId)
  app.use('*', requestLogger(logger))
  app.use('/api/*', cors())

  app.get('/version', (c) => ok(c, { service: 'pushrelay-api', version: settings.version }))

  app.route('/api', createCoreApiRoutes({ services, auth }))

  app.onError((err, c) => {
    if (err instanceof AppError) {
      if (err.status >= 500) {
        log.error({ err, requestId: c.get('requestId') }, 'request_failed')
      }
      return fail(c, err.code, err.message, err.status, err.details)
    }
    if (err instanceof ZodError) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid request.', 400, err.flatten())
    }
    if (err instanceof HTTPException) {
      return fail(c, 'HTTP_ERROR', err.message, err.status)
    }
    log.error({ err, requestId: c.get('requestId') }, 'request_failed')
    return fail(c, 'INTERNAL_ERROR', 'Internal server error.', 500)
  })

  app.notFound((c) => fail(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found.`, 404))

  return app
}
