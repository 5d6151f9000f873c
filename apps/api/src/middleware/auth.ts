/**
 * Authentication + authorization middleware for the API.
 *
 * - User routes carry `Authorization: Bearer <jwt>` (HS256). The `sub` claim
 *   is the identity; `groups` decides the administrative role.
 * - Internal routes carry the shared `INTERNAL-API-KEY` header instead.
 * - Handlers read the caller through `getIdentity(c)`; `null` means anonymous.
 */

import { randomUUID, timingSafeEqual } from 'node:crypto'
import type { Context, MiddlewareHandler, Next } from 'hono'
import { verify } from 'hono/jwt'
import { identityClaimsSchema, type Identity } from '@pushrelay/schema'
import type { Logger } from '../logger.js'
import { fail } from '../routes/_api.js'

export const INTERNAL_API_KEY_HEADER = 'INTERNAL-API-KEY'

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
    identity: Identity | null
  }
}

export type AuthSettings = {
  jwtSecret: string
  internalApiKey: string
  adminGroup: string
}

/**
 * Ensure each request has a stable request id for tracing.
 */
export async function requestId(c: Context, next: Next) {
  const id = c.req.header('x-request-id') ?? randomUUID()
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}

/**
 * One log line per request, written after the handler (and `onError`) ran.
 */
export function requestLogger(logger: Logger): MiddlewareHandler {
  const log = logger.child({ component: 'http' })
  return async (c, next) => {
    const startedAt = performance.now()
    await next()
    log.info(
      {
        requestId: c.get('requestId'),
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - startedAt),
      },
      'request_completed',
    )
  }
}

function bearerToken(c: Context): string | null {
  const header = c.req.header('authorization')
  if (!header) return null
  const [scheme, token] = header.split(' ')
  if (scheme?.toLowerCase() !== 'bearer' || !token) return null
  return token
}

function sameSecret(given: string, expected: string) {
  const a = Buffer.from(given)
  const b = Buffer.from(expected)
  return a.length === b.length && timingSafeEqual(a, b)
}

export function getIdentity(c: Context): Identity | null {
  return c.get('identity') ?? null
}

export function createAuthMiddleware(settings: AuthSettings) {
  /**
   * Resolve the identity from the bearer token. `undefined` means no token
   * was sent; `null` means one was sent but is not acceptable.
   */
  async function resolveIdentity(c: Context): Promise<Identity | null | undefined> {
    const token = bearerToken(c)
    if (!token) return undefined

    let payload: unknown
    try {
      payload = await verify(token, settings.jwtSecret, 'HS256')
    } catch {
      return null
    }

    const claims = identityClaimsSchema.safeParse(payload)
    if (!claims.success) return null
    return {
      userId: claims.data.sub,
      email: claims.data.email,
      phone: claims.data.phone,
      name: claims.data.name,
      groups: claims.data.groups ?? [],
    }
  }

  /**
   * Attach the identity when a valid token is present. A missing token is
   * anonymous; an invalid one is still rejected.
   */
  async function optionalAuth(c: Context, next: Next) {
    const identity = await resolveIdentity(c)
    if (identity === null) {
      return fail(c, 'UNAUTHORIZED', 'Invalid bearer token.', 401)
    }
    c.set('identity', identity ?? null)
    await next()
  }

  async function requireAuth(c: Context, next: Next) {
    const identity = await resolveIdentity(c)
    if (!identity) {
      return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
    }
    c.set('identity', identity)
    await next()
  }

  async function requireAdmin(c: Context, next: Next) {
    const identity = await resolveIdentity(c)
    if (!identity) {
      return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
    }
    if (!identity.groups?.includes(settings.adminGroup)) {
      return fail(c, 'FORBIDDEN', 'Administrator role required.', 403)
    }
    c.set('identity', identity)
    await next()
  }

  /** Service-to-service calls; the caller acts as the system. */
  async function requireInternalKey(c: Context, next: Next) {
    const key = c.req.header(INTERNAL_API_KEY_HEADER)
    if (!key || !sameSecret(key, settings.internalApiKey)) {
      return fail(c, 'UNAUTHORIZED', 'Invalid internal API key.', 401)
    }
    c.set('identity', null)
    await next()
  }

  return {
    optionalAuth,
    requireAuth,
    requireAdmin,
    requireInternalKey,
  }
}

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>
