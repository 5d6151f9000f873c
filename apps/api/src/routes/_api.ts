import { randomUUID } from 'node:crypto'
import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { z } from 'zod'
import { ValidationError } from '../errors.js'
import type { AuthMiddleware } from '../middleware/auth.js'
import type { Services } from '../services/index.js'

export function requestMeta(c: Context) {
  return {
    requestId: c.get('requestId') ?? randomUUID(),
    timestamp: new Date().toISOString(),
  }
}

export function ok<T>(
  c: Context,
  data: T,
  status: ContentfulStatusCode = 200,
  extra?: Record<string, unknown>,
) {
  return c.json(
    {
      success: true,
      data,
      meta: requestMeta(c),
      ...(extra ?? {}),
    },
    status,
  )
}

export function fail(
  c: Context,
  code: string,
  message: string,
  status: ContentfulStatusCode = 400,
  details?: unknown,
) {
  return c.json(
    {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
      meta: requestMeta(c),
    },
    status,
  )
}

/** Collaborators every route module is built from. */
export type RouteDeps = {
  services: Services
  auth: AuthMiddleware
}

export async function parseBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let raw: unknown
  try {
    raw = await c.req.json()
  } catch {
    throw new ValidationError('Request body must be valid JSON.')
  }
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new ValidationError('Invalid request body.', parsed.error.flatten())
  }
  return parsed.data
}

export function parseQuery<S extends z.ZodTypeAny>(c: Context, schema: S): z.output<S> {
  const parsed = schema.safeParse(c.req.query())
  if (!parsed.success) {
    throw new ValidationError('Invalid query parameters.', parsed.error.flatten())
  }
  return parsed.data
}
