import { z } from 'zod'

// Common schemas
export const idSchema = z.string().min(1).max(64)

export const topicNameSchema = z.string().trim().min(1).max(255)

export const pushTokenSchema = z.string().trim().min(1).max(4096)

export const paginationSchema = z.object({
  offset: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
  order: z.enum(['asc', 'desc']).default('desc'),
})

/** Unix seconds in query strings, surfaced as Dates. */
export const unixSecondsSchema = z.coerce
  .number()
  .int()
  .min(0)
  .transform((seconds) => new Date(seconds * 1000))

// Identity
export const identitySchema = z.object({
  userId: z.string().min(1),
  email: z.string().optional(),
  phone: z.string().optional(),
  name: z.string().optional(),
  groups: z.array(z.string()).optional(),
})

/**
 * Claims carried by the bearer token of user-facing routes.
 * `sub` is the stable external identity.
 */
export const identityClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().optional(),
  phone: z.string().optional(),
  name: z.string().optional(),
  groups: z.array(z.string()).optional(),
})

// Message
export const recipientSchema = z.object({
  userId: z.string().min(1),
  name: z.string().nullable().optional(),
})

export const senderUserSchema = z.object({
  userId: z.string().min(1),
  email: z.string().nullable().optional(),
  phone: z.string().nullable().optional(),
})

export const senderSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('user'), user: senderUserSchema }),
  z.object({ type: z.literal('system') }),
])

export const messageDataSchema = z.record(z.string())

export const messageDraftSchema = z.object({
  id: z.string().nullable().optional(),
  priority: z.number().int().default(0),
  recipients: z.array(recipientSchema).default([]),
  topic: topicNameSchema.nullable().optional(),
  subject: z.string().max(1024).default(''),
  body: z.string().max(16384).default(''),
  data: messageDataSchema.default({}),
})

export const messageUpdateSchema = messageDraftSchema.extend({
  id: idSchema,
})

export const messageIdsBodySchema = z.object({
  ids: z.array(idSchema).min(1).max(100),
})

export const listMessagesQuerySchema = paginationSchema.extend({
  ids: z
    .string()
    .optional()
    .transform((value) =>
      value
        ? value
            .split(',')
            .map((id) => id.trim())
            .filter(Boolean)
        : undefined,
    ),
  start_date: unixSecondsSchema.optional(),
  end_date: unixSecondsSchema.optional(),
})

// Topic
export const topicSchema = z.object({
  name: topicNameSchema,
  description: z.string().max(2048).default(''),
})

// Token registry
export const tokenBodySchema = z.object({
  token: pushTokenSchema,
})

export const storeTokenBodySchema = z.object({
  token: pushTokenSchema,
  previous_token: z.string().trim().min(1).nullable().optional(),
})

export type Identity = z.infer<typeof identitySchema>
export type IdentityClaims = z.infer<typeof identityClaimsSchema>
export type Recipient = z.infer<typeof recipientSchema>
export type SenderUser = z.infer<typeof senderUserSchema>
export type Sender = z.infer<typeof senderSchema>
export type MessageData = z.infer<typeof messageDataSchema>
export type MessageDraft = z.infer<typeof messageDraftSchema>
export type MessageUpdate = z.infer<typeof messageUpdateSchema>
export type ListMessagesQuery = z.infer<typeof listMessagesQuerySchema>
export type TopicInput = z.infer<typeof topicSchema>
export type SortOrder = z.infer<typeof paginationSchema>['order']
