/**
 * Push gateway backed by Firebase Cloud Messaging.
 */

import { cert, initializeApp } from 'firebase-admin/app'
import { getMessaging, type Messaging } from 'firebase-admin/messaging'
import { z } from 'zod'
import type { MessageData, PushGateway } from '../services/types.js'

export type MessagingClient = Pick<Messaging, 'send' | 'subscribeToTopic' | 'unsubscribeFromTopic'>

const serviceAccountSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
})

export class FirebasePushGateway implements PushGateway {
  constructor(private readonly messaging: MessagingClient) {}

  async sendToToken(token: string, subject: string, body: string, data: MessageData): Promise<void> {
    await this.messaging.send({
      token,
      notification: { title: subject, body },
      data,
    })
  }

  async sendToTopic(topic: string, subject: string, body: string): Promise<void> {
    await this.messaging.send({
      topic,
      notification: { title: subject, body },
    })
  }

  async subscribeTokenToTopic(token: string, topic: string): Promise<void> {
    const response = await this.messaging.subscribeToTopic(token, topic)
    if (response.failureCount > 0) {
      throw new Error(`subscribe to topic (${topic}) rejected: ${response.errors[0]?.error.message ?? 'unknown'}`)
    }
  }

  async unsubscribeTokenFromTopic(token: string, topic: string): Promise<void> {
    const response = await this.messaging.unsubscribeFromTopic(token, topic)
    if (response.failureCount > 0) {
      throw new Error(
        `unsubscribe from topic (${topic}) rejected: ${response.errors[0]?.error.message ?? 'unknown'}`,
      )
    }
  }
}

/**
 * Initialize the Firebase app from the service-account JSON in
 * `FIREBASE_AUTH` and return a gateway over its messaging client.
 */
export function createFirebaseGateway(input: { projectId: string; serviceAccountJson: string }) {
  let raw: unknown
  try {
    raw = JSON.parse(input.serviceAccountJson)
  } catch (error) {
    throw new Error('FIREBASE_AUTH is not valid JSON', { cause: error })
  }
  const account = serviceAccountSchema.parse(raw)

  const app = initializeApp({
    projectId: input.projectId,
    credential: cert({
      projectId: account.project_id,
      clientEmail: account.client_email,
      privateKey: account.private_key,
    }),
  })
  return new FirebasePushGateway(getMessaging(app))
}
