import { createMessageService } from './messages.js'
import { createSubscriptionService } from './subscriptions.js'
import { createTopicService } from './topics.js'
import type { ServiceDeps } from './types.js'

export * from './types.js'
export * from './message-access.js'
export type { CreatedMessage, DeliveryReport, MessageQuery, MessageService } from './messages.js'
export type { SubscriptionService } from './subscriptions.js'
export type { TopicService } from './topics.js'

export type ServiceOptions = {
  fanoutConcurrency?: number
}

/**
 * Wire the core services around one store, one gateway and one logger.
 */
export function createServices(deps: ServiceDeps, options: ServiceOptions = {}) {
  return {
    subscriptions: createSubscriptionService(deps),
    messages: createMessageService(deps, { fanoutConcurrency: options.fanoutConcurrency }),
    topics: createTopicService(deps),
  }
}

export type Services = ReturnType<typeof createServices>
