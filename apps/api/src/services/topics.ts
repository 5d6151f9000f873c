import { ValidationError, callDependency } from '../errors.js'
import type { ServiceDeps, Topic, TopicInput } from './types.js'

/**
 * Topic administration. Topics are only referenced by name, so there is no
 * rename and no delete.
 */
export function createTopicService({ store, logger }: Pick<ServiceDeps, 'store' | 'logger'>) {
  const log = logger.child({ service: 'topics' })

  function requireName(topic: TopicInput) {
    if (!topic.name || !topic.name.trim()) {
      throw new ValidationError('topic name is required')
    }
  }

  async function getTopics(): Promise<Topic[]> {
    return callDependency('store', 'listTopics', () => store.listTopics())
  }

  async function appendTopic(topic: TopicInput): Promise<Topic> {
    requireName(topic)
    const created = await callDependency('store', 'insertTopic', () => store.insertTopic(topic))
    log.info({ topic: created.name }, 'topic_created')
    return created
  }

  async function updateTopic(topic: TopicInput): Promise<Topic> {
    requireName(topic)
    const updated = await callDependency('store', 'updateTopic', () => store.updateTopic(topic))
    log.info({ topic: updated.name }, 'topic_updated')
    return updated
  }

  return {
    getTopics,
    appendTopic,
    updateTopic,
  }
}

export type TopicService = ReturnType<typeof createTopicService>
