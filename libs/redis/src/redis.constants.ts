/**
 * Injection tokens for the Redis module.
 *
 * String tokens so the publisher and subscriber connections can be two
 * separate ioredis instances.
 */
export const REDIS_PUBLISHER_CLIENT = 'REDIS_PUBLISHER_CLIENT';
export const REDIS_SUBSCRIBER_CLIENT = 'REDIS_SUBSCRIBER_CLIENT';

/**
 * Channel key for a document's status events.
 * Follows the project naming convention: {domain}:{id}:{type}
 */
export function documentStatusChannel(documentId: string): string {
  return `doc:${documentId}:status`;
}
