/**
 * @papertrail/redis
 *
 * Redis PubSub used to broadcast document status transitions.
 *
 * Exports:
 *   - RedisModule.forRoot()     — import into any NestJS module
 *   - RedisPublisherService     — publish events to channels
 *   - RedisSubscriberService    — subscribe to channels as Observables
 *   - documentStatusChannel()   — channel key for a document
 */
export { RedisModule } from './redis.module';
export { RedisPublisherService } from './redis-publisher.service';
export { RedisSubscriberService } from './redis-subscriber.service';
export {
  REDIS_PUBLISHER_CLIENT,
  REDIS_SUBSCRIBER_CLIENT,
  documentStatusChannel,
} from './redis.constants';
