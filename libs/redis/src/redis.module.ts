import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_PUBLISHER_CLIENT, REDIS_SUBSCRIBER_CLIENT } from './redis.constants';
import { RedisPublisherService } from './redis-publisher.service';
import { RedisSubscriberService } from './redis-subscriber.service';

/**
 * RedisModule — dynamic module providing the status-event PubSub pair.
 *
 * Exports:
 *   - RedisPublisherService: publish(channel, payload)
 *   - RedisSubscriberService: subscribe(channel), subscribeJson(channel, guard)
 *
 * Two ioredis connections: once subscribe() is called a connection only
 * accepts subscriber commands.
 */
@Module({})
export class RedisModule {
  static forRoot(): DynamicModule {
    const publisherProvider = {
      provide: REDIS_PUBLISHER_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: configService.get<number>('REDIS_PORT', 6379),
          password: configService.get<string>('REDIS_PASSWORD'),
          // Linear back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          lazyConnect: false,
        });
      },
    };

    const subscriberProvider = {
      provide: REDIS_SUBSCRIBER_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: configService.get<number>('REDIS_PORT', 6379),
          password: configService.get<string>('REDIS_PASSWORD'),
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          // Subscriber connections send no regular commands
          maxRetriesPerRequest: null,
          lazyConnect: false,
        });
      },
    };

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers: [
        publisherProvider,
        subscriberProvider,
        RedisPublisherService,
        RedisSubscriberService,
      ],
      exports: [RedisPublisherService, RedisSubscriberService],
      global: false,
    };
  }
}
