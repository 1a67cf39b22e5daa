import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { Observable, Observer, Subject } from 'rxjs';
import { REDIS_SUBSCRIBER_CLIENT } from './redis.constants';

/**
 * RedisSubscriberService — owns a dedicated ioredis subscriber connection.
 *
 * Once SUBSCRIBE is issued the connection is locked into subscriber mode,
 * hence the second ioredis instance. Several callers may subscribe to the
 * same channel; each gets its own Subject, and ioredis is told to
 * UNSUBSCRIBE when the last one goes away.
 */
@Injectable()
export class RedisSubscriberService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisSubscriberService.name);

  /** channel → active subjects */
  private readonly subjects = new Map<string, Set<Subject<string>>>();

  constructor(
    @Inject(REDIS_SUBSCRIBER_CLIENT)
    private readonly client: Redis,
  ) {
    this.client.on('message', (channel: string, message: string) => {
      const channelSubjects = this.subjects.get(channel);
      if (!channelSubjects) return;

      for (const subject of channelSubjects) {
        subject.next(message);
      }
    });
  }

  /**
   * Emits the raw strings published to `channel` until the consumer
   * unsubscribes.
   */
  subscribe(channel: string): Observable<string> {
    const subject = new Subject<string>();

    let channelSubjects = this.subjects.get(channel);
    if (!channelSubjects) {
      channelSubjects = new Set();
      this.subjects.set(channel, channelSubjects);
    }
    channelSubjects.add(subject);

    this.client.subscribe(channel).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Failed to subscribe to channel "${channel}": ${message}`);
      subject.error(new Error(`Redis subscribe failed: ${message}`));
    });

    this.logger.debug(`Subscribed to channel "${channel}"`);

    return new Observable<string>((observer: Observer<string>) => {
      const subscription = subject.subscribe(observer);

      return () => {
        subscription.unsubscribe();
        this.unsubscribeSubject(channel, subject);
      };
    });
  }

  /**
   * Subscribes to `channel` and parses each message as JSON. Messages that
   * are not JSON, or fail `isPayload`, are logged and skipped.
   */
  subscribeJson<T>(
    channel: string,
    isPayload: (value: unknown) => value is T,
  ): Observable<T> {
    return new Observable<T>((observer: Observer<T>) => {
      const subscription = this.subscribe(channel).subscribe({
        next: (raw: string) => {
          let parsed: unknown;
          try {
            parsed = JSON.parse(raw);
          } catch {
            this.logger.warn(
              `Malformed JSON on channel "${channel}": ${raw.slice(0, 120)}`,
            );
            return;
          }

          if (isPayload(parsed)) {
            observer.next(parsed);
          } else {
            this.logger.warn(
              `Unexpected payload on channel "${channel}": ${raw.slice(0, 120)}`,
            );
          }
        },
        error: (err: Error) => observer.error(err),
        complete: () => observer.complete(),
      });

      return () => subscription.unsubscribe();
    });
  }

  // ── Private helpers ──────────────────────────────────────

  private unsubscribeSubject(channel: string, subject: Subject<string>): void {
    const channelSubjects = this.subjects.get(channel);
    if (!channelSubjects) return;

    subject.complete();
    channelSubjects.delete(subject);

    if (channelSubjects.size === 0) {
      this.subjects.delete(channel);
      this.client.unsubscribe(channel).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(
          `Failed to unsubscribe from channel "${channel}": ${message}`,
        );
      });
      this.logger.debug(`Unsubscribed from channel "${channel}"`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing Redis subscriber connection');
    for (const [, channelSubjects] of this.subjects) {
      for (const subject of channelSubjects) {
        subject.complete();
      }
    }
    this.subjects.clear();
    await this.client.quit();
  }
}
