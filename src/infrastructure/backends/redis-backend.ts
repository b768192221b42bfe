import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Backend, EnrichedEvent, SendResult } from '../../domain/index.js';
import { SENT, SKIPPED, failed } from '../../domain/index.js';
import type { RedisSettings } from '../config/index.js';
import { serializeEvent } from './payload.js';

/** Channel used when the settings leave `channel` empty. */
export const DEFAULT_REDIS_CHANNEL = 'telemetry_events';

/** The one Redis command this backend needs. */
export type RedisPublisher = Pick<Redis, 'publish' | 'quit'>;

/**
 * Publishes each event to a Redis Pub/Sub channel, same flat payload as
 * the MQTT backend. Settings are read at send time.
 */
export class RedisBackend implements Backend {
  readonly name = 'redis';

  constructor(
    private readonly getSettings: () => RedisSettings | undefined,
    private readonly redis: RedisPublisher,
    private readonly log: Logger,
  ) {}

  async send(event: EnrichedEvent): Promise<SendResult> {
    const settings = this.getSettings();
    if (!settings?.enabled) {
      this.log.debug({ action: event.action }, 'Redis telemetry skipped (disabled)');
      return SKIPPED;
    }

    const channel = settings.channel || DEFAULT_REDIS_CHANNEL;
    try {
      const receivers = await this.redis.publish(channel, serializeEvent(event));
      this.log.debug({ channel, receivers, action: event.action }, 'Redis telemetry published');
      return SENT;
    } catch (err: unknown) {
      return failed(err);
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
