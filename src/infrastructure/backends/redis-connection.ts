import { Redis } from 'ioredis';
import type { Logger } from 'pino';

/** Upper bound on a single Redis command, matching the MQTT publish timeout. */
export const DEFAULT_REDIS_COMMAND_TIMEOUT_MS = 5000;

export interface RedisConnectionOptions {
  commandTimeoutMs?: number;
}

/**
 * Connects the Redis publisher, or returns undefined when Redis is
 * unreachable. Telemetry is best-effort: a missing transport never
 * prevents the server from starting.
 *
 * - No offline queue: commands fail at once while disconnected.
 * - `commandTimeout`: a connected but unresponsive server fails the
 *   command instead of holding the dispatcher.
 */
export async function connectRedisPublisher(
  url: string,
  log: Logger,
  options: RedisConnectionOptions = {},
): Promise<Redis | undefined> {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    commandTimeout: options.commandTimeoutMs ?? DEFAULT_REDIS_COMMAND_TIMEOUT_MS,
    lazyConnect: true,
  });
  redis.on('error', (err: Error) => {
    log.warn({ err }, 'Redis telemetry connection error');
  });

  try {
    await redis.connect();
    log.info({ url }, 'Redis connected');
    return redis;
  } catch (err: unknown) {
    log.error({ err, url }, 'Redis unreachable, telemetry backend not registered');
    redis.disconnect();
    return undefined;
  }
}
