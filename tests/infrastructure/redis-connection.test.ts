import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('ioredis', () => ({
  Redis: vi.fn(),
}));

import { Redis } from 'ioredis';
import {
  connectRedisPublisher,
  DEFAULT_REDIS_COMMAND_TIMEOUT_MS,
} from '../../src/infrastructure/backends/redis-connection.js';
import { fakeLogger } from '../helpers.js';

const MockRedis = vi.mocked(Redis);

function fakeRedis() {
  return {
    on: vi.fn(),
    connect: vi.fn().mockResolvedValue(undefined),
    disconnect: vi.fn(),
  };
}

describe('connectRedisPublisher', () => {
  let log: ReturnType<typeof fakeLogger>;
  let redis: ReturnType<typeof fakeRedis>;

  beforeEach(() => {
    vi.clearAllMocks();
    log = fakeLogger();
    redis = fakeRedis();
    MockRedis.mockImplementation(function () {
      return redis as unknown as Redis;
    });
  });

  it('bounds every command and disables the offline queue', async () => {
    await connectRedisPublisher('redis://cache:6379', log);

    expect(MockRedis).toHaveBeenCalledWith('redis://cache:6379', {
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      commandTimeout: DEFAULT_REDIS_COMMAND_TIMEOUT_MS,
      lazyConnect: true,
    });
    expect(DEFAULT_REDIS_COMMAND_TIMEOUT_MS).toBe(5000);
  });

  it('accepts a custom command timeout', async () => {
    await connectRedisPublisher('redis://cache:6379', log, { commandTimeoutMs: 250 });

    expect(MockRedis).toHaveBeenCalledWith(
      'redis://cache:6379',
      expect.objectContaining({ commandTimeout: 250 }),
    );
  });

  it('returns the connected client', async () => {
    const client = await connectRedisPublisher('redis://cache:6379', log);

    expect(client).toBe(redis);
    expect(redis.connect).toHaveBeenCalledOnce();
    expect(log.info).toHaveBeenCalledWith({ url: 'redis://cache:6379' }, 'Redis connected');
  });

  it('returns undefined and disconnects when Redis is unreachable', async () => {
    redis.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    const client = await connectRedisPublisher('redis://cache:6379', log);

    expect(client).toBeUndefined();
    expect(redis.disconnect).toHaveBeenCalledOnce();
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error), url: 'redis://cache:6379' }),
      'Redis unreachable, telemetry backend not registered',
    );
  });

  it('logs connection errors instead of letting them escape', async () => {
    await connectRedisPublisher('redis://cache:6379', log);

    const onError = redis.on.mock.calls.find(([event]) => event === 'error')?.[1] as
      | ((err: Error) => void)
      | undefined;
    onError?.(new Error('read ECONNRESET'));

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Redis telemetry connection error',
    );
  });
});
