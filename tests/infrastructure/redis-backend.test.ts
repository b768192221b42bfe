import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RedisBackend, DEFAULT_REDIS_CHANNEL } from '../../src/infrastructure/backends/redis-backend.js';
import type { RedisPublisher } from '../../src/infrastructure/backends/redis-backend.js';
import type { RedisSettings } from '../../src/infrastructure/config/index.js';
import type { EnrichedEvent } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

function fakeRedis() {
  return {
    publish: vi.fn().mockResolvedValue(1),
    quit: vi.fn().mockResolvedValue('OK'),
  };
}

const enabled: RedisSettings = {
  enabled: true,
  url: 'redis://localhost:6379',
  channel: 'tv_events',
};

const sampleEvent: EnrichedEvent = {
  category: 'settings',
  action: 'change_language',
  attributes: { session: 'abc', language: 'de' },
};

describe('RedisBackend', () => {
  let log: ReturnType<typeof fakeLogger>;
  let redis: ReturnType<typeof fakeRedis>;

  beforeEach(() => {
    log = fakeLogger();
    redis = fakeRedis();
  });

  function backend(getSettings: () => RedisSettings | undefined): RedisBackend {
    return new RedisBackend(getSettings, redis as unknown as RedisPublisher, log);
  }

  it('skips without publishing when disabled', async () => {
    const result = await backend(() => ({ ...enabled, enabled: false })).send(sampleEvent);

    expect(result).toEqual({ ok: true, skipped: true });
    expect(redis.publish).not.toHaveBeenCalled();
  });

  it('skips when no settings are available', async () => {
    const result = await backend(() => undefined).send(sampleEvent);

    expect(result).toEqual({ ok: true, skipped: true });
    expect(redis.publish).not.toHaveBeenCalled();
  });

  it('publishes the flattened event to the configured channel', async () => {
    const result = await backend(() => enabled).send(sampleEvent);

    expect(result).toEqual({ ok: true, skipped: false });
    expect(redis.publish).toHaveBeenCalledWith(
      'tv_events',
      '{"session":"abc","language":"de","category":"settings","event_action":"change_language"}',
    );
    expect(log.debug).toHaveBeenCalledWith(
      { channel: 'tv_events', receivers: 1, action: 'change_language' },
      'Redis telemetry published',
    );
  });

  it('falls back to the default channel when none is configured', async () => {
    await backend(() => ({ ...enabled, channel: '' })).send(sampleEvent);

    expect(redis.publish).toHaveBeenCalledWith(DEFAULT_REDIS_CHANNEL, expect.any(String));
  });

  it('reports a publish failure instead of throwing', async () => {
    const error = new Error("Stream isn't writeable and enableOfflineQueue options is false");
    redis.publish.mockRejectedValueOnce(error);

    const result = await backend(() => enabled).send(sampleEvent);

    expect(result).toEqual({ ok: false, error });
  });

  it('reports a command timeout as a failure so the dispatcher moves on', async () => {
    const error = new Error('Command timed out');
    redis.publish.mockRejectedValueOnce(error);

    const result = await backend(() => enabled).send(sampleEvent);

    expect(result).toEqual({ ok: false, error });
    expect(redis.publish).toHaveBeenCalledOnce();
  });

  it('close() quits the connection', async () => {
    await backend(() => enabled).close();

    expect(redis.quit).toHaveBeenCalledOnce();
  });
});
