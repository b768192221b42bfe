import { describe, it, expect } from 'vitest';
import { SettingsStore } from '../../src/application/settings-store.js';
import type { MqttSettings } from '../../src/infrastructure/config/index.js';

function settings(overrides: Partial<MqttSettings> = {}): MqttSettings {
  return {
    enabled: overrides.enabled ?? true,
    url: overrides.url ?? 'mqtt://localhost:1883',
    topic: overrides.topic ?? 'analytics/events',
    qos: overrides.qos ?? 0,
  };
}

describe('SettingsStore', () => {
  it('returns the initial snapshot', () => {
    const initial = settings();
    const store = new SettingsStore(initial);
    expect(store.get()).toBe(initial);
  });

  it('set() replaces the snapshot', () => {
    const store = new SettingsStore(settings({ topic: 'old' }));
    store.set(settings({ topic: 'new' }));
    expect(store.get().topic).toBe('new');
  });

  it('consecutive set() calls always reflect the latest snapshot', () => {
    const store = new SettingsStore(settings());
    store.set(settings({ qos: 1 }));
    store.set(settings({ qos: 2 }));
    store.set(settings({ enabled: false }));
    expect(store.get()).toEqual(settings({ enabled: false }));
  });
});
