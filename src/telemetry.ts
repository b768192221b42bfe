import type { Logger } from 'pino';
import { EventDispatcher, SessionEnricher, SettingsStore } from './application/index.js';
import type { AttributeEnricher } from './application/index.js';
import type { Backend, EventParameters } from './domain/index.js';
import { MqttBackend, RedisBackend } from './infrastructure/backends/index.js';
import type { MqttTransport, RedisPublisher } from './infrastructure/backends/index.js';
import type { MqttSettings, RedisSettings, TelemetryConfig } from './infrastructure/config/index.js';

export interface TelemetryTransports {
  /** Required for the MQTT backend to be registered. */
  mqtt?: MqttTransport | undefined;
  /** Required for the Redis backend to be registered. */
  redis?: RedisPublisher | undefined;
}

export interface CreateTelemetryOptions extends TelemetryTransports {
  config: TelemetryConfig;
  log: Logger;
  /** Defaults to a SessionEnricher carrying `telemetry.app_version`. */
  enricher?: AttributeEnricher;
}

/**
 * What call sites get. Backends are deliberately unreachable from here:
 * every event goes through the dispatcher's serialised fan-out.
 */
export interface Telemetry {
  logEvent(category: string | undefined, action: string, parameters?: EventParameters): void;
  /** Resolves when every event logged so far has been fanned out. */
  drain(): Promise<void>;
  /** Stops accepting events, drains, then closes every transport. */
  shutdown(): Promise<void>;
  /**
   * Applies new transport settings (`enabled`, topic, channel, QoS) to the
   * next event. Transports are wired once at startup: turning on a
   * transport that was not connected, changing a `url`, or changing
   * `telemetry.enabled` needs a restart, and is logged as a warning.
   */
  reload(config: TelemetryConfig): void;
  readonly pending: number;
  readonly backends: readonly string[];
}

interface TransportSettings {
  enabled: boolean;
  url: string;
}

/** Warns about reloaded settings that only a restart can apply. */
function warnRestartRequired(
  log: Logger,
  transport: 'mqtt' | 'redis',
  wired: boolean,
  initial: TransportSettings,
  next: TransportSettings,
): void {
  if (!wired && next.enabled) {
    log.warn(
      { transport, url: next.url },
      'Transport enabled on reload but was not connected at startup, restart to apply',
    );
  }
  if (wired && next.url !== initial.url) {
    log.warn(
      { transport, from: initial.url, to: next.url },
      'Transport url changed on reload, restart to reconnect',
    );
  }
}

/**
 * Builds the dispatcher and its backends from configuration.
 *
 * A backend is registered when its transport is supplied; whether it
 * actually publishes is decided per event from the current settings.
 * Registration order is MQTT, then Redis.
 */
export function createTelemetry(options: CreateTelemetryOptions): Telemetry {
  const { config, log } = options;

  const mqttSettings = new SettingsStore<MqttSettings>(config.mqtt);
  const redisSettings = new SettingsStore<RedisSettings>(config.redis);

  const backends: Backend[] = [];
  if (options.mqtt) {
    backends.push(new MqttBackend(() => mqttSettings.get(), options.mqtt, log));
  }
  if (options.redis) {
    backends.push(new RedisBackend(() => redisSettings.get(), options.redis, log));
  }

  const enricher = options.enricher ?? new SessionEnricher({ appVersion: config.telemetry.app_version });

  const dispatcher = new EventDispatcher({
    enabled: config.telemetry.enabled,
    backends,
    enricher,
    log,
  });

  log.info(
    { enabled: config.telemetry.enabled, backends: dispatcher.backendNames },
    'Telemetry dispatcher ready',
  );

  return {
    logEvent: (category, action, parameters) => dispatcher.logEvent(category, action, parameters),
    drain: () => dispatcher.drain(),
    shutdown: () => dispatcher.shutdown(),
    reload: (next) => {
      warnRestartRequired(log, 'mqtt', options.mqtt !== undefined, config.mqtt, next.mqtt);
      warnRestartRequired(log, 'redis', options.redis !== undefined, config.redis, next.redis);
      if (next.telemetry.enabled !== config.telemetry.enabled) {
        log.warn(
          { enabled: config.telemetry.enabled, requested: next.telemetry.enabled },
          'telemetry.enabled is fixed for the process lifetime, restart to apply',
        );
      }
      mqttSettings.set(next.mqtt);
      redisSettings.set(next.redis);
      log.info({ mqtt: next.mqtt, redis: next.redis }, 'Telemetry transport settings reloaded');
    },
    get pending() {
      return dispatcher.pending;
    },
    get backends() {
      return dispatcher.backendNames;
    },
  };
}

export type { TelemetryConfig, MqttSettings, RedisSettings } from './infrastructure/config/index.js';
export { loadTelemetryConfig, DEFAULT_CONFIG } from './infrastructure/config/index.js';
export type { AttributeEnricher } from './application/index.js';
export { SessionEnricher } from './application/index.js';
export type { AttributeValue, Attributes, EventParameters } from './domain/index.js';
export { connectMqttTransport } from './infrastructure/backends/index.js';
export type { MqttTransport, RedisPublisher } from './infrastructure/backends/index.js';
