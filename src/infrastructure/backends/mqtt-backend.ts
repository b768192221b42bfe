import type { Logger } from 'pino';
import type { Backend, EnrichedEvent, SendResult } from '../../domain/index.js';
import { SENT, SKIPPED, failed } from '../../domain/index.js';
import type { MqttSettings } from '../config/index.js';
import type { MqttTransport } from './mqtt-transport.js';
import { serializeEvent } from './payload.js';

/** Topic used when the settings leave `topic` empty. */
export const DEFAULT_MQTT_TOPIC = 'analytics/events';

/**
 * Publishes each event as a flat JSON object to an MQTT topic.
 *
 * Settings are read on every send, not at construction, so a config
 * reload applies to the next event. Disabled or absent settings are a
 * skip, not a failure.
 */
export class MqttBackend implements Backend {
  readonly name = 'mqtt';

  constructor(
    private readonly getSettings: () => MqttSettings | undefined,
    private readonly transport: MqttTransport,
    private readonly log: Logger,
  ) {}

  async send(event: EnrichedEvent): Promise<SendResult> {
    const settings = this.getSettings();
    if (!settings?.enabled) {
      this.log.debug({ action: event.action }, 'MQTT telemetry skipped (disabled)');
      return SKIPPED;
    }

    const topic = settings.topic || DEFAULT_MQTT_TOPIC;
    try {
      await this.transport.publish(topic, serializeEvent(event), settings.qos);
      this.log.debug({ topic, qos: settings.qos, action: event.action }, 'MQTT telemetry published');
      return SENT;
    } catch (err: unknown) {
      return failed(err);
    }
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}
