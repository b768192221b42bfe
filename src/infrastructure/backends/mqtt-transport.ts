import { connect } from 'mqtt';
import type { MqttClient } from 'mqtt';
import type { Logger } from 'pino';
import type { MqttQos } from '../config/index.js';

/**
 * Publishing side of an MQTT connection, as the MQTT backend sees it.
 */
export interface MqttTransport {
  publish(topic: string, payload: string, qos: MqttQos): Promise<void>;
  close(): Promise<void>;
}

export interface MqttTransportOptions {
  clientId?: string;
  /** Upper bound on a single publish; a broker outage must not stall the dispatcher. */
  publishTimeoutMs?: number;
  reconnectPeriodMs?: number;
}

const DEFAULT_PUBLISH_TIMEOUT_MS = 5000;
const DEFAULT_RECONNECT_PERIOD_MS = 5000;

export class MqttOfflineError extends Error {
  constructor(topic: string) {
    super(`MQTT client is not connected, dropping publish to "${topic}"`);
    this.name = 'MqttOfflineError';
  }
}

export class PublishTimeoutError extends Error {
  constructor(topic: string, timeoutMs: number) {
    super(`MQTT publish to "${topic}" timed out after ${timeoutMs}ms`);
    this.name = 'PublishTimeoutError';
  }
}

/**
 * Races `promise` against a timer. The timer is always cleared so a
 * settled publish leaves nothing scheduled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

class MqttClientTransport implements MqttTransport {
  constructor(
    private readonly client: MqttClient,
    private readonly publishTimeoutMs: number,
  ) {}

  /**
   * Publishes only while connected, so nothing lands in the client's
   * offline store. A QoS 1/2 packet that times out is removed from the
   * outgoing store: it is never re-sent after a reconnect.
   */
  async publish(topic: string, payload: string, qos: MqttQos): Promise<void> {
    if (!this.client.connected) {
      throw new MqttOfflineError(topic);
    }

    const sending = this.client.publishAsync(topic, payload, { qos });
    const messageId = qos > 0 ? this.client.getLastMessageId() : undefined;

    try {
      await withTimeout(
        sending,
        this.publishTimeoutMs,
        () => new PublishTimeoutError(topic, this.publishTimeoutMs),
      );
    } catch (err: unknown) {
      if (err instanceof PublishTimeoutError && messageId !== undefined) {
        this.client.removeOutgoingMessage(messageId);
      }
      throw err;
    }
  }

  /** Forced end: in-flight packets are discarded rather than awaited. */
  async close(): Promise<void> {
    await this.client.endAsync(true);
  }
}

/**
 * Opens an MQTT client for `url`.
 *
 * The client connects (and reconnects) in the background. Publishes made
 * while it is offline fail at once with `MqttOfflineError`; publishes the
 * broker does not acknowledge within `publishTimeoutMs` fail with
 * `PublishTimeoutError`.
 */
export function connectMqttTransport(
  url: string,
  log: Logger,
  options: MqttTransportOptions = {},
): MqttTransport {
  const client = connect(url, {
    clientId: options.clientId,
    reconnectPeriod: options.reconnectPeriodMs ?? DEFAULT_RECONNECT_PERIOD_MS,
    queueQoSZero: false,
  });

  client.on('connect', () => {
    log.info({ url }, 'MQTT connected');
  });
  client.on('offline', () => {
    log.warn({ url }, 'MQTT client offline');
  });
  client.on('error', (err: Error) => {
    log.warn({ err, url }, 'MQTT client error');
  });

  return new MqttClientTransport(client, options.publishTimeoutMs ?? DEFAULT_PUBLISH_TIMEOUT_MS);
}
