export { MqttBackend, DEFAULT_MQTT_TOPIC } from './mqtt-backend.js';
export { RedisBackend, DEFAULT_REDIS_CHANNEL } from './redis-backend.js';
export type { RedisPublisher } from './redis-backend.js';
export { connectMqttTransport, withTimeout, PublishTimeoutError, MqttOfflineError } from './mqtt-transport.js';
export type { MqttTransport, MqttTransportOptions } from './mqtt-transport.js';
export { flattenEvent, serializeEvent } from './payload.js';
export type { FlatPayload } from './payload.js';
export { connectRedisPublisher, DEFAULT_REDIS_COMMAND_TIMEOUT_MS } from './redis-connection.js';
export type { RedisConnectionOptions } from './redis-connection.js';
