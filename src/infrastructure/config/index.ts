export { loadTelemetryConfig, parseSimpleYaml, DEFAULT_CONFIG } from './telemetry-config.js';
export type { TelemetryConfig, MqttSettings, RedisSettings, MqttQos } from './telemetry-config.js';
