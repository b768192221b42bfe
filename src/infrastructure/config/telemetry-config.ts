import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

export type MqttQos = 0 | 1 | 2;

/** Settings an MQTT backend reads at send time. */
export interface MqttSettings {
  enabled: boolean;
  url: string;
  /** Empty means "use the default topic". */
  topic: string;
  qos: MqttQos;
}

/** Settings a Redis Pub/Sub backend reads at send time. */
export interface RedisSettings {
  enabled: boolean;
  url: string;
  channel: string;
}

/**
 * Telemetry configuration loaded from YAML.
 */
export interface TelemetryConfig {
  telemetry: { enabled: boolean; app_version: string };
  mqtt: MqttSettings;
  redis: RedisSettings;
}

/**
 * Default configuration: pipeline enabled, MQTT on, Redis off.
 */
export const DEFAULT_CONFIG: TelemetryConfig = {
  telemetry: { enabled: true, app_version: '0.0.0' },
  mqtt: { enabled: true, url: 'mqtt://localhost:1883', topic: '', qos: 0 },
  redis: { enabled: false, url: 'redis://localhost:6379', channel: '' },
};

type Section = Record<string, string | number | boolean>;

function parseScalar(raw: string): string | number | boolean {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'"))) {
    return raw.slice(1, -1);
  }
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return raw;
}

/**
 * Cuts a trailing `# comment`. A `#` starts a comment only outside quotes
 * and at the start of the line or after whitespace. A quote opens a quoted
 * scalar only where a token starts (after whitespace or `:`).
 */
function stripComment(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    const prev = i === 0 ? ' ' : (line[i - 1] ?? ' ');
    const atTokenStart = /\s/.test(prev) || prev === ':';
    if (quote) {
      if (ch === quote) quote = null;
    } else if ((ch === '"' || ch === "'") && atTokenStart) {
      quote = ch;
    } else if (ch === '#' && /\s/.test(prev)) {
      return line.slice(0, i);
    }
  }
  return line;
}

/**
 * Parser for the two-level YAML used in config/telemetry.yaml: top-level
 * section names, each followed by indented `key: scalar` lines. Comments
 * (full-line, or trailing after a space outside quotes) are ignored.
 */
export function parseSimpleYaml(content: string): Record<string, Section> {
  const result: Record<string, Section> = {};
  let current: Section | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = stripComment(rawLine).trimEnd();
    if (line.trim() === '') continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const key = line.slice(0, colonIdx).trim();
    const value = line.slice(colonIdx + 1).trim();

    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      current = {};
      result[key] = current;
      continue;
    }

    if (current) {
      current[key] = parseScalar(value);
    }
  }

  return result;
}

function bool(section: Section, key: string, fallback: boolean): boolean {
  const v = section[key];
  return typeof v === 'boolean' ? v : fallback;
}

function str(section: Section, key: string, fallback: string): string {
  const v = section[key];
  if (typeof v === 'string') return v;
  if (typeof v === 'number') return String(v);
  return fallback;
}

function qos(section: Section, fallback: MqttQos): MqttQos {
  const v = section['qos'];
  return v === 0 || v === 1 || v === 2 ? v : fallback;
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function readSections(filePath: string): Record<string, Section> {
  try {
    return parseSimpleYaml(readFileSync(filePath, 'utf-8'));
  } catch {
    return {};
  }
}

/**
 * Loads telemetry configuration from the YAML file, then applies
 * environment overrides (TELEMETRY_ENABLED, MQTT_URL, REDIS_URL).
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable.
 * Missing or mistyped keys take their default value.
 */
export function loadTelemetryConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): TelemetryConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'telemetry.yaml');

  const parsed = readSections(filePath);
  const telemetry = parsed['telemetry'] ?? {};
  const mqtt = parsed['mqtt'] ?? {};
  const redis = parsed['redis'] ?? {};
  const d = DEFAULT_CONFIG;

  return {
    telemetry: {
      enabled: envBool(env['TELEMETRY_ENABLED']) ?? bool(telemetry, 'enabled', d.telemetry.enabled),
      app_version: str(telemetry, 'app_version', d.telemetry.app_version),
    },
    mqtt: {
      enabled: bool(mqtt, 'enabled', d.mqtt.enabled),
      url: env['MQTT_URL'] ?? str(mqtt, 'url', d.mqtt.url),
      topic: str(mqtt, 'topic', d.mqtt.topic),
      qos: qos(mqtt, d.mqtt.qos),
    },
    redis: {
      enabled: bool(redis, 'enabled', d.redis.enabled),
      url: env['REDIS_URL'] ?? str(redis, 'url', d.redis.url),
      channel: str(redis, 'channel', d.redis.channel),
    },
  };
}
