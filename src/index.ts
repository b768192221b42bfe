import { fastify as Fastify } from 'fastify';
import { pino } from 'pino';

import { loadTelemetryConfig } from './infrastructure/config/index.js';
import { connectMqttTransport, connectRedisPublisher } from './infrastructure/backends/index.js';
import type { MqttTransport } from './infrastructure/backends/index.js';
import { createTelemetry } from './telemetry.js';
import { telemetryPlugin, eventRoutes } from './interfaces/http/index.js';

const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

const configPath = process.env['TELEMETRY_CONFIG'];

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config + transports
 * 2) Telemetry pipeline
 * 3) Fastify plugin + routes
 * 4) Signal handlers
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadTelemetryConfig(configPath);
  log.info({ config }, 'Telemetry config loaded');

  // --------------------------------------------------
  // Transports
  // --------------------------------------------------

  const mqtt: MqttTransport | undefined = config.mqtt.enabled
    ? connectMqttTransport(config.mqtt.url, log)
    : undefined;

  const redis = config.redis.enabled ? await connectRedisPublisher(config.redis.url, log) : undefined;

  const telemetry = createTelemetry({ config, log, mqtt, redis });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = Fastify({ loggerInstance: log });

  await fastify.register(telemetryPlugin, { telemetry });
  await fastify.register(eventRoutes);

  // --------------------------------------------------
  // Signals
  // --------------------------------------------------

  process.on('SIGHUP', () => {
    telemetry.reload(loadTelemetryConfig(configPath));
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
