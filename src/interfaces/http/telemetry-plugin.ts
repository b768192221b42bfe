import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Telemetry } from '../../telemetry.js';

export interface TelemetryPluginOptions {
  telemetry: Telemetry;
}

/**
 * Fastify plugin that exposes the telemetry pipeline to routes.
 *
 * - Decorates `fastify.telemetry`.
 * - Drains and shuts the pipeline down when the server closes.
 */
async function telemetryPlugin(
  fastify: FastifyInstance,
  options: TelemetryPluginOptions,
): Promise<void> {
  fastify.decorate('telemetry', options.telemetry);

  fastify.addHook('onClose', async () => {
    await options.telemetry.shutdown();
    fastify.log.info('Telemetry pipeline shut down');
  });
}

export default fp(telemetryPlugin, {
  name: 'telemetry',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.telemetry` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    telemetry: Telemetry;
  }
}
