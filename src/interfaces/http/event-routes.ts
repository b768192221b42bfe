import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventSchema, eventBatchSchema } from '../../application/index.js';

/**
 * Registers the event ingestion routes for remote call sites.
 *
 * POST /api/v1/events        — single event
 * POST /api/v1/events/batch  — array of events
 * GET  /api/v1/health        — liveness and dispatch backlog
 *
 * Both POST routes answer 202 as soon as the events are handed to the
 * dispatcher; delivery outcome is never reported back.
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { category, action, parameters } = parsed.data;
      fastify.telemetry.logEvent(category, action, parameters);

      return reply.status(202).send({ status: 'accepted' });
    },
  );

  /**
   * Validates the full array up-front. On any validation failure the
   * entire batch is rejected; nothing is dispatched.
   */
  fastify.post(
    '/api/v1/events/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      for (const { category, action, parameters } of parsed.data) {
        fastify.telemetry.logEvent(category, action, parameters);
      }

      return reply.status(202).send({
        status: 'accepted',
        count: parsed.data.length,
      });
    },
  );

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        status: 'ok',
        pending: fastify.telemetry.pending,
        backends: fastify.telemetry.backends,
      });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['telemetry'],
  fastify: '5.x',
});
