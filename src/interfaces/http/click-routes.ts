import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { clickQuerySchema, trackClick } from '../../application/index.js';

/**
 * Click tracking.
 *
 * GET /api/click?email&redirect&message_id: records the click, then 302.
 *
 * `redirect` is followed as given. This is an open redirect; links are
 * expected to be minted by the sending system.
 */
async function clickRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/click',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = clickQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { email, redirect } = parsed.data;

      await trackClick(fastify.tracking.events, {
        email,
        messageId: parsed.data.message_id ?? null,
        redirect,
        userAgent: request.headers['user-agent'] ?? null,
        remoteAddr: request.ip,
      });

      return reply.redirect(redirect, 302);
    },
  );
}

export default fp(clickRoutes, {
  name: 'click-routes',
  dependencies: ['tracking'],
  fastify: '5.x',
});
