import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { pixelQuerySchema, decodeImageParam, trackPixelOpen } from '../../application/index.js';

/** Headers on every pixel/image response: never cached, rendered inline. */
export const NO_CACHE_HEADERS = {
  'cache-control': 'no-cache, no-store, must-revalidate',
  'pragma': 'no-cache',
  'expires': '0',
  'content-disposition': 'inline; filename=pixel.gif',
} as const;

/**
 * Tracking pixel and image proxy.
 *
 * GET /api/img?email&image&message_id
 *
 * Always answers 200 with an image once the query is valid. Recording
 * failures are logged and never break email rendering.
 */
async function pixelRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/img',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = pixelQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { events, resolver, dedupWindowMinutes } = fastify.tracking;
      const email = parsed.data.email;
      const messageId = parsed.data.message_id ?? null;
      const imageParam = decodeImageParam(parsed.data.image);

      try {
        const outcome = await trackPixelOpen(
          events,
          {
            email,
            messageId,
            imageParam,
            userAgent: request.headers['user-agent'] ?? null,
            remoteAddr: request.ip,
          },
          { windowMinutes: dedupWindowMinutes },
        );

        if (outcome.suppressed) {
          request.log.debug({ email, message_id: messageId }, 'Open already recorded within window');
        }
      } catch (err: unknown) {
        request.log.error({ err, email, message_id: messageId }, 'Failed to record pixel open');
      }

      const image = await resolver.resolve({ imageParam, email, messageId });

      return reply
        .status(200)
        .headers(NO_CACHE_HEADERS)
        .type(image.contentType)
        .send(image.body);
    },
  );
}

export default fp(pixelRoutes, {
  name: 'pixel-routes',
  dependencies: ['tracking'],
  fastify: '5.x',
});
