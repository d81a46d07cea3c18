import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';

/** GET /api/test: liveness probe. */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/api/test', async () => ({ status: 'ok', message: 'API is working!' }));
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
