import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  byEmailQuerySchema,
  latestQuerySchema,
  byIdentity,
  latest,
  download,
} from '../../application/index.js';

const NDJSON = 'application/x-ndjson';

/**
 * Read-only reporting routes over the two logs.
 *
 * GET /tracking/by_email?email: opens, clicks and image reads of one recipient
 * GET /tracking/latest?n=200: newest records of each log
 * GET /tracking/download: raw tracking log
 * GET /tracking/download_imgreads: raw image-read log
 */
async function reportRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/tracking/by_email',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = byEmailQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const report = await byIdentity(fastify.tracking, parsed.data.email);
      return reply.status(200).send(report);
    },
  );

  fastify.get(
    '/tracking/latest',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = latestQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const report = await latest(fastify.tracking, parsed.data.n);
      return reply.status(200).send(report);
    },
  );

  fastify.get(
    '/tracking/download',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const body = await download(fastify.tracking.events);
      return reply
        .header('content-disposition', 'attachment; filename="tracking_logs.jsonl"')
        .type(NDJSON)
        .send(body);
    },
  );

  fastify.get(
    '/tracking/download_imgreads',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const body = await download(fastify.tracking.imageReads);
      return reply
        .header('content-disposition', 'attachment; filename="img_reads.jsonl"')
        .type(NDJSON)
        .send(body);
    },
  );
}

export default fp(reportRoutes, {
  name: 'report-routes',
  dependencies: ['tracking'],
  fastify: '5.x',
});
