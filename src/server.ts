import Fastify from 'fastify';
import cors from '@fastify/cors';
import { trackingPlugin } from './infrastructure/index.js';
import type { TrackerConfig } from './infrastructure/index.js';
import type { TrackingStores } from './application/index.js';
import {
  pixelRoutes,
  clickRoutes,
  reportRoutes,
  healthRoutes,
} from './interfaces/http/index.js';

export interface BuildServerOptions {
  config: TrackerConfig;
  /** Pre-built stores; when omitted they are opened from `config.store`. */
  stores?: TrackingStores;
  /** Set to false to silence request logging (tests). */
  logger?: boolean;
}

/**
 * Builds the Fastify application without listening.
 *
 * Order:
 * 1) CORS (any origin: pixels load from arbitrary mail clients)
 * 2) Tracking services (stores + image resolver)
 * 3) HTTP routes
 */
export async function buildServer(options: BuildServerOptions) {
  const { config } = options;

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
    trustProxy: config.trustProxy,
  });

  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  await fastify.register(trackingPlugin, {
    config,
    stores: options.stores,
  });

  await fastify.register(healthRoutes);
  await fastify.register(pixelRoutes);
  await fastify.register(clickRoutes);
  await fastify.register(reportRoutes);

  return fastify;
}
