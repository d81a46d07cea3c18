import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';
import type { ImageReadDraft, TrackingEventDraft } from '../domain/index.js';
import { ImageResolver, trackingRecordSchema, imageReadRecordSchema } from '../application/index.js';
import type { TrackingStores } from '../application/index.js';
import type { TrackerConfig } from './config.js';
import { JsonlEventStore, RedisEventStore, ioredisStreamClient } from './store/index.js';

/** Everything the tracking routes need, injected once per server. */
export interface TrackingServices extends TrackingStores {
  resolver: ImageResolver;
  dedupWindowMinutes: number;
}

export interface TrackingPluginOptions {
  config: TrackerConfig;
  /** Ready-made stores (e.g. in-memory for tests); overrides `config.store`. */
  stores?: TrackingStores;
}

async function openStores(fastify: FastifyInstance, config: TrackerConfig): Promise<TrackingStores> {
  const { store } = config;

  if (store.kind === 'file') {
    fastify.log.info(
      { trackingLog: store.trackingLogFile, imgReadLog: store.imgReadLogFile },
      'Using JSONL event logs',
    );
    return {
      events: new JsonlEventStore<TrackingEventDraft>({
        path: store.trackingLogFile,
        schema: trackingRecordSchema,
        log: fastify.log,
      }),
      imageReads: new JsonlEventStore<ImageReadDraft>({
        path: store.imgReadLogFile,
        schema: imageReadRecordSchema,
        log: fastify.log,
      }),
    };
  }

  const redis = new Redis(store.url, {
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  fastify.log.info({ trackingStream: store.trackingStream, imgReadStream: store.imgReadStream }, 'Redis connected');

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });

  const client = ioredisStreamClient(redis);

  return {
    events: new RedisEventStore<TrackingEventDraft>({
      client,
      key: store.trackingStream,
      schema: trackingRecordSchema,
      log: fastify.log,
    }),
    imageReads: new RedisEventStore<ImageReadDraft>({
      client,
      key: store.imgReadStream,
      schema: imageReadRecordSchema,
      log: fastify.log,
    }),
  };
}

/**
 * Fastify plugin that builds the event stores and image resolver.
 *
 * Decorates `fastify.tracking` for use by the route plugins. When the
 * Redis backend is selected, the connection is closed on server shutdown.
 */
async function trackingPlugin(fastify: FastifyInstance, options: TrackingPluginOptions): Promise<void> {
  const { config } = options;
  const stores = options.stores ?? await openStores(fastify, config);

  const resolver = new ImageResolver({
    imageReads: stores.imageReads,
    uploadDir: config.uploadDir,
    log: fastify.log,
    fetchTimeoutMs: config.remoteFetchTimeoutMs,
    maxRemoteBytes: config.remoteMaxBytes,
  });

  fastify.decorate('tracking', {
    events: stores.events,
    imageReads: stores.imageReads,
    resolver,
    dedupWindowMinutes: config.dedupWindowMinutes,
  });
}

export default fp(trackingPlugin, {
  name: 'tracking',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.tracking` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    tracking: TrackingServices;
  }
}
