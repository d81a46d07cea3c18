import { loadConfig } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap: load config, build the app, listen, close on SIGINT/SIGTERM.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildServer({ config });

  const shutdown = (signal: NodeJS.Signals): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
