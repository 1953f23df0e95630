import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { initPool, createSchema, closePool, sqlAccountStore } from './db/db_sql.js';
import { initClient, ensureListingTemplate, closeClient, esListingSource } from './db/db_es.js';
import { initRateLimiter, closeRateLimiter } from './rate_limit.js';
import { buildServer } from './server.js';
import { createStripeProvider } from './services/stripe.js';

dotenv.config();

const config = loadConfig();

initPool(config.postgres);
initClient(config.elasticsearchUrl, config.listingsIndexPattern);

const fastify = await buildServer({
  config,
  store: sqlAccountStore,
  listings: esListingSource,
  payments: createStripeProvider(config),
});

// Graceful shutdown
const shutdown = async () => {
  fastify.log.info('Shutting down...');
  await fastify.close();
  await closeRateLimiter();
  await closePool();
  await closeClient();
  process.exit(0);
};

process.on('SIGTERM', () => {
  void shutdown();
});
process.on('SIGINT', () => {
  void shutdown();
});

const start = async () => {
  try {
    // Create schemas before server starts accepting requests
    try {
      await createSchema();
      await ensureListingTemplate();
      fastify.log.info('Database schemas initialized');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      fastify.log.error(`Error initializing schemas: ${message}`);
      // Continue anyway: tables may already exist and listings are read-only
    }

    await initRateLimiter({ redisUrl: config.redisUrl });

    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Server listening on port ${config.port} (${config.environment})`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
