import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { AppContext } from './app_context.js';
import { ApiError, errorMessage } from './common/errors.js';
import { registerAuthRoutes } from './routes/auth.js';
import { registerFavoriteRoutes } from './routes/favorites.js';
import { registerListingRoutes } from './routes/listings.js';
import { registerMiscRoutes } from './routes/misc-routes.js';
import { registerPaymentRoutes } from './routes/payments.js';

export interface ServerOptions {
  /** false to silence request logging (tests) */
  logger?: boolean;
}

function hasClientStatus(error: FastifyError): boolean {
  return typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500;
}

/**
 * Build the HTTP server with every route registered. Does not listen.
 */
export async function buildServer(ctx: AppContext, options: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            serializers: {
              req: (req) => ({
                method: req.method,
                url: req.url,
                // Explicitly exclude body: it may carry passwords or payment tokens
              }),
            },
          },
  });

  fastify.decorateRequest('user', null);

  await fastify.register(cors, {
    origin: ctx.config.corsOrigins,
    credentials: true,
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ApiError) {
      reply.code(error.statusCode).headers(error.headers).send({ error: error.message });
      return;
    }
    if (error instanceof ZodError) {
      reply.code(400).send({ error: error.issues[0]?.message ?? 'Invalid request' });
      return;
    }
    if (hasClientStatus(error)) {
      reply.code(error.statusCode ?? 400).send({ error: error.message });
      return;
    }
    request.log.error(`Error in ${request.method} ${request.url}: ${errorMessage(error)}`);
    request.log.error(error);
    reply.code(500).send({ error: 'Internal server error', details: errorMessage(error) });
  });

  await registerMiscRoutes(fastify);
  await fastify.register(async (scoped) => registerAuthRoutes(scoped, ctx), { prefix: '/v1/auth' });
  await fastify.register(async (scoped) => registerListingRoutes(scoped, ctx), { prefix: '/v1/listings' });
  await fastify.register(async (scoped) => registerFavoriteRoutes(scoped, ctx), { prefix: '/v1/favorites' });
  await fastify.register(async (scoped) => registerPaymentRoutes(scoped, ctx), { prefix: '/v1/payments' });

  return fastify;
}
