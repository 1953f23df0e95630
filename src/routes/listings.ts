import { FastifyInstance } from 'fastify';
import type { AppContext } from '../app_context.js';
import { createAuthGuards } from '../server_auth.js';
import { getListing, searchListings } from '../services/listings.js';

/**
 * Register listing endpoints (mounted under /v1/listings).
 */
export async function registerListingRoutes(fastify: FastifyInstance, ctx: AppContext): Promise<void> {
  const { requireSubscription } = createAuthGuards(ctx);

  // Security: admin or live subscription required.
  fastify.get('/listings', { preHandler: requireSubscription }, async (request) => {
    return searchListings(request.query, ctx.listings);
  });

  fastify.get<{ Params: { id: string } }>(
    '/listings/:id',
    { preHandler: requireSubscription },
    async (request) => {
      return getListing(request.params.id, ctx.listings);
    }
  );
}
