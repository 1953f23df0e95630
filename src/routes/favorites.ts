import { FastifyInstance } from 'fastify';
import type { AppContext } from '../app_context.js';
import { createAuthGuards, currentUser } from '../server_auth.js';
import { addFavorite, listFavoriteIds, removeFavorite } from '../services/favorites.js';

/**
 * Register favorite endpoints (mounted under /v1/favorites).
 */
export async function registerFavoriteRoutes(fastify: FastifyInstance, ctx: AppContext): Promise<void> {
  const { requireSubscription } = createAuthGuards(ctx);

  fastify.post('/favorites', { preHandler: requireSubscription }, async (request) => {
    return addFavorite(ctx.store, ctx.listings, currentUser(request).id, request.body);
  });

  fastify.get('/favorites', { preHandler: requireSubscription }, async (request) => {
    return listFavoriteIds(ctx.store, currentUser(request).id);
  });

  fastify.delete<{ Params: { listing_id: string } }>(
    '/favorites/:listing_id',
    { preHandler: requireSubscription },
    async (request) => {
      return removeFavorite(ctx.store, currentUser(request).id, request.params.listing_id);
    }
  );
}
