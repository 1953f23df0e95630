import { FastifyInstance } from 'fastify';

export const API_NAME = 'Property Listings API';
export const API_VERSION = '1.0.0';

export async function registerMiscRoutes(fastify: FastifyInstance): Promise<void> {
  // Security: Public endpoint - no authentication required.
  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  fastify.get('/', async () => {
    return { message: API_NAME, version: API_VERSION };
  });
}
