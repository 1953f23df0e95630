import formbody from '@fastify/formbody';
import { FastifyInstance } from 'fastify';
import type { AppContext } from '../app_context.js';
import { TooManyRequestsError } from '../common/errors.js';
import { SUBSCRIPTION_PLAN } from '../common/plan.js';
import { toPublicUser } from '../common/types/User.js';
import { checkRateLimit } from '../rate_limit.js';
import { createAuthGuards, currentUser } from '../server_auth.js';
import { checkEmail, login, register, updateName, updatePassword } from '../services/accounts.js';
import { clientAddress } from './route_helpers.js';

/**
 * Register account endpoints (mounted under /v1/auth).
 */
export async function registerAuthRoutes(fastify: FastifyInstance, ctx: AppContext): Promise<void> {
  const { requireActiveUser } = createAuthGuards(ctx);

  // OAuth2 password-grant clients post the login form url-encoded
  await fastify.register(formbody);

  // Security: Public endpoint, rate limited per client address.
  fastify.post('/check-email', async (request) => {
    const limit = await checkRateLimit(`check-email:${clientAddress(request)}`);
    if (limit && !limit.allowed) {
      throw new TooManyRequestsError('Too many email check requests. Please wait a moment.');
    }
    return checkEmail(ctx.store, request.body);
  });

  // Security: Public endpoint. Always creates a plain user.
  fastify.post('/register', async (request) => {
    const result = await register(ctx.store, request.body);
    request.log.info({ userId: result.user_id }, 'User registered');
    return result;
  });

  // Security: Public endpoint. Takes JSON or a url-encoded username/password form.
  fastify.post('/login', async (request) => {
    return login(ctx.store, ctx.config.token, request.body);
  });

  fastify.get('/me', { preHandler: requireActiveUser }, async (request) => {
    return toPublicUser(currentUser(request));
  });

  // Tokens are stateless; the client discards its copy.
  fastify.post('/logout', { preHandler: requireActiveUser }, async () => {
    return { message: 'Successfully logged out' };
  });

  fastify.get('/subscription-plan', async () => {
    return { plan: SUBSCRIPTION_PLAN };
  });

  fastify.put('/update-name', { preHandler: requireActiveUser }, async (request) => {
    return updateName(ctx.store, currentUser(request), request.body);
  });

  fastify.put('/update-password', { preHandler: requireActiveUser }, async (request) => {
    return updatePassword(ctx.store, currentUser(request), request.body);
  });
}
