/**
 * Bearer-token authentication for route preHandlers.
 * Tokens are the JWTs issued at login; the subject is the user's email.
 *
 * Guards throw ApiErrors; the server's error handler turns them into responses.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AppContext } from './app_context.js';
import { BadRequestError, ForbiddenError, UnauthorizedError } from './common/errors.js';
import { InvalidTokenError, verifyToken } from './common/tokens.js';
import type { User } from './common/types/index.js';
import { hasSubscriptionAccess } from './services/subscriptions.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** set by the auth guards */
    user: User | null;
  }
}

export type Guard = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

export interface AuthGuards {
  /** A user holding a valid token whose account is active. */
  requireActiveUser: Guard;
  /** ...and who is an admin or has a live subscription. */
  requireSubscription: Guard;
}

/**
 * The user the guards attached to the request.
 * @throws UnauthorizedError if the route was not guarded
 */
export function currentUser(request: FastifyRequest): User {
  if (!request.user) {
    throw new UnauthorizedError();
  }
  return request.user;
}

function bearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.substring(7).trim();
  return token === '' ? null : token;
}

export function createAuthGuards(ctx: AppContext): AuthGuards {
  async function loadUser(request: FastifyRequest): Promise<User> {
    const token = bearerToken(request);
    if (!token) {
      throw new UnauthorizedError('Not authenticated');
    }
    let email: string;
    try {
      email = verifyToken(ctx.config.token, token);
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        throw new UnauthorizedError();
      }
      throw error;
    }
    const user = await ctx.store.getUserByEmail(email);
    if (!user) {
      throw new UnauthorizedError();
    }
    request.user = user;
    return user;
  }

  async function loadActiveUser(request: FastifyRequest): Promise<User> {
    const user = await loadUser(request);
    if (!user.is_active) {
      throw new BadRequestError('Inactive user');
    }
    return user;
  }

  return {
    requireActiveUser: async (request) => {
      await loadActiveUser(request);
    },
    requireSubscription: async (request) => {
      const user = await loadActiveUser(request);
      if (user.role === 'admin') {
        return;
      }
      const latest = await ctx.store.getLatestSubscription(user.id);
      if (!hasSubscriptionAccess(user, latest, new Date())) {
        throw new ForbiddenError('Active subscription required to access this resource');
      }
    },
  };
}
