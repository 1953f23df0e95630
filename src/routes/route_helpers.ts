import type { FastifyRequest } from 'fastify';

/** Client address used as the rate-limit key. Honours X-Forwarded-For only when trustProxy is set. */
export function clientAddress(request: FastifyRequest): string {
  return request.ip || 'unknown';
}
