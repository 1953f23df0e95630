/**
 * Stateless access tokens (HMAC-signed JWTs). The subject is the user's email.
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import type { TokenAlgorithm } from '../config.js';

export interface TokenSettings {
  secret: string;
  algorithm: TokenAlgorithm;
  /** default lifetime, in minutes */
  ttlMinutes: number;
}

/** Thrown for every verification failure; the reason is deliberately not exposed. */
export class InvalidTokenError extends Error {
  constructor() {
    super('Invalid token');
    this.name = 'InvalidTokenError';
  }
}

export function issueToken(settings: TokenSettings, subject: string, ttlMinutes: number = settings.ttlMinutes): string {
  return jwt.sign({ sub: subject }, settings.secret, {
    algorithm: settings.algorithm,
    expiresIn: ttlMinutes * 60,
  });
}

/**
 * @returns the token subject
 * @throws InvalidTokenError on bad signature, malformed token, expiry or missing subject
 */
export function verifyToken(settings: TokenSettings, token: string): string {
  let payload: string | JwtPayload;
  try {
    payload = jwt.verify(token, settings.secret, { algorithms: [settings.algorithm] });
  } catch (error) {
    throw new InvalidTokenError();
  }
  if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
    throw new InvalidTokenError();
  }
  return payload.sub;
}
