/**
 * API key guard
 *
 * Secures endpoints with a shared secret in the `x-api-key` header.
 * Registered as an onRequest hook so it runs before the body is parsed.
 */

import { timingSafeEqual } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { AuthError } from '../../common/errors.js';

export const API_KEY_HEADER = 'x-api-key';

function readHeader(req: FastifyRequest): string | undefined {
  const value = req.headers[API_KEY_HEADER];
  // Repeated headers arrive as an array; treat them as not provided
  return typeof value === 'string' ? value : undefined;
}

/**
 * Constant-time comparison of the presented key against the secret
 */
export function isValidApiKey(presented: string | undefined, secret: string | undefined): boolean {
  if (!secret || !presented) return false;

  const a = Buffer.from(presented, 'utf8');
  const b = Buffer.from(secret, 'utf8');
  if (a.length !== b.length) return false;

  return timingSafeEqual(a, b);
}

/**
 * Validate API key from the request headers
 * @throws AuthError if absent, wrong, or no secret is configured
 */
export function requireApiKey(req: FastifyRequest, secret: string | undefined): void {
  if (!isValidApiKey(readHeader(req), secret)) {
    throw new AuthError();
  }
}

/**
 * Fastify onRequest hook factory
 */
export function apiKeyHook(secret: string | undefined) {
  return async function apiKeyGuard(req: FastifyRequest, _reply: FastifyReply): Promise<void> {
    requireApiKey(req, secret);
  };
}
