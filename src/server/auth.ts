import type { IncomingMessage } from 'node:http';
import { z } from 'zod';
import { ValidationError } from '../core/errors';
import { type Logger, SilentLogger } from '../core/types/Logger';
import { formatIssues } from '../formats/JsonFormatStrategy';

/**
 * Authenticated user of a connection
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly roles: readonly string[];
  /** Session expiry, unix seconds */
  readonly expiresAt: number;
}

/**
 * Resolves the user behind an upgrade request, or null to reject it with 401
 */
export type Authenticator = (request: IncomingMessage) => Promise<User | null>;

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  preferred_username: z.string().min(1),
  exp: z.number().int(),
  azp: z.string().min(1),
  resource_access: z.record(z.object({ roles: z.array(z.string()).default([]) })).default({}),
});

export type TokenClaims = z.input<typeof ClaimsSchema>;

/**
 * Build a user from identity-provider token claims. Roles are the client roles
 * of the authorized party (`resource_access[azp].roles`).
 *
 * @throws {ValidationError} when required claims are missing
 */
export const userFromClaims = (claims: unknown): User => {
  const result = ClaimsSchema.safeParse(claims);
  if (!result.success) {
    throw ValidationError.invalidInput('Invalid token claims', {
      issues: formatIssues(result.error),
    });
  }

  const { sub, preferred_username, exp, azp, resource_access } = result.data;
  return {
    id: sub,
    username: preferred_username,
    roles: resource_access[azp]?.roles ?? [],
    expiresAt: exp,
  };
};

/**
 * Bearer token from the Authorization header, falling back to the `token`
 * query parameter (browsers cannot set headers on WebSocket upgrades)
 */
export const extractToken = (request: IncomingMessage): string | null => {
  const header = request.headers.authorization;
  if (header) {
    const match = /^Bearer\s+(\S+)$/i.exec(header);
    if (match) {
      return match[1] ?? null;
    }
  }

  const url = new URL(request.url ?? '/', 'http://localhost');
  return url.searchParams.get('token');
};

export interface StaticTokenAuthenticatorOptions {
  logger?: Logger;
}

/**
 * Authenticator backed by a fixed token → claims map. Claims are checked once,
 * up front; a bad entry fails startup.
 */
export const createStaticTokenAuthenticator = (
  tokens: Readonly<Record<string, unknown>>,
  options: StaticTokenAuthenticatorOptions = {}
): Authenticator => {
  const logger = options.logger ?? new SilentLogger();
  const users = new Map<string, User>();

  for (const [token, claims] of Object.entries(tokens)) {
    users.set(token, userFromClaims(claims));
  }

  return async (request) => {
    const token = extractToken(request);
    if (!token) {
      logger.debug('Upgrade request without token', { url: request.url });
      return null;
    }

    const user = users.get(token);
    if (!user) {
      logger.warn('Unknown token on upgrade request');
      return null;
    }
    return user;
  };
};
