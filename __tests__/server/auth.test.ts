import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import { describe, it, expect } from 'vitest';
import {
  createStaticTokenAuthenticator,
  extractToken,
  userFromClaims,
} from '../../src/server/auth';

const claims = {
  sub: 'f4b1c2d3',
  preferred_username: 'ada',
  exp: 4_102_444_800,
  azp: 'web-client',
  resource_access: {
    'web-client': { roles: ['get-authors', 'create-author'] },
    'other-client': { roles: ['admin'] },
  },
};

const createUpgradeRequest = (url: string, headers: Record<string, string> = {}): IncomingMessage => {
  const request = new IncomingMessage(new Socket());
  request.url = url;
  Object.assign(request.headers, headers);
  return request;
};

describe('auth', () => {
  describe('userFromClaims', () => {
    it('should map claims and take roles of the authorized party', () => {
      expect(userFromClaims(claims)).toEqual({
        id: 'f4b1c2d3',
        username: 'ada',
        roles: ['get-authors', 'create-author'],
        expiresAt: 4_102_444_800,
      });
    });

    it('should give no roles when the client has no resource access entry', () => {
      const user = userFromClaims({ ...claims, azp: 'unknown-client' });
      expect(user.roles).toEqual([]);
    });

    it('should give no roles when resource access is missing', () => {
      const { resource_access: _ignored, ...rest } = claims;
      expect(userFromClaims(rest).roles).toEqual([]);
    });

    it('should reject claims without a subject', () => {
      expect(() => userFromClaims({ ...claims, sub: '' })).toThrowError(
        expect.objectContaining({ code: 'VALIDATION_ERROR:INVALID_INPUT' })
      );
      expect(() => userFromClaims(null)).toThrow('Invalid token claims');
    });
  });

  describe('extractToken', () => {
    it('should read a bearer token from the header', () => {
      const request = createUpgradeRequest('/web', { authorization: 'Bearer test-token' });
      expect(extractToken(request)).toBe('test-token');
    });

    it('should fall back to the token query parameter', () => {
      expect(extractToken(createUpgradeRequest('/web?format=protobuf&token=test-token'))).toBe(
        'test-token'
      );
    });

    it('should ignore other authorization schemes', () => {
      const request = createUpgradeRequest('/web', { authorization: 'Basic dGVzdA==' });
      expect(extractToken(request)).toBeNull();
    });
  });

  describe('createStaticTokenAuthenticator', () => {
    const authenticate = createStaticTokenAuthenticator({ 'test-token': claims });

    it('should resolve a known token to its user', async () => {
      const user = await authenticate(createUpgradeRequest('/web?token=test-token'));
      expect(user?.username).toBe('ada');
    });

    it('should resolve null for unknown or missing tokens', async () => {
      await expect(authenticate(createUpgradeRequest('/web?token=other'))).resolves.toBeNull();
      await expect(authenticate(createUpgradeRequest('/web'))).resolves.toBeNull();
    });

    it('should fail fast on invalid claims', () => {
      expect(() => createStaticTokenAuthenticator({ 'test-token': { sub: 'x' } })).toThrowError(
        expect.objectContaining({ code: 'VALIDATION_ERROR:INVALID_INPUT' })
      );
    });
  });
});
