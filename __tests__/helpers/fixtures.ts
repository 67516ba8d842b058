import type { User } from '../../src/server/auth';

export const REQ_ID = '3fa85f64-5717-4562-b3fc-2c963f66afa6';
export const OTHER_REQ_ID = '9b2d7c1e-4a5f-4e8b-9c3d-1f2e3a4b5c6d';

export const createUser = (roles: string[] = [], overrides: Partial<User> = {}): User => ({
  id: 'user-1',
  username: 'tester',
  roles,
  expiresAt: 4_102_444_800,
  ...overrides,
});
