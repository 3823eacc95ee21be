import { vi, type Mock } from 'vitest';
import type { AuthProvider, Session } from '../auth/index.js';

export interface MockAuthProvider extends AuthProvider {
  getSession: Mock<[], Promise<Session>>;
  getAuthHeaders: Mock<[], Promise<Record<string, string>>>;
  invalidate: Mock<[], void>;
}

export function createMockAuthProvider(accessToken = 'test-token'): MockAuthProvider {
  return {
    getSession: vi.fn().mockResolvedValue({ accessToken, issuedAt: 0 }),
    getAuthHeaders: vi.fn().mockResolvedValue({ Authorization: `Bearer ${accessToken}` }),
    invalidate: vi.fn(),
  };
}
