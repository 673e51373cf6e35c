/**
 * Test Utilities
 *
 * Reusable helpers for creating test data.
 */

import type { AuthSuccessResponse, BackendUser, User } from '../../shared/types/auth';
import type { NativeIdentityCredential } from '../../services/auth-providers';
import { createUser, type UserFields } from '../../shared/utils/user';

// ============ User Mocks ============

/**
 * Create a mock User (an email account by default)
 */
export const mockUser = (overrides: Partial<UserFields> = {}): User =>
  createUser({
    id: overrides.id ?? 'user-123',
    email: overrides.email === undefined ? 'test@example.com' : overrides.email,
    name: overrides.name ?? 'Test User',
    profileImageUrl: overrides.profileImageUrl ?? null,
    provider: overrides.provider ?? 'email',
    createdAt: overrides.createdAt ?? new Date('2024-01-15T10:30:00.000Z'),
  });

// ============ Backend Payload Mocks ============

export const mockBackendUser = (overrides: Partial<BackendUser> = {}): BackendUser => ({
  id: 'user-123',
  email: 'test@example.com',
  name: 'Test User',
  profile_image_url: null,
  created_at: '2024-01-15T10:30:00.000Z',
  ...overrides,
});

export const mockAuthResponse = (
  overrides: Partial<AuthSuccessResponse> = {}
): AuthSuccessResponse => ({
  user: mockBackendUser(),
  access_token: 'test-access-token',
  token_type: 'bearer',
  ...overrides,
});

// ============ Native Credential Mocks ============

export const mockNativeCredential = (
  overrides: Partial<NativeIdentityCredential> = {}
): NativeIdentityCredential => ({
  user: 'native-user-001',
  email: 'native@example.com',
  fullName: { givenName: 'Test', familyName: 'User' },
  identityToken: 'test-identity-token',
  authorizationCode: 'test-authorization-code',
  ...overrides,
});

// ============ HTTP Helpers ============

/**
 * Build a JSON Response
 */
export const jsonResponse = (status: number, body: unknown): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

export const textResponse = (status: number, body: string): Response =>
  new Response(body, { status });

/**
 * Let pending promise callbacks run
 */
export const flushPromises = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
