/**
 * Auth Types
 *
 * Type definitions for the sign-in providers, the observable authentication
 * state and the backend auth API.
 */

import type { AuthError } from '../utils/errors';

// ============ Providers ============

export type AuthProviderId = 'native' | 'oauth' | 'email' | 'guest';

export interface AuthProviderInfo {
  /** Label shown on sign-in buttons and profile screens */
  label: string;
  /** Icon reference resolved by the UI layer */
  icon: string;
}

// ============ User ============

export interface User {
  /** Opaque identifier (stable across sessions for a provider account) */
  readonly id: string;
  /** Email address (null when the provider hides it) */
  readonly email: string | null;
  /** Display name */
  readonly name: string;
  readonly profileImageUrl: string | null;
  /** The provider the user signed in with */
  readonly provider: AuthProviderId;
  readonly createdAt: Date;
}

/** Persisted representation of a User */
export interface StoredUser {
  id: string;
  email: string | null;
  name: string;
  profileImageUrl: string | null;
  provider: AuthProviderId;
  /** ISO-8601 timestamp */
  createdAt: string;
}

// ============ State ============

export type AuthenticationState =
  | { status: 'loading' }
  | { status: 'authenticated'; user: User }
  | { status: 'unauthenticated' }
  | { status: 'error'; message: string };

export type AuthStatus = AuthenticationState['status'];

export type AuthStateListener = (state: AuthenticationState) => void;

/**
 * Applies a state write on the execution context observers expect.
 * The default applies immediately.
 */
export type StateDispatcher = (apply: () => void) => void;

// ============ Sign-In Result ============

export type SignInResult =
  | { type: 'success'; user: User }
  | { type: 'failure'; error: AuthError }
  | { type: 'cancelled' };

export type SessionValidationOutcome = 'valid' | 'expired' | 'unknown' | 'skipped';

// ============ Backend Wire Shapes ============

export interface RegisterRequest {
  email: string;
  password: string;
  name: string;
}

export interface LoginRequest {
  email: string;
  password: string;
}

export interface OAuthTokenRequest {
  id_token: string;
}

export interface BackendUser {
  id: string;
  email: string;
  name: string;
  profile_image_url?: string | null;
  created_at?: string | null;
}

export interface AuthSuccessResponse {
  user: BackendUser;
  access_token: string;
  token_type?: string;
  message?: string;
}

export interface BackendErrorResponse {
  detail: string;
}
