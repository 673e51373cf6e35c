import type { AuthProviderId, AuthProviderInfo } from '../types/auth';

// ============ Auth Storage Keys ============
export const AUTH_STORAGE_KEYS = {
  /** Serialized current user */
  CURRENT_USER: 'auth_current_user',
  /** Backend access token (absent for native and guest sessions) */
  ACCESS_TOKEN: 'auth_access_token',
} as const;

// ============ Auth Endpoints ============
export const AUTH_ENDPOINTS = {
  REGISTER: '/api/auth/register',
  LOGIN: '/api/auth/login',
  OAUTH: '/api/auth/google',
  LOGOUT: '/api/auth/logout',
  ME: '/api/auth/me',
} as const;

// ============ Providers ============
export const AUTH_PROVIDERS: Record<AuthProviderId, AuthProviderInfo> = {
  native: { label: 'Apple', icon: 'applelogo' },
  oauth: { label: 'Google', icon: 'globe' },
  email: { label: 'Email', icon: 'envelope' },
  guest: { label: 'Guest', icon: 'person.circle' },
};

// ============ Sign-In Configuration ============
export const SIGN_IN_CONFIG = {
  /** Display name used when the native provider withholds the user's name */
  NATIVE_FALLBACK_NAME: 'User',
  GUEST_NAME: 'Guest User',
  GUEST_ID_PREFIX: 'guest_',
  /** Backend rejects longer passwords */
  PASSWORD_MAX_LENGTH: 72,
};

// ============ Session Validation ============
export const SESSION_CONFIG = {
  VALIDATION_COOLDOWN_MS: 30000, // 30 seconds
  MIN_BACKGROUND_MS: 60000, // only validate if backgrounded for >1min
};

// ============ API Configuration ============
export const API_DEFAULTS = {
  BASE_URL: 'http://localhost:8000',
  TIMEOUT_MS: 30000,
  STORAGE_DIR: './.auth-storage',
};
