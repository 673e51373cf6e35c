/**
 * Authentication state machine helpers.
 */

import type { AuthenticationState, AuthStatus, SignInResult } from '../types/auth';
import type { AuthError } from './errors';

export const ALLOWED_TRANSITIONS: Record<AuthStatus, readonly AuthStatus[]> = {
  loading: ['authenticated', 'unauthenticated'],
  unauthenticated: ['authenticated', 'unauthenticated'],
  authenticated: ['authenticated', 'unauthenticated', 'error'],
  error: ['unauthenticated'],
};

export function canTransition(from: AuthStatus, to: AuthStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * State equality: authenticated compares user IDs, error compares messages
 */
export function isSameState(a: AuthenticationState, b: AuthenticationState): boolean {
  switch (a.status) {
    case 'authenticated':
      return b.status === 'authenticated' && a.user.id === b.user.id;
    case 'error':
      return b.status === 'error' && a.message === b.message;
    default:
      return a.status === b.status;
  }
}

// ============ Sign-In Results ============

export const cancelledResult = (): SignInResult => ({ type: 'cancelled' });

export const failureResult = (error: AuthError): SignInResult => ({ type: 'failure', error });

/**
 * Message for an error banner. Success and cancellation have none.
 */
export function getSignInErrorMessage(result: SignInResult): string | null {
  return result.type === 'failure' ? result.error.message : null;
}
