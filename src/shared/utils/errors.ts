/**
 * Error Handling Utilities
 *
 * Standardized error taxonomy for every sign-in path. Provider, network and
 * backend failures are all normalized into an AuthError before they reach
 * the UI. User cancellation is not an error and has no code here.
 */

export type AuthErrorCode =
  | 'PRESENTATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'CREDENTIAL_ERROR'
  | 'PROVIDER_ERROR'
  | 'NETWORK_ERROR'
  | 'BACKEND_ERROR'
  | 'INVALID_RESPONSE'
  | 'STORAGE_ERROR'
  | 'VALIDATION_ERROR'
  | 'SIGN_IN_IN_PROGRESS'
  | 'INVALID_STATE';

export interface AuthError {
  code: AuthErrorCode;
  message: string;
  recoverable: boolean;
  /** HTTP status when the error came from a backend response */
  status?: number;
  originalError?: unknown;
}

const DEFAULT_MESSAGES: Record<AuthErrorCode, string> = {
  PRESENTATION_ERROR: 'Unable to present sign-in interface',
  CONFIGURATION_ERROR: 'Sign-in is not configured for this app',
  CREDENTIAL_ERROR: 'Invalid authentication credential',
  PROVIDER_ERROR: 'Sign-in failed',
  NETWORK_ERROR: 'Network error occurred',
  BACKEND_ERROR: 'Authentication failed',
  INVALID_RESPONSE: 'Invalid response from server',
  STORAGE_ERROR: 'Failed to save your session. Please try again.',
  VALIDATION_ERROR: 'Invalid data provided',
  SIGN_IN_IN_PROGRESS: 'A sign-in request is already in progress',
  INVALID_STATE: 'Dismiss the current error before signing in again',
};

const UNRECOVERABLE: ReadonlySet<AuthErrorCode> = new Set<AuthErrorCode>(['CONFIGURATION_ERROR']);

/**
 * Create a standardized AuthError. The message falls back to a fixed
 * description of the code.
 */
export function createAuthError(
  code: AuthErrorCode,
  message?: string | null,
  extras: Pick<AuthError, 'status' | 'originalError'> = {}
): AuthError {
  return {
    code,
    message: message || DEFAULT_MESSAGES[code],
    recoverable: !UNRECOVERABLE.has(code),
    ...extras,
  };
}

export function getDefaultMessage(code: AuthErrorCode): string {
  return DEFAULT_MESSAGES[code];
}

/**
 * Describe an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Get user guidance for recovering from an error
 */
export function getRecoverySuggestion(error: AuthError): string {
  switch (error.code) {
    case 'NETWORK_ERROR':
      return 'Please check your internet connection and try again.';
    case 'CONFIGURATION_ERROR':
      return 'The app needs to be properly configured for this sign-in method. Please contact support if this issue persists.';
    case 'VALIDATION_ERROR':
      return 'Please check the details you entered.';
    case 'SIGN_IN_IN_PROGRESS':
      return 'Please finish the sign-in that is already open.';
    default:
      return 'Please try again or contact support if the issue persists.';
  }
}
