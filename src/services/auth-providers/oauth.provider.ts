/**
 * OAuth Sign-In Provider
 *
 * Runs the third-party SDK on the presenting context, then exchanges the
 * identity token with the backend, which returns the canonical user and an
 * access token.
 */

import { createAuthError, describeError } from '../../shared/utils/errors';
import { createUser, parseTimestamp } from '../../shared/utils/user';
import type { AuthApiClient } from '../../api/clients/auth-api.client';
import type { AuthSuccessResponse, AuthProviderId } from '../../shared/types/auth';
import { getLoggingService } from '../logging.service';
import type { ProviderOutcome } from './types';

const log = getLoggingService().createLogger('Auth');

// ============ SDK Port ============

/** Opaque handle to whatever hosts the SDK's sign-in sheet */
export interface PresentationContext {
  readonly id: string;
}

export interface OAuthSdkUser {
  idToken: string | null;
  userId?: string;
  email?: string | null;
  name?: string | null;
  profileImageUrl?: string | null;
}

export interface OAuthSdk {
  /** Client ID the SDK was configured with (null when missing) */
  readonly clientId: string | null;
  signIn(context: PresentationContext): Promise<OAuthSdkUser>;
  /** Local sign-out; clears the SDK's cached account */
  signOut(): void;
}

/** Error thrown by the SDK; `code` follows the SDK's error domain */
export class OAuthSdkError extends Error {
  constructor(public readonly code: number, message = '') {
    super(message);
    this.name = 'OAuthSdkError';
  }
}

export type PresentationContextProvider = () => PresentationContext | null;

// ============ Error Mapping ============

export type OAuthErrorTag =
  | 'unknown'
  | 'keychain'
  | 'hasNoAuthInKeychain'
  | 'canceled'
  | 'emm'
  | 'scopesAlreadyGranted'
  | 'mismatchWithCurrentUser';

export const OAUTH_ERROR_CODES: ReadonlyMap<number, OAuthErrorTag> = new Map<number, OAuthErrorTag>([
  [-1, 'unknown'],
  [-2, 'keychain'],
  [-4, 'hasNoAuthInKeychain'],
  [-5, 'canceled'],
  [-6, 'emm'],
  [-8, 'scopesAlreadyGranted'],
  [-9, 'mismatchWithCurrentUser'],
]);

const OAUTH_FAILED_MESSAGE = 'Google Sign In failed';

export function mapOAuthError(error: unknown): ProviderOutcome {
  if (!(error instanceof OAuthSdkError)) {
    return {
      type: 'failure',
      error: createAuthError('PROVIDER_ERROR', OAUTH_FAILED_MESSAGE, { originalError: error }),
    };
  }

  const tag = OAUTH_ERROR_CODES.get(error.code);
  if (tag === 'canceled') return { type: 'cancelled' };

  const message = error.message ? `${OAUTH_FAILED_MESSAGE}: ${error.message}` : OAUTH_FAILED_MESSAGE;
  return {
    type: 'failure',
    error: createAuthError('PROVIDER_ERROR', message, { originalError: error }),
  };
}

/**
 * Build a session outcome from a backend auth response
 */
export function toSessionOutcome(
  response: AuthSuccessResponse,
  provider: AuthProviderId
): ProviderOutcome {
  return {
    type: 'success',
    user: createUser({
      id: response.user.id,
      email: response.user.email,
      name: response.user.name,
      profileImageUrl: response.user.profile_image_url,
      provider,
      createdAt: parseTimestamp(response.user.created_at),
    }),
    accessToken: response.access_token,
  };
}

// ============ Provider ============

export class OAuthSignInProvider {
  constructor(
    private readonly sdk: OAuthSdk,
    private readonly api: AuthApiClient,
    private readonly getPresentationContext: PresentationContextProvider
  ) {}

  async signIn(): Promise<ProviderOutcome> {
    const context = this.getPresentationContext();
    if (!context) {
      log.warn('No presentation context for OAuth sign-in');
      return { type: 'failure', error: createAuthError('PRESENTATION_ERROR') };
    }

    if (!this.sdk.clientId) {
      log.error('OAuth client ID is not configured');
      return {
        type: 'failure',
        error: createAuthError('CONFIGURATION_ERROR', 'Google Sign In is not configured'),
      };
    }

    let sdkUser: OAuthSdkUser;
    try {
      sdkUser = await this.sdk.signIn(context);
    } catch (error) {
      log.debug('OAuth SDK sign-in did not complete', { reason: describeError(error) });
      return mapOAuthError(error);
    }

    if (!sdkUser.idToken) {
      log.warn('OAuth SDK returned no identity token');
      return {
        type: 'failure',
        error: createAuthError('CREDENTIAL_ERROR', 'Failed to get ID token from Google'),
      };
    }

    const result = await this.api.verifyOAuthToken(sdkUser.idToken);
    if (!result.ok) {
      return { type: 'failure', error: result.error };
    }
    return toSessionOutcome(result.data, 'oauth');
  }

  /**
   * Clear the SDK's local account. Failures are logged; sign-out continues.
   */
  signOut(): void {
    try {
      this.sdk.signOut();
    } catch (error) {
      log.error('OAuth SDK sign-out failed', error);
    }
  }
}
