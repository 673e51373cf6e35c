/**
 * Native Sign-In Provider
 *
 * Drives the platform identity sheet through its delegate interface and
 * bridges the delegate callback back to the awaiting caller.
 *
 * SECURITY NOTE: the identity returned by the platform is trusted locally.
 * Unlike the OAuth flow, no backend verification of the identity token
 * happens here, so the session carries no access token. Server-side calls
 * that need a verified identity must not rely on a native session alone.
 */

import { SIGN_IN_CONFIG } from '../../shared/constants';
import { createAuthError } from '../../shared/utils/errors';
import { createUser } from '../../shared/utils/user';
import { getLoggingService } from '../logging.service';
import { BridgeBusyError, ContinuationBridge } from './continuation-bridge';
import type { ProviderOutcome } from './types';

const log = getLoggingService().createLogger('Auth');

// ============ Platform Port ============

export type NativeScope = 'fullName' | 'email';

export interface NativeNameComponents {
  givenName?: string | null;
  familyName?: string | null;
}

export interface NativeIdentityCredential {
  /** Stable platform user identifier */
  user: string;
  /** Only provided on the first authorization */
  email: string | null;
  /** Only provided on the first authorization */
  fullName: NativeNameComponents | null;
  identityToken: string | null;
  authorizationCode: string | null;
}

export interface NativeAuthorizationError {
  code: number;
  message: string;
}

export interface NativeAuthorizationDelegate {
  didCompleteWithAuthorization(credential: NativeIdentityCredential): void;
  didCompleteWithError(error: NativeAuthorizationError): void;
}

/**
 * Presents the platform sheet. The outcome arrives later on the delegate.
 * Throwing means the sheet could not be presented.
 */
export interface NativeAuthorizationController {
  performRequests(
    request: { requestedScopes: NativeScope[] },
    delegate: NativeAuthorizationDelegate
  ): void;
}

// ============ Error Mapping ============

export type NativeErrorTag =
  | 'canceled'
  | 'failed'
  | 'invalidResponse'
  | 'notHandled'
  | 'unknown'
  | 'idAuthenticationFailed'
  | 'misconfigured';

export const NATIVE_ERROR_CODES: ReadonlyMap<number, NativeErrorTag> = new Map<number, NativeErrorTag>([
  [1000, 'unknown'],
  [1001, 'canceled'],
  [1002, 'invalidResponse'],
  [1003, 'notHandled'],
  [1004, 'failed'],
  [-7026, 'idAuthenticationFailed'],
  [-1000, 'misconfigured'],
]);

const NATIVE_ERROR_OUTCOMES: Record<NativeErrorTag, (platformMessage: string) => ProviderOutcome> = {
  canceled: () => ({ type: 'cancelled' }),
  failed: (platformMessage) => providerFailure(`Apple Sign In failed: ${platformMessage}`),
  invalidResponse: () => providerFailure('Invalid response from Apple Sign In'),
  notHandled: () => providerFailure('Apple Sign In request was not handled'),
  unknown: () => providerFailure('Unknown Apple Sign In error'),
  idAuthenticationFailed: () =>
    providerFailure(
      'Apple ID authentication failed. Please check your Apple ID settings and try again.'
    ),
  misconfigured: () =>
    providerFailure(
      'Apple Sign In configuration error. Please ensure the app is properly configured for Apple Sign In.'
    ),
};

function providerFailure(message: string): ProviderOutcome {
  return { type: 'failure', error: createAuthError('PROVIDER_ERROR', message) };
}

export function mapNativeError(error: NativeAuthorizationError): ProviderOutcome {
  const tag = NATIVE_ERROR_CODES.get(error.code);
  if (!tag) return providerFailure(error.message);
  return NATIVE_ERROR_OUTCOMES[tag](error.message);
}

/**
 * Join the name parts the platform returned, if any
 */
export function formatDisplayName(fullName: NativeNameComponents | null): string {
  const parts = [fullName?.givenName, fullName?.familyName]
    .map((part) => part?.trim())
    .filter((part): part is string => !!part);
  return parts.length > 0 ? parts.join(' ') : SIGN_IN_CONFIG.NATIVE_FALLBACK_NAME;
}

// ============ Provider ============

export class NativeSignInProvider implements NativeAuthorizationDelegate {
  private readonly bridge = new ContinuationBridge<ProviderOutcome>();

  constructor(private readonly controller: NativeAuthorizationController) {}

  get isPending(): boolean {
    return this.bridge.isPending;
  }

  /**
   * Request the platform sheet (full name + email) and wait for the delegate.
   * A call made while another is pending fails without disturbing the first.
   */
  async signIn(): Promise<ProviderOutcome> {
    try {
      return await this.bridge.await(() =>
        this.controller.performRequests({ requestedScopes: ['fullName', 'email'] }, this)
      );
    } catch (error) {
      if (error instanceof BridgeBusyError) {
        log.warn('Native sign-in already in progress');
        return { type: 'failure', error: createAuthError('SIGN_IN_IN_PROGRESS') };
      }
      log.error('Failed to present native sign-in', error);
      return {
        type: 'failure',
        error: createAuthError('PRESENTATION_ERROR', null, { originalError: error }),
      };
    }
  }

  didCompleteWithAuthorization(credential: NativeIdentityCredential): void {
    let outcome: ProviderOutcome;
    if (!credential.user) {
      outcome = { type: 'failure', error: createAuthError('CREDENTIAL_ERROR') };
    } else {
      log.debug('Native credential received', {
        hasEmail: !!credential.email,
        hasFullName: !!credential.fullName,
      });
      outcome = {
        type: 'success',
        user: createUser({
          id: credential.user,
          email: credential.email,
          name: formatDisplayName(credential.fullName),
          provider: 'native',
        }),
        accessToken: null,
      };
    }
    this.settle(outcome);
  }

  didCompleteWithError(error: NativeAuthorizationError): void {
    log.debug('Native sign-in error', { code: error.code });
    this.settle(mapNativeError(error));
  }

  private settle(outcome: ProviderOutcome): void {
    if (!this.bridge.resolve(outcome)) {
      log.warn('Native delegate fired with no pending sign-in', { outcome: outcome.type });
    }
  }
}
