/**
 * Auth Service
 *
 * Owns the authentication state and coordinates every sign-in mechanism:
 * native platform identity, third-party OAuth, email/password and guest.
 * Each flow ends the same way: the outcome is normalized into a SignInResult,
 * the session is persisted and observers see exactly one state change.
 *
 * Sign-in operations never throw; every failure is encoded in the result.
 */

import {
  canTransition,
  cancelledResult,
  createAuthError,
  dedup,
  failureResult,
  isSameState,
} from '../shared/utils';
import type { AuthApiClient } from '../api/clients/auth-api.client';
import type {
  AuthenticationState,
  AuthProviderId,
  AuthStateListener,
  SessionValidationOutcome,
  SignInResult,
  StateDispatcher,
  User,
} from '../shared/types';
import type {
  EmailSignInProvider,
  NativeSignInProvider,
  OAuthSignInProvider,
  ProviderOutcome,
} from './auth-providers';
import { GuestSignInProvider } from './auth-providers/guest.provider';
import type { SessionStore } from './session-store.service';
import { getLoggingService } from './logging.service';

const log = getLoggingService().createLogger('Auth');

// ============ Types ============

export interface AuthServiceDeps {
  store: SessionStore;
  api: AuthApiClient;
  native: NativeSignInProvider;
  oauth: OAuthSignInProvider;
  email: EmailSignInProvider;
  guest?: GuestSignInProvider;
  /** Marshals state writes onto the UI context (applies immediately by default) */
  dispatch?: StateDispatcher;
}

const applyNow: StateDispatcher = (apply) => apply();

// ============ Service Implementation ============

export class AuthService {
  private state: AuthenticationState = { status: 'loading' };
  /** Signed-in user, kept while the UI shows an error over the session */
  private user: User | null = null;
  private listeners: Set<AuthStateListener> = new Set();

  private readonly store: SessionStore;
  private readonly api: AuthApiClient;
  private readonly native: NativeSignInProvider;
  private readonly oauth: OAuthSignInProvider;
  private readonly email: EmailSignInProvider;
  private readonly guest: GuestSignInProvider;
  private readonly dispatch: StateDispatcher;

  constructor(deps: AuthServiceDeps) {
    this.store = deps.store;
    this.api = deps.api;
    this.native = deps.native;
    this.oauth = deps.oauth;
    this.email = deps.email;
    this.guest = deps.guest ?? new GuestSignInProvider();
    this.dispatch = deps.dispatch ?? applyNow;

    this.restoreSession();
  }

  // ============ Observation ============

  /**
   * Subscribe to state changes
   */
  subscribe(listener: AuthStateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  getState(): AuthenticationState {
    return this.state;
  }

  getCurrentUser(): User | null {
    return this.state.status === 'authenticated' ? this.state.user : null;
  }

  getAccessToken(): string | null {
    return this.store.loadToken();
  }

  // ============ Sign-In ============

  /**
   * Sign in with the platform identity sheet.
   * One request at a time: a concurrent call fails with SIGN_IN_IN_PROGRESS
   * and the pending caller still receives its own result.
   */
  signInWithNativeProvider(): Promise<SignInResult> {
    return this.runSignIn('native', () => this.native.signIn());
  }

  signInWithOAuthProvider(): Promise<SignInResult> {
    return this.runSignIn('oauth', () => this.oauth.signIn());
  }

  signUpWithEmail(email: string, password: string, name: string): Promise<SignInResult> {
    return this.runSignIn('email', () => this.email.signUp(email, password, name));
  }

  signInWithEmail(email: string, password: string): Promise<SignInResult> {
    return this.runSignIn('email', () => this.email.signIn(email, password));
  }

  signInAsGuest(): Promise<SignInResult> {
    return this.runSignIn('guest', async () => this.guest.signIn());
  }

  private async runSignIn(
    provider: AuthProviderId,
    flow: () => Promise<ProviderOutcome>
  ): Promise<SignInResult> {
    if (this.state.status === 'error') {
      return failureResult(createAuthError('INVALID_STATE'));
    }

    let outcome: ProviderOutcome;
    try {
      outcome = await flow();
    } catch (error) {
      log.error(`Unexpected ${provider} sign-in failure`, error);
      outcome = {
        type: 'failure',
        error: createAuthError('PROVIDER_ERROR', null, { originalError: error }),
      };
    }

    switch (outcome.type) {
      case 'cancelled':
        log.info('Sign-in cancelled by user', { provider });
        return cancelledResult();
      case 'failure':
        log.warn('Sign-in failed', { provider, code: outcome.error.code });
        return failureResult(outcome.error);
      case 'success':
        return this.completeSignIn(outcome.user, outcome.accessToken);
    }
  }

  private completeSignIn(user: User, accessToken: string | null): SignInResult {
    if (!canTransition(this.state.status, 'authenticated')) {
      log.warn('Discarding sign-in result', { from: this.state.status });
      return failureResult(createAuthError('INVALID_STATE'));
    }

    try {
      this.store.save(user, accessToken);
    } catch (error) {
      log.error('Failed to persist session', error);
      return failureResult(createAuthError('STORAGE_ERROR', null, { originalError: error }));
    }

    this.user = user;
    getLoggingService().setUserId(user.id);
    this.transition({ status: 'authenticated', user });
    log.info('Sign-in successful', { provider: user.provider });
    return { type: 'success', user };
  }

  // ============ Sign-Out ============

  /**
   * Sign out. The backend logout is best-effort and not awaited; the local
   * session is always cleared, and the state ends unauthenticated even when
   * storage refuses. Safe to call when already signed out.
   */
  async signOut(): Promise<void> {
    if (this.user?.provider === 'oauth') {
      this.oauth.signOut();
    }

    this.logoutInBackground(this.store.loadToken());

    try {
      this.store.clear();
    } catch (error) {
      log.error('Stored session could not be cleared', error);
    }
    this.user = null;
    getLoggingService().setUserId(null);
    this.transition({ status: 'unauthenticated' });
  }

  private logoutInBackground(token: string | null): void {
    void this.api.logout(token).then(
      (result) => {
        if (!result.ok) {
          log.warn('Logout request failed', { code: result.error.code, status: result.status });
        }
      },
      (error: unknown) => log.error('Logout request failed', error)
    );
  }

  // ============ Error State ============

  /**
   * Surface an unrecoverable local failure over the current session.
   * Only valid while authenticated.
   */
  reportError(message: string): void {
    if (this.state.status !== 'authenticated') {
      log.warn('Ignoring error report outside an authenticated session', {
        status: this.state.status,
      });
      return;
    }
    this.transition({ status: 'error', message });
  }

  /**
   * Leave the error state. The session is discarded and the user must sign in again.
   */
  async dismissError(): Promise<void> {
    if (this.state.status !== 'error') return;
    await this.signOut();
  }

  // ============ Session Validation ============

  /**
   * Check the stored token with the backend (concurrent calls share one request).
   * A 401 signs the user out; other failures keep the session.
   */
  validateSession = dedup(() => this.doValidateSession());

  private async doValidateSession(): Promise<SessionValidationOutcome> {
    if (this.state.status !== 'authenticated') return 'skipped';

    const token = this.store.loadToken();
    if (!token) return 'skipped';

    const result = await this.api.me(token);
    if (result.ok) return 'valid';

    if (this.store.loadToken() !== token) {
      // Session changed while the request was in flight
      return 'skipped';
    }

    if (result.status === 401) {
      log.info('Session expired');
      await this.signOut();
      return 'expired';
    }

    log.warn('Session validation inconclusive', {
      code: result.error.code,
      status: result.status,
    });
    return 'unknown';
  }

  // ============ State ============

  private restoreSession(): void {
    const user = this.store.load();
    this.user = user;

    if (user) {
      getLoggingService().setUserId(user.id);
      log.info('Restored session', { provider: user.provider });
      this.transition({ status: 'authenticated', user });
    } else {
      this.transition({ status: 'unauthenticated' });
    }
  }

  private transition(next: AuthenticationState): void {
    this.dispatch(() => {
      const previous = this.state;
      if (!canTransition(previous.status, next.status)) {
        log.warn('Refusing state transition', { from: previous.status, to: next.status });
        return;
      }

      this.state = next;
      if (isSameState(previous, next)) return;

      this.listeners.forEach((listener) => {
        try {
          listener(next);
        } catch (error) {
          log.error('Auth state listener threw', error);
        }
      });
    });
  }
}
