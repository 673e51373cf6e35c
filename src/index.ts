/**
 * Client authentication orchestrator.
 *
 * `createAuthService()` wires configuration, logging, persistence and the
 * backend client around the host's platform integrations.
 */

import { AuthApiClient, type FetchFn } from './api/clients/auth-api.client';
import { loadAuthConfig, loadEnvFile, type AuthConfig } from './api/config';
import { AuthService } from './services/auth.service';
import {
  EmailSignInProvider,
  GuestSignInProvider,
  NativeSignInProvider,
  OAuthSignInProvider,
  type NativeAuthorizationController,
  type OAuthSdk,
  type PresentationContextProvider,
} from './services/auth-providers';
import { configureLogging } from './services/logging.service';
import { SessionStore } from './services/session-store.service';
import { createFileStorage, type KeyValueStorage } from './shared/utils/storage';
import type { StateDispatcher } from './shared/types/auth';

export interface CreateAuthServiceOptions {
  /** Platform identity controller supplied by the host */
  nativeController: NativeAuthorizationController;
  /** Builds the OAuth SDK for the configured client ID */
  createOAuthSdk: (clientId: string | null) => OAuthSdk;
  getPresentationContext: PresentationContextProvider;
  /** Defaults to the environment, after loading .env */
  config?: AuthConfig;
  /** Defaults to file storage under config.storageDir */
  storage?: KeyValueStorage;
  fetch?: FetchFn;
  dispatch?: StateDispatcher;
  generateGuestId?: () => string;
}

export function createAuthService(options: CreateAuthServiceOptions): AuthService {
  let config = options.config;
  if (!config) {
    loadEnvFile();
    config = loadAuthConfig();
  }
  configureLogging({ level: config.logLevel });

  const api = new AuthApiClient({
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.timeoutMs,
    fetch: options.fetch,
  });
  const store = new SessionStore(options.storage ?? createFileStorage(config.storageDir));

  return new AuthService({
    store,
    api,
    native: new NativeSignInProvider(options.nativeController),
    oauth: new OAuthSignInProvider(
      options.createOAuthSdk(config.oauthClientId),
      api,
      options.getPresentationContext
    ),
    email: new EmailSignInProvider(api),
    guest: new GuestSignInProvider(options.generateGuestId),
    dispatch: options.dispatch,
  });
}

export { AuthService } from './services/auth.service';
export { SessionValidationService } from './services/session-validation.service';
export type {
  SessionValidationOptions,
  ValidationReason,
} from './services/session-validation.service';
export { SessionStore } from './services/session-store.service';
export * from './services/auth-providers';
export {
  configureLogging,
  getLoggingService,
  type LoggingOptions,
  type LogLevel,
} from './services/logging.service';
export { AuthApiClient } from './api/clients/auth-api.client';
export type { ApiResult, AuthApiClientOptions, FetchFn } from './api/clients/auth-api.client';
export { loadAuthConfig, loadEnvFile, type AuthConfig } from './api/config';
export { AUTH_PROVIDERS, AUTH_ENDPOINTS, AUTH_STORAGE_KEYS } from './shared/constants';
export * from './shared/types';
export {
  createAuthError,
  getRecoverySuggestion,
  type AuthError,
  type AuthErrorCode,
} from './shared/utils/errors';
export { getSignInErrorMessage } from './shared/utils/auth-state';
export { parseJsonValue, toJsonValue, fromJsonValue } from './shared/utils/json';
export { MemoryStorage, createFileStorage, type KeyValueStorage } from './shared/utils/storage';
