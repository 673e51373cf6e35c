/**
 * Auth API Client
 *
 * Typed request/response transport for the backend auth endpoints.
 *
 * Endpoints:
 * - POST /api/auth/register - Create an email/password account
 * - POST /api/auth/login    - Email/password sign-in
 * - POST /api/auth/google   - Verify an OAuth identity token
 * - POST /api/auth/logout   - Invalidate the session (bearer token)
 * - GET  /api/auth/me       - Validate the session (bearer token)
 *
 * Every call makes exactly one network attempt and resolves to an ApiResult;
 * nothing here throws. Retries are a caller decision.
 */

import { z } from 'zod';
import { AUTH_ENDPOINTS } from '../../shared/constants';
import { createAuthError, describeError, type AuthError } from '../../shared/utils/errors';
import { getStringField, parseJsonValue } from '../../shared/utils/json';
import { getLoggingService } from '../../services/logging.service';
import type {
  AuthSuccessResponse,
  BackendUser,
  LoginRequest,
  OAuthTokenRequest,
  RegisterRequest,
} from '../../shared/types/auth';

const log = getLoggingService().createLogger('API');

// ============ Types ============

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export type ApiResult<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number | null; error: AuthError };

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface RequestOptions<T> {
  method: HttpMethod;
  body?: unknown;
  bearerToken?: string | null;
  /** Success payload schema */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface AuthApiClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchFn;
}

// ============ Schemas ============

export const backendUserSchema: z.ZodType<BackendUser, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  email: z.string(),
  name: z.string(),
  profile_image_url: z.string().nullable().optional(),
  created_at: z.string().nullable().optional(),
});

export const authSuccessSchema: z.ZodType<AuthSuccessResponse, z.ZodTypeDef, unknown> = z.object({
  user: backendUserSchema,
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  message: z.string().optional(),
});

/** Accepts any body; for endpoints whose response is not used */
const ignoredBodySchema = z.unknown().transform((): void => undefined);

const AUTH_FAILED_FALLBACK = 'Authentication failed';

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

// ============ Client ============

export class AuthApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: AuthApiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Perform one request. 200 decodes the typed payload; any other status
   * decodes the server's {detail} message.
   */
  async request<T>(path: string, options: RequestOptions<T>): Promise<ApiResult<T>> {
    let url: string;
    try {
      url = new URL(`${this.baseUrl}${path}`).toString();
    } catch (error) {
      log.error('Invalid endpoint', error);
      return {
        ok: false,
        status: null,
        error: createAuthError('NETWORK_ERROR', null, { originalError: error }),
      };
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (options.bearerToken) {
      headers.Authorization = `Bearer ${options.bearerToken}`;
    }

    log.debug('Request', { method: options.method, path });

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: options.method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = isTimeout(error);
      log.warn(timedOut ? 'Request timed out' : 'Request failed', {
        path,
        reason: describeError(error),
      });
      return {
        ok: false,
        status: null,
        error: createAuthError('NETWORK_ERROR', timedOut ? 'The request timed out' : null, {
          originalError: error,
        }),
      };
    }

    log.debug('Response status', { path, status: response.status });

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      log.warn('Failed to read response body', { path, reason: describeError(error) });
      return {
        ok: false,
        status: response.status,
        error: createAuthError('NETWORK_ERROR', null, { originalError: error }),
      };
    }

    if (response.status !== 200) {
      const detail = getStringField(parseJsonValue(text), 'detail');
      return {
        ok: false,
        status: response.status,
        error: createAuthError('BACKEND_ERROR', detail ?? AUTH_FAILED_FALLBACK, {
          status: response.status,
        }),
      };
    }

    return this.decode(path, response.status, text, options.schema);
  }

  private decode<T>(
    path: string,
    status: number,
    text: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): ApiResult<T> {
    let parsed: unknown = null;
    try {
      if (text.trim() !== '') parsed = JSON.parse(text);
    } catch (error) {
      log.warn('Response is not JSON', { path });
      return {
        ok: false,
        status,
        error: createAuthError('INVALID_RESPONSE', null, { status, originalError: error }),
      };
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      log.warn('Response failed validation', { path, issues: result.error.issues.length });
      return {
        ok: false,
        status,
        error: createAuthError('INVALID_RESPONSE', null, { status, originalError: result.error }),
      };
    }
    return { ok: true, status, data: result.data };
  }

  // ============ Endpoints ============

  register(body: RegisterRequest): Promise<ApiResult<AuthSuccessResponse>> {
    return this.request(AUTH_ENDPOINTS.REGISTER, { method: 'POST', body, schema: authSuccessSchema });
  }

  login(body: LoginRequest): Promise<ApiResult<AuthSuccessResponse>> {
    return this.request(AUTH_ENDPOINTS.LOGIN, { method: 'POST', body, schema: authSuccessSchema });
  }

  verifyOAuthToken(idToken: string): Promise<ApiResult<AuthSuccessResponse>> {
    const body: OAuthTokenRequest = { id_token: idToken };
    return this.request(AUTH_ENDPOINTS.OAUTH, { method: 'POST', body, schema: authSuccessSchema });
  }

  logout(bearerToken: string | null): Promise<ApiResult<void>> {
    return this.request(AUTH_ENDPOINTS.LOGOUT, {
      method: 'POST',
      bearerToken,
      schema: ignoredBodySchema,
    });
  }

  me(bearerToken: string): Promise<ApiResult<BackendUser>> {
    return this.request(AUTH_ENDPOINTS.ME, { method: 'GET', bearerToken, schema: backendUserSchema });
  }
}
