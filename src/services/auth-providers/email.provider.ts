/**
 * Email Sign-In Provider
 *
 * Email/password registration and login against the backend.
 */

import { z } from 'zod';
import { SIGN_IN_CONFIG } from '../../shared/constants';
import { createAuthError } from '../../shared/utils/errors';
import type { ApiResult, AuthApiClient } from '../../api/clients/auth-api.client';
import type { AuthSuccessResponse } from '../../shared/types/auth';
import { getLoggingService } from '../logging.service';
import { toSessionOutcome } from './oauth.provider';
import type { ProviderOutcome } from './types';

const log = getLoggingService().createLogger('Auth');

const emailSchema = z.string().trim().email('Please enter a valid email address');

const passwordSchema = z.string().min(1, 'Please enter your password');

/** Length is counted in characters (code points), not UTF-16 units */
const newPasswordSchema = passwordSchema.refine(
  (password) => [...password].length <= SIGN_IN_CONFIG.PASSWORD_MAX_LENGTH,
  `Password must be no more than ${SIGN_IN_CONFIG.PASSWORD_MAX_LENGTH} characters long`
);

const nameSchema = z.string().trim().min(1, 'Please enter your name');

const loginSchema = z.object({ email: emailSchema, password: passwordSchema });
const registerSchema = z.object({
  email: emailSchema,
  password: newPasswordSchema,
  name: nameSchema,
});

function validationFailure(error: z.ZodError): ProviderOutcome {
  const message = error.issues[0]?.message;
  return { type: 'failure', error: createAuthError('VALIDATION_ERROR', message) };
}

function toOutcome(result: ApiResult<AuthSuccessResponse>): ProviderOutcome {
  if (!result.ok) {
    return { type: 'failure', error: result.error };
  }
  return toSessionOutcome(result.data, 'email');
}

export class EmailSignInProvider {
  constructor(private readonly api: AuthApiClient) {}

  async signUp(email: string, password: string, name: string): Promise<ProviderOutcome> {
    const input = registerSchema.safeParse({ email, password, name });
    if (!input.success) {
      log.debug('Registration input rejected');
      return validationFailure(input.error);
    }
    return toOutcome(await this.api.register(input.data));
  }

  async signIn(email: string, password: string): Promise<ProviderOutcome> {
    const input = loginSchema.safeParse({ email, password });
    if (!input.success) {
      log.debug('Login input rejected');
      return validationFailure(input.error);
    }
    return toOutcome(await this.api.login(input.data));
  }
}
