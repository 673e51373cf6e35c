import { v4 as uuidv4 } from 'uuid';
import { SIGN_IN_CONFIG } from '../../shared/constants';
import { createUser } from '../../shared/utils/user';
import type { ProviderOutcome } from './types';

/**
 * Guest Sign-In Provider
 *
 * Purely local: synthesizes an anonymous user. Never touches the network.
 */
export class GuestSignInProvider {
  constructor(private readonly generateId: () => string = () => uuidv4()) {}

  signIn(): ProviderOutcome {
    return {
      type: 'success',
      user: createUser({
        id: `${SIGN_IN_CONFIG.GUEST_ID_PREFIX}${this.generateId()}`,
        email: null,
        name: SIGN_IN_CONFIG.GUEST_NAME,
        provider: 'guest',
      }),
      accessToken: null,
    };
  }
}
