import type { User } from '../../shared/types/auth';
import type { AuthError } from '../../shared/utils/errors';

/** Normalized result of one provider flow, before the orchestrator applies it */
export type ProviderOutcome =
  | { type: 'success'; user: User; accessToken: string | null }
  | { type: 'failure'; error: AuthError }
  | { type: 'cancelled' };
