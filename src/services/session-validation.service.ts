/**
 * Session Validation Service
 *
 * Re-validates the backend session when the host app returns to the
 * foreground. Hosts forward their lifecycle events; this service decides
 * whether a check is worth a network call.
 */

import { SESSION_CONFIG } from '../shared/constants';
import type { SessionValidationOutcome } from '../shared/types/auth';
import type { AuthService } from './auth.service';
import { getLoggingService } from './logging.service';

const log = getLoggingService().createLogger('Session');

// ============ Types ============

export type ValidationReason = 'foreground' | 'active' | 'manual';

export interface SessionValidationOptions {
  cooldownMs?: number;
  minBackgroundMs?: number;
  now?: () => number;
}

// ============ Service Implementation ============

export class SessionValidationService {
  private lastValidationAt: number | null = null;
  private backgroundedAt: number | null = null;
  private expired = false;

  private readonly cooldownMs: number;
  private readonly minBackgroundMs: number;
  private readonly now: () => number;

  constructor(
    private readonly auth: Pick<AuthService, 'validateSession'>,
    options: SessionValidationOptions = {}
  ) {
    this.cooldownMs = options.cooldownMs ?? SESSION_CONFIG.VALIDATION_COOLDOWN_MS;
    this.minBackgroundMs = options.minBackgroundMs ?? SESSION_CONFIG.MIN_BACKGROUND_MS;
    this.now = options.now ?? Date.now;
  }

  /** Whether the last validation found the session expired */
  get sessionExpired(): boolean {
    return this.expired;
  }

  clearSessionExpired(): void {
    this.expired = false;
  }

  onBackground(): void {
    this.backgroundedAt = this.now();
  }

  onForeground(): Promise<SessionValidationOutcome> {
    return this.validateIfNeeded('foreground');
  }

  onActive(): Promise<SessionValidationOutcome> {
    return this.validateIfNeeded('active');
  }

  /**
   * Validate unless a check ran recently or the app was only briefly in
   * the background. Returns 'skipped' when no request was made.
   */
  async validateIfNeeded(reason: ValidationReason): Promise<SessionValidationOutcome> {
    const now = this.now();

    if (this.lastValidationAt !== null && now - this.lastValidationAt < this.cooldownMs) {
      log.debug('Validation skipped (cooldown)', { reason });
      return 'skipped';
    }

    if (this.backgroundedAt !== null) {
      const awayMs = now - this.backgroundedAt;
      this.backgroundedAt = null;
      if (awayMs < this.minBackgroundMs) {
        log.debug('Validation skipped (brief background)', { reason, awayMs });
        return 'skipped';
      }
    }

    this.lastValidationAt = now;
    const outcome = await this.auth.validateSession();

    if (outcome === 'expired') {
      this.expired = true;
    }
    log.info('Session validated', { reason, outcome });
    return outcome;
  }
}
