/**
 * Session Store
 *
 * Persists the signed-in user and the backend access token under two
 * independent keys. Synchronous, local, no business logic.
 */

import { AUTH_STORAGE_KEYS } from '../shared/constants';
import {
  getStoredJSON,
  removeStored,
  setStoredJSON,
  type KeyValueStorage,
} from '../shared/utils/storage';
import { fromStoredUser, storedUserSchema, toStoredUser } from '../shared/utils/user';
import type { User } from '../shared/types/auth';
import { getLoggingService } from './logging.service';

const log = getLoggingService().createLogger('Storage');

export class SessionStore {
  constructor(private readonly storage: KeyValueStorage) {}

  /**
   * Write the token, then the user. A missing token removes any stored one
   * so a previous account's token never outlives its user. If either write
   * fails the previous pair is put back (or both keys are discarded) and the
   * error is rethrown.
   */
  save(user: User, token?: string | null): void {
    const previousToken = this.storage.getItem(AUTH_STORAGE_KEYS.ACCESS_TOKEN);

    if (token) {
      this.storage.setItem(AUTH_STORAGE_KEYS.ACCESS_TOKEN, token);
    } else if (!this.discard(AUTH_STORAGE_KEYS.ACCESS_TOKEN)) {
      throw new Error('Failed to remove the previous access token');
    }

    try {
      setStoredJSON(this.storage, AUTH_STORAGE_KEYS.CURRENT_USER, toStoredUser(user));
    } catch (error) {
      this.restoreToken(previousToken);
      throw error;
    }
    log.debug('Session saved', { provider: user.provider, hasToken: !!token });
  }

  /**
   * Load the persisted user; absent or corrupt data reads as no session
   */
  load(): User | null {
    const stored = getStoredJSON(this.storage, AUTH_STORAGE_KEYS.CURRENT_USER, storedUserSchema);
    return stored ? fromStoredUser(stored) : null;
  }

  loadToken(): string | null {
    try {
      return this.storage.getItem(AUTH_STORAGE_KEYS.ACCESS_TOKEN) || null;
    } catch (error) {
      log.error('Failed to read access token', error);
      return null;
    }
  }

  /**
   * Remove both keys. Throws when a key could neither be removed nor
   * overwritten, since that session would be restored on the next launch.
   */
  clear(): void {
    const userCleared = this.discard(AUTH_STORAGE_KEYS.CURRENT_USER);
    const tokenCleared = this.discard(AUTH_STORAGE_KEYS.ACCESS_TOKEN);
    if (!userCleared || !tokenCleared) {
      throw new Error('Failed to clear the stored session');
    }
    log.debug('Session cleared');
  }

  // ============ Helpers ============

  /**
   * Remove a key, or blank it when removal fails. Blank entries read as absent.
   */
  private discard(key: string): boolean {
    if (removeStored(this.storage, key)) return true;
    try {
      this.storage.setItem(key, '');
      log.warn(`Blanked ${key} after a failed removal`);
      return true;
    } catch (error) {
      log.error(`Failed to blank ${key}`, error);
      return false;
    }
  }

  private restoreToken(previous: string | null): void {
    try {
      if (previous === null) {
        this.storage.removeItem(AUTH_STORAGE_KEYS.ACCESS_TOKEN);
      } else {
        this.storage.setItem(AUTH_STORAGE_KEYS.ACCESS_TOKEN, previous);
      }
    } catch (error) {
      log.error('Failed to restore the previous access token', error);
      this.discard(AUTH_STORAGE_KEYS.CURRENT_USER);
      this.discard(AUTH_STORAGE_KEYS.ACCESS_TOKEN);
    }
  }
}
