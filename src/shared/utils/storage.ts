import { LocalStorage } from 'node-localstorage';
import type { z } from 'zod';
import { getLoggingService } from '../../services/logging.service';

const log = getLoggingService().createLogger('Storage');

/** Synchronous key-value storage (the subset of the Web Storage API we use) */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

/**
 * File-backed storage that survives process restarts
 */
export function createFileStorage(directory: string): KeyValueStorage {
  return new LocalStorage(directory);
}

/**
 * In-process storage (tests and ephemeral sessions)
 */
export class MemoryStorage implements KeyValueStorage {
  private items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }

  get size(): number {
    return this.items.size;
  }
}

/**
 * Read and validate a JSON entry. Missing, empty, unparsable or invalid
 * data reads as null.
 */
export function getStoredJSON<T>(
  storage: KeyValueStorage,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | null {
  let stored: string | null;
  try {
    stored = storage.getItem(key);
  } catch (err) {
    log.error(`Failed to get ${key}`, err);
    return null;
  }
  if (stored === null || stored === '') return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(stored);
  } catch {
    log.warn(`Discarding unparsable ${key}`);
    return null;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    log.warn(`Discarding invalid ${key}`, { issues: result.error.issues.length });
    return null;
  }
  return result.data;
}

export function setStoredJSON<T>(storage: KeyValueStorage, key: string, value: T): void {
  try {
    storage.setItem(key, JSON.stringify(value));
  } catch (err) {
    log.error(`Failed to set ${key}`, err);
    throw err;
  }
}

/**
 * Remove a key. Returns false (after logging) when the storage refused.
 */
export function removeStored(storage: KeyValueStorage, key: string): boolean {
  try {
    storage.removeItem(key);
    return true;
  } catch (err) {
    log.error(`Failed to remove ${key}`, err);
    return false;
  }
}
