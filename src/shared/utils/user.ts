/**
 * User model helpers: construction, equality and the persisted form.
 */

import { z } from 'zod';
import type { AuthProviderId, StoredUser, User } from '../types/auth';

export const authProviderIdSchema = z.enum(['native', 'oauth', 'email', 'guest']);

export const storedUserSchema = z.object({
  id: z.string().min(1),
  email: z.string().nullable(),
  name: z.string(),
  profileImageUrl: z.string().nullable(),
  provider: authProviderIdSchema,
  createdAt: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'createdAt must be a timestamp',
  }),
});

export interface UserFields {
  id: string;
  email?: string | null;
  name: string;
  profileImageUrl?: string | null;
  provider: AuthProviderId;
  createdAt?: Date;
}

/**
 * Build an immutable user. createdAt is held as a timestamp and every read
 * returns a fresh Date, so callers cannot mutate it in place.
 */
export function createUser(fields: UserFields): User {
  const createdAtMs = (fields.createdAt ?? new Date()).getTime();
  return Object.freeze({
    id: fields.id,
    email: fields.email ?? null,
    name: fields.name,
    profileImageUrl: fields.profileImageUrl ?? null,
    provider: fields.provider,
    get createdAt(): Date {
      return new Date(createdAtMs);
    },
  });
}

export function isSameUser(a: User | null, b: User | null): boolean {
  if (!a || !b) return a === b;
  return a.id === b.id;
}

export function toStoredUser(user: User): StoredUser {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    profileImageUrl: user.profileImageUrl,
    provider: user.provider,
    createdAt: user.createdAt.toISOString(),
  };
}

export function fromStoredUser(stored: StoredUser): User {
  return createUser({ ...stored, createdAt: new Date(stored.createdAt) });
}

/**
 * Parse a server timestamp, falling back to now when missing or unreadable
 */
export function parseTimestamp(value: string | null | undefined): Date {
  if (!value) return new Date();
  const time = Date.parse(value);
  return Number.isNaN(time) ? new Date() : new Date(time);
}
