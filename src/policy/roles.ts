export const ROLES = ['anonymous', 'user', 'moderator', 'admin'] as const;

export type Role = (typeof ROLES)[number];

/** Roles a user record can hold; `anonymous` only ever describes an actor. */
export const STORED_ROLES = ['user', 'moderator', 'admin'] as const;

export type StoredRole = (typeof STORED_ROLES)[number];

export function isStoredRole(value: unknown): value is StoredRole {
  return STORED_ROLES.some((role) => role === value);
}
