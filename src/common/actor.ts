import type { Role } from '../policy/roles';

/**
 * The identity a request runs as, resolved at the boundary from the bearer
 * token. The core trusts it as given.
 */
export interface Actor {
  readonly userId: number | null;
  readonly role: Role;
}

export const ANONYMOUS: Actor = Object.freeze({ userId: null, role: 'anonymous' });

export function isOwner(actor: Actor, authorId: number | null | undefined): boolean {
  return actor.userId !== null && authorId != null && actor.userId === authorId;
}
