import type { Actor } from '../common/actor';
import { ForbiddenError } from '../common/errors';
import type { Role } from './roles';

export type Action =
  | 'catalog:read'
  | 'content:read'
  | 'content:create'
  | 'content:modify'
  | 'catalog:write'
  | 'user:set-role'
  | 'user:manage';

export type Decision = 'allow' | 'deny';

/**
 * `own` grants the action only on resources the actor authored.
 */
type Grant = 'allow' | 'own' | 'deny';

const POLICY: Readonly<Record<Action, Readonly<Record<Role, Grant>>>> = {
  'catalog:read': { anonymous: 'allow', user: 'allow', moderator: 'allow', admin: 'allow' },
  'content:read': { anonymous: 'allow', user: 'allow', moderator: 'allow', admin: 'allow' },
  'content:create': { anonymous: 'deny', user: 'allow', moderator: 'allow', admin: 'allow' },
  'content:modify': { anonymous: 'deny', user: 'own', moderator: 'allow', admin: 'allow' },
  'catalog:write': { anonymous: 'deny', user: 'deny', moderator: 'deny', admin: 'allow' },
  'user:set-role': { anonymous: 'deny', user: 'deny', moderator: 'deny', admin: 'allow' },
  'user:manage': { anonymous: 'deny', user: 'deny', moderator: 'deny', admin: 'allow' },
};

export function decide(role: Role, action: Action, isOwner = false): Decision {
  const grant = POLICY[action][role];
  if (grant === 'allow' || (grant === 'own' && isOwner)) {
    return 'allow';
  }
  return 'deny';
}

/**
 * Throws ForbiddenError when the policy denies the action. Call it before any
 * read that only exists to serve the mutation.
 */
export function authorize(actor: Actor, action: Action, isOwner = false): void {
  if (decide(actor.role, action, isOwner) === 'deny') {
    throw new ForbiddenError();
  }
}
