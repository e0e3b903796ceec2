import type { UserRoleType } from '@modules/identity/permissions.js';

export type Caller =
  | { kind: 'guest' }
  | { kind: 'user'; userId: number; role: UserRoleType };

/**
 * Who is making a call into the core. Built once per request by the HTTP
 * layer and passed down explicitly.
 */
export interface CallerContext {
  requestId: string;
  caller: Caller;
}

export function guestContext(requestId: string): CallerContext {
  return { requestId, caller: { kind: 'guest' } };
}

export function userContext(
  requestId: string,
  user: { id: number; role: UserRoleType }
): CallerContext {
  return { requestId, caller: { kind: 'user', userId: user.id, role: user.role } };
}
