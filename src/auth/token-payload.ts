import { Role } from '../user/enums/role.enum';

export type TokenType = 'access' | 'refresh';

export interface TokenPayload {
  sub: string;
  username: string;
  role: Role;
  type: TokenType;
}

const ROLES: readonly string[] = Object.values(Role);

function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.includes(value);
}

/** Narrows a decoded JWT body; returns null for anything not issued by this API. */
export function parseTokenPayload(value: unknown, expected: TokenType): TokenPayload | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('sub' in value) || !('username' in value) || !('role' in value) || !('type' in value)) {
    return null;
  }
  const { sub, username, role, type } = value;
  if (typeof sub !== 'string' || typeof username !== 'string' || !isRole(role) || type !== expected) {
    return null;
  }
  return { sub, username, role, type: expected };
}
