/**
 * ContactBook Auth Types
 * Common types for authentication
 */

export enum Role {
  USER = 'user',
  ADMIN = 'admin',
}

export interface Account {
  id: number;
  username: string;
  password_hash: string;
  confirmed: boolean;
  role: Role;
  avatar_url: string | null;
  created_at: Date;
}

/**
 * Public identity fields of an account; this is what the session cache holds
 */
export interface Identity {
  id: number;
  username: string;
  role: Role;
  confirmed: boolean;
  avatar_url: string | null;
}

export function isRole(value: unknown): value is Role {
  return value === Role.USER || value === Role.ADMIN;
}

export function toIdentity(account: Account): Identity {
  return {
    id: account.id,
    username: account.username,
    role: account.role,
    confirmed: account.confirmed,
    avatar_url: account.avatar_url,
  };
}

export function isIdentity(value: unknown): value is Identity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'username' in value &&
    typeof value.username === 'string' &&
    'role' in value &&
    isRole(value.role) &&
    'confirmed' in value &&
    typeof value.confirmed === 'boolean' &&
    'avatar_url' in value &&
    (value.avatar_url === null || typeof value.avatar_url === 'string')
  );
}
