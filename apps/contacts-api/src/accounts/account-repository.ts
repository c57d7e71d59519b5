/**
 * Durable account store consumed by the auth core.
 * Every call runs on the caller's unit of work.
 */

import { Queryable } from '@contactbook/common/database';
import { Account, Role } from '@contactbook/common/types';

export interface NewAccount {
  username: string;
  passwordHash: string;
  role?: Role;
}

export interface AccountRepository {
  findByUsername(db: Queryable, username: string): Promise<Account | null>;
  /** Throws AccountExists when the username is taken */
  create(db: Queryable, input: NewAccount): Promise<Account>;
  markConfirmed(db: Queryable, accountId: number): Promise<void>;
  updateAvatar(db: Queryable, accountId: number, avatarUrl: string): Promise<Account | null>;
  list(db: Queryable): Promise<Account[]>;
}

export const ACCOUNT_REPOSITORY = Symbol('ACCOUNT_REPOSITORY');
