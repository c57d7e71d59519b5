/**
 * Accounts Repository
 * PostgreSQL implementation of AccountRepository
 */

import { Injectable } from '@nestjs/common';
import { Queryable } from '@contactbook/common/database';
import { ERRORS } from '@contactbook/common/errors';
import { Account, Role, isRole } from '@contactbook/common/types';
import { AccountRepository, NewAccount } from './account-repository';

type AccountRow = {
  id: number;
  username: string;
  password_hash: string;
  confirmed: boolean;
  role: string;
  avatar_url: string | null;
  created_at: Date;
};

const ACCOUNT_COLUMNS = 'id, username, password_hash, confirmed, role, avatar_url, created_at';

@Injectable()
export class AccountsRepository implements AccountRepository {
  async findByUsername(db: Queryable, username: string): Promise<Account | null> {
    const result = await db.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS}
       FROM accounts
       WHERE username = $1`,
      [username],
    );

    return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
  }

  async create(db: Queryable, input: NewAccount): Promise<Account> {
    try {
      const result = await db.query<AccountRow>(
        `INSERT INTO accounts (username, password_hash, role)
         VALUES ($1, $2, $3)
         RETURNING ${ACCOUNT_COLUMNS}`,
        [input.username, input.passwordHash, input.role ?? Role.USER],
      );
      return toAccount(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw ERRORS.AccountExists(input.username, error instanceof Error ? error : undefined);
      }
      throw error;
    }
  }

  async markConfirmed(db: Queryable, accountId: number): Promise<void> {
    await db.query(
      `UPDATE accounts
       SET confirmed = TRUE
       WHERE id = $1`,
      [accountId],
    );
  }

  async updateAvatar(db: Queryable, accountId: number, avatarUrl: string): Promise<Account | null> {
    const result = await db.query<AccountRow>(
      `UPDATE accounts
       SET avatar_url = $2
       WHERE id = $1
       RETURNING ${ACCOUNT_COLUMNS}`,
      [accountId, avatarUrl],
    );

    return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
  }

  async list(db: Queryable): Promise<Account[]> {
    const result = await db.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS}
       FROM accounts
       ORDER BY id`,
    );

    return result.rows.map(toAccount);
  }
}

function toAccount(row: AccountRow): Account {
  if (!isRole(row.role)) {
    throw new Error(`Account ${row.id} has unknown role '${row.role}'`);
  }

  return {
    id: row.id,
    username: row.username,
    password_hash: row.password_hash,
    confirmed: row.confirmed,
    role: row.role,
    avatar_url: row.avatar_url,
    created_at: row.created_at,
  };
}

// Postgres unique_violation
function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}
