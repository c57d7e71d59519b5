import { Queryable } from '@contactbook/common/database';
import { ERRORS } from '@contactbook/common/errors';
import { Account, Role } from '@contactbook/common/types';
import { AccountRepository, NewAccount } from '../../src/accounts/account-repository';

export class InMemoryAccountRepository implements AccountRepository {
  readonly accounts = new Map<string, Account>();
  lookups = 0;
  private nextId = 1;

  async findByUsername(_db: Queryable, username: string): Promise<Account | null> {
    this.lookups++;
    const account = this.accounts.get(username);
    return account ? { ...account } : null;
  }

  async create(_db: Queryable, input: NewAccount): Promise<Account> {
    if (this.accounts.has(input.username)) {
      throw ERRORS.AccountExists(input.username);
    }

    const account: Account = {
      id: this.nextId++,
      username: input.username,
      password_hash: input.passwordHash,
      confirmed: false,
      role: input.role ?? Role.USER,
      avatar_url: null,
      created_at: new Date('2026-01-01T00:00:00Z'),
    };
    this.accounts.set(account.username, account);
    return { ...account };
  }

  async markConfirmed(_db: Queryable, accountId: number): Promise<void> {
    const account = this.byId(accountId);
    if (account) {
      account.confirmed = true;
    }
  }

  async updateAvatar(_db: Queryable, accountId: number, avatarUrl: string): Promise<Account | null> {
    const account = this.byId(accountId);
    if (!account) {
      return null;
    }
    account.avatar_url = avatarUrl;
    return { ...account };
  }

  async list(_db: Queryable): Promise<Account[]> {
    return [...this.accounts.values()].map((account) => ({ ...account }));
  }

  /**
   * Test helper: insert an account directly
   */
  seed(overrides: Partial<Account> & Pick<Account, 'username' | 'password_hash'>): Account {
    const account: Account = {
      id: this.nextId++,
      confirmed: false,
      role: Role.USER,
      avatar_url: null,
      created_at: new Date('2026-01-01T00:00:00Z'),
      ...overrides,
    };
    this.accounts.set(account.username, account);
    return { ...account };
  }

  private byId(accountId: number): Account | undefined {
    return [...this.accounts.values()].find((account) => account.id === accountId);
  }
}
