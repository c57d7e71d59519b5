/**
 * Durable contact store. Every call is scoped to the owning account.
 */

import { Queryable } from '@contactbook/common/database';
import { Contact, ContactChanges, ContactFilter, ContactInput } from '@contactbook/common/types';

export interface ContactRepository {
  create(db: Queryable, userId: number, input: ContactInput): Promise<Contact>;
  search(db: Queryable, userId: number, filter: ContactFilter): Promise<Contact[]>;
  findById(db: Queryable, userId: number, contactId: number): Promise<Contact | null>;
  update(db: Queryable, userId: number, contactId: number, changes: ContactChanges): Promise<Contact | null>;
  delete(db: Queryable, userId: number, contactId: number): Promise<boolean>;
  listWithBirthdays(db: Queryable, userId: number): Promise<Contact[]>;
}

export const CONTACT_REPOSITORY = Symbol('CONTACT_REPOSITORY');
