/**
 * Contacts Repository
 * PostgreSQL implementation of ContactRepository
 */

import { Injectable } from '@nestjs/common';
import { Queryable } from '@contactbook/common/database';
import { Contact, ContactChanges, ContactFilter, ContactInput } from '@contactbook/common/types';
import { ContactRepository } from './contact-repository';

type ContactRow = {
  id: number;
  user_id: number;
  first_name: string;
  last_name: string;
  email: string;
  phone: string;
  birthday: string | null;
  additional_info: string | null;
  created_at: Date;
  updated_at: Date;
};

const CONTACT_COLUMNS =
  'id, user_id, first_name, last_name, email, phone, birthday, additional_info, created_at, updated_at';

// Columns a caller may change, in a fixed order
const UPDATABLE_COLUMNS = [
  'first_name',
  'last_name',
  'email',
  'phone',
  'birthday',
  'additional_info',
] as const;

@Injectable()
export class ContactsRepository implements ContactRepository {
  async create(db: Queryable, userId: number, input: ContactInput): Promise<Contact> {
    const result = await db.query<ContactRow>(
      `INSERT INTO contacts (user_id, first_name, last_name, email, phone, birthday, additional_info)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${CONTACT_COLUMNS}`,
      [
        userId,
        input.first_name,
        input.last_name,
        input.email,
        input.phone,
        input.birthday ?? null,
        input.additional_info ?? null,
      ],
    );

    return toContact(result.rows[0]);
  }

  /**
   * Case-insensitive partial match on first or last name and/or email
   */
  async search(db: Queryable, userId: number, filter: ContactFilter): Promise<Contact[]> {
    const conditions = ['user_id = $1'];
    const params: unknown[] = [userId];

    if (filter.name) {
      params.push(`%${escapeLike(filter.name)}%`);
      conditions.push(`(first_name ILIKE $${params.length} OR last_name ILIKE $${params.length})`);
    }
    if (filter.email) {
      params.push(`%${escapeLike(filter.email)}%`);
      conditions.push(`email ILIKE $${params.length}`);
    }

    const result = await db.query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS}
       FROM contacts
       WHERE ${conditions.join(' AND ')}
       ORDER BY id`,
      params,
    );

    return result.rows.map(toContact);
  }

  async findById(db: Queryable, userId: number, contactId: number): Promise<Contact | null> {
    const result = await db.query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS}
       FROM contacts
       WHERE id = $1 AND user_id = $2`,
      [contactId, userId],
    );

    return result.rows.length > 0 ? toContact(result.rows[0]) : null;
  }

  async update(
    db: Queryable,
    userId: number,
    contactId: number,
    changes: ContactChanges,
  ): Promise<Contact | null> {
    const assignments: string[] = [];
    const params: unknown[] = [contactId, userId];

    for (const column of UPDATABLE_COLUMNS) {
      const value = changes[column];
      if (value !== undefined) {
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    if (assignments.length === 0) {
      return this.findById(db, userId, contactId);
    }

    const result = await db.query<ContactRow>(
      `UPDATE contacts
       SET ${assignments.join(', ')}, updated_at = now()
       WHERE id = $1 AND user_id = $2
       RETURNING ${CONTACT_COLUMNS}`,
      params,
    );

    return result.rows.length > 0 ? toContact(result.rows[0]) : null;
  }

  async delete(db: Queryable, userId: number, contactId: number): Promise<boolean> {
    const result = await db.query(
      `DELETE FROM contacts
       WHERE id = $1 AND user_id = $2`,
      [contactId, userId],
    );

    return (result.rowCount ?? 0) > 0;
  }

  async listWithBirthdays(db: Queryable, userId: number): Promise<Contact[]> {
    const result = await db.query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS}
       FROM contacts
       WHERE user_id = $1 AND birthday IS NOT NULL
       ORDER BY id`,
      [userId],
    );

    return result.rows.map(toContact);
  }
}

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    user_id: row.user_id,
    first_name: row.first_name,
    last_name: row.last_name,
    email: row.email,
    phone: row.phone,
    birthday: row.birthday,
    additional_info: row.additional_info,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

// Backslash is Postgres' default LIKE escape character
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}
