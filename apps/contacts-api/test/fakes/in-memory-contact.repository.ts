import { Queryable } from '@contactbook/common/database';
import { Contact, ContactChanges, ContactFilter, ContactInput } from '@contactbook/common/types';
import { ContactRepository } from '../../src/contacts/contact-repository';

export class InMemoryContactRepository implements ContactRepository {
  readonly contacts = new Map<number, Contact>();
  private nextId = 1;

  async create(_db: Queryable, userId: number, input: ContactInput): Promise<Contact> {
    const now = new Date('2026-01-01T00:00:00Z');
    const contact: Contact = {
      id: this.nextId++,
      user_id: userId,
      first_name: input.first_name,
      last_name: input.last_name,
      email: input.email,
      phone: input.phone,
      birthday: input.birthday ?? null,
      additional_info: input.additional_info ?? null,
      created_at: now,
      updated_at: now,
    };
    this.contacts.set(contact.id, contact);
    return { ...contact };
  }

  async search(_db: Queryable, userId: number, filter: ContactFilter): Promise<Contact[]> {
    const name = filter.name?.toLowerCase();
    const email = filter.email?.toLowerCase();

    return this.owned(userId).filter(
      (contact) =>
        (!name ||
          contact.first_name.toLowerCase().includes(name) ||
          contact.last_name.toLowerCase().includes(name)) &&
        (!email || contact.email.toLowerCase().includes(email)),
    );
  }

  async findById(_db: Queryable, userId: number, contactId: number): Promise<Contact | null> {
    const contact = this.contacts.get(contactId);
    return contact && contact.user_id === userId ? { ...contact } : null;
  }

  async update(
    _db: Queryable,
    userId: number,
    contactId: number,
    changes: ContactChanges,
  ): Promise<Contact | null> {
    const contact = this.contacts.get(contactId);
    if (!contact || contact.user_id !== userId) {
      return null;
    }

    const updated: Contact = {
      ...contact,
      first_name: changes.first_name ?? contact.first_name,
      last_name: changes.last_name ?? contact.last_name,
      email: changes.email ?? contact.email,
      phone: changes.phone ?? contact.phone,
      birthday: changes.birthday === undefined ? contact.birthday : changes.birthday,
      additional_info:
        changes.additional_info === undefined ? contact.additional_info : changes.additional_info,
    };
    this.contacts.set(contactId, updated);
    return { ...updated };
  }

  async delete(_db: Queryable, userId: number, contactId: number): Promise<boolean> {
    const contact = this.contacts.get(contactId);
    if (!contact || contact.user_id !== userId) {
      return false;
    }
    return this.contacts.delete(contactId);
  }

  async listWithBirthdays(_db: Queryable, userId: number): Promise<Contact[]> {
    return this.owned(userId).filter((contact) => contact.birthday !== null);
  }

  private owned(userId: number): Contact[] {
    return [...this.contacts.values()]
      .filter((contact) => contact.user_id === userId)
      .map((contact) => ({ ...contact }));
  }
}
