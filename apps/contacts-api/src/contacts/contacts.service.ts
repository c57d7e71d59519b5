/**
 * Contacts Service
 * Per-account contact book
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { UNIT_OF_WORK, UnitOfWork } from '@contactbook/common/database';
import { ERRORS } from '@contactbook/common/errors';
import { Contact, ContactChanges, ContactFilter, ContactInput } from '@contactbook/common/types';
import { CONTACT_REPOSITORY, ContactRepository } from './contact-repository';
import { upcomingBirthdays } from './birthdays';
import { DeleteContactResponseDto } from './dto/contact.dto';

@Injectable()
export class ContactsService {
  private readonly logger = new Logger(ContactsService.name);

  constructor(
    @Inject(CONTACT_REPOSITORY) private contacts: ContactRepository,
    @Inject(UNIT_OF_WORK) private unitOfWork: UnitOfWork,
  ) {}

  async create(userId: number, input: ContactInput): Promise<Contact> {
    const contact = await this.unitOfWork.run((db) => this.contacts.create(db, userId, input));
    this.logger.log(`Contact ${contact.id} created for account ${userId}`);
    return contact;
  }

  async search(userId: number, filter: ContactFilter): Promise<Contact[]> {
    return this.unitOfWork.run((db) => this.contacts.search(db, userId, filter));
  }

  /**
   * A contact owned by another account is reported as not found
   */
  async get(userId: number, contactId: number): Promise<Contact> {
    const contact = await this.unitOfWork.run((db) =>
      this.contacts.findById(db, userId, contactId),
    );
    if (!contact) {
      throw ERRORS.ContactNotFound(contactId);
    }
    return contact;
  }

  async update(userId: number, contactId: number, changes: ContactChanges): Promise<Contact> {
    const contact = await this.unitOfWork.run((db) =>
      this.contacts.update(db, userId, contactId, changes),
    );
    if (!contact) {
      throw ERRORS.ContactNotFound(contactId);
    }
    return contact;
  }

  async remove(userId: number, contactId: number): Promise<DeleteContactResponseDto> {
    const deleted = await this.unitOfWork.run((db) =>
      this.contacts.delete(db, userId, contactId),
    );
    if (!deleted) {
      throw ERRORS.ContactNotFound(contactId);
    }

    this.logger.log(`Contact ${contactId} deleted for account ${userId}`);
    return { detail: 'Contact deleted successfully.' };
  }

  async upcomingBirthdays(userId: number, today: Date = new Date()): Promise<Contact[]> {
    const contacts = await this.unitOfWork.run((db) =>
      this.contacts.listWithBirthdays(db, userId),
    );
    return upcomingBirthdays(contacts, today);
  }
}
