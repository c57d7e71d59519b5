import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CONTACT_REPOSITORY } from './contact-repository';
import { ContactsRepository } from './contacts.repository';
import { ContactsService } from './contacts.service';
import { ContactsController } from './contacts.controller';

@Module({
  imports: [AuthModule],
  controllers: [ContactsController],
  providers: [ContactsService, { provide: CONTACT_REPOSITORY, useClass: ContactsRepository }],
})
export class ContactsModule {}
