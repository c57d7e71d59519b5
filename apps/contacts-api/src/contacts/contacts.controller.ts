/**
 * Contacts Controller
 * Routes: /contacts/*
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { Contact } from '@contactbook/common/types';
import { CurrentSession } from '../auth/current-session.decorator';
import { AuthenticatedSession } from '../auth/authenticated-session';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { ContactsService } from './contacts.service';
import {
  ContactQueryDto,
  CreateContactDto,
  DeleteContactResponseDto,
  UpdateContactDto,
} from './dto/contact.dto';

@Controller('contacts')
@UseGuards(JwtAuthGuard)
export class ContactsController {
  constructor(private contactsService: ContactsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @CurrentSession() session: AuthenticatedSession,
    @Body() dto: CreateContactDto,
  ): Promise<Contact> {
    return this.contactsService.create(session.identity.id, dto);
  }

  /**
   * GET /contacts?name=&email=
   */
  @Get()
  async search(
    @CurrentSession() session: AuthenticatedSession,
    @Query() query: ContactQueryDto,
  ): Promise<Contact[]> {
    return this.contactsService.search(session.identity.id, query);
  }

  /**
   * GET /contacts/upcoming-birthdays
   * Declared before :id so the literal segment wins
   */
  @Get('upcoming-birthdays')
  async upcomingBirthdays(@CurrentSession() session: AuthenticatedSession): Promise<Contact[]> {
    return this.contactsService.upcomingBirthdays(session.identity.id);
  }

  @Get(':id')
  async get(
    @CurrentSession() session: AuthenticatedSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<Contact> {
    return this.contactsService.get(session.identity.id, id);
  }

  @Put(':id')
  async update(
    @CurrentSession() session: AuthenticatedSession,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateContactDto,
  ): Promise<Contact> {
    return this.contactsService.update(session.identity.id, id, dto);
  }

  @Delete(':id')
  async remove(
    @CurrentSession() session: AuthenticatedSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<DeleteContactResponseDto> {
    return this.contactsService.remove(session.identity.id, id);
  }
}
