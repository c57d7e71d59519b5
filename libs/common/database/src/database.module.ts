/**
 * ContactBook Database Module
 * Provides the connection pool and the unit of work used by repositories
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseService } from './database.service';
import { UNIT_OF_WORK } from './unit-of-work';

@Module({
  imports: [ConfigModule],
  providers: [
    DatabaseService,
    { provide: UNIT_OF_WORK, useExisting: DatabaseService },
  ],
  exports: [DatabaseService, UNIT_OF_WORK],
})
export class DatabaseModule {}
