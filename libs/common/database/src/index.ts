export { DatabaseModule } from './database.module';
export { DatabaseService } from './database.service';
export { Queryable, UnitOfWork, UNIT_OF_WORK } from './unit-of-work';
export { withTransaction, TransactionClient, TransactionPool } from './with-transaction';
