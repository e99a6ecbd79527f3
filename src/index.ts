import { db, Database } from './config/database';
import { PgDataSource } from './repositories/pg-data-source';
import { DataSource } from './types/repository.types';
import { BookService } from './services/book.service';
import { LoanLedgerOptions, LoanLedgerService } from './services/loan-ledger.service';
import { StatisticsService } from './services/statistics.service';
import { UserService, UserServiceOptions } from './services/user.service';

export interface LibraryCore {
  ledger: LoanLedgerService;
  books: BookService;
  users: UserService;
  statistics: StatisticsService;
}

export interface LibraryCoreOptions {
  ledger?: LoanLedgerOptions;
  users?: UserServiceOptions;
}

/**
 * Wire every service onto one data source
 */
export function createLibraryCore(
  dataSource: DataSource,
  options: LibraryCoreOptions = {}
): LibraryCore {
  return {
    ledger: new LoanLedgerService(dataSource, options.ledger),
    books: new BookService(dataSource),
    users: new UserService(dataSource, options.users),
    statistics: new StatisticsService(dataSource),
  };
}

/**
 * Library core backed by PostgreSQL (the shared pool by default)
 */
export function createPgLibraryCore(
  database: Database = db,
  options: LibraryCoreOptions = {}
): LibraryCore {
  return createLibraryCore(new PgDataSource(database), options);
}

export { db, Database, runInTransaction } from './config/database';
export type { Queryable, TransactionClient } from './config/database';
export { config } from './config/config';
export { PgDataSource, createRepositories } from './repositories/pg-data-source';
export { BookService } from './services/book.service';
export { LoanLedgerService } from './services/loan-ledger.service';
export type { ReturnLoanOptions } from './services/loan-ledger.service';
export { StatisticsService } from './services/statistics.service';
export { UserService, toPublicUser } from './services/user.service';
export * from './utils/errors';
export { collect } from './utils/pagination.utils';
export { addDays, isIsoDate, today } from './utils/date.utils';
export { hasPermission, parsePermissions } from './utils/permission.utils';
export * from './types/library.types';
export * from './types/user.types';
export * from './types/repository.types';
export * from './types/config.types';
export type { LoanLedgerOptions, UserServiceOptions };
