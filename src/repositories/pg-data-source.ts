import { Database, Queryable } from '../config/database';
import { DataSource, Repositories, TransactionOptions } from '../types/repository.types';
import { PgBookRepository } from './book.repository';
import { PgLoanRepository } from './loan.repository';
import { PgUserRepository } from './user.repository';

export function createRepositories(client: Queryable): Repositories {
  return {
    users: new PgUserRepository(client),
    books: new PgBookRepository(client),
    loans: new PgLoanRepository(client),
  };
}

/**
 * PostgreSQL data source
 * Outside a transaction the repositories run on the pool; inside one they
 * share a single checked-out client.
 */
export class PgDataSource implements DataSource {
  readonly users: PgUserRepository;
  readonly books: PgBookRepository;
  readonly loans: PgLoanRepository;

  constructor(private readonly database: Database) {
    this.users = new PgUserRepository(database);
    this.books = new PgBookRepository(database);
    this.loans = new PgLoanRepository(database);
  }

  async transaction<T>(
    work: (tx: Repositories) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    return this.database.withTransaction((client) => work(createRepositories(client)), options);
  }
}
