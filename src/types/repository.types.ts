import {
  Book,
  BookPatch,
  BookSearchCriteria,
  IsoDate,
  Loan,
  LoanDetails,
  LoanListFilter,
  NewLoanRow,
  OverdueCursor,
} from './library.types';
import { NewUserRow, User, UserPatch } from './user.types';
import { IsolationLevel } from './config.types';

export interface LockOptions {
  /** Take a row lock held until the enclosing transaction ends */
  forUpdate?: boolean;
}

export interface UserRepository {
  findById(userId: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  insert(row: NewUserRow): Promise<User>;
  update(userId: number, patch: UserPatch): Promise<User | null>;
  delete(userId: number): Promise<boolean>;
  list(): Promise<User[]>;
  count(): Promise<number>;
}

export interface BookRepository {
  findById(bookId: number, options?: LockOptions): Promise<Book | null>;
  findByTitleAndAuthor(title: string, author: string): Promise<Book | null>;
  insert(row: Omit<Book, 'bookId' | 'addedAt'>): Promise<Book>;
  update(bookId: number, patch: BookPatch): Promise<Book | null>;
  delete(bookId: number): Promise<boolean>;
  search(criteria: BookSearchCriteria): Promise<Book[]>;
  list(): Promise<Book[]>;
  totals(): Promise<{ titles: number; copies: number }>;
}

export interface LoanRepository {
  findById(loanId: number, options?: LockOptions): Promise<Loan | null>;
  findOpen(userId: number, bookId: number): Promise<Loan | null>;
  insert(row: NewLoanRow): Promise<Loan>;
  markReturned(loanId: number, returnDate: IsoDate): Promise<Loan | null>;
  /** One page of open loans with due_date < asOf, strictly after the cursor */
  findOverdue(asOf: IsoDate, after: OverdueCursor | null, limit: number): Promise<Loan[]>;
  list(filter: LoanListFilter): Promise<LoanDetails[]>;
  countOpen(filter?: { userId?: number; bookId?: number }): Promise<number>;
  countOverdue(asOf: IsoDate): Promise<number>;
}

export interface Repositories {
  users: UserRepository;
  books: BookRepository;
  loans: LoanRepository;
}

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  /** Extra attempts after a serialization failure or deadlock */
  retries?: number;
}

/**
 * Repositories plus a scope in which they share one transaction
 */
export interface DataSource extends Repositories {
  transaction<T>(work: (tx: Repositories) => Promise<T>, options?: TransactionOptions): Promise<T>;
}
