import { config } from '../config/config';
import { DataSource, TransactionOptions } from '../types/repository.types';
import { IsoDate, Loan, LoanDetails, loanStatus, OverdueCursor } from '../types/library.types';
import { Actor } from '../types/user.types';
import { logger } from '../utils/logger';
import {
  AlreadyReturnedError,
  DuplicateLoanError,
  InvalidDateError,
  NotFoundError,
  OutOfStockError,
} from '../utils/errors';
import { addDays, compareIsoDates, parseIsoDate, today } from '../utils/date.utils';
import { getPageSize, keysetIterable } from '../utils/pagination.utils';
import { requirePermission } from '../utils/permission.utils';

export interface LoanLedgerOptions {
  defaultLoanDays?: number;
  overduePageSize?: number;
  /** Transaction settings for createLoan/returnLoan; retries are opt-in */
  transaction?: TransactionOptions;
}

export interface ReturnLoanOptions {
  /** Only return the loan if it belongs to this user */
  userId?: number;
}

/**
 * Loan Ledger
 * Owns the OPEN -> CLOSED loan transition and keeps each book's
 * available_quantity in step with its open loans.
 */
export class LoanLedgerService {
  private readonly defaultLoanDays: number;
  private readonly overduePageSize: number;
  private readonly transactionOptions: TransactionOptions;

  constructor(
    private readonly dataSource: DataSource,
    options: LoanLedgerOptions = {}
  ) {
    this.defaultLoanDays = options.defaultLoanDays ?? config.ledger.defaultLoanDays;
    this.overduePageSize = getPageSize(options.overduePageSize ?? config.ledger.overduePageSize);
    this.transactionOptions = options.transaction ?? {};
  }

  /**
   * Lend one copy of a book.
   * The book row stays locked from the availability check until commit, so
   * concurrent callers cannot both take the last copy.
   */
  async createLoan(userId: number, bookId: number, loanDate: IsoDate, dueDate: IsoDate): Promise<Loan> {
    return this.openLoan(userId, bookId, loanDate, dueDate, false);
  }

  /**
   * Reader-facing borrow with the default loan period.
   * The duplicate check runs under the same book lock as the stock check.
   */
  async checkoutBook(userId: number, bookId: number, loanDate: IsoDate = today()): Promise<Loan> {
    parseIsoDate(loanDate, 'loan date');
    return this.openLoan(userId, bookId, loanDate, addDays(loanDate, this.defaultLoanDays), true);
  }

  async returnLoan(loanId: number, returnDate: IsoDate, options: ReturnLoanOptions = {}): Promise<Loan> {
    parseIsoDate(returnDate, 'return date');

    const loan = await this.dataSource.transaction(async (tx) => {
      const current = await tx.loans.findById(loanId, { forUpdate: true });
      if (!current || (options.userId !== undefined && current.userId !== options.userId)) {
        throw new NotFoundError(`Loan with ID ${loanId} not found`);
      }
      if (loanStatus(current) === 'closed') {
        throw new AlreadyReturnedError(`Loan ${loanId} was already returned on ${current.returnDate}`);
      }
      if (compareIsoDates(returnDate, current.loanDate) < 0) {
        throw new InvalidDateError(`Return date ${returnDate} is before loan date ${current.loanDate}`);
      }

      const closed = await tx.loans.markReturned(loanId, returnDate);
      if (!closed) {
        throw new AlreadyReturnedError(`Loan ${loanId} was already returned`);
      }

      const book = await tx.books.findById(current.bookId, { forUpdate: true });
      if (book) {
        await tx.books.update(book.bookId, {
          availableQuantity: Math.min(book.quantity, book.availableQuantity + 1),
        });
      }

      return closed;
    }, this.transactionOptions);

    logger.info('Loan returned', { loanId, bookId: loan.bookId, returnDate });
    return loan;
  }

  /**
   * Open loans due strictly before `asOfDate`, by due date then loan ID.
   * Rows are fetched page by page as the sequence is consumed; iterating
   * again restarts from the first page.
   */
  listOverdue(asOfDate: IsoDate): AsyncIterable<Loan> {
    const asOf = parseIsoDate(asOfDate, 'as-of date');

    return keysetIterable<Loan, OverdueCursor>(
      (cursor, limit) => this.dataSource.loans.findOverdue(asOf, cursor, limit),
      (loan) => ({ dueDate: loan.dueDate, loanId: loan.loanId }),
      this.overduePageSize
    );
  }

  async getLoan(loanId: number): Promise<Loan> {
    const loan = await this.dataSource.loans.findById(loanId);
    if (!loan) {
      throw new NotFoundError(`Loan with ID ${loanId} not found`);
    }
    return loan;
  }

  async listUserLoans(userId: number, options: { onlyActive?: boolean } = {}): Promise<LoanDetails[]> {
    return this.dataSource.loans.list({ userId, onlyActive: options.onlyActive });
  }

  async listAllLoans(actor: Actor, options: { onlyActive?: boolean } = {}): Promise<LoanDetails[]> {
    requirePermission(actor, 'view_reports');
    return this.dataSource.loans.list({ onlyActive: options.onlyActive });
  }

  private async openLoan(
    userId: number,
    bookId: number,
    loanDate: IsoDate,
    dueDate: IsoDate,
    rejectDuplicate: boolean
  ): Promise<Loan> {
    parseIsoDate(loanDate, 'loan date');
    parseIsoDate(dueDate, 'due date');
    if (compareIsoDates(dueDate, loanDate) <= 0) {
      throw new InvalidDateError(`Due date ${dueDate} must be after loan date ${loanDate}`);
    }

    const loan = await this.dataSource.transaction(async (tx) => {
      const user = await tx.users.findById(userId);
      if (!user) {
        throw new NotFoundError(`User with ID ${userId} not found`);
      }

      const book = await tx.books.findById(bookId, { forUpdate: true });
      if (!book) {
        throw new NotFoundError(`Book with ID ${bookId} not found`);
      }

      if (rejectDuplicate) {
        const existing = await tx.loans.findOpen(userId, bookId);
        if (existing) {
          throw new DuplicateLoanError(
            `User ${userId} already has book ${bookId} borrowed (loan ${existing.loanId})`
          );
        }
      }

      if (book.availableQuantity <= 0) {
        throw new OutOfStockError(`Book '${book.title}' has no available copies`);
      }

      await tx.books.update(bookId, { availableQuantity: book.availableQuantity - 1 });
      return tx.loans.insert({ userId, bookId, loanDate, dueDate });
    }, this.transactionOptions);

    logger.info('Loan created', { loanId: loan.loanId, userId, bookId, dueDate });
    return loan;
  }
}
