/**
 * Book and loan shapes shared by the services and repositories.
 * Calendar dates are ISO `YYYY-MM-DD` strings.
 */

export type IsoDate = string;

export interface Book {
  bookId: number;
  title: string;
  author: string;
  isbn: string | null;
  quantity: number;
  availableQuantity: number;
  addedAt: Date;
}

export interface NewBookInput {
  title: string;
  author: string;
  isbn?: string | null;
  quantity: number;
}

export interface BookUpdateInput {
  title?: string;
  author?: string;
  isbn?: string | null;
  quantity?: number;
}

export type BookPatch = Partial<Pick<Book, 'title' | 'author' | 'isbn' | 'quantity' | 'availableQuantity'>>;

export interface BookSearchCriteria {
  title?: string;
  author?: string;
  isbn?: string;
}

export type LoanStatus = 'open' | 'closed';

export interface Loan {
  loanId: number;
  userId: number;
  bookId: number;
  loanDate: IsoDate;
  dueDate: IsoDate;
  returnDate: IsoDate | null;
}

/**
 * Loan joined with the borrower and the book, for listings
 */
export interface LoanDetails extends Loan {
  username: string;
  title: string;
  author: string;
}

export interface NewLoanRow {
  userId: number;
  bookId: number;
  loanDate: IsoDate;
  dueDate: IsoDate;
}

export interface LoanListFilter {
  userId?: number;
  onlyActive?: boolean;
}

/**
 * Keyset position in the overdue ordering (due_date, loan_id)
 */
export interface OverdueCursor {
  dueDate: IsoDate;
  loanId: number;
}

export interface LibraryStatistics {
  totalTitles: number;
  totalCopies: number;
  activeLoans: number;
  overdueLoans: number;
  totalUsers: number;
}

export function loanStatus(loan: Pick<Loan, 'returnDate'>): LoanStatus {
  return loan.returnDate === null ? 'open' : 'closed';
}
