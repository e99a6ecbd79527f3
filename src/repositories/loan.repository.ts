import { Queryable } from '../config/database';
import {
  IsoDate,
  Loan,
  LoanDetails,
  LoanListFilter,
  NewLoanRow,
  OverdueCursor,
} from '../types/library.types';
import { LoanRepository, LockOptions } from '../types/repository.types';
import { mapLoanDetailsRow, mapLoanRow } from './row.mappers';

const LOAN_COLUMNS = `loan_id, user_id, book_id, loan_date::text AS loan_date,
  due_date::text AS due_date, return_date::text AS return_date`;

export class PgLoanRepository implements LoanRepository {
  constructor(private readonly client: Queryable) {}

  async findById(loanId: number, options: LockOptions = {}): Promise<Loan | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const result = await this.client.query(
      `SELECT ${LOAN_COLUMNS} FROM loans WHERE loan_id = $1${lock}`,
      [loanId]
    );
    return result.rows.length > 0 ? mapLoanRow(result.rows[0]) : null;
  }

  async findOpen(userId: number, bookId: number): Promise<Loan | null> {
    const result = await this.client.query(
      `SELECT ${LOAN_COLUMNS} FROM loans
       WHERE user_id = $1 AND book_id = $2 AND return_date IS NULL
       ORDER BY loan_id LIMIT 1`,
      [userId, bookId]
    );
    return result.rows.length > 0 ? mapLoanRow(result.rows[0]) : null;
  }

  async insert(row: NewLoanRow): Promise<Loan> {
    const result = await this.client.query(
      `INSERT INTO loans (user_id, book_id, loan_date, due_date)
       VALUES ($1, $2, $3, $4)
       RETURNING ${LOAN_COLUMNS}`,
      [row.userId, row.bookId, row.loanDate, row.dueDate]
    );
    return mapLoanRow(result.rows[0]);
  }

  async markReturned(loanId: number, returnDate: IsoDate): Promise<Loan | null> {
    const result = await this.client.query(
      `UPDATE loans SET return_date = $1
       WHERE loan_id = $2 AND return_date IS NULL
       RETURNING ${LOAN_COLUMNS}`,
      [returnDate, loanId]
    );
    return result.rows.length > 0 ? mapLoanRow(result.rows[0]) : null;
  }

  async findOverdue(asOf: IsoDate, after: OverdueCursor | null, limit: number): Promise<Loan[]> {
    const params: unknown[] = [asOf];
    let keyset = '';

    if (after) {
      params.push(after.dueDate, after.loanId);
      keyset = 'AND (due_date, loan_id) > ($2::date, $3)';
    }

    params.push(limit);
    const result = await this.client.query(
      `SELECT ${LOAN_COLUMNS} FROM loans
       WHERE return_date IS NULL AND due_date < $1::date ${keyset}
       ORDER BY due_date ASC, loan_id ASC
       LIMIT $${params.length}`,
      params
    );
    return result.rows.map(mapLoanRow);
  }

  async list(filter: LoanListFilter): Promise<LoanDetails[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.userId !== undefined) {
      params.push(filter.userId);
      conditions.push(`l.user_id = $${params.length}`);
    }
    if (filter.onlyActive) {
      conditions.push('l.return_date IS NULL');
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.client.query(
      `SELECT l.loan_id, l.user_id, l.book_id, l.loan_date::text AS loan_date,
              l.due_date::text AS due_date, l.return_date::text AS return_date,
              u.username, b.title, b.author
       FROM loans l
       JOIN users u ON l.user_id = u.user_id
       JOIN books b ON l.book_id = b.book_id
       ${whereClause}
       ORDER BY l.loan_date DESC, l.loan_id DESC`,
      params
    );
    return result.rows.map(mapLoanDetailsRow);
  }

  async countOpen(filter: { userId?: number; bookId?: number } = {}): Promise<number> {
    const conditions = ['return_date IS NULL'];
    const params: unknown[] = [];

    if (filter.userId !== undefined) {
      params.push(filter.userId);
      conditions.push(`user_id = $${params.length}`);
    }
    if (filter.bookId !== undefined) {
      params.push(filter.bookId);
      conditions.push(`book_id = $${params.length}`);
    }

    const result = await this.client.query(
      `SELECT COUNT(*) AS count FROM loans WHERE ${conditions.join(' AND ')}`,
      params
    );
    return Number(result.rows[0].count);
  }

  async countOverdue(asOf: IsoDate): Promise<number> {
    const result = await this.client.query(
      `SELECT COUNT(*) AS count FROM loans WHERE return_date IS NULL AND due_date < $1::date`,
      [asOf]
    );
    return Number(result.rows[0].count);
  }
}
