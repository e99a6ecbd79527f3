import { Queryable } from '../config/database';
import { Book, BookPatch, BookSearchCriteria } from '../types/library.types';
import { BookRepository, LockOptions } from '../types/repository.types';
import { mapBookRow } from './row.mappers';

const BOOK_COLUMNS = `book_id, title, author, isbn, quantity, available_quantity, added_at`;

/**
 * Escape LIKE wildcards so a fragment matches literally
 */
export function escapeLikePattern(fragment: string): string {
  return fragment.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class PgBookRepository implements BookRepository {
  constructor(private readonly client: Queryable) {}

  async findById(bookId: number, options: LockOptions = {}): Promise<Book | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const result = await this.client.query(
      `SELECT ${BOOK_COLUMNS} FROM books WHERE book_id = $1${lock}`,
      [bookId]
    );
    return result.rows.length > 0 ? mapBookRow(result.rows[0]) : null;
  }

  async findByTitleAndAuthor(title: string, author: string): Promise<Book | null> {
    const result = await this.client.query(
      `SELECT ${BOOK_COLUMNS} FROM books WHERE title = $1 AND author = $2`,
      [title, author]
    );
    return result.rows.length > 0 ? mapBookRow(result.rows[0]) : null;
  }

  async insert(row: Omit<Book, 'bookId' | 'addedAt'>): Promise<Book> {
    const query = `
      INSERT INTO books (title, author, isbn, quantity, available_quantity)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING ${BOOK_COLUMNS}
    `;
    const result = await this.client.query(query, [
      row.title,
      row.author,
      row.isbn,
      row.quantity,
      row.availableQuantity,
    ]);
    return mapBookRow(result.rows[0]);
  }

  async update(bookId: number, patch: BookPatch): Promise<Book | null> {
    const columns: Array<[string, unknown]> = [
      ['title', patch.title],
      ['author', patch.author],
      ['isbn', patch.isbn],
      ['quantity', patch.quantity],
      ['available_quantity', patch.availableQuantity],
    ];
    const present = columns.filter(([, value]) => value !== undefined);

    if (present.length === 0) {
      return this.findById(bookId);
    }

    const assignments = present.map(([column], index) => `${column} = $${index + 1}`);
    const params = [...present.map(([, value]) => value), bookId];

    const result = await this.client.query(
      `UPDATE books SET ${assignments.join(', ')} WHERE book_id = $${params.length} RETURNING ${BOOK_COLUMNS}`,
      params
    );
    return result.rows.length > 0 ? mapBookRow(result.rows[0]) : null;
  }

  async delete(bookId: number): Promise<boolean> {
    const result = await this.client.query(`DELETE FROM books WHERE book_id = $1`, [bookId]);
    return (result.rowCount ?? 0) > 0;
  }

  async search(criteria: BookSearchCriteria): Promise<Book[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    const fields: Array<[string, string | undefined]> = [
      ['title', criteria.title],
      ['author', criteria.author],
      ['isbn', criteria.isbn],
    ];

    for (const [column, fragment] of fields) {
      if (fragment) {
        params.push(`%${escapeLikePattern(fragment)}%`);
        conditions.push(`${column} ILIKE $${params.length}`);
      }
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.client.query(
      `SELECT ${BOOK_COLUMNS} FROM books ${whereClause} ORDER BY title, book_id`,
      params
    );
    return result.rows.map(mapBookRow);
  }

  async list(): Promise<Book[]> {
    return this.search({});
  }

  async totals(): Promise<{ titles: number; copies: number }> {
    const result = await this.client.query(
      `SELECT COUNT(*) AS titles, COALESCE(SUM(quantity), 0) AS copies FROM books`
    );
    return {
      titles: Number(result.rows[0].titles),
      copies: Number(result.rows[0].copies),
    };
  }
}
