import { DataSource } from '../types/repository.types';
import { Book, BookPatch, BookSearchCriteria, BookUpdateInput, NewBookInput } from '../types/library.types';
import { Actor } from '../types/user.types';
import { logger } from '../utils/logger';
import { ConstraintViolationError, NotFoundError, ValidationError } from '../utils/errors';
import { requirePermission } from '../utils/permission.utils';

function requireText(value: string | undefined, field: string): string {
  const trimmed = (value ?? '').trim();
  if (!trimmed) {
    throw new ValidationError(`${field} is required`);
  }
  return trimmed;
}

function normalizeIsbn(isbn: string | null | undefined): string | null {
  const trimmed = (isbn ?? '').trim();
  return trimmed ? trimmed : null;
}

/**
 * Book catalog
 * Keeps 0 <= available_quantity <= quantity across edits
 */
export class BookService {
  constructor(private readonly dataSource: DataSource) {}

  async addBook(actor: Actor, input: NewBookInput): Promise<Book> {
    requirePermission(actor, 'add_book');

    const title = requireText(input.title, 'Title');
    const author = requireText(input.author, 'Author');
    if (!Number.isInteger(input.quantity) || input.quantity <= 0) {
      throw new ValidationError('Quantity must be a positive integer');
    }

    // UNIQUE (title, author) settles inserts that race past the lookup
    const book = await this.dataSource.transaction(async (tx) => {
      const existing = await tx.books.findByTitleAndAuthor(title, author);
      if (existing) {
        throw new ConstraintViolationError(
          `A book with title '${title}' by '${author}' already exists (ID: ${existing.bookId})`
        );
      }

      return tx.books.insert({
        title,
        author,
        isbn: normalizeIsbn(input.isbn),
        quantity: input.quantity,
        availableQuantity: input.quantity,
      });
    });

    logger.info(`Book added: ${book.title}`, { bookId: book.bookId });
    return book;
  }

  /**
   * Changing the total shifts the available count by the same amount
   */
  async updateBook(actor: Actor, bookId: number, input: BookUpdateInput): Promise<Book> {
    requirePermission(actor, 'update_book');

    if (input.quantity !== undefined && (!Number.isInteger(input.quantity) || input.quantity < 0)) {
      throw new ValidationError('Quantity cannot be negative');
    }

    const updated = await this.dataSource.transaction(async (tx) => {
      const current = await tx.books.findById(bookId, { forUpdate: true });
      if (!current) {
        throw new NotFoundError(`Book with ID ${bookId} not found`);
      }

      const patch: BookPatch = {};
      if (input.title !== undefined) patch.title = requireText(input.title, 'Title');
      if (input.author !== undefined) patch.author = requireText(input.author, 'Author');
      if (input.isbn !== undefined) patch.isbn = normalizeIsbn(input.isbn);

      if (input.quantity !== undefined && input.quantity !== current.quantity) {
        const available = current.availableQuantity + (input.quantity - current.quantity);
        if (available < 0) {
          throw new ConstraintViolationError(
            'Cannot reduce total quantity below the number of currently loaned books'
          );
        }
        patch.quantity = input.quantity;
        patch.availableQuantity = Math.min(available, input.quantity);
      }

      const book = await tx.books.update(bookId, patch);
      if (!book) {
        throw new NotFoundError(`Book with ID ${bookId} not found`);
      }
      return book;
    });

    logger.info(`Book updated: ${updated.title}`, { bookId });
    return updated;
  }

  async deleteBook(actor: Actor, bookId: number): Promise<void> {
    requirePermission(actor, 'delete_book');

    await this.dataSource.transaction(async (tx) => {
      const book = await tx.books.findById(bookId, { forUpdate: true });
      if (!book) {
        throw new NotFoundError(`Book with ID ${bookId} not found`);
      }
      if (book.availableQuantity < book.quantity) {
        throw new ConstraintViolationError(`Cannot delete book '${book.title}' as it has active loans`);
      }
      await tx.books.delete(bookId);
    });

    logger.info(`Book deleted`, { bookId });
  }

  async getBook(bookId: number): Promise<Book> {
    const book = await this.dataSource.books.findById(bookId);
    if (!book) {
      throw new NotFoundError(`Book with ID ${bookId} not found`);
    }
    return book;
  }

  /**
   * Case-insensitive fragment search; blank criteria are ignored
   */
  async searchBooks(criteria: BookSearchCriteria): Promise<Book[]> {
    return this.dataSource.books.search({
      title: criteria.title?.trim() || undefined,
      author: criteria.author?.trim() || undefined,
      isbn: criteria.isbn?.trim() || undefined,
    });
  }

  async listBooks(): Promise<Book[]> {
    return this.dataSource.books.list();
  }
}
