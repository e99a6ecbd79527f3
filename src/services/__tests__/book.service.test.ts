import { beforeEach, describe, expect, it } from 'vitest';
import { BookService } from '../book.service';
import { LoanLedgerService } from '../loan-ledger.service';
import { MemoryDataSource } from '../../__tests__/helpers/memory-data-source';
import { ConstraintViolationError, ForbiddenError, NotFoundError, ValidationError } from '../../utils/errors';
import { Actor } from '../../types/user.types';

const superadmin: Actor = { userId: 1000, role: 'superadmin', permissions: [] };
const catalogAdmin: Actor = { userId: 1001, role: 'admin', permissions: ['add_book', 'update_book'] };
const plainAdmin: Actor = { userId: 1002, role: 'admin', permissions: [] };

describe('BookService', () => {
  let ds: MemoryDataSource;
  let books: BookService;
  let ledger: LoanLedgerService;

  beforeEach(() => {
    ds = new MemoryDataSource();
    books = new BookService(ds);
    ledger = new LoanLedgerService(ds);
  });

  describe('addBook', () => {
    it('stores a trimmed book with every copy available', async () => {
      const book = await books.addBook(superadmin, { title: ' Dune ', author: 'Frank Herbert', quantity: 3 });

      expect(book).toMatchObject({
        bookId: 1,
        title: 'Dune',
        author: 'Frank Herbert',
        isbn: null,
        quantity: 3,
        availableQuantity: 3,
      });
    });

    it('checks the add_book permission', async () => {
      await expect(
        books.addBook(plainAdmin, { title: 'Dune', author: 'Frank Herbert', quantity: 1 })
      ).rejects.toBeInstanceOf(ForbiddenError);
      await expect(
        books.addBook(catalogAdmin, { title: 'Dune', author: 'Frank Herbert', quantity: 1 })
      ).resolves.toMatchObject({ title: 'Dune' });
    });

    it('rejects a non-positive quantity and a duplicate title and author', async () => {
      await expect(
        books.addBook(superadmin, { title: 'Dune', author: 'Frank Herbert', quantity: 0 })
      ).rejects.toBeInstanceOf(ValidationError);

      await books.addBook(superadmin, { title: 'Dune', author: 'Frank Herbert', quantity: 1 });
      await expect(
        books.addBook(superadmin, { title: 'Dune', author: 'Frank Herbert', quantity: 2 })
      ).rejects.toBeInstanceOf(ConstraintViolationError);
    });

    it('stores one book when the same title is added twice at once', async () => {
      const results = await Promise.allSettled([
        books.addBook(superadmin, { title: 'Dune', author: 'Frank Herbert', quantity: 1 }),
        books.addBook(catalogAdmin, { title: 'Dune', author: 'Frank Herbert', quantity: 2 }),
      ]);

      const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(ConstraintViolationError);
      await expect(books.searchBooks({ title: 'Dune' })).resolves.toHaveLength(1);
    });
  });

  describe('updateBook', () => {
    async function bookWithTwoLoans() {
      const book = await books.addBook(superadmin, { title: 'Dune', author: 'Frank Herbert', quantity: 3 });
      const alice = await ds.seedUser('alice');
      const bob = await ds.seedUser('bob');
      await ledger.createLoan(alice.userId, book.bookId, '2024-01-01', '2024-01-15');
      await ledger.createLoan(bob.userId, book.bookId, '2024-01-01', '2024-01-15');
      return book;
    }

    it('shifts available copies by the change in total quantity', async () => {
      const book = await bookWithTwoLoans();

      const grown = await books.updateBook(catalogAdmin, book.bookId, { quantity: 5 });
      expect(grown).toMatchObject({ quantity: 5, availableQuantity: 3 });

      const shrunk = await books.updateBook(catalogAdmin, book.bookId, { quantity: 2 });
      expect(shrunk).toMatchObject({ quantity: 2, availableQuantity: 0 });
    });

    it('refuses to drop the total below the copies on loan', async () => {
      const book = await bookWithTwoLoans();

      await expect(books.updateBook(superadmin, book.bookId, { quantity: 1 })).rejects.toBeInstanceOf(
        ConstraintViolationError
      );
      expect(ds.getBookRow(book.bookId)).toMatchObject({ quantity: 3, availableQuantity: 1 });
    });

    it('updates descriptive fields and clears a blank ISBN', async () => {
      const book = await books.addBook(superadmin, {
        title: 'Dune',
        author: 'Frank Herbert',
        isbn: 'isbn-0001',
        quantity: 1,
      });

      const updated = await books.updateBook(superadmin, book.bookId, { title: 'Dune (Deluxe)', isbn: ' ' });

      expect(updated).toMatchObject({ title: 'Dune (Deluxe)', author: 'Frank Herbert', isbn: null });
    });

    it('fails for a missing book', async () => {
      await expect(books.updateBook(superadmin, 77, { title: 'X' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('deleteBook', () => {
    it('refuses while copies are on loan, then deletes once returned', async () => {
      const book = await books.addBook(superadmin, { title: 'Dune', author: 'Frank Herbert', quantity: 1 });
      const alice = await ds.seedUser('alice');
      const loan = await ledger.createLoan(alice.userId, book.bookId, '2024-01-01', '2024-01-15');

      await expect(books.deleteBook(superadmin, book.bookId)).rejects.toBeInstanceOf(ConstraintViolationError);

      await ledger.returnLoan(loan.loanId, '2024-01-03');
      await books.deleteBook(superadmin, book.bookId);

      await expect(books.getBook(book.bookId)).rejects.toBeInstanceOf(NotFoundError);
      expect(ds.getLoanRow(loan.loanId)).toBeUndefined();
    });

    it('checks the delete_book permission', async () => {
      const book = await books.addBook(superadmin, { title: 'Dune', author: 'Frank Herbert', quantity: 1 });

      await expect(books.deleteBook(catalogAdmin, book.bookId)).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  describe('searchBooks', () => {
    beforeEach(async () => {
      await books.addBook(superadmin, { title: 'Neuromancer', author: 'William Gibson', quantity: 1 });
      await books.addBook(superadmin, { title: 'Dune Messiah', author: 'Frank Herbert', quantity: 1 });
      await books.addBook(superadmin, { title: 'Dune', author: 'Frank Herbert', quantity: 1 });
    });

    it('matches fragments case-insensitively, ordered by title', async () => {
      const result = await books.searchBooks({ title: 'dune' });

      expect(result.map((b) => b.title)).toEqual(['Dune', 'Dune Messiah']);
    });

    it('combines criteria with AND', async () => {
      expect((await books.searchBooks({ author: 'gibson' })).map((b) => b.title)).toEqual(['Neuromancer']);
      expect(await books.searchBooks({ title: 'dune', author: 'gibson' })).toEqual([]);
    });

    it('lists everything when the criteria are blank', async () => {
      const result = await books.searchBooks({ title: '  ' });

      expect(result.map((b) => b.title)).toEqual(['Dune', 'Dune Messiah', 'Neuromancer']);
      expect(await books.listBooks()).toEqual(result);
    });
  });
});
