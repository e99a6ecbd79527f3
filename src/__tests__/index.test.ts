import { describe, expect, it } from 'vitest';
import { createLibraryCore } from '../index';
import { MemoryDataSource } from './helpers/memory-data-source';
import { collect } from '../utils/pagination.utils';

describe('createLibraryCore', () => {
  it('wires every service onto one data source', async () => {
    const ds = new MemoryDataSource();
    const core = createLibraryCore(ds, { users: { bcryptRounds: 4 }, ledger: { defaultLoanDays: 7 } });

    await core.users.ensureSuperadmin('root', 'test-secret');
    const root = await core.users.verifyCredentials('root', 'test-secret');
    if (!root) {
      throw new Error('superadmin missing');
    }

    const book = await core.books.addBook(root, { title: 'Dune', author: 'Frank Herbert', quantity: 1 });
    const loan = await core.ledger.checkoutBook(root.userId, book.bookId, '2024-01-01');

    expect(loan.dueDate).toBe('2024-01-08');
    expect((await collect(core.ledger.listOverdue('2024-01-09'))).map((l) => l.loanId)).toEqual([loan.loanId]);
    expect(await core.statistics.getStatistics(root, '2024-01-09')).toMatchObject({ activeLoans: 1, overdueLoans: 1 });
  });
});
