import { describe, expect, it } from 'vitest';
import { StatisticsService } from '../statistics.service';
import { LoanLedgerService } from '../loan-ledger.service';
import { MemoryDataSource } from '../../__tests__/helpers/memory-data-source';
import { ForbiddenError } from '../../utils/errors';
import { Actor } from '../../types/user.types';

const superadmin: Actor = { userId: 1, role: 'superadmin', permissions: [] };
const reader: Actor = { userId: 2, role: 'reader', permissions: [] };

describe('StatisticsService', () => {
  it('counts titles, copies, open and overdue loans, and users', async () => {
    const ds = new MemoryDataSource();
    const ledger = new LoanLedgerService(ds);
    const alice = await ds.seedUser('alice');
    const bob = await ds.seedUser('bob');
    const dune = await ds.seedBook('Dune', 2);
    await ds.seedBook('Neuromancer', 3);

    await ledger.createLoan(alice.userId, dune.bookId, '2024-01-01', '2024-01-10');
    const returned = await ledger.createLoan(bob.userId, dune.bookId, '2024-01-01', '2024-01-05');
    await ledger.returnLoan(returned.loanId, '2024-01-04');

    const stats = await new StatisticsService(ds).getStatistics(superadmin, '2024-01-15');

    expect(stats).toEqual({
      totalTitles: 2,
      totalCopies: 5,
      activeLoans: 1,
      overdueLoans: 1,
      totalUsers: 2,
    });
  });

  it('requires view_reports', async () => {
    const service = new StatisticsService(new MemoryDataSource());

    await expect(service.getStatistics(reader, '2024-01-15')).rejects.toBeInstanceOf(ForbiddenError);
  });
});
