import { DataSource } from '../types/repository.types';
import { IsoDate, LibraryStatistics } from '../types/library.types';
import { Actor } from '../types/user.types';
import { parseIsoDate, today } from '../utils/date.utils';
import { requirePermission } from '../utils/permission.utils';

export class StatisticsService {
  constructor(private readonly dataSource: DataSource) {}

  async getStatistics(actor: Actor, asOfDate: IsoDate = today()): Promise<LibraryStatistics> {
    requirePermission(actor, 'view_reports');
    const asOf = parseIsoDate(asOfDate, 'as-of date');

    const [totals, activeLoans, overdueLoans, totalUsers] = await Promise.all([
      this.dataSource.books.totals(),
      this.dataSource.loans.countOpen(),
      this.dataSource.loans.countOverdue(asOf),
      this.dataSource.users.count(),
    ]);

    return {
      totalTitles: totals.titles,
      totalCopies: totals.copies,
      activeLoans,
      overdueLoans,
      totalUsers,
    };
  }
}
