import { monthBounds, monthlyReport, previousMonth } from '../domain/computations.js';
import type { Month } from '../domain/types.js';
import { createLogger } from '../logger.js';
import type { ReportSink } from '../notifications/sinks.js';
import type { TransactionStore } from '../store/index.js';

const log = createLogger('reports');

export interface MonthlyReportDeps {
  transactions: Pick<TransactionStore, 'listBetween' | 'usersWithActivityBetween'>;
  sink: ReportSink;
}

/** Builds one user's report for a month from stored transactions */
export function buildMonthlyReport(
  transactions: Pick<TransactionStore, 'listBetween'>,
  userId: string,
  month: Month,
) {
  const { start, end } = monthBounds(month);
  return monthlyReport(userId, month, transactions.listBetween(userId, start, end));
}

/**
 * Generates the prior month's report for every user with activity in it.
 * Returns the number of reports delivered.
 */
export async function runMonthlyReports(deps: MonthlyReportDeps, now: Date = new Date()): Promise<number> {
  const month = previousMonth(now);
  const { start, end } = monthBounds(month);
  const users = deps.transactions.usersWithActivityBetween(start, end);

  let delivered = 0;
  for (const userId of users) {
    try {
      await deps.sink.deliver(buildMonthlyReport(deps.transactions, userId, month));
      delivered++;
    } catch (error) {
      log.error(`Failed to deliver ${month} report for user ${userId}:`, error);
    }
  }

  log.info(`Delivered ${delivered}/${users.length} reports for ${month}`);
  return delivered;
}
