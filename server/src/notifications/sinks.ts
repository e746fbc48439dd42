import { fromCents } from '../domain/computations.js';
import type { BudgetAlert, MonthlyReport } from '../domain/types.js';
import { createLogger } from '../logger.js';

/**
 * Receives budget alerts for delivery (email, push, ...).
 * A rejected promise marks the delivery as failed.
 */
export interface NotificationSink {
  sendBudgetAlert: (alert: BudgetAlert) => Promise<void>;
}

/**
 * Receives finished monthly reports for rendering or delivery.
 */
export interface ReportSink {
  deliver: (report: MonthlyReport) => Promise<void>;
}

const log = createLogger('notify');

/** Default sink: writes alerts to the log */
export class LoggingNotificationSink implements NotificationSink {
  async sendBudgetAlert(alert: BudgetAlert): Promise<void> {
    log.warn(
      `Budget "${alert.budgetName}" for user ${alert.userId} is at ${alert.percentageUsed.toFixed(1)}%`,
    );
  }
}

/** Default sink: writes report totals to the log */
export class LoggingReportSink implements ReportSink {
  async deliver(report: MonthlyReport): Promise<void> {
    log.info(`Monthly report ${report.month} for user ${report.userId}`, {
      income: fromCents(report.totalIncomeCents),
      expenses: fromCents(report.totalExpensesCents),
      net: fromCents(report.netCents),
      categories: report.byCategory.length,
    });
  }
}
