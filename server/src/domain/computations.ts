/**
 * Pure domain computations.
 * No Express, no DB, no IO — only data in, data out.
 */
import type {
  Budget,
  BudgetStatus,
  CategoryTotal,
  IsoDate,
  Month,
  MonthlyReport,
  Transaction,
} from './types.js';

/** Filter to expenses only */
export function expensesOnly(txns: Transaction[]): Transaction[] {
  return txns.filter((t) => t.type === 'Expense');
}

/** Inclusive window check; a null end leaves the window open */
export function withinWindow(date: IsoDate, start: IsoDate, end: IsoDate | null): boolean {
  return date >= start && (end === null || date <= end);
}

/**
 * Spend to date for a budget: expenses in the budget's category whose date
 * falls inside [startDate, endDate].
 */
export function budgetSpent(budget: Budget, txns: Transaction[]): number {
  return expensesOnly(txns)
    .filter((t) => t.categoryId === budget.categoryId)
    .filter((t) => withinWindow(t.date, budget.startDate, budget.endDate))
    .reduce((sum, t) => sum + t.amountCents, 0);
}

/** Percentage of the budget used; 0 when the budget amount is not positive */
export function percentageUsed(spentCents: number, amountCents: number): number {
  return amountCents > 0 ? (spentCents / amountCents) * 100 : 0;
}

/**
 * Status of a single budget.
 * remaining = budgeted − spent (negative when overspent)
 */
export function summarizeBudget(budget: Budget, txns: Transaction[]): BudgetStatus {
  const spentCents = budgetSpent(budget, txns);
  return {
    spentCents,
    remainingCents: budget.amountCents - spentCents,
    percentageUsed: percentageUsed(spentCents, budget.amountCents),
  };
}

/** Breakdown of spending by category, largest first */
export function categoryBreakdown(txns: Transaction[]): CategoryTotal[] {
  const map = new Map<string | null, number>();
  for (const t of expensesOnly(txns)) {
    map.set(t.categoryId, (map.get(t.categoryId) ?? 0) + t.amountCents);
  }
  return Array.from(map.entries())
    .map(([categoryId, spentCents]) => ({ categoryId, spentCents }))
    .sort((a, b) => b.spentCents - a.spentCents);
}

/** Filter transactions to a single month (YYYY-MM) */
export function forMonth(txns: Transaction[], month: Month): Transaction[] {
  return txns.filter((t) => t.date.startsWith(`${month}-`));
}

/** Income/expense totals for one user's month */
export function monthlyReport(userId: string, month: Month, txns: Transaction[]): MonthlyReport {
  const monthTxns = forMonth(txns, month);
  const totalIncomeCents = monthTxns
    .filter((t) => t.type === 'Income')
    .reduce((sum, t) => sum + t.amountCents, 0);
  const totalExpensesCents = expensesOnly(monthTxns).reduce((sum, t) => sum + t.amountCents, 0);

  return {
    userId,
    month,
    totalIncomeCents,
    totalExpensesCents,
    netCents: totalIncomeCents - totalExpensesCents,
    byCategory: categoryBreakdown(monthTxns),
  };
}

/** Row offset for a 1-based page */
export function pageOffset(page: number, pageSize: number): number {
  return (page - 1) * pageSize;
}

// --- Money ---

/** Decimal currency amount → integer cents */
export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

/** Integer cents → decimal currency amount */
export function fromCents(cents: number): number {
  return cents / 100;
}

// --- Dates (UTC) ---

/** Current date as YYYY-MM-DD */
export function todayIso(now: Date = new Date()): IsoDate {
  return now.toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return todayIso(d);
}

/** Get current month as YYYY-MM */
export function currentMonth(now: Date = new Date()): Month {
  const y = now.getUTCFullYear();
  const m = String(now.getUTCMonth() + 1).padStart(2, '0');
  return `${y}-${m}`;
}

/** The calendar month before the one containing `now` */
export function previousMonth(now: Date = new Date()): Month {
  return currentMonth(new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - 1, 1)));
}

/** First and last day of a YYYY-MM month */
export function monthBounds(month: Month): { start: IsoDate; end: IsoDate } {
  const [y, m] = month.split('-').map(Number);
  const last = new Date(Date.UTC(y, m, 0)).getUTCDate();
  return { start: `${month}-01`, end: `${month}-${String(last).padStart(2, '0')}` };
}
