/**
 * Domain types for the budget tracker.
 * Pure data — no Express, no DB, no IO.
 */

export const TRANSACTION_TYPES = ['Income', 'Expense'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const BUDGET_PERIODS = ['Daily', 'Weekly', 'Monthly', 'Yearly'] as const;
export type BudgetPeriod = (typeof BUDGET_PERIODS)[number];

/** YYYY-MM-DD */
export type IsoDate = string;

/** YYYY-MM */
export type Month = string;

export interface Transaction {
  id: string;
  userId: string;
  description: string;
  amountCents: number;         // always > 0; direction comes from type
  type: TransactionType;
  date: IsoDate;
  categoryId: string | null;
  createdAt: string;
  updatedAt: string | null;
}

export interface Category {
  id: string;
  userId: string;
  name: string;
  icon: string | null;
  color: string | null;        // #RRGGBB
  isDefault: boolean;
  createdAt: string;
  updatedAt: string | null;
}

export interface Budget {
  id: string;
  userId: string;
  name: string;
  amountCents: number;
  period: BudgetPeriod;
  startDate: IsoDate;
  endDate: IsoDate | null;     // inclusive; strictly after startDate when set
  categoryId: string;
  lastAlertedAt: string | null;
  createdAt: string;
  updatedAt: string | null;
}

/** Result of aggregating a budget's spend window */
export interface BudgetStatus {
  spentCents: number;
  remainingCents: number;      // can be negative (overspent)
  percentageUsed: number;
}

export interface TransactionFilter {
  startDate?: IsoDate;
  endDate?: IsoDate;
  categoryId?: string;
  type?: TransactionType;
  page: number;
  pageSize: number;
}

export interface Page<T> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
}

export interface CategoryTotal {
  categoryId: string | null;
  spentCents: number;
}

export interface MonthlyReport {
  userId: string;
  month: Month;
  totalIncomeCents: number;
  totalExpensesCents: number;
  netCents: number;
  byCategory: CategoryTotal[];
}

export interface BudgetAlert {
  userId: string;
  budgetId: string;
  budgetName: string;
  percentageUsed: number;
}

export const DEFAULT_PAGE_SIZE = 20;
export const DEFAULT_ALERT_THRESHOLD = 80;
