import { fromCents } from '../domain/computations.js';
import type { Budget, BudgetStatus, Category, MonthlyReport, Transaction } from '../domain/types.js';

/** Percentages go out with two decimals */
const round2 = (value: number) => Math.round(value * 100) / 100;

export function transactionDto(t: Transaction) {
  return {
    id: t.id,
    description: t.description,
    amount: fromCents(t.amountCents),
    type: t.type,
    date: t.date,
    categoryId: t.categoryId,
    createdAt: t.createdAt,
    updatedAt: t.updatedAt,
  };
}

export function categoryDto(c: Category) {
  return {
    id: c.id,
    name: c.name,
    icon: c.icon,
    color: c.color,
    isDefault: c.isDefault,
    createdAt: c.createdAt,
    updatedAt: c.updatedAt,
  };
}

export function budgetDto(b: Budget, status: BudgetStatus) {
  return {
    id: b.id,
    name: b.name,
    amount: fromCents(b.amountCents),
    period: b.period,
    startDate: b.startDate,
    endDate: b.endDate,
    categoryId: b.categoryId,
    createdAt: b.createdAt,
    updatedAt: b.updatedAt,
    spent: fromCents(status.spentCents),
    remaining: fromCents(status.remainingCents),
    percentageUsed: round2(status.percentageUsed),
  };
}

export function monthlyReportDto(r: MonthlyReport) {
  return {
    month: r.month,
    totalIncome: fromCents(r.totalIncomeCents),
    totalExpenses: fromCents(r.totalExpensesCents),
    net: fromCents(r.netCents),
    byCategory: r.byCategory.map((c) => ({ categoryId: c.categoryId, spent: fromCents(c.spentCents) })),
  };
}
