import { describe, expect, it } from 'vitest';

import {
  addDays,
  categoryBreakdown,
  monthBounds,
  monthlyReport,
  pageOffset,
  percentageUsed,
  previousMonth,
  summarizeBudget,
  toCents,
  todayIso,
} from './computations.js';
import type { Budget, Transaction } from './types.js';

// --- Test data factories ---

function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 't1',
    userId: 'user-1',
    description: 'Test purchase',
    amountCents: 1000,
    type: 'Expense',
    date: '2024-01-15',
    categoryId: 'food',
    createdAt: '2024-01-15T00:00:00.000Z',
    updatedAt: null,
    ...overrides,
  };
}

function makeBudget(overrides: Partial<Budget> = {}): Budget {
  return {
    id: 'b1',
    userId: 'user-1',
    name: 'Food',
    amountCents: 50000,
    period: 'Monthly',
    startDate: '2024-01-01',
    endDate: null,
    categoryId: 'food',
    lastAlertedAt: null,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: null,
    ...overrides,
  };
}

describe('summarizeBudget', () => {
  it('counts only in-window expenses of the budget category', () => {
    const txns = [
      makeTxn({ id: '1', amountCents: 12000 }),
      makeTxn({ id: '2', amountCents: 5000, type: 'Income' }),
      makeTxn({ id: '3', amountCents: 3000, categoryId: 'travel' }),
      makeTxn({ id: '4', amountCents: 20000, date: '2023-12-31' }),
    ];

    const status = summarizeBudget(makeBudget(), txns);

    expect(status).toEqual({ spentCents: 12000, remainingCents: 38000, percentageUsed: 24 });
  });

  it('returns zeros when nothing matches', () => {
    const status = summarizeBudget(makeBudget(), []);
    expect(status).toEqual({ spentCents: 0, remainingCents: 50000, percentageUsed: 0 });
  });

  it('includes both window edges', () => {
    const budget = makeBudget({ startDate: '2024-01-01', endDate: '2024-01-31' });
    const txns = [
      makeTxn({ id: '1', date: '2024-01-01', amountCents: 100 }),
      makeTxn({ id: '2', date: '2024-01-31', amountCents: 200 }),
      makeTxn({ id: '3', date: '2024-02-01', amountCents: 400 }),
    ];
    expect(summarizeBudget(budget, txns).spentCents).toBe(300);
  });

  it('keeps a negative remaining when overspent', () => {
    const status = summarizeBudget(makeBudget({ amountCents: 10000 }), [makeTxn({ amountCents: 15000 })]);
    expect(status.remainingCents).toBe(-5000);
    expect(status.percentageUsed).toBe(150);
  });

  it('ignores uncategorised expenses', () => {
    const status = summarizeBudget(makeBudget(), [makeTxn({ categoryId: null })]);
    expect(status.spentCents).toBe(0);
  });

  it('does not depend on transaction order', () => {
    const txns = [
      makeTxn({ id: '1', amountCents: 1234 }),
      makeTxn({ id: '2', amountCents: 999, date: '2024-03-02' }),
      makeTxn({ id: '3', amountCents: 1 }),
    ];
    const forward = summarizeBudget(makeBudget(), txns);
    const reversed = summarizeBudget(makeBudget(), [...txns].reverse());
    expect(reversed).toEqual(forward);
    expect(forward.spentCents).toBe(2234);
  });
});

describe('percentageUsed', () => {
  it('returns 0 for a zero or negative budget amount', () => {
    expect(percentageUsed(500, 0)).toBe(0);
    expect(percentageUsed(500, -100)).toBe(0);
  });

  it('computes spent over amount', () => {
    expect(percentageUsed(4000, 5000)).toBe(80);
  });
});

describe('monthlyReport', () => {
  it('totals income and expenses for the month only', () => {
    const txns = [
      makeTxn({ id: '1', type: 'Income', amountCents: 300000, categoryId: 'salary', date: '2024-02-01' }),
      makeTxn({ id: '2', amountCents: 4500, categoryId: 'food', date: '2024-02-10' }),
      makeTxn({ id: '3', amountCents: 9000, categoryId: 'rent', date: '2024-02-28' }),
      makeTxn({ id: '4', amountCents: 500, categoryId: null, date: '2024-02-29' }),
      makeTxn({ id: '5', amountCents: 7000, categoryId: 'food', date: '2024-03-01' }),
    ];

    const report = monthlyReport('user-1', '2024-02', txns);

    expect(report.totalIncomeCents).toBe(300000);
    expect(report.totalExpensesCents).toBe(14000);
    expect(report.netCents).toBe(286000);
    expect(report.byCategory).toEqual([
      { categoryId: 'rent', spentCents: 9000 },
      { categoryId: 'food', spentCents: 4500 },
      { categoryId: null, spentCents: 500 },
    ]);
  });
});

describe('categoryBreakdown', () => {
  it('groups expenses and sorts by amount', () => {
    const bd = categoryBreakdown([
      makeTxn({ id: '1', amountCents: 300, categoryId: 'a' }),
      makeTxn({ id: '2', amountCents: 200, categoryId: 'b' }),
      makeTxn({ id: '3', amountCents: 250, categoryId: 'b' }),
    ]);
    expect(bd).toEqual([
      { categoryId: 'b', spentCents: 450 },
      { categoryId: 'a', spentCents: 300 },
    ]);
  });
});

describe('helpers', () => {
  it('converts decimals to cents without float drift', () => {
    expect(toCents(19.99)).toBe(1999);
    expect(toCents(0.1 + 0.2)).toBe(30);
  });

  it('computes page offsets', () => {
    expect(pageOffset(1, 20)).toBe(0);
    expect(pageOffset(3, 20)).toBe(40);
  });

  it('handles month and day arithmetic in UTC', () => {
    expect(todayIso(new Date('2024-05-06T23:59:00Z'))).toBe('2024-05-06');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(previousMonth(new Date('2024-01-01T00:00:00Z'))).toBe('2023-12');
    expect(monthBounds('2024-02')).toEqual({ start: '2024-02-01', end: '2024-02-29' });
    expect(monthBounds('2023-11')).toEqual({ start: '2023-11-01', end: '2023-11-30' });
  });
});
