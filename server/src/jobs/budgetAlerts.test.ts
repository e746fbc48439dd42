import { describe, expect, it, vi } from 'vitest';

import type { Budget, BudgetAlert, Transaction } from '../domain/types.js';
import type { NotificationSink } from '../notifications/sinks.js';
import { runBudgetAlertSweep, type AlertSweepDeps } from './budgetAlerts.js';

const NOW = new Date('2024-03-15T12:00:00.000Z');

function makeBudget(id: string, amountCents: number, overrides: Partial<Budget> = {}): Budget {
  return {
    id,
    userId: `owner-${id}`,
    name: `Budget ${id}`,
    amountCents,
    period: 'Monthly',
    startDate: '2024-03-01',
    endDate: null,
    categoryId: `cat-${id}`,
    lastAlertedAt: null,
    createdAt: '2024-03-01T00:00:00.000Z',
    updatedAt: null,
    ...overrides,
  };
}

function expense(categoryId: string, amountCents: number): Transaction {
  return {
    id: `${categoryId}-${amountCents}`,
    userId: 'any',
    description: 'spend',
    amountCents,
    type: 'Expense',
    date: '2024-03-10',
    categoryId,
    createdAt: '2024-03-10T00:00:00.000Z',
    updatedAt: null,
  };
}

/** Each budget's category has a single expense of `spent` cents */
function setup(entries: Array<{ budget: Budget; spent: number }>, sink: NotificationSink) {
  const markAlerted = vi.fn();
  const deps: AlertSweepDeps = {
    budgets: {
      listActive: () => entries.map((e) => e.budget),
      markAlerted,
    },
    transactions: {
      listForCategory: (_userId, categoryId) =>
        entries.filter((e) => e.budget.categoryId === categoryId).map((e) => expense(categoryId, e.spent)),
    },
    sink,
  };
  return { deps, markAlerted };
}

describe('runBudgetAlertSweep', () => {
  it('alerts once per budget at or over the threshold', async () => {
    const sent: BudgetAlert[] = [];
    const sink: NotificationSink = { sendBudgetAlert: async (alert) => { sent.push(alert); } };
    const { deps, markAlerted } = setup([
      { budget: makeBudget('a', 10000), spent: 7999 },
      { budget: makeBudget('b', 10000), spent: 8000 },
      { budget: makeBudget('c', 10000), spent: 12000 },
    ], sink);

    const result = await runBudgetAlertSweep(deps, { now: NOW });

    expect(result).toEqual({ evaluated: 3, alerted: 2, failed: 0, suppressed: 0 });
    expect(sent).toEqual([
      { userId: 'owner-b', budgetId: 'b', budgetName: 'Budget b', percentageUsed: 80 },
      { userId: 'owner-c', budgetId: 'c', budgetName: 'Budget c', percentageUsed: 120 },
    ]);
    expect(markAlerted).toHaveBeenCalledWith('b', NOW);
    expect(markAlerted).toHaveBeenCalledWith('c', NOW);
  });

  it('honours a custom threshold', async () => {
    const sendBudgetAlert = vi.fn(async () => {});
    const { deps } = setup([{ budget: makeBudget('a', 10000), spent: 5000 }], { sendBudgetAlert });

    const result = await runBudgetAlertSweep(deps, { threshold: 50, now: NOW });

    expect(result.alerted).toBe(1);
    expect(sendBudgetAlert).toHaveBeenCalledTimes(1);
  });

  it('keeps going after a failed delivery', async () => {
    const sendBudgetAlert = vi.fn(async (alert: BudgetAlert) => {
      if (alert.budgetId === 'a') throw new Error('smtp down');
    });
    const { deps, markAlerted } = setup([
      { budget: makeBudget('a', 100), spent: 100 },
      { budget: makeBudget('b', 100), spent: 100 },
    ], { sendBudgetAlert });

    const result = await runBudgetAlertSweep(deps, { now: NOW });

    expect(result).toEqual({ evaluated: 2, alerted: 1, failed: 1, suppressed: 0 });
    expect(sendBudgetAlert).toHaveBeenCalledTimes(2);
    expect(markAlerted).toHaveBeenCalledTimes(1);
    expect(markAlerted).toHaveBeenCalledWith('b', NOW);
  });

  it('counts a delivered alert even when recording it fails', async () => {
    const sendBudgetAlert = vi.fn(async () => {});
    const { deps, markAlerted } = setup([{ budget: makeBudget('a', 100), spent: 100 }], { sendBudgetAlert });
    markAlerted.mockImplementation(() => {
      throw new Error('database is locked');
    });

    const result = await runBudgetAlertSweep(deps, { now: NOW, cooldownMs: 6 * 60 * 60 * 1000 });

    expect(result).toEqual({ evaluated: 1, alerted: 1, failed: 0, suppressed: 0 });
    expect(sendBudgetAlert).toHaveBeenCalledTimes(1);
  });

  it('re-alerts every sweep when no cooldown is set', async () => {
    const sendBudgetAlert = vi.fn(async () => {});
    const recent = makeBudget('a', 100, { lastAlertedAt: '2024-03-15T11:00:00.000Z' });
    const { deps } = setup([{ budget: recent, spent: 90 }], { sendBudgetAlert });

    const result = await runBudgetAlertSweep(deps, { now: NOW });

    expect(result.alerted).toBe(1);
  });

  it('suppresses budgets alerted within the cooldown', async () => {
    const sendBudgetAlert = vi.fn(async () => {});
    const { deps } = setup([
      { budget: makeBudget('a', 100, { lastAlertedAt: '2024-03-15T11:00:00.000Z' }), spent: 90 },
      { budget: makeBudget('b', 100, { lastAlertedAt: '2024-03-14T11:00:00.000Z' }), spent: 90 },
    ], { sendBudgetAlert });

    const result = await runBudgetAlertSweep(deps, { now: NOW, cooldownMs: 6 * 60 * 60 * 1000 });

    expect(result).toEqual({ evaluated: 2, alerted: 1, failed: 0, suppressed: 1 });
    expect(sendBudgetAlert).toHaveBeenCalledWith(expect.objectContaining({ budgetId: 'b' }));
  });

  it('does not alert for a budget with a zero amount', async () => {
    const sendBudgetAlert = vi.fn(async () => {});
    const { deps } = setup([{ budget: makeBudget('a', 0), spent: 500 }], { sendBudgetAlert });

    const result = await runBudgetAlertSweep(deps, { now: NOW });

    expect(result).toEqual({ evaluated: 1, alerted: 0, failed: 0, suppressed: 0 });
  });
});
