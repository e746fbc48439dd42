import { generateId, type Db } from '../db.js';
import type { Budget, BudgetPeriod, IsoDate } from '../domain/types.js';

interface BudgetRow {
  id: string;
  user_id: string;
  name: string;
  amount_cents: number;
  period: BudgetPeriod;
  start_date: string;
  end_date: string | null;
  category_id: string;
  last_alerted_at: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface BudgetInput {
  name: string;
  amountCents: number;
  period: BudgetPeriod;
  startDate: IsoDate;
  endDate: IsoDate | null;
  categoryId: string;
}

export interface BudgetStore {
  list(userId: string): Budget[];
  get(id: string, userId: string): Budget | undefined;
  create(userId: string, input: BudgetInput): Budget;
  update(id: string, userId: string, input: BudgetInput): Budget | undefined;
  remove(id: string, userId: string): boolean;
  /** Budgets of every user whose window contains `today` */
  listActive(today: IsoDate): Budget[];
  markAlerted(id: string, at: Date): void;
}

function toBudget(row: BudgetRow): Budget {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    amountCents: row.amount_cents,
    period: row.period,
    startDate: row.start_date,
    endDate: row.end_date,
    categoryId: row.category_id,
    lastAlertedAt: row.last_alerted_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createBudgetStore(db: Db): BudgetStore {
  const selectOne = db.prepare<[string, string], BudgetRow>(
    'SELECT * FROM budgets WHERE id = ? AND user_id = ?',
  );

  const get = (id: string, userId: string): Budget | undefined => {
    const row = selectOne.get(id, userId);
    return row ? toBudget(row) : undefined;
  };

  return {
    list(userId) {
      return db.prepare<[string], BudgetRow>(
        'SELECT * FROM budgets WHERE user_id = ? ORDER BY start_date DESC, name ASC',
      ).all(userId).map(toBudget);
    },

    get,

    create(userId, input) {
      const id = generateId();
      db.prepare(`
        INSERT INTO budgets (id, user_id, name, amount_cents, period, start_date, end_date, category_id, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        id, userId, input.name, input.amountCents, input.period, input.startDate, input.endDate,
        input.categoryId, new Date().toISOString(),
      );

      const created = get(id, userId);
      if (!created) throw new Error(`Budget ${id} vanished after insert`);
      return created;
    },

    update(id, userId, input) {
      const result = db.prepare(`
        UPDATE budgets
        SET name = ?, amount_cents = ?, period = ?, start_date = ?, end_date = ?, category_id = ?, updated_at = ?
        WHERE id = ? AND user_id = ?
      `).run(
        input.name, input.amountCents, input.period, input.startDate, input.endDate, input.categoryId,
        new Date().toISOString(), id, userId,
      );
      return result.changes > 0 ? get(id, userId) : undefined;
    },

    remove(id, userId) {
      const result = db.prepare('DELETE FROM budgets WHERE id = ? AND user_id = ?').run(id, userId);
      return result.changes > 0;
    },

    listActive(today) {
      return db.prepare<[string, string], BudgetRow>(`
        SELECT * FROM budgets
        WHERE start_date <= ? AND (end_date IS NULL OR end_date >= ?)
        ORDER BY user_id, id
      `).all(today, today).map(toBudget);
    },

    markAlerted(id, at) {
      db.prepare('UPDATE budgets SET last_alerted_at = ? WHERE id = ?').run(at.toISOString(), id);
    },
  };
}
