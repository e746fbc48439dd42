import { generateId, type Db } from '../db.js';
import { pageOffset } from '../domain/computations.js';
import type {
  IsoDate,
  Page,
  Transaction,
  TransactionFilter,
  TransactionType,
} from '../domain/types.js';

interface TransactionRow {
  id: string;
  user_id: string;
  description: string;
  amount_cents: number;
  type: TransactionType;
  date: string;
  category_id: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface TransactionInput {
  description: string;
  amountCents: number;
  type: TransactionType;
  date: IsoDate;
  categoryId: string | null;
}

export interface TransactionStore {
  create(userId: string, input: TransactionInput): Transaction;
  get(id: string, userId: string): Transaction | undefined;
  update(id: string, userId: string, input: TransactionInput): Transaction | undefined;
  remove(id: string, userId: string): boolean;
  list(userId: string, filter: TransactionFilter): Page<Transaction>;
  listForCategory(userId: string, categoryId: string): Transaction[];
  listBetween(userId: string, start: IsoDate, end: IsoDate): Transaction[];
  usersWithActivityBetween(start: IsoDate, end: IsoDate): string[];
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    userId: row.user_id,
    description: row.description,
    amountCents: row.amount_cents,
    type: row.type,
    date: row.date,
    categoryId: row.category_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

interface FilterParams {
  userId: string;
  startDate?: string;
  endDate?: string;
  categoryId?: string;
  type?: string;
}

/** Builds the WHERE clause for a filter; every provided criterion is ANDed */
function buildWhere(userId: string, filter: TransactionFilter): { sql: string; params: FilterParams } {
  const clauses = ['user_id = @userId'];
  const params: FilterParams = { userId };

  if (filter.startDate !== undefined) {
    clauses.push('date >= @startDate');
    params.startDate = filter.startDate;
  }
  if (filter.endDate !== undefined) {
    clauses.push('date <= @endDate');
    params.endDate = filter.endDate;
  }
  if (filter.categoryId !== undefined) {
    clauses.push('category_id = @categoryId');
    params.categoryId = filter.categoryId;
  }
  if (filter.type !== undefined) {
    clauses.push('type = @type');
    params.type = filter.type;
  }

  return { sql: clauses.join(' AND '), params };
}

export function createTransactionStore(db: Db): TransactionStore {
  const selectOne = db.prepare<[string, string], TransactionRow>(
    'SELECT * FROM transactions WHERE id = ? AND user_id = ?',
  );

  const get = (id: string, userId: string): Transaction | undefined => {
    const row = selectOne.get(id, userId);
    return row ? toTransaction(row) : undefined;
  };

  return {
    create(userId, input) {
      const id = generateId();
      db.prepare(`
        INSERT INTO transactions (id, user_id, description, amount_cents, type, date, category_id, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        id, userId, input.description, input.amountCents, input.type, input.date,
        input.categoryId, new Date().toISOString(),
      );

      const created = get(id, userId);
      if (!created) throw new Error(`Transaction ${id} vanished after insert`);
      return created;
    },

    get,

    update(id, userId, input) {
      const result = db.prepare(`
        UPDATE transactions
        SET description = ?, amount_cents = ?, type = ?, date = ?, category_id = ?, updated_at = ?
        WHERE id = ? AND user_id = ?
      `).run(
        input.description, input.amountCents, input.type, input.date, input.categoryId,
        new Date().toISOString(), id, userId,
      );
      return result.changes > 0 ? get(id, userId) : undefined;
    },

    remove(id, userId) {
      const result = db.prepare('DELETE FROM transactions WHERE id = ? AND user_id = ?').run(id, userId);
      return result.changes > 0;
    },

    list(userId, filter) {
      const where = buildWhere(userId, filter);

      const countRow = db.prepare<FilterParams, { total: number }>(
        `SELECT COUNT(*) AS total FROM transactions WHERE ${where.sql}`,
      ).get(where.params);
      const totalCount = countRow?.total ?? 0;
      const offset = pageOffset(filter.page, filter.pageSize);

      // Past the last page; also keeps OFFSET inside SQLite's integer range
      if (offset >= totalCount) {
        return { items: [], totalCount, page: filter.page, pageSize: filter.pageSize };
      }

      // date DESC, then newest insert, then id for a stable order across pages
      const rows = db.prepare<FilterParams & { limit: number; offset: number }, TransactionRow>(`
        SELECT * FROM transactions
        WHERE ${where.sql}
        ORDER BY date DESC, created_at DESC, id DESC
        LIMIT @limit OFFSET @offset
      `).all({
        ...where.params,
        limit: filter.pageSize,
        offset,
      });

      return {
        items: rows.map(toTransaction),
        totalCount,
        page: filter.page,
        pageSize: filter.pageSize,
      };
    },

    listForCategory(userId, categoryId) {
      return db.prepare<[string, string], TransactionRow>(
        'SELECT * FROM transactions WHERE user_id = ? AND category_id = ?',
      ).all(userId, categoryId).map(toTransaction);
    },

    listBetween(userId, start, end) {
      return db.prepare<[string, string, string], TransactionRow>(`
        SELECT * FROM transactions
        WHERE user_id = ? AND date >= ? AND date <= ?
        ORDER BY date ASC
      `).all(userId, start, end).map(toTransaction);
    },

    usersWithActivityBetween(start, end) {
      return db.prepare<[string, string], { user_id: string }>(`
        SELECT DISTINCT user_id FROM transactions
        WHERE date >= ? AND date <= ?
        ORDER BY user_id
      `).all(start, end).map((r) => r.user_id);
    },
  };
}
