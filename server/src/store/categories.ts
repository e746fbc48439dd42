import { generateId, type Db } from '../db.js';
import type { Category } from '../domain/types.js';

interface CategoryRow {
  id: string;
  user_id: string;
  name: string;
  icon: string | null;
  color: string | null;
  is_default: number;
  created_at: string;
  updated_at: string | null;
}

export interface CategoryInput {
  name: string;
  icon: string | null;
  color: string | null;
}

/** Seeded for a user the first time they list categories */
export const DEFAULT_CATEGORIES: readonly CategoryInput[] = [
  { name: 'Groceries', icon: 'cart', color: '#4CAF50' },
  { name: 'Dining', icon: 'utensils', color: '#FF9800' },
  { name: 'Transport', icon: 'bus', color: '#2196F3' },
  { name: 'Housing', icon: 'home', color: '#795548' },
  { name: 'Utilities', icon: 'bolt', color: '#FFC107' },
  { name: 'Entertainment', icon: 'film', color: '#9C27B0' },
  { name: 'Health', icon: 'heart', color: '#F44336' },
  { name: 'Salary', icon: 'briefcase', color: '#009688' },
];

export interface CategoryStore {
  list(userId: string): Category[];
  get(id: string, userId: string): Category | undefined;
  findByName(userId: string, name: string): Category | undefined;
  create(userId: string, input: CategoryInput, isDefault?: boolean): Category;
  update(id: string, userId: string, input: CategoryInput): Category | undefined;
  remove(id: string, userId: string): boolean;
  ensureDefaults(userId: string): void;
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    icon: row.icon,
    color: row.color,
    isDefault: row.is_default === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createCategoryStore(db: Db): CategoryStore {
  const selectOne = db.prepare<[string, string], CategoryRow>(
    'SELECT * FROM categories WHERE id = ? AND user_id = ?',
  );
  const insert = db.prepare(`
    INSERT INTO categories (id, user_id, name, icon, color, is_default, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const get = (id: string, userId: string): Category | undefined => {
    const row = selectOne.get(id, userId);
    return row ? toCategory(row) : undefined;
  };

  const create = (userId: string, input: CategoryInput, isDefault = false): Category => {
    const id = generateId();
    insert.run(id, userId, input.name, input.icon, input.color, isDefault ? 1 : 0, new Date().toISOString());
    const created = get(id, userId);
    if (!created) throw new Error(`Category ${id} vanished after insert`);
    return created;
  };

  const seedDefaults = db.transaction((userId: string) => {
    for (const input of DEFAULT_CATEGORIES) {
      create(userId, input, true);
    }
  });

  return {
    list(userId) {
      return db.prepare<[string], CategoryRow>(
        'SELECT * FROM categories WHERE user_id = ? ORDER BY is_default DESC, name ASC',
      ).all(userId).map(toCategory);
    },

    get,

    findByName(userId, name) {
      const row = db.prepare<[string, string], CategoryRow>(
        'SELECT * FROM categories WHERE user_id = ? AND name = ?',
      ).get(userId, name);
      return row ? toCategory(row) : undefined;
    },

    create,

    update(id, userId, input) {
      const result = db.prepare(`
        UPDATE categories SET name = ?, icon = ?, color = ?, updated_at = ?
        WHERE id = ? AND user_id = ?
      `).run(input.name, input.icon, input.color, new Date().toISOString(), id, userId);
      return result.changes > 0 ? get(id, userId) : undefined;
    },

    // Transactions are detached and budgets cascade through the FK actions
    remove(id, userId) {
      const result = db.prepare('DELETE FROM categories WHERE id = ? AND user_id = ?').run(id, userId);
      return result.changes > 0;
    },

    ensureDefaults(userId) {
      const row = db.prepare<[string], { n: number }>(
        'SELECT COUNT(*) AS n FROM categories WHERE user_id = ?',
      ).get(userId);
      if ((row?.n ?? 0) === 0) {
        seedDefaults(userId);
      }
    },
  };
}
