import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = Database.Database;

/**
 * Opens (or creates) the SQLite database and applies the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL for concurrent readers; FK enforcement is off by default in SQLite
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  migrate(db);
  return db;
}

function migrate(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS categories (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      icon TEXT DEFAULT NULL,
      color TEXT DEFAULT NULL,
      is_default INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT DEFAULT NULL,
      UNIQUE(user_id, name)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      description TEXT NOT NULL,
      amount_cents INTEGER NOT NULL CHECK (amount_cents > 0),
      type TEXT NOT NULL CHECK (type IN ('Income', 'Expense')),
      date TEXT NOT NULL,
      category_id TEXT DEFAULT NULL REFERENCES categories(id) ON DELETE SET NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT DEFAULT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_user_date ON transactions(user_id, date)
  `);
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_category ON transactions(category_id)
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      amount_cents INTEGER NOT NULL CHECK (amount_cents > 0),
      period TEXT NOT NULL CHECK (period IN ('Daily', 'Weekly', 'Monthly', 'Yearly')),
      start_date TEXT NOT NULL,
      end_date TEXT DEFAULT NULL CHECK (end_date IS NULL OR end_date > start_date),
      category_id TEXT NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
      last_alerted_at TEXT DEFAULT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT DEFAULT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_budgets_user ON budgets(user_id)
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS job_runs (
      name TEXT PRIMARY KEY,
      last_run_at TEXT NOT NULL
    )
  `);

  // Add last_alerted_at to databases created before the alert cooldown existed
  const budgetCols = db.pragma('table_info(budgets)') as { name: string }[];
  if (!budgetCols.some((c) => c.name === 'last_alerted_at')) {
    db.exec(`ALTER TABLE budgets ADD COLUMN last_alerted_at TEXT DEFAULT NULL`);
  }
}

// Helper function to generate cuid-like IDs
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}
