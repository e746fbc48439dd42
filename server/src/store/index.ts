import type { Db } from '../db.js';
import { createBudgetStore, type BudgetStore } from './budgets.js';
import { createCategoryStore, type CategoryStore } from './categories.js';
import { createJobRunStore } from './jobRuns.js';
import { createTransactionStore, type TransactionStore } from './transactions.js';

export interface Stores {
  transactions: TransactionStore;
  categories: CategoryStore;
  budgets: BudgetStore;
}

export function createStores(db: Db): Stores {
  return {
    transactions: createTransactionStore(db),
    categories: createCategoryStore(db),
    budgets: createBudgetStore(db),
  };
}

export { createJobRunStore };

export type { BudgetInput, BudgetStore } from './budgets.js';
export type { CategoryInput, CategoryStore } from './categories.js';
export type { TransactionInput, TransactionStore } from './transactions.js';
