import { Router } from 'express';

import { summarizeBudget, toCents } from '../domain/computations.js';
import type { Budget } from '../domain/types.js';
import { budgetDto } from '../http/dto.js';
import { NotFoundError } from '../http/errors.js';
import { currentUser } from '../http/middleware.js';
import { budgetBody, parseWith } from '../http/schemas.js';
import type { BudgetInput, Stores } from '../store/index.js';
import { assertOwnCategory } from './transactions.js';

function toInput(body: unknown, stores: Stores, userId: string): BudgetInput {
  const parsed = parseWith(budgetBody, body);
  assertOwnCategory(stores.categories, userId, parsed.categoryId);
  return {
    name: parsed.name,
    amountCents: toCents(parsed.amount),
    period: parsed.period,
    startDate: parsed.startDate,
    endDate: parsed.endDate,
    categoryId: parsed.categoryId,
  };
}

export function budgetRoutes(stores: Stores): Router {
  const router = Router();

  const withStatus = (budget: Budget) =>
    budgetDto(budget, summarizeBudget(budget, stores.transactions.listForCategory(budget.userId, budget.categoryId)));

  router.get('/', (req, res) => {
    const userId = currentUser(req);
    res.json(stores.budgets.list(userId).map(withStatus));
  });

  router.get('/:id', (req, res) => {
    const userId = currentUser(req);
    const budget = stores.budgets.get(req.params.id, userId);
    if (!budget) throw new NotFoundError('Budget');
    res.json(withStatus(budget));
  });

  router.post('/', (req, res) => {
    const userId = currentUser(req);
    const created = stores.budgets.create(userId, toInput(req.body, stores, userId));
    res.status(201).json(withStatus(created));
  });

  router.put('/:id', (req, res) => {
    const userId = currentUser(req);
    const updated = stores.budgets.update(req.params.id, userId, toInput(req.body, stores, userId));
    if (!updated) throw new NotFoundError('Budget');
    res.json(withStatus(updated));
  });

  router.delete('/:id', (req, res) => {
    const userId = currentUser(req);
    if (!stores.budgets.remove(req.params.id, userId)) throw new NotFoundError('Budget');
    res.json({ ok: true });
  });

  return router;
}
