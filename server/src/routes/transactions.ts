import { Router } from 'express';

import { toCents } from '../domain/computations.js';
import { transactionDto } from '../http/dto.js';
import { NotFoundError, ValidationError } from '../http/errors.js';
import { currentUser } from '../http/middleware.js';
import { parseWith, transactionBody, transactionQuery } from '../http/schemas.js';
import type { CategoryStore, Stores, TransactionInput } from '../store/index.js';

export interface TransactionRouteOptions {
  maxPageSize: number;
}

/** A referenced category must belong to the caller */
export function assertOwnCategory(categories: CategoryStore, userId: string, categoryId: string | null): void {
  if (categoryId !== null && !categories.get(categoryId, userId)) {
    throw new ValidationError(`Unknown category ${categoryId}`);
  }
}

function toInput(body: unknown, stores: Stores, userId: string): TransactionInput {
  const parsed = parseWith(transactionBody, body);
  assertOwnCategory(stores.categories, userId, parsed.categoryId);
  return {
    description: parsed.description,
    amountCents: toCents(parsed.amount),
    type: parsed.type,
    date: parsed.date,
    categoryId: parsed.categoryId,
  };
}

export function transactionRoutes(stores: Stores, options: TransactionRouteOptions): Router {
  const router = Router();

  // GET /transactions?startDate&endDate&categoryId&type&page&pageSize
  router.get('/', (req, res) => {
    const userId = currentUser(req);
    const query = parseWith(transactionQuery, req.query);
    const page = stores.transactions.list(userId, {
      ...query,
      pageSize: Math.min(query.pageSize, options.maxPageSize),
    });
    res.json({ ...page, items: page.items.map(transactionDto) });
  });

  router.get('/:id', (req, res) => {
    const userId = currentUser(req);
    const txn = stores.transactions.get(req.params.id, userId);
    if (!txn) throw new NotFoundError('Transaction');
    res.json(transactionDto(txn));
  });

  router.post('/', (req, res) => {
    const userId = currentUser(req);
    const created = stores.transactions.create(userId, toInput(req.body, stores, userId));
    res.status(201).json(transactionDto(created));
  });

  router.put('/:id', (req, res) => {
    const userId = currentUser(req);
    const updated = stores.transactions.update(req.params.id, userId, toInput(req.body, stores, userId));
    if (!updated) throw new NotFoundError('Transaction');
    res.json(transactionDto(updated));
  });

  router.delete('/:id', (req, res) => {
    const userId = currentUser(req);
    if (!stores.transactions.remove(req.params.id, userId)) throw new NotFoundError('Transaction');
    res.json({ ok: true });
  });

  return router;
}
