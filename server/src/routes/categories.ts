import { Router } from 'express';

import { categoryDto } from '../http/dto.js';
import { ConflictError, NotFoundError } from '../http/errors.js';
import { currentUser } from '../http/middleware.js';
import { categoryBody, parseWith } from '../http/schemas.js';
import type { Stores } from '../store/index.js';

export function categoryRoutes(stores: Stores): Router {
  const router = Router();
  const { categories } = stores;

  router.get('/', (req, res) => {
    const userId = currentUser(req);
    categories.ensureDefaults(userId);
    res.json(categories.list(userId).map(categoryDto));
  });

  router.post('/', (req, res) => {
    const userId = currentUser(req);
    const input = parseWith(categoryBody, req.body);
    if (categories.findByName(userId, input.name)) {
      throw new ConflictError(`Category "${input.name}" already exists`);
    }
    res.status(201).json(categoryDto(categories.create(userId, input)));
  });

  router.put('/:id', (req, res) => {
    const userId = currentUser(req);
    const input = parseWith(categoryBody, req.body);
    const clash = categories.findByName(userId, input.name);
    if (clash && clash.id !== req.params.id) {
      throw new ConflictError(`Category "${input.name}" already exists`);
    }
    const updated = categories.update(req.params.id, userId, input);
    if (!updated) throw new NotFoundError('Category');
    res.json(categoryDto(updated));
  });

  // Detaches transactions and deletes budgets tied to the category
  router.delete('/:id', (req, res) => {
    const userId = currentUser(req);
    if (!categories.remove(req.params.id, userId)) throw new NotFoundError('Category');
    res.json({ ok: true });
  });

  return router;
}
