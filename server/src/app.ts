import cors from 'cors';
import express, { type Express } from 'express';

import { errorHandler } from './http/middleware.js';
import { budgetRoutes } from './routes/budgets.js';
import { categoryRoutes } from './routes/categories.js';
import { reportRoutes } from './routes/reports.js';
import { transactionRoutes } from './routes/transactions.js';
import type { Stores } from './store/index.js';

export interface AppOptions {
  maxPageSize: number;
}

export function createApp(stores: Stores, options: AppOptions): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/transactions', transactionRoutes(stores, { maxPageSize: options.maxPageSize }));
  app.use('/categories', categoryRoutes(stores));
  app.use('/budgets', budgetRoutes(stores));
  app.use('/reports', reportRoutes(stores));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}
