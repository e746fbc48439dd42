import { Router } from 'express';

import { monthlyReportDto } from '../http/dto.js';
import { currentUser } from '../http/middleware.js';
import { monthQuery, parseWith } from '../http/schemas.js';
import { buildMonthlyReport } from '../jobs/monthlyReports.js';
import type { Stores } from '../store/index.js';

export function reportRoutes(stores: Stores): Router {
  const router = Router();

  // GET /reports/monthly?month=YYYY-MM
  router.get('/monthly', (req, res) => {
    const userId = currentUser(req);
    const { month } = parseWith(monthQuery, req.query);
    res.json(monthlyReportDto(buildMonthlyReport(stores.transactions, userId, month)));
  });

  return router;
}
