import { Router } from 'express';
import type { Services } from '../lib/services.js';
import { BudgetOptions, parseInput } from '../middleware/validation.js';

export function budgetRoutes(services: Services): Router {
  const router = Router();

  // GET /api/budget?income=
  router.get('/', (req, res) => {
    const { income } = parseInput(BudgetOptions, req.query, 'query');
    const plan = services.budget.plan(income);

    res.json({ ok: true, plan });
  });

  return router;
}
