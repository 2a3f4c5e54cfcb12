import { Router } from 'express';
import type { Services } from '../lib/services.js';
import { InvestOptions, parseInput } from '../middleware/validation.js';
import type { InvestmentOption } from '../types/content.js';

export function investmentRoutes(services: Services): Router {
  const router = Router();

  // GET /api/investments?risk=&taxSaving=&beginner=
  router.get('/', (req, res) => {
    const query = parseInput(InvestOptions, req.query, 'query');
    const basics = services.investments;

    let options: InvestmentOption[];
    if (query.taxSaving) {
      options = basics.taxSaving();
    } else if (query.beginner) {
      options = basics.forBeginner();
    } else if (query.risk) {
      options = basics.byRisk(query.risk);
    } else {
      options = basics.compareAll();
    }

    res.json({ ok: true, count: options.length, options });
  });

  return router;
}
