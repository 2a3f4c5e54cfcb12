import { Router } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../lib/errors.js';
import type { Services } from '../lib/services.js';
import { SchemesOptions, parseInput } from '../middleware/validation.js';

const LookupQuery = z.object({
  name: z.string().trim().min(1, 'Scheme name is required').max(200, 'Value too long'),
});

export function schemeRoutes(services: Services): Router {
  const router = Router();

  // GET /api/schemes?age=&income=&occupation=
  router.get('/', (req, res) => {
    const { age, income, occupation } = parseInput(SchemesOptions, req.query, 'query');
    const schemes = services.schemes.findEligible({ age, income, occupation });

    res.json({ ok: true, count: schemes.length, schemes });
  });

  // GET /api/schemes/lookup?name=
  router.get('/lookup', (req, res) => {
    const { name } = parseInput(LookupQuery, req.query, 'query');
    const scheme = services.schemes.getScheme(name);
    if (!scheme) {
      throw new NotFoundError(`No scheme matches "${name}"`);
    }

    res.json({ ok: true, scheme });
  });

  return router;
}
