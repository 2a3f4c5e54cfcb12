import { Router } from 'express';
import { NotFoundError } from '../lib/errors.js';
import type { Services } from '../lib/services.js';

export function upiRoutes(services: Services): Router {
  const router = Router();

  // GET /api/upi - list guide topics
  router.get('/', (req, res) => {
    res.json({ ok: true, topics: services.upi.availableTopics() });
  });

  // GET /api/upi/:topic
  router.get('/:topic', (req, res) => {
    const guide = services.upi.getGuide(req.params.topic);
    if (!guide) {
      throw new NotFoundError(
        `Unknown UPI topic "${req.params.topic}". Available: ${services.upi.availableTopics().join(', ')}`
      );
    }

    res.json({ ok: true, slug: req.params.topic.toLowerCase(), guide });
  });

  return router;
}
