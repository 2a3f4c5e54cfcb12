import { Router } from 'express';
import type { Services } from '../lib/services.js';
import { LearnOptions, parseInput } from '../middleware/validation.js';
import type { Concept } from '../types/content.js';

export function conceptRoutes(services: Services): Router {
  const router = Router();

  // GET /api/concepts?topic=&level=&search=
  router.get('/', (req, res) => {
    const query = parseInput(LearnOptions, req.query, 'query');
    const library = services.concepts;

    let concepts: Concept[];
    if (query.search !== undefined) {
      concepts = library.search(query.search);
    } else if (query.topic && query.level) {
      concepts = library.byTopicAndLevel(query.topic, query.level);
    } else if (query.topic) {
      concepts = library.byTopic(query.topic);
    } else if (query.level) {
      concepts = library.byLevel(query.level);
    } else {
      concepts = library.all();
    }

    res.json({ ok: true, count: concepts.length, concepts });
  });

  return router;
}
