import express from 'express';
import cors from 'cors';
import { env } from './config/env.js';
import { AppError, toErrorResponse } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { createServices, type Services } from './lib/services.js';
import { budgetRoutes } from './routes/budget.js';
import { conceptRoutes } from './routes/concepts.js';
import { investmentRoutes } from './routes/investments.js';
import { schemeRoutes } from './routes/schemes.js';
import { upiRoutes } from './routes/upi.js';

export function createApp(services: Services = createServices()): express.Express {
  const app = express();

  // Read-only content, so any origin may fetch it.
  app.use(cors());

  // Health check
  app.get('/healthz', (req, res) => {
    res.json({
      ok: true,
      timestamp: new Date().toISOString(),
      service: 'paisa-guide-api',
      environment: env.NODE_ENV,
    });
  });

  // API Routes
  app.use('/api/concepts', conceptRoutes(services));
  app.use('/api/budget', budgetRoutes(services));
  app.use('/api/schemes', schemeRoutes(services));
  app.use('/api/upi', upiRoutes(services));
  app.use('/api/investments', investmentRoutes(services));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      ok: false,
      error: 'Route not found',
      code: 'NOT_FOUND',
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof AppError) {
      logger.warn({ code: err.errorCode, url: req.originalUrl, method: req.method }, err.message);
      res.status(err.statusCode).json(toErrorResponse(err));
      return;
    }

    logger.error({
      err,
      url: req.originalUrl,
      method: req.method,
    }, 'Unhandled error');

    res.status(500).json({
      ok: false,
      error: env.NODE_ENV === 'production' || !(err instanceof Error) ? 'Internal server error' : err.message,
      code: 'INTERNAL_ERROR',
    });
  });

  return app;
}
