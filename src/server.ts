import { env } from './config/env.js';
import { createApp } from './app.js';
import { logger } from './lib/logger.js';
import { getContentStore } from './lib/contentStore.js';
import { createServices } from './lib/services.js';

function startServer(): void {
  try {
    const store = getContentStore();
    const app = createApp(createServices(store));

    const server = app.listen(env.PORT, '0.0.0.0', () => {
      logger.info({
        port: env.PORT,
        environment: env.NODE_ENV,
        content: store.counts(),
      }, 'Server started successfully');
    });

    // Graceful shutdown
    process.on('SIGINT', () => {
      logger.info('Shutting down server...');
      server.close(() => {
        process.exit(0);
      });
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exitCode = 1;
  }
}

startServer();
