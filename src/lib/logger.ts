import pino from 'pino';
import { env } from '../config/env.js';

// stdout belongs to CLI output, so every log line goes to stderr.
export const logger = pino(
  {
    level: env.LOG_LEVEL,
    base: { service: 'paisa-guide' },
    transport: env.NODE_ENV === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
        destination: 2,
      },
    } : undefined,
  },
  env.NODE_ENV === 'development' ? undefined : pino.destination(2),
);
