import pino from 'pino';

// stdout carries tool results; diagnostics always go to stderr.
export const logger = pino(
  {
    name: 'ytmcp',
    level: process.env.LOG_LEVEL ?? 'warn',
  },
  pino.destination(2)
);
