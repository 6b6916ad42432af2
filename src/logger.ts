import pino from 'pino';
import type { Logger } from 'pino';

// ---------------------------------------------------------------------------
// Root logger, shared by the job components and the Fastify server
// ---------------------------------------------------------------------------

export const SERVICE_NAME = 'dormant-account-cleanup';

export function createLogger(level: string): Logger {
  return pino({
    level,
    base: { service: SERVICE_NAME },
  });
}
