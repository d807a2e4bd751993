import { pino, type Logger } from 'pino';

const DEFAULT_LEVEL = 'silent';

/**
 * Default logger for a registry. The level comes from `LOCUS_LOG_LEVEL` so an
 * application can turn lifecycle records on without touching code.
 */
export function createDefaultLogger(name: string): Logger {
  return pino({
    name,
    level: process.env.LOCUS_LOG_LEVEL ?? DEFAULT_LEVEL,
  });
}
