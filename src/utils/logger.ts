/**
 * Structured logging for the cart ledger.
 * JSON lines go to stderr; stdout belongs to the menu.
 */

import { destination, pino } from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export type { Logger };

export const SERVICE_NAME = 'bazaar-cart';

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({ name: SERVICE_NAME, level }, destination(2));
}

// for collaborators constructed without a logger, and for tests
export function createSilentLogger(): Logger {
  return pino({ name: SERVICE_NAME, level: 'silent' });
}
