/**
 * Periodic removal of expired security state (CSRF tokens, attempt
 * histories, rate buckets).
 *
 * @module security/sweeper
 */

import type { Logger } from '../logging/logger.js';
import { toError } from '../logging/logger.js';

/** Anything with a `sweep(now)` that drops expired entries. */
export interface Sweepable {
  sweep(now: number): Promise<number>;
}

export type SweepTargets = Record<string, Sweepable>;

export interface SweepReport {
  /** Entries removed, by target name. */
  removed: Record<string, number>;
  sweptAt: Date;
}

/**
 * Sweep every target once. A target that fails is logged and counted as
 * zero; the others are still swept.
 */
export async function sweepSecurityState(
  targets: SweepTargets,
  logger: Logger,
  now: number = Date.now(),
): Promise<SweepReport> {
  const removed: Record<string, number> = {};

  for (const [name, target] of Object.entries(targets)) {
    try {
      removed[name] = await target.sweep(now);
    } catch (err) {
      logger.error('Security state sweep failed', toError(err), { target: name });
      removed[name] = 0;
    }
  }

  return { removed, sweptAt: new Date(now) };
}

export interface SweeperOptions {
  targets: SweepTargets;
  intervalMs: number;
  logger: Logger;
  now?: () => number;
}

/** Start sweeping on a timer that does not keep the process alive. Returns a stop function. */
export function startSecuritySweeper(options: SweeperOptions): () => void {
  const logger = options.logger.child({ component: 'sweeper' });
  const now = options.now ?? Date.now;
  let running = false;

  const timer = setInterval(() => {
    if (running) return;
    running = true;
    sweepSecurityState(options.targets, logger, now())
      .then((report) => {
        const total = Object.values(report.removed).reduce((sum, count) => sum + count, 0);
        if (total > 0) logger.debug('Expired security state removed', { ...report.removed });
      })
      .finally(() => {
        running = false;
      })
      .catch((err: unknown) => {
        logger.error('Security state sweep failed', toError(err));
      });
  }, options.intervalMs);
  timer.unref();

  return () => {
    clearInterval(timer);
  };
}
