/**
 * Due-post worker: a node-cron job that hands scheduled posts whose slot has
 * arrived to the dispatcher. Started by `relaypost worker`.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { ScheduleError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { findDueScheduled } from '../post/postStore.js';
import type { Dispatcher } from '../publish/dispatcher.js';

export interface DueRunStats {
  due: number;
  posted: number;
  failed: number;
  /** Still scheduled, usually because the rate limiter said wait. */
  deferred: number;
}

let dispatchTask: ScheduledTask | null = null;
let inFlight = false;

/**
 * Dispatch every scheduled post due at `now`, oldest slot first. Posts on the
 * same platform go one at a time so the rate limiter sees each result.
 */
export async function runDuePosts(
  db: Database.Database,
  dispatcher: Dispatcher,
  now: Date = new Date(),
  signal?: AbortSignal,
): Promise<DueRunStats> {
  const due = findDueScheduled(db, now);
  const stats: DueRunStats = { due: due.length, posted: 0, failed: 0, deferred: 0 };

  for (const post of due) {
    if (signal?.aborted) {
      stats.deferred += due.length - stats.posted - stats.failed - stats.deferred;
      break;
    }
    try {
      const result = await dispatcher.dispatchScheduled(post, { signal });
      if (result.success) stats.posted++;
      else if (result.skipped === 'rate_limited') stats.deferred++;
      else stats.failed++;
    } catch (e) {
      stats.failed++;
      logger.error({ postId: post.id, error: errorMessage(e) }, 'Scheduled dispatch failed');
    }
  }

  if (due.length > 0) {
    logger.info(stats, 'Due posts processed');
  }
  return stats;
}

async function tick(db: Database.Database, dispatcher: Dispatcher): Promise<void> {
  if (inFlight) {
    logger.info('Previous due-post run still in flight, skipping tick');
    return;
  }
  inFlight = true;
  try {
    await runDuePosts(db, dispatcher);
  } catch (e) {
    logger.error({ error: errorMessage(e) }, 'Due-post run failed');
  } finally {
    inFlight = false;
  }
}

export function startWorker(db: Database.Database, config: Config, dispatcher: Dispatcher): void {
  const expression = config.worker.dispatch_cron;
  if (!cron.validate(expression)) {
    throw new ScheduleError(`Invalid worker.dispatch_cron expression: ${expression}`, { expression });
  }

  stopWorker();
  dispatchTask = cron.schedule(expression, () => {
    void tick(db, dispatcher);
  });

  logger.info({ dispatch_cron: expression }, 'Worker started');
}

export function stopWorker(): void {
  if (!dispatchTask) return;
  dispatchTask.stop();
  dispatchTask = null;
  logger.info('Worker stopped');
}

export function isWorkerRunning(): boolean {
  return dispatchTask !== null;
}
