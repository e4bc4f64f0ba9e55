// =====================================================
// Rank Sync Queue - Periodic Reconciliation
// =====================================================
// BullMQ worker that runs a bulk rank sync on a fixed interval
// (RANK_SYNC_INTERVAL_MS, hourly by default).
//
// Passes are idempotent: an overlapping on-demand sync converges
// on the same external state.
// =====================================================

import { Queue, Worker, Job } from 'bullmq';
import { BulkSyncSummary } from '@rank-ledger/shared-types';
import { getQueueConnection, getWorkerConnection } from './connection';
import { logger } from '../utils/logger';
import { config } from '../config';
import { RankSyncService } from '../services/ranks/rank-sync.service';

// ===========================================
// Queue Name Constants
// ===========================================

export const RANK_SYNC_QUEUE_NAME = 'rank-sync-queue';
export const PERIODIC_RANK_SYNC_JOB = 'periodic-rank-sync';

// ===========================================
// Job Types
// ===========================================

export interface RankSyncJobData {
  triggeredBy: 'scheduled';
}

export type RankSyncJobResult = BulkSyncSummary;

// ===========================================
// Queue Instance (Singleton)
// ===========================================

let rankSyncQueue: Queue<RankSyncJobData, RankSyncJobResult> | null = null;
let rankSyncWorker: Worker<RankSyncJobData, RankSyncJobResult> | null = null;

export function getRankSyncQueue(): Queue<RankSyncJobData, RankSyncJobResult> {
  if (!rankSyncQueue) {
    rankSyncQueue = new Queue<RankSyncJobData, RankSyncJobResult>(RANK_SYNC_QUEUE_NAME, {
      connection: getQueueConnection(),
      defaultJobOptions: {
        // A failed pass is simply picked up by the next interval
        attempts: 1,
        removeOnComplete: {
          age: 24 * 60 * 60,
          count: 100,
        },
        removeOnFail: {
          age: 7 * 24 * 60 * 60,
        },
      },
    });

    logger.info(`Rank sync queue initialized: ${RANK_SYNC_QUEUE_NAME}`);
  }

  return rankSyncQueue;
}

// ===========================================
// Job Processor
// ===========================================

export function createRankSyncProcessor(rankSync: RankSyncService) {
  return async (job: Pick<Job<RankSyncJobData, RankSyncJobResult>, 'id' | 'data'>): Promise<RankSyncJobResult> => {
    logger.info(`Processing rank sync job ${job.id} (${job.data.triggeredBy})`);
    return rankSync.bulkSync();
  };
}

// ===========================================
// Worker Management
// ===========================================

/**
 * Start the rank sync worker. Call once during startup.
 */
export function startRankSyncWorker(rankSync: RankSyncService): Worker<RankSyncJobData, RankSyncJobResult> {
  if (rankSyncWorker) {
    logger.warn('Rank sync worker already running');
    return rankSyncWorker;
  }

  rankSyncWorker = new Worker<RankSyncJobData, RankSyncJobResult>(
    RANK_SYNC_QUEUE_NAME,
    createRankSyncProcessor(rankSync),
    {
      connection: getWorkerConnection(),
      // One pass at a time; the bulk sync already throttles itself
      concurrency: 1,
    }
  );

  rankSyncWorker.on('completed', (job, result) => {
    logger.info(
      `Rank sync job ${job.id} completed: ${result.updated} updated, ${result.noChange} unchanged, ${result.skipped} skipped, ${result.errors} errors`
    );
  });

  rankSyncWorker.on('failed', (job, error) => {
    logger.error(`Rank sync job ${job?.id} failed:`, error);
  });

  rankSyncWorker.on('error', (error) => {
    logger.error('Rank sync worker error:', error);
  });

  logger.info('Rank sync worker started');
  return rankSyncWorker;
}

export async function stopRankSyncWorker(): Promise<void> {
  if (rankSyncWorker) {
    await rankSyncWorker.close();
    rankSyncWorker = null;
    logger.info('Rank sync worker stopped');
  }

  if (rankSyncQueue) {
    await rankSyncQueue.close();
    rankSyncQueue = null;
  }
}

// ===========================================
// Job Scheduling
// ===========================================

/**
 * Replaces the repeatable periodic sync job.
 */
export async function schedulePeriodicRankSync(intervalMs: number = config.rankSync.intervalMs): Promise<void> {
  const queue = getRankSyncQueue();

  const repeatableJobs = await queue.getRepeatableJobs();
  for (const job of repeatableJobs) {
    if (job.name === PERIODIC_RANK_SYNC_JOB) {
      await queue.removeRepeatableByKey(job.key);
    }
  }

  if (!config.rankSync.enabled) {
    logger.info('Periodic rank sync is disabled (RANK_SYNC_ENABLED=false)');
    return;
  }

  await queue.add(
    PERIODIC_RANK_SYNC_JOB,
    { triggeredBy: 'scheduled' },
    {
      repeat: { every: intervalMs },
      jobId: PERIODIC_RANK_SYNC_JOB,
    }
  );

  logger.info(`Periodic rank sync scheduled every ${Math.round(intervalMs / 1000)}s`);
}
