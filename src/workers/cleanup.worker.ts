import { Worker, Job } from 'bullmq';
import { connection, QUEUE_NAMES, SweepJobData } from '../config/queue';
import { MemoryStore } from '../services/memory/memory.store';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type SweepJob = Pick<Job<SweepJobData>, 'id' | 'data'>;

export async function processSweep(job: SweepJob, store: MemoryStore): Promise<{ removed: number }> {
  try {
    const removed = await store.sweepExpired(new Date());
    logger.info('Expiry sweep completed', { jobId: job.id, requestedBy: job.data.requestedBy, removed });
    return { removed };
  } catch (error) {
    logger.error('Expiry sweep failed', { jobId: job.id, error: errorMessage(error) });
    throw error;
  }
}

export function createCleanupWorker(store: MemoryStore): Worker<SweepJobData> {
  const worker = new Worker<SweepJobData>(
    QUEUE_NAMES.MEMORY_MAINTENANCE,
    (job) => processSweep(job, store),
    {
      connection,
      concurrency: 1,
    }
  );

  worker.on('failed', (job, err) => {
    logger.error('Expiry sweep job failed', { jobId: job?.id, error: err.message });
  });

  worker.on('error', (err) => {
    logger.error('Cleanup worker error', { error: err.message });
  });

  return worker;
}
