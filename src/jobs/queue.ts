import { Queue, QueueOptions } from 'bullmq';
import { redis } from '../config/redis';
import { logger } from '../utils/logger';
import {
  queueWaitingJobs,
  queueActiveJobs,
  queueCompletedJobs,
  queueFailedJobs,
} from '../config/metrics';
import type { StarSchemaEtlJobData } from '../validators/runs.validator';

export const STAR_SCHEMA_ETL_QUEUE = 'star-schema-etl';

// A failed full refresh is never retried automatically; recovery is a new run.
const defaultQueueOptions: QueueOptions = {
  connection: redis,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: {
      count: 100,
      age: 7 * 24 * 3600,
    },
    removeOnFail: {
      count: 500,
    },
  },
};

export const starSchemaEtlQueue = new Queue<StarSchemaEtlJobData>(STAR_SCHEMA_ETL_QUEUE, defaultQueueOptions);

starSchemaEtlQueue.on('error', (error) => {
  logger.error(`Queue ${STAR_SCHEMA_ETL_QUEUE} error`, { error: error.message });
});

starSchemaEtlQueue.on('waiting', (job) => {
  logger.debug(`Job ${job.id} is waiting in queue ${STAR_SCHEMA_ETL_QUEUE}`);
});

export async function enqueueStarSchemaEtl(data: StarSchemaEtlJobData): Promise<string | undefined> {
  const job = await starSchemaEtlQueue.add('full-refresh', data);
  return job.id;
}

async function collectQueueMetrics() {
  try {
    const counts = await starSchemaEtlQueue.getJobCounts('waiting', 'active', 'completed', 'failed');

    queueWaitingJobs.set({ queue_name: STAR_SCHEMA_ETL_QUEUE }, counts.waiting || 0);
    queueActiveJobs.set({ queue_name: STAR_SCHEMA_ETL_QUEUE }, counts.active || 0);
    queueCompletedJobs.set({ queue_name: STAR_SCHEMA_ETL_QUEUE }, counts.completed || 0);
    queueFailedJobs.set({ queue_name: STAR_SCHEMA_ETL_QUEUE }, counts.failed || 0);
  } catch (error) {
    logger.error(`Failed to collect metrics for queue ${STAR_SCHEMA_ETL_QUEUE}`, { error });
  }
}

let metricsInterval: NodeJS.Timeout | null = null;

export function startQueueMetricsCollection(intervalMs: number = 10000) {
  if (metricsInterval) {
    return;
  }

  void collectQueueMetrics();

  metricsInterval = setInterval(() => {
    void collectQueueMetrics();
  }, intervalMs);

  logger.info('Queue metrics collection started', { intervalMs });
}

export async function closeQueues() {
  if (metricsInterval) {
    clearInterval(metricsInterval);
    metricsInterval = null;
  }

  await starSchemaEtlQueue.close();
}
