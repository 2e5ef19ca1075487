import { Worker } from 'bullmq';
import express from 'express';
import 'dotenv/config';
import { processStarSchemaEtl } from './jobs/star-schema-etl.job';
import { STAR_SCHEMA_ETL_QUEUE } from './jobs/queue';
import { closeDatabaseConnection } from './config/database';
import { logger } from './utils/logger';
import { jobProcessingDuration, jobProcessedTotal, register } from './config/metrics';
import type { StarSchemaEtlJobData } from './validators/runs.validator';

const REDIS_URL = process.env.REDIS_URL || 'redis://localhost:6379';
const WORKER_PORT = parseInt(process.env.WORKER_PORT || '3002');

const connection = {
  host: new URL(REDIS_URL).hostname,
  port: parseInt(new URL(REDIS_URL).port || '6379'),
  maxRetriesPerRequest: null,
};

function wrapProcessorWithMetrics<J, T>(
  jobType: string,
  processor: (job: J) => Promise<T>
) {
  return async (job: J): Promise<T> => {
    const startTime = Date.now();

    try {
      const result = await processor(job);

      const duration = (Date.now() - startTime) / 1000;
      jobProcessingDuration.observe(
        { job_type: jobType, status: 'success' },
        duration
      );
      jobProcessedTotal.inc({ job_type: jobType, status: 'success' });

      return result;
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      jobProcessingDuration.observe(
        { job_type: jobType, status: 'failed' },
        duration
      );
      jobProcessedTotal.inc({ job_type: jobType, status: 'failed' });

      throw error;
    }
  };
}

// One refresh at a time: a second concurrent full refresh would truncate
// under the first.
const etlWorker = new Worker<StarSchemaEtlJobData>(
  STAR_SCHEMA_ETL_QUEUE,
  wrapProcessorWithMetrics(STAR_SCHEMA_ETL_QUEUE, processStarSchemaEtl),
  {
    connection,
    concurrency: 1,
  }
);

etlWorker.on('completed', (job) => {
  logger.info(`Job ${job.id} completed`, {
    queueName: etlWorker.name,
  });
});

etlWorker.on('failed', (job, error) => {
  logger.error(`Job ${job?.id} failed`, {
    queueName: etlWorker.name,
    error: error.message,
    jobData: job?.data,
  });
});

etlWorker.on('error', (error) => {
  logger.error(`Worker ${etlWorker.name} error`, {
    error: error.message,
  });
});

logger.info('Worker started', { queue: STAR_SCHEMA_ETL_QUEUE, concurrency: 1 });

const app = express();

app.get('/metrics', async (req, res) => {
  res.set('Content-Type', register.contentType);
  const metrics = await register.metrics();
  res.send(metrics);
});

app.get('/health', (req, res) => {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    workers: {
      [STAR_SCHEMA_ETL_QUEUE]: { active: etlWorker.isRunning() },
    },
  });
});

const server = app.listen(WORKER_PORT, () => {
  logger.info(`Worker metrics available at http://localhost:${WORKER_PORT}/metrics`);
  logger.info(`Worker health check at http://localhost:${WORKER_PORT}/health`);
});

const shutdown = () => {
  logger.info('Shutting down worker gracefully...');

  server.close(async () => {
    try {
      await etlWorker.close();
      await closeDatabaseConnection();
      logger.info('Worker closed');
      process.exit(0);
    } catch (error) {
      logger.error('Error during worker shutdown', { error });
      process.exit(1);
    }
  });

  setTimeout(() => {
    logger.error('Forced worker shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
