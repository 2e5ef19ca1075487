import client from 'prom-client';

export const register = new client.Registry();

client.collectDefaultMetrics({ register });

export const isMetricsEnabled = (): boolean => {
  return process.env.ENABLE_METRICS !== 'false';
};

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestTotal = new client.Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

export const jobProcessingDuration = new client.Histogram({
  name: 'job_processing_duration_seconds',
  help: 'Duration of background job processing',
  labelNames: ['job_type', 'status'],
  buckets: [1, 5, 15, 30, 60, 300, 900],
  registers: [register],
});

export const jobProcessedTotal = new client.Counter({
  name: 'jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['job_type', 'status'],
  registers: [register],
});

export const etlRunsTotal = new client.Counter({
  name: 'etl_runs_total',
  help: 'Total number of finished ETL runs',
  labelNames: ['status'],
  registers: [register],
});

export const etlPhaseDuration = new client.Histogram({
  name: 'etl_phase_duration_seconds',
  help: 'Duration of ETL phases',
  labelNames: ['phase'],
  buckets: [0.05, 0.1, 0.5, 1, 5, 15, 60, 300],
  registers: [register],
});

export const etlRowsPublished = new client.Gauge({
  name: 'etl_rows_published',
  help: 'Rows written to each star schema table by the last successful run',
  labelNames: ['table'],
  registers: [register],
});

export const etlRowsExcluded = new client.Counter({
  name: 'etl_rows_excluded_total',
  help: 'Source rows left out of the star schema',
  labelNames: ['reason'],
  registers: [register],
});

export const queueWaitingJobs = new client.Gauge({
  name: 'queue_waiting_jobs',
  help: 'Number of jobs waiting in queue',
  labelNames: ['queue_name'],
  registers: [register],
});

export const queueActiveJobs = new client.Gauge({
  name: 'queue_active_jobs',
  help: 'Number of jobs currently being processed',
  labelNames: ['queue_name'],
  registers: [register],
});

export const queueCompletedJobs = new client.Gauge({
  name: 'queue_completed_jobs',
  help: 'Number of completed jobs',
  labelNames: ['queue_name'],
  registers: [register],
});

export const queueFailedJobs = new client.Gauge({
  name: 'queue_failed_jobs',
  help: 'Number of failed jobs',
  labelNames: ['queue_name'],
  registers: [register],
});
