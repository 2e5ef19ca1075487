import { Job } from 'bullmq';
import { parseISO } from 'date-fns';
import { StarSchemaPipeline } from '../etl/pipeline';
import type { PipelineResult } from '../etl/interfaces';
import { starSchemaEtlJobSchema, StarSchemaEtlJobData } from '../validators/runs.validator';
import { logger } from '../utils/logger';

export type StarSchemaEtlJob = Pick<Job<StarSchemaEtlJobData>, 'id' | 'data'>;

export async function processStarSchemaEtl(job: StarSchemaEtlJob): Promise<PipelineResult> {
  const { requestedBy, requestedAt, asOfDate } = starSchemaEtlJobSchema.parse(job.data);

  logger.info('Processing star schema refresh', {
    jobId: job.id,
    requestedBy,
    requestedAt,
    asOfDate,
  });

  const pipeline = new StarSchemaPipeline();
  const result = await pipeline.run({
    asOf: asOfDate ? parseISO(asOfDate) : undefined,
  });

  logger.info('Star schema refresh processed', {
    jobId: job.id,
    runId: result.runId,
    durationMs: result.durationMs,
    facts: result.tables.facts,
    exclusions: result.exclusions,
  });

  return result;
}
