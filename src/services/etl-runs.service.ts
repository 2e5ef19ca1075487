import { subMinutes } from 'date-fns';
import { EtlRunRepository } from '../repositories/etl-run.repository';
import { enqueueStarSchemaEtl } from '../jobs/queue';
import { ConflictError, NotFoundError } from '../errors';
import type { EtlRun } from '../drizzle/types';
import type { PaginatedResponse } from '../types';
import type { ListRunsQuery, TriggerRunInput } from '../validators/runs.validator';
import { RUN_STALE_AFTER_MINUTES } from '../config/etl';
import { logger } from '../utils/logger';

export interface RunRequest {
  jobId: string | undefined;
  requestedBy: string;
  requestedAt: string;
}

export class EtlRunsService {
  private repository: EtlRunRepository;

  constructor() {
    this.repository = new EtlRunRepository();
  }

  async listRuns(query: ListRunsQuery): Promise<PaginatedResponse<EtlRun>> {
    const { data, total } = await this.repository.list(query);

    return {
      data,
      pagination: {
        total,
        limit: query.limit,
        offset: query.offset,
        hasMore: query.offset + query.limit < total,
      },
    };
  }

  async getRun(runId: number): Promise<EtlRun> {
    const run = await this.repository.findById(runId);
    if (!run) {
      throw new NotFoundError(`ETL run ${runId}`);
    }
    return run;
  }

  /**
   * Queues a full refresh. Refused up front while a run is active; the run
   * tracker checks again when the worker picks the job up.
   */
  async requestRun(input: TriggerRunInput): Promise<RunRequest> {
    const staleBefore = subMinutes(new Date(), RUN_STALE_AFTER_MINUTES);
    const active = await this.repository.findActive(staleBefore.toISOString());
    if (active) {
      throw new ConflictError(`ETL run ${active.etlRunId} is still running`, 'RUN_IN_PROGRESS', {
        activeRunId: active.etlRunId,
      });
    }

    const requestedAt = new Date().toISOString();
    const jobId = await enqueueStarSchemaEtl({ ...input, requestedAt });

    logger.info('Star schema refresh queued', { jobId, requestedBy: input.requestedBy });

    return { jobId, requestedBy: input.requestedBy, requestedAt };
  }
}
