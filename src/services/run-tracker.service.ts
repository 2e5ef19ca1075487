import { subMinutes } from 'date-fns';
import { EtlRunRepository } from '../repositories/etl-run.repository';
import type { RunStore } from '../etl/interfaces';
import type { EtlRun } from '../drizzle/types';
import type { EtlPhase, TerminalRunStatus } from '../types';
import { BusinessRuleError, ConflictError, NotFoundError } from '../errors';
import { RUN_STALE_AFTER_MINUTES } from '../config/etl';
import { etlRunsTotal } from '../config/metrics';
import { logger } from '../utils/logger';

/**
 * Keeps the `etl_control` record of each pipeline execution. A run moves
 * RUNNING -> (phase tags) -> SUCCESS | FAILED; terminal runs are never touched
 * again. The run id is passed explicitly to every call.
 */
export class RunTrackerService {
  private store: RunStore;

  constructor(store?: RunStore, private readonly clock: () => Date = () => new Date()) {
    this.store = store ?? new EtlRunRepository();
  }

  async start(): Promise<number> {
    const now = this.clock();
    const staleBefore = subMinutes(now, RUN_STALE_AFTER_MINUTES);

    const active = await this.store.findActive(staleBefore.toISOString());
    if (active) {
      throw new ConflictError(`ETL run ${active.etlRunId} is still running`, 'RUN_IN_PROGRESS', {
        activeRunId: active.etlRunId,
        startedAt: active.runStartDatetime,
      });
    }

    const run = await this.store.create(now.toISOString());

    logger.info('ETL run started', { runId: run.etlRunId });

    return run.etlRunId;
  }

  async advance(runId: number, phase: EtlPhase, rowsProcessed?: number): Promise<EtlRun> {
    const updated = await this.store.updatePhase(runId, phase, rowsProcessed);
    if (!updated) {
      throw await this.inactiveRunError(runId);
    }

    logger.debug('ETL phase recorded', { runId, phase, rowsProcessed });

    return updated;
  }

  async complete(runId: number, status: TerminalRunStatus, error?: unknown): Promise<EtlRun> {
    const errorMessage =
      error === undefined ? undefined : error instanceof Error ? error.message : String(error);

    const finished = await this.store.finish(runId, status, this.clock().toISOString(), errorMessage);
    if (!finished) {
      throw await this.inactiveRunError(runId);
    }

    etlRunsTotal.inc({ status });

    if (status === 'SUCCESS') {
      logger.info('ETL run completed', { runId, recordsProcessed: finished.recordsProcessed });
    } else {
      logger.error('ETL run failed', { runId, phase: finished.etlPhase, error: errorMessage });
    }

    return finished;
  }

  private async inactiveRunError(runId: number) {
    const run = await this.store.findById(runId);
    if (!run) {
      return new NotFoundError(`ETL run ${runId}`);
    }
    return new BusinessRuleError(`ETL run ${runId} is ${run.status}`, 'RUN_NOT_ACTIVE', {
      runId,
      status: run.status,
    });
  }
}
