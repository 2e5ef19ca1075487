import { and, desc, eq, gte, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository';
import { etlControl } from '../drizzle/olap.schema';
import type { EtlRun } from '../drizzle/types';
import type { RunStore } from '../etl/interfaces';
import type { EtlPhase, RunStatus, TerminalRunStatus } from '../types';

export class EtlRunRepository extends BaseRepository implements RunStore {
  async create(startedAt: string): Promise<EtlRun> {
    const [run] = await this.db
      .insert(etlControl)
      .values({
        runStartDatetime: startedAt,
        status: 'RUNNING',
        etlPhase: 'INITIALIZATION',
      })
      .returning();

    return run;
  }

  async findById(runId: number): Promise<EtlRun | null> {
    const [run] = await this.db
      .select()
      .from(etlControl)
      .where(eq(etlControl.etlRunId, runId))
      .limit(1);

    return run || null;
  }

  async findActive(startedAfter: string): Promise<EtlRun | null> {
    const [run] = await this.db
      .select()
      .from(etlControl)
      .where(and(eq(etlControl.status, 'RUNNING'), gte(etlControl.runStartDatetime, startedAfter)))
      .orderBy(desc(etlControl.runStartDatetime))
      .limit(1);

    return run || null;
  }

  async updatePhase(runId: number, phase: EtlPhase, recordsProcessed?: number): Promise<EtlRun | null> {
    const [updated] = await this.db
      .update(etlControl)
      .set({
        etlPhase: phase,
        ...(recordsProcessed !== undefined && { recordsProcessed }),
      })
      .where(and(eq(etlControl.etlRunId, runId), eq(etlControl.status, 'RUNNING')))
      .returning();

    return updated || null;
  }

  async finish(
    runId: number,
    status: TerminalRunStatus,
    endedAt: string,
    errorMessage?: string
  ): Promise<EtlRun | null> {
    const [updated] = await this.db
      .update(etlControl)
      .set({
        status,
        runEndDatetime: endedAt,
        errorMessage: errorMessage ?? null,
        ...(status === 'SUCCESS' && { etlPhase: 'COMPLETED' }),
      })
      .where(and(eq(etlControl.etlRunId, runId), eq(etlControl.status, 'RUNNING')))
      .returning();

    return updated || null;
  }

  async list(query: { status?: RunStatus; limit: number; offset: number }): Promise<{ data: EtlRun[]; total: number }> {
    const condition = query.status ? eq(etlControl.status, query.status) : undefined;

    const [{ count }] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(etlControl)
      .where(condition);

    const data = await this.db
      .select()
      .from(etlControl)
      .where(condition)
      .orderBy(desc(etlControl.etlRunId))
      .limit(query.limit)
      .offset(query.offset);

    return { data, total: Number(count) };
  }
}
