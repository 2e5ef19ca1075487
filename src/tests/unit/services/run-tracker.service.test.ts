import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RunTrackerService } from '../../../services/run-tracker.service';
import { BusinessRuleError, ConflictError, NotFoundError } from '../../../errors';
import * as metrics from '../../../config/metrics';
import { createEtlRun, createMockRunStore } from '../../utils/mock-factories';

vi.mock('../../../repositories/etl-run.repository', () => ({
  EtlRunRepository: vi.fn(),
}));
vi.mock('../../../config/metrics', () => ({
  etlRunsTotal: { inc: vi.fn() },
}));

describe('RunTrackerService - Unit Tests', () => {
  const now = new Date('2024-03-01T04:00:00.000Z');
  let store: ReturnType<typeof createMockRunStore>;
  let tracker: RunTrackerService;

  beforeEach(() => {
    vi.clearAllMocks();
    store = createMockRunStore();
    tracker = new RunTrackerService(store, () => now);
  });

  describe('start', () => {
    it('should create a RUNNING record and return its id', async () => {
      store.findActive.mockResolvedValue(null);
      store.create.mockResolvedValue(createEtlRun({ etlRunId: 7 }));

      const runId = await tracker.start();

      expect(runId).toBe(7);
      expect(store.findActive).toHaveBeenCalledWith('2024-03-01T02:00:00.000Z');
      expect(store.create).toHaveBeenCalledWith('2024-03-01T04:00:00.000Z');
    });

    it('should refuse to start while a recent run is still RUNNING', async () => {
      store.findActive.mockResolvedValue(createEtlRun({ etlRunId: 3 }));

      const error = await tracker.start().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictError);
      if (error instanceof ConflictError) {
        expect(error.errorCode).toBe('RUN_IN_PROGRESS');
        expect(error.statusCode).toBe(409);
      }
      expect(store.create).not.toHaveBeenCalled();
    });
  });

  describe('advance', () => {
    it('should record the phase tag and row count', async () => {
      store.updatePhase.mockResolvedValue(
        createEtlRun({ etlRunId: 3, etlPhase: 'FACT_TABLE_LOADED', recordsProcessed: 120 })
      );

      const run = await tracker.advance(3, 'FACT_TABLE_LOADED', 120);

      expect(run.etlPhase).toBe('FACT_TABLE_LOADED');
      expect(store.updatePhase).toHaveBeenCalledWith(3, 'FACT_TABLE_LOADED', 120);
    });

    it('should reject updates to a finished run', async () => {
      store.updatePhase.mockResolvedValue(null);
      store.findById.mockResolvedValue(createEtlRun({ etlRunId: 3, status: 'SUCCESS' }));

      const error = await tracker.advance(3, 'BRIDGES_LOADED').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BusinessRuleError);
      if (error instanceof BusinessRuleError) {
        expect(error.errorCode).toBe('RUN_NOT_ACTIVE');
      }
    });

    it('should report unknown runs as not found', async () => {
      store.updatePhase.mockResolvedValue(null);
      store.findById.mockResolvedValue(null);

      await expect(tracker.advance(404, 'BRIDGES_LOADED')).rejects.toThrow(NotFoundError);
    });
  });

  describe('complete', () => {
    it('should store the error message of a failed run', async () => {
      store.finish.mockResolvedValue(createEtlRun({ etlRunId: 3, status: 'FAILED', errorMessage: 'boom' }));

      await tracker.complete(3, 'FAILED', new Error('boom'));

      expect(store.finish).toHaveBeenCalledWith(3, 'FAILED', '2024-03-01T04:00:00.000Z', 'boom');
      expect(metrics.etlRunsTotal.inc).toHaveBeenCalledWith({ status: 'FAILED' });
    });

    it('should finish a successful run without an error message', async () => {
      store.finish.mockResolvedValue(createEtlRun({ etlRunId: 3, status: 'SUCCESS', etlPhase: 'COMPLETED' }));

      const run = await tracker.complete(3, 'SUCCESS');

      expect(run.etlPhase).toBe('COMPLETED');
      expect(store.finish).toHaveBeenCalledWith(3, 'SUCCESS', '2024-03-01T04:00:00.000Z', undefined);
      expect(metrics.etlRunsTotal.inc).toHaveBeenCalledWith({ status: 'SUCCESS' });
    });

    it('should reject completing a run twice', async () => {
      store.finish.mockResolvedValue(null);
      store.findById.mockResolvedValue(createEtlRun({ etlRunId: 3, status: 'FAILED' }));

      await expect(tracker.complete(3, 'SUCCESS')).rejects.toThrow(BusinessRuleError);
      expect(metrics.etlRunsTotal.inc).not.toHaveBeenCalled();
    });
  });
});
