import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EtlRunsService } from '../../../services/etl-runs.service';
import { ConflictError, NotFoundError } from '../../../errors';
import { enqueueStarSchemaEtl } from '../../../jobs/queue';
import { createEtlRun } from '../../utils/mock-factories';

const mockRepository = vi.hoisted(() => ({
  findById: vi.fn(),
  findActive: vi.fn(),
  list: vi.fn(),
}));

vi.mock('../../../repositories/etl-run.repository', () => ({
  EtlRunRepository: vi.fn(function () {
    return mockRepository;
  }),
}));
vi.mock('../../../jobs/queue', () => ({
  enqueueStarSchemaEtl: vi.fn(),
}));

describe('EtlRunsService - Unit Tests', () => {
  let service: EtlRunsService;

  beforeEach(() => {
    vi.clearAllMocks();
    service = new EtlRunsService();
  });

  describe('listRuns', () => {
    it('should paginate the run history', async () => {
      const runs = [createEtlRun({ etlRunId: 5 }), createEtlRun({ etlRunId: 4 })];
      mockRepository.list.mockResolvedValue({ data: runs, total: 5 });

      const result = await service.listRuns({ limit: 2, offset: 0 });

      expect(result).toEqual({
        data: runs,
        pagination: { total: 5, limit: 2, offset: 0, hasMore: true },
      });
      expect(mockRepository.list).toHaveBeenCalledWith({ limit: 2, offset: 0 });
    });

    it('should report the last page', async () => {
      mockRepository.list.mockResolvedValue({ data: [createEtlRun()], total: 3 });

      const result = await service.listRuns({ status: 'RUNNING', limit: 2, offset: 2 });

      expect(result.pagination.hasMore).toBe(false);
    });
  });

  describe('getRun', () => {
    it('should return an existing run', async () => {
      const run = createEtlRun({ etlRunId: 9, status: 'SUCCESS' });
      mockRepository.findById.mockResolvedValue(run);

      await expect(service.getRun(9)).resolves.toEqual(run);
    });

    it('should throw NotFoundError for unknown runs', async () => {
      mockRepository.findById.mockResolvedValue(null);

      await expect(service.getRun(9)).rejects.toThrow(NotFoundError);
    });
  });

  describe('requestRun', () => {
    it('should queue a refresh when no run is active', async () => {
      mockRepository.findActive.mockResolvedValue(null);
      vi.mocked(enqueueStarSchemaEtl).mockResolvedValue('job-1');

      const request = await service.requestRun({ requestedBy: 'scheduler', asOfDate: '2024-06-30' });

      expect(request.jobId).toBe('job-1');
      expect(request.requestedBy).toBe('scheduler');
      expect(enqueueStarSchemaEtl).toHaveBeenCalledWith({
        requestedBy: 'scheduler',
        asOfDate: '2024-06-30',
        requestedAt: request.requestedAt,
      });
    });

    it('should refuse while a run is active', async () => {
      mockRepository.findActive.mockResolvedValue(createEtlRun({ etlRunId: 2 }));

      await expect(service.requestRun({ requestedBy: 'api' })).rejects.toThrow(ConflictError);
      expect(enqueueStarSchemaEtl).not.toHaveBeenCalled();
    });
  });
});
